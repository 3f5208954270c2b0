import { IsoAuthoringExhaustedError, PatcherError } from "../errors.js";

function causeMessage(err: Error): string | null {
  const cause: unknown = err.cause;
  if (!cause) return null;
  const msg = cause instanceof Error ? cause.message : String(cause);
  return msg && !err.message.includes(msg) ? msg : null;
}

export function renderCliError(err: unknown): string {
  if (!(err instanceof Error)) return `error: ${String(err)}\n`;

  const lines = [`error: ${err.message}`];
  if (err instanceof IsoAuthoringExhaustedError) {
    for (const [i, attempt] of err.attempts.entries()) {
      lines.push(`  ${i + 1}. ${attempt.strategyName}: ${err.reasons[i]}`);
    }
  } else if (err instanceof PatcherError) {
    for (const hint of err.hints) lines.push(`  hint: ${hint}`);
  }
  const cause = causeMessage(err);
  if (cause) lines.push(`  cause: ${cause}`);
  return `${lines.join("\n")}\n`;
}
