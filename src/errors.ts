import type { AuthoringAttempt } from "./authoring/types.js";
import type { ValidationResult } from "./validation/validateImage.js";
import type { ExitResult } from "./tools/toolRunner.js";

export class PatcherError extends Error {
  readonly hints: string[];

  constructor(
    message: string,
    hints: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PatcherError";
    this.hints = hints;
  }
}

export class CliUsageError extends PatcherError {
  constructor(message: string, hints: string[] = []) {
    super(message, hints);
    this.name = "CliUsageError";
  }
}

export class CliHelpRequested extends Error {
  constructor() {
    super("help requested");
    this.name = "CliHelpRequested";
  }
}

export class ToolInvocationError extends PatcherError {
  constructor(
    readonly tool: string,
    readonly args: string[],
    readonly result: ExitResult,
    label: string,
  ) {
    super(`${label} failed (${describeExit(result)})`, tailLines(result));
    this.name = "ToolInvocationError";
  }
}

export class MetadataExtractionError extends PatcherError {
  constructor(
    message: string,
    hints: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, hints, options);
    this.name = "MetadataExtractionError";
  }
}

export class ContainerRebuildError extends PatcherError {
  constructor(
    message: string,
    readonly containerPath: string,
    options?: { cause?: unknown; hints?: string[] },
  ) {
    super(message, options?.hints ?? [], { cause: options?.cause });
    this.name = "ContainerRebuildError";
  }
}

export class IsoAuthoringExhaustedError extends PatcherError {
  constructor(readonly attempts: AuthoringAttempt[]) {
    super(
      `All ${attempts.length} ISO authoring strategies failed`,
      attempts.map((a) => `${a.strategyName}: ${failureReason(a)}`),
    );
    this.name = "IsoAuthoringExhaustedError";
  }

  get reasons(): string[] {
    return this.attempts.map(failureReason);
  }
}

export class ValidationFailure extends PatcherError {
  constructor(readonly result: ValidationResult) {
    super(
      `validation failed: ${result.problems.join("; ") || "unknown problem"}`,
    );
    this.name = "ValidationFailure";
  }
}

export class EnvironmentMissingToolError extends PatcherError {
  constructor(
    readonly missing: string[],
    hints: string[],
  ) {
    super(`Required tools are not available: ${missing.join(", ")}`, hints);
    this.name = "EnvironmentMissingToolError";
  }
}

export class CancelledError extends PatcherError {
  constructor(stage?: string) {
    super(stage ? `Cancelled during ${stage}` : "Cancelled");
    this.name = "CancelledError";
  }
}

export function throwIfCancelled(
  signal: AbortSignal | undefined,
  stage?: string,
): void {
  if (signal?.aborted) throw new CancelledError(stage);
}

function failureReason(attempt: AuthoringAttempt): string {
  const { outcome } = attempt;
  return outcome.kind === "failed" ? outcome.reason : "succeeded";
}

function describeExit(result: ExitResult): string {
  if (result.spawnError) return result.spawnError;
  if (result.signal) return `killed by ${result.signal}`;
  return `exit code ${result.code ?? "unknown"}`;
}

function tailLines(result: ExitResult): string[] {
  const text = `${result.stderr}\n${result.stdout}`.trim();
  if (!text) return [];
  return text.split(/\r?\n/).filter((l) => l.trim()).slice(-5);
}
