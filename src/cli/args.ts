import path from "node:path";

import { CliHelpRequested, CliUsageError } from "../errors.js";

export type CliArgs = {
  targetIso: string | null;
  referenceIso: string | null;
  outputIso: string | null;
  configPath: string | null;
  profile: string | null;
  volumeLabel: string | null;
  workDir: string | null;
  noValidate: boolean;
  inspect: string | null;
};

const VALUE_OPTIONS = [
  "--config",
  "--profile",
  "--volume-label",
  "--work-dir",
  "--inspect",
] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((o) => o === name);
}

export const MAX_VOLUME_LABEL_LENGTH = 32;

export function parseCliArgs(argv: string[]): CliArgs {
  const values = new Map<ValueOption, string>();
  const positional: string[] = [];
  let noValidate = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (arg === "-h" || arg === "--help") throw new CliHelpRequested();
    if (arg === "--no-validate") {
      noValidate = true;
      continue;
    }
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const name = eq === -1 ? arg : arg.slice(0, eq);
      if (!isValueOption(name)) {
        throw new CliUsageError(`unknown option: ${name}`);
      }
      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i += 1;
      }
      if (!value?.trim()) throw new CliUsageError(`${name} requires a value`);
      values.set(name, value);
      continue;
    }
    positional.push(arg);
  }

  const inspect = values.get("--inspect") ?? null;
  if (!inspect && positional.length < 2) {
    throw new CliUsageError("target ISO and reference ISO are required", [
      "usage: bootcamp-iso-patcher <target_iso> <reference_iso> [output_iso]",
    ]);
  }
  if (positional.length > 3) {
    throw new CliUsageError(`unexpected argument: ${positional[3]}`);
  }

  const volumeLabel = values.get("--volume-label") ?? null;
  if (volumeLabel && volumeLabel.length > MAX_VOLUME_LABEL_LENGTH) {
    throw new CliUsageError(
      `volume label must be at most ${MAX_VOLUME_LABEL_LENGTH} characters`,
    );
  }

  return {
    targetIso: positional[0] ?? null,
    referenceIso: positional[1] ?? null,
    outputIso: positional[2] ?? null,
    configPath: values.get("--config") ?? null,
    profile: values.get("--profile") ?? null,
    volumeLabel,
    workDir: values.get("--work-dir") ?? null,
    noValidate,
    inspect,
  };
}

/** `<dir>/<stem>_bootcamp.iso` next to the target. */
export function defaultOutputPath(targetIso: string): string {
  const parsed = path.parse(targetIso);
  return path.join(parsed.dir, `${parsed.name}_bootcamp.iso`);
}
