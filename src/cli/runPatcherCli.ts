import { Iso9660Library } from "../authoring/iso9660Writer.js";
import type { IsoLibrary } from "../authoring/isoLibrary.js";
import {
  loadConfig,
  mergeConfig,
  type PatcherConfigOverride,
} from "../config.js";
import { CancelledError, CliHelpRequested, CliUsageError } from "../errors.js";
import { readIsoDescriptors } from "../iso/volumeDescriptor.js";
import { createLogger, toLoggerFns, type LoggerFn } from "../logger.js";
import { patchIso } from "../orchestrator/patchIso.js";
import { ProcessToolRunner, type ToolRunner } from "../tools/toolRunner.js";
import { defaultOutputPath, parseCliArgs, type CliArgs } from "./args.js";
import { renderCliError } from "./renderCliError.js";
import { USAGE } from "./usage.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

type RunPatcherCliOpts = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  out?: (text: string) => void;
  err?: (text: string) => void;
  runner?: ToolRunner;
  isoLibrary?: IsoLibrary | null;
  log?: LoggerFn;
  logWarn?: LoggerFn;
};

function cliOverrides(args: CliArgs): PatcherConfigOverride {
  const override: PatcherConfigOverride = {};
  if (args.volumeLabel) override.volume_label = args.volumeLabel;
  if (args.workDir) override.work_dir = args.workDir;
  if (args.noValidate) override.validation = { enabled: false };
  return override;
}

async function inspectIso(
  isoPath: string,
  out: (text: string) => void,
): Promise<void> {
  const descriptors = await readIsoDescriptors(isoPath);
  out(`${JSON.stringify(descriptors, null, 2)}\n`);
}

export async function runPatcherCli(
  argv: string[],
  opts?: RunPatcherCliOpts,
): Promise<number> {
  const out = opts?.out ?? ((text: string) => void process.stdout.write(text));
  const err = opts?.err ?? ((text: string) => void process.stderr.write(text));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    if (e instanceof CliHelpRequested) {
      out(USAGE);
      return EXIT_OK;
    }
    if (e instanceof CliUsageError) {
      err(renderCliError(e));
      err(USAGE);
      return EXIT_FAILURE;
    }
    throw e;
  }

  try {
    if (args.inspect) {
      await inspectIso(args.inspect, out);
      return EXIT_OK;
    }

    const { targetIso, referenceIso } = args;
    if (!targetIso || !referenceIso) {
      throw new CliUsageError("target ISO and reference ISO are required");
    }

    const loaded = await loadConfig({
      configPath: args.configPath ?? undefined,
      profile: args.profile ?? undefined,
      cwd: opts?.cwd,
      env: opts?.env,
    });
    const config = mergeConfig(loaded, cliOverrides(args));

    let log = opts?.log;
    let logWarn = opts?.logWarn;
    if (!log) {
      const fns = toLoggerFns(createLogger({ env: opts?.env }));
      log = fns.log;
      logWarn = logWarn ?? fns.logWarn;
    }
    const runner = opts?.runner ?? new ProcessToolRunner({ log });
    // null turns the in-process fallback off
    const isoLibrary =
      opts?.isoLibrary === undefined ? new Iso9660Library() : opts.isoLibrary;

    const result = await patchIso(
      { config, runner, isoLibrary, log, logWarn },
      {
        targetIso,
        referenceIso,
        outputIso: args.outputIso ?? defaultOutputPath(targetIso),
        signal: opts?.signal,
      },
    );

    const last = result.attempts[result.attempts.length - 1];
    const used = last?.strategyName ?? "unknown";
    out(
      `Patched ISO written to ${result.outputPath} ` +
        `(${result.sizeBytes} bytes, ${used})\n`,
    );
    return EXIT_OK;
  } catch (e) {
    err(renderCliError(e));
    return e instanceof CancelledError ? EXIT_CANCELLED : EXIT_FAILURE;
  }
}
