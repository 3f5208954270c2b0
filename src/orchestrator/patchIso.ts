import { stat } from "node:fs/promises";
import path from "node:path";

import { locateBootImages } from "../authoring/bootCatalog.js";
import type { IsoLibrary } from "../authoring/isoLibrary.js";
import {
  runAuthoringPipeline,
  type AuthoringValidator,
} from "../authoring/pipeline.js";
import { defaultStrategies } from "../authoring/strategies.js";
import type {
  AuthoringAttempt,
  AuthoringRequest,
  AuthoringStrategy,
} from "../authoring/types.js";
import type { PatcherConfig } from "../config.js";
import { checkEnvironment } from "../environment/checkEnvironment.js";
import { PatcherError, throwIfCancelled } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import {
  BOOT_CONTAINER_PATH,
  INSTALL_CONTAINER_PATHS,
  extractSourceMetadata,
  type SourceMetadata,
} from "../metadata/sourceMetadata.js";
import {
  rebrandInstallContainer,
  rebuildBootContainer,
} from "../rebuild/containerRebuild.js";
import { planRegistryPatch } from "../registry/patchPlan.js";
import { HivexTool } from "../tools/hivex.js";
import { IsoExtractTool } from "../tools/isoExtract.js";
import type { ToolRunner } from "../tools/toolRunner.js";
import { WimTool } from "../tools/wimlib.js";
import {
  directorySize,
  findPathCaseInsensitive,
  moveFileAtomic,
} from "../utils/fsUtils.js";
import {
  validateImage,
  type ValidationResult,
} from "../validation/validateImage.js";
import { BuildWorkspace } from "../workspace/buildWorkspace.js";
import {
  describeStageEvent,
  type StageEvent,
  type StageEventSink,
} from "./events.js";

export type PatchIsoDeps = {
  config: PatcherConfig;
  runner: ToolRunner;
  isoLibrary?: IsoLibrary | null;
  // replaces the default fallback order; mainly for tests
  strategies?: readonly AuthoringStrategy[];
  log: LoggerFn;
  logWarn?: LoggerFn;
};

export type PatchIsoRequest = {
  targetIso: string;
  referenceIso: string;
  outputIso: string;
  signal?: AbortSignal;
  onEvent?: StageEventSink;
};

export type PatchIsoResult = {
  outputPath: string;
  sizeBytes: number;
  metadata: SourceMetadata;
  attempts: AuthoringAttempt[];
  validation: ValidationResult | null;
};

async function assertFile(p: string, what: string): Promise<void> {
  const st = await stat(p).catch(() => null);
  if (!st?.isFile()) throw new PatcherError(`${what} not found: ${p}`);
}

export async function validatePatchRequest(
  req: PatchIsoRequest,
  config: PatcherConfig,
): Promise<void> {
  await assertFile(req.targetIso, "target ISO");
  await assertFile(req.referenceIso, "reference ISO");

  const outDir = path.dirname(path.resolve(req.outputIso));
  const dirStat = await stat(outDir).catch(() => null);
  if (!dirStat?.isDirectory()) {
    throw new PatcherError(`output directory does not exist: ${outDir}`);
  }

  const out = path.resolve(req.outputIso);
  const inputs = [path.resolve(req.targetIso), path.resolve(req.referenceIso)];
  if (inputs.includes(out)) {
    throw new PatcherError("output ISO must differ from both input ISOs");
  }
  if (config.volume_label && config.volume_label.length > 32) {
    throw new PatcherError(
      `volume label is longer than 32 characters: ${config.volume_label}`,
    );
  }
}

async function locateTargetContainers(
  sourceDir: string,
): Promise<{ boot: string; install: string | null }> {
  const boot = await findPathCaseInsensitive(sourceDir, BOOT_CONTAINER_PATH);
  if (!boot) {
    throw new PatcherError(
      `${BOOT_CONTAINER_PATH} not found in the target ISO`,
      ["the target must be a Windows installation ISO"],
    );
  }
  let install: string | null = null;
  for (const candidate of INSTALL_CONTAINER_PATHS) {
    install = await findPathCaseInsensitive(sourceDir, candidate);
    if (install) break;
  }
  return { boot, install };
}

/**
 * Runs the whole patch: reference metadata, target extraction, boot container
 * registry patch, install rebrand, authoring with fallbacks, validation and the
 * final move. The workspace is released on every exit path.
 */
export async function patchIso(
  deps: PatchIsoDeps,
  req: PatchIsoRequest,
): Promise<PatchIsoResult> {
  const { config, runner, log } = deps;
  const logWarn = deps.logWarn ?? log;
  const { signal } = req;
  const emit = (event: StageEvent) => {
    log("stage", { stage: event.stage, detail: describeStageEvent(event) });
    req.onEvent?.(event);
  };

  await validatePatchRequest(req, config);

  const env = await checkEnvironment({
    runner,
    tools: config.tools,
    libraryAvailable: !!deps.isoLibrary,
    signal,
    log,
  });
  emit({
    stage: "environment_checked",
    authoringTools: env.authoring,
    libraryAvailable: env.libraryAvailable,
  });

  const timeoutMs =
    config.tool_timeout_seconds > 0
      ? config.tool_timeout_seconds * 1000
      : undefined;
  const isoTool = new IsoExtractTool({
    runner,
    binary: config.tools.seven_zip,
    timeoutMs,
  });
  const wimTool = new WimTool({
    runner,
    binary: config.tools.wimlib,
    timeoutMs,
  });
  const hivexTool = new HivexTool({
    runner,
    hivexget: config.tools.hivexget,
    hivexregedit: config.tools.hivexregedit,
    timeoutMs,
  });

  throwIfCancelled(signal, "startup");
  const ws = await BuildWorkspace.acquire({ parentDir: config.work_dir, log });
  try {
    const metadata = await extractSourceMetadata(
      { isoTool, wimTool, hivexTool, log },
      {
        referenceIso: req.referenceIso,
        scratchDir: ws.referenceDir,
        volumeLabelOverride: config.volume_label,
        signal,
      },
    );
    emit({ stage: "metadata_extracted", metadata });

    throwIfCancelled(signal, "target extraction");
    await isoTool.extractAll(req.targetIso, ws.targetDir, { signal });
    const containers = await locateTargetContainers(ws.targetDir);
    emit({
      stage: "target_extracted",
      sourceDir: ws.targetDir,
      bootContainer: containers.boot,
      installContainer: containers.install,
    });

    throwIfCancelled(signal, "registry patch");
    const plan = planRegistryPatch(metadata);
    const rebuilt = await rebuildBootContainer(
      { wimTool, hivexTool, log },
      {
        containerPath: containers.boot,
        plan,
        scratchDir: await ws.scratch("boot-image"),
        signal,
      },
    );
    emit({
      stage: "registry_patched",
      patchedIndex: rebuilt.patchedIndex,
      writes: rebuilt.writesApplied,
    });

    throwIfCancelled(signal, "install rebrand");
    if (containers.install) {
      const edits = await rebrandInstallContainer(
        { wimTool, log },
        { containerPath: containers.install, metadata, signal },
      );
      emit({ stage: "install_rebranded", images: edits.length });
    } else {
      logWarn("target ISO has no install container; skipping rebrand");
      emit({ stage: "install_rebranded", images: 0 });
    }

    throwIfCancelled(signal, "ISO authoring");
    const request: AuthoringRequest = {
      sourceDir: ws.targetDir,
      outputPath: ws.candidateImage,
      volumeLabel: metadata.volumeLabel,
      applicationId: metadata.applicationId || undefined,
      publisherId: metadata.publisherId || undefined,
      boot: await locateBootImages(ws.targetDir),
      expectedBytes: await directorySize(ws.targetDir),
    };
    const policy = {
      minSizeRatio: config.validation.min_size_ratio,
      maxSizeRatio: config.validation.max_size_ratio,
    };
    const validate: AuthoringValidator | undefined = config.validation.enabled
      ? (outputPath, r) =>
          validateImage(outputPath, {
            expectedBytes: r.expectedBytes,
            expectedVolumeLabel: r.volumeLabel,
            policy,
            listEntries: (imagePath) =>
              isoTool.listEntries(imagePath, { signal }),
          })
      : undefined;

    const strategies =
      deps.strategies ??
      defaultStrategies({
        runner,
        tools: config.tools,
        isoLibrary: deps.isoLibrary,
        timeoutMs,
      });
    const authored = await runAuthoringPipeline({
      strategies,
      request,
      validate,
      signal,
      log,
      logWarn,
      onAttempt: (attempt, index, total) =>
        emit({ stage: "image_authored", attempt, index, total }),
    });
    const validation = authored.attempt.validation ?? null;
    emit({ stage: "validation_completed", result: validation });

    throwIfCancelled(signal, "output move");
    await moveFileAtomic(ws.candidateImage, req.outputIso);
    const sizeBytes = (await stat(req.outputIso)).size;
    emit({ stage: "output_written", outputPath: req.outputIso, sizeBytes });

    return {
      outputPath: req.outputIso,
      sizeBytes,
      metadata,
      attempts: authored.attempts,
      validation,
    };
  } finally {
    await runner.waitForIdle?.();
    await ws.release();
  }
}
