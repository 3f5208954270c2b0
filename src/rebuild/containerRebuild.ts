import { copyFile, mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";

import {
  CancelledError,
  ContainerRebuildError,
  PatcherError,
} from "../errors.js";
import type { LoggerFn } from "../logger.js";
import {
  pickBootableImage,
  type SourceMetadata,
} from "../metadata/sourceMetadata.js";
import {
  planImageRebrand,
  type ImageRebrandEdit,
  type RegistryPatchPlan,
} from "../registry/patchPlan.js";
import {
  HIVE_RELATIVE_PATH,
  type HiveName,
  type HivexTool,
  type RegistryWrite,
  withHive,
} from "../tools/hivex.js";
import type { WimImageInfo, WimTool } from "../tools/wimlib.js";
import { findPathCaseInsensitive } from "../utils/fsUtils.js";

export type ContainerRebuildDeps = {
  wimTool: WimTool;
  hivexTool: HivexTool;
  log: LoggerFn;
};

export type BootRebuildResult = {
  patchedIndex: number;
  imageCount: number;
  writesApplied: number;
};

function tempSibling(containerPath: string, tag: string, ext: string): string {
  return `${containerPath}.${tag}-${process.pid}-${Date.now()}${ext}`;
}

function groupByHive(
  writes: readonly RegistryWrite[],
): Map<HiveName, RegistryWrite[]> {
  const groups = new Map<HiveName, RegistryWrite[]>();
  for (const w of writes) {
    const list = groups.get(w.hive) ?? [];
    list.push(w);
    groups.set(w.hive, list);
  }
  return groups;
}

function preservedProperties(image: WimImageInfo): Record<string, string> {
  const props: Record<string, string> = {};
  if (image.displayName) props.DISPLAYNAME = image.displayName;
  if (image.displayDescription) {
    props.DISPLAYDESCRIPTION = image.displayDescription;
  }
  if (image.flags) props.FLAGS = image.flags;
  return props;
}

function wrapFailure(
  err: unknown,
  containerPath: string,
  what: string,
  signal?: AbortSignal,
): Error {
  if (signal?.aborted || err instanceof CancelledError) {
    return new CancelledError(what);
  }
  if (err instanceof ContainerRebuildError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const hints = err instanceof PatcherError ? err.hints : [];
  return new ContainerRebuildError(
    `${what} failed for ${path.basename(containerPath)}: ${message}`,
    containerPath,
    { cause: err, hints },
  );
}

async function applyPlan(
  deps: ContainerRebuildDeps,
  imageDir: string,
  scratchDir: string,
  containerPath: string,
  plan: RegistryPatchPlan,
  signal?: AbortSignal,
): Promise<number> {
  let applied = 0;
  for (const [hive, writes] of groupByHive(plan.writes)) {
    const hiveFile = await findPathCaseInsensitive(
      imageDir,
      HIVE_RELATIVE_PATH[hive],
    );
    if (!hiveFile) {
      throw new ContainerRebuildError(
        `${hive} hive not found in the boot image`,
        containerPath,
      );
    }
    const session = { tool: deps.hivexTool, hiveFile, hive, scratchDir };
    await withHive(session, async (hiveSession) => {
      for (const w of writes) {
        hiveSession.setValue({
          keyPath: w.keyPath,
          valueName: w.valueName,
          valueType: w.valueType,
          valueData: w.valueData,
        });
      }
      await hiveSession.commit(signal);
    });
    applied += writes.length;
    deps.log("hive patched", { hive, writes: writes.length });
  }
  return applied;
}

/**
 * Patches the bootable image of a boot container and repacks it. The repack
 * goes to a sibling file that replaces the original only once every image has
 * been written, so a failure leaves the original bytes untouched.
 */
export async function rebuildBootContainer(
  deps: ContainerRebuildDeps,
  input: {
    containerPath: string;
    plan: RegistryPatchPlan;
    scratchDir: string;
    signal?: AbortSignal;
  },
): Promise<BootRebuildResult> {
  const { containerPath, plan, scratchDir, signal } = input;
  const wim = deps.wimTool;
  const call = { signal };
  const tempWim = tempSibling(containerPath, "rebuild", ".wim");
  try {
    const info = await wim.info(containerPath, call);
    const patchedIndex = pickBootableImage(info);
    if (patchedIndex === null) {
      throw new ContainerRebuildError(
        "boot container has no images",
        containerPath,
      );
    }

    const imageDir = path.join(scratchDir, "image");
    await mkdir(imageDir, { recursive: true });
    await wim.extractImage(containerPath, patchedIndex, imageDir, call);

    const writesApplied = await applyPlan(
      deps,
      imageDir,
      scratchDir,
      containerPath,
      plan,
      signal,
    );

    const bootIndex = info.bootIndex > 0 ? info.bootIndex : patchedIndex;
    const images = [...info.images].sort((a, b) => a.index - b.index);
    for (const [position, image] of images.entries()) {
      const boot = image.index === bootIndex;
      const first = position === 0;
      if (image.index !== patchedIndex) {
        const opts = { boot, create: first };
        await wim.exportImage(containerPath, image.index, tempWim, opts, call);
        continue;
      }
      const { name, description } = image;
      const capture = { name, description, boot };
      if (first) await wim.captureImage(imageDir, tempWim, capture, call);
      else await wim.appendImage(imageDir, tempWim, capture, call);
      const props = preservedProperties(image);
      await wim.setImageProperties(tempWim, position + 1, props, call);
    }

    await rename(tempWim, containerPath);
    deps.log("boot container rebuilt", {
      container: containerPath,
      patchedIndex,
      images: images.length,
    });
    return { patchedIndex, imageCount: images.length, writesApplied };
  } catch (err) {
    await rm(tempWim, { force: true });
    throw wrapFailure(err, containerPath, "boot container rebuild", signal);
  }
}

/**
 * Rewrites install image display strings on a copy and swaps it in. No
 * registry changes.
 */
export async function rebrandInstallContainer(
  deps: Pick<ContainerRebuildDeps, "wimTool" | "log">,
  input: {
    containerPath: string;
    metadata: SourceMetadata;
    signal?: AbortSignal;
  },
): Promise<ImageRebrandEdit[]> {
  const { containerPath, metadata, signal } = input;
  const ext = path.extname(containerPath);
  const tempCopy = tempSibling(containerPath, "rebrand", ext);
  try {
    const info = await deps.wimTool.info(containerPath, { signal });
    const edits = planImageRebrand(metadata, info.images);
    if (!edits.length) {
      deps.log("install container already matches the reference family", {
        container: containerPath,
      });
      return [];
    }

    await copyFile(containerPath, tempCopy);
    for (const { index, properties } of edits) {
      await deps.wimTool.setImageProperties(tempCopy, index, properties, {
        signal,
      });
    }
    await rename(tempCopy, containerPath);
    deps.log("install container rebranded", {
      container: containerPath,
      images: edits.length,
    });
    return edits;
  } catch (err) {
    await rm(tempCopy, { force: true });
    throw wrapFailure(err, containerPath, "install container rebrand", signal);
  }
}
