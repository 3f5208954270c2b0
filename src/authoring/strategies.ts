import { stat } from "node:fs/promises";

import { throwIfCancelled } from "../errors.js";
import {
  describeFailure,
  isSuccess,
  type ToolRunner,
} from "../tools/toolRunner.js";
import { walkTree } from "../utils/fsUtils.js";
import type { IsoLibrary } from "./isoLibrary.js";
import type {
  AuthoringRequest,
  AuthoringStrategy,
  StrategyOutcome,
} from "./types.js";

export const BOOT_CATALOG_NAME = "boot.catalog";
const BIOS_LOAD_SECTORS = "8";

function identityArgs(req: AuthoringRequest): string[] {
  const args: string[] = [];
  if (req.applicationId) args.push("-A", req.applicationId);
  if (req.publisherId) args.push("-publisher", req.publisherId);
  return args;
}

function biosBootArgs(image: string): string[] {
  return ["-b", image, "-no-emul-boot", "-boot-load-size", BIOS_LOAD_SECTORS];
}

/**
 * ISO level 3, UDF, Joliet long names, BIOS entry plus UEFI alternate entry.
 */
export function mkisofsFullArgs(req: AuthoringRequest): string[] {
  const args = [
    "-iso-level",
    "3",
    "-udf",
    "-J",
    "-joliet-long",
    "-D",
    "-N",
    "-relaxed-filenames",
    "-V",
    req.volumeLabel,
    ...identityArgs(req),
  ];
  if (req.boot.bios) {
    args.push(...biosBootArgs(req.boot.bios), "-c", BOOT_CATALOG_NAME);
  }
  if (req.boot.uefi) {
    args.push(
      "-eltorito-alt-boot",
      "-eltorito-platform",
      "efi",
      "-b",
      req.boot.uefi,
      "-no-emul-boot",
    );
  }
  args.push("-o", req.outputPath, req.sourceDir);
  return args;
}

export function mkisofsMinimalArgs(req: AuthoringRequest): string[] {
  const args = ["-iso-level", "3", "-udf", "-V", req.volumeLabel];
  if (req.boot.bios) args.push(...biosBootArgs(req.boot.bios));
  args.push("-o", req.outputPath, req.sourceDir);
  return args;
}

export function xorrisoArgs(req: AuthoringRequest): string[] {
  const args = [
    "-as",
    "mkisofs",
    "-iso-level",
    "3",
    "-J",
    "-joliet-long",
    "-V",
    req.volumeLabel,
    ...identityArgs(req),
  ];
  if (req.boot.bios) args.push(...biosBootArgs(req.boot.bios));
  if (req.boot.uefi) {
    args.push("-eltorito-alt-boot", "-e", req.boot.uefi, "-no-emul-boot");
  }
  args.push("-o", req.outputPath, req.sourceDir);
  return args;
}

async function producedOutput(outputPath: string): Promise<StrategyOutcome> {
  const st = await stat(outputPath).catch(() => null);
  if (!st?.isFile()) {
    return { kind: "failed", reason: "no output image was produced" };
  }
  return { kind: "success", outputPath, sizeBytes: st.size };
}

export function toolStrategy(opts: {
  name: string;
  runner: ToolRunner;
  binary: string;
  buildArgs: (req: AuthoringRequest) => string[];
  timeoutMs?: number;
}): AuthoringStrategy {
  return {
    name: opts.name,
    async author(req, signal) {
      const res = await opts.runner.run(opts.binary, opts.buildArgs(req), {
        signal,
        timeoutMs: opts.timeoutMs,
      });
      if (!isSuccess(res)) {
        return { kind: "failed", reason: describeFailure(res) };
      }
      return await producedOutput(req.outputPath);
    },
  };
}

export function libraryStrategy(
  library: IsoLibrary | null | undefined,
): AuthoringStrategy {
  return {
    name: "in-process library",
    async author(req, signal) {
      if (!library) {
        return {
          kind: "failed",
          reason: "no in-process ISO library is configured",
        };
      }

      const tree = await walkTree(req.sourceDir);
      const writer = await library.open({
        volumeLabel: req.volumeLabel,
        applicationId: req.applicationId,
        publisherId: req.publisherId,
        joliet: true,
      });
      try {
        for (const entry of tree) {
          throwIfCancelled(signal, "in-process authoring");
          const isoPath = `/${entry.relPath}`;
          if (entry.isDirectory) await writer.addDirectory(isoPath);
          else await writer.addFile(entry.absPath, isoPath);
        }
        const biosImage = req.boot.bios ?? req.boot.bootmgr;
        if (biosImage) {
          await writer.addBootEntry({
            platform: "bios",
            imagePath: `/${biosImage}`,
            loadSectors: 8,
          });
        }
        if (req.boot.uefi) {
          await writer.addBootEntry({
            platform: "efi",
            imagePath: `/${req.boot.uefi}`,
          });
        }
        await writer.write(req.outputPath, signal);
      } finally {
        await writer.close();
      }
      return await producedOutput(req.outputPath);
    },
  };
}

export type StrategyDeps = {
  runner: ToolRunner;
  tools: { mkisofs: string; xorriso: string };
  isoLibrary?: IsoLibrary | null;
  timeoutMs?: number;
};

/** The fixed fallback order. */
export function defaultStrategies(deps: StrategyDeps): AuthoringStrategy[] {
  const { runner, tools, timeoutMs } = deps;
  return [
    toolStrategy({
      name: "mkisofs (full)",
      runner,
      binary: tools.mkisofs,
      buildArgs: mkisofsFullArgs,
      timeoutMs,
    }),
    toolStrategy({
      name: "mkisofs (minimal)",
      runner,
      binary: tools.mkisofs,
      buildArgs: mkisofsMinimalArgs,
      timeoutMs,
    }),
    toolStrategy({
      name: "xorriso (mkisofs emulation)",
      runner,
      binary: tools.xorriso,
      buildArgs: xorrisoArgs,
      timeoutMs,
    }),
    libraryStrategy(deps.isoLibrary),
  ];
}
