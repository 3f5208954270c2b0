import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { walkTree } from "../../src/utils/fsUtils.js";
import { buildIsoImage } from "./isoImage.js";
import { readIsoTree } from "./isoReader.js";
import { fail, ok, type ScriptedCall, ScriptedRunner } from "./scriptedRunner.js";

export type FakeWindowsWorld = {
  // ISO path -> (relative file path -> size in bytes)
  isoFiles: Record<string, Record<string, number>>;
  bootWimInfo: string;
  installWimInfo: string;
  // files found when a boot image is extracted
  bootImageFiles: Record<string, number>;
  // SOFTWARE values hivexget answers with, by value name
  referenceRegistry: Record<string, string>;
  // bytes each exported or captured image adds to a rebuilt container
  imageBytes: number;
  mergedRegFiles: Array<{ prefix: string; hiveFile: string; text: string }>;
  propertyEdits: Array<{ wim: string; index: number; properties: string[] }>;
};

export function createWorld(overrides?: Partial<FakeWindowsWorld>): FakeWindowsWorld {
  return {
    isoFiles: {},
    bootWimInfo: bootWimInfo(),
    installWimInfo: installWimInfo(["Windows 11 Home", "Windows 11 Pro"]),
    bootImageFiles: {
      "Windows/System32/config/SYSTEM": 8192,
      "Windows/System32/config/SOFTWARE": 16384,
      "sources/setup.exe": 4096,
    },
    referenceRegistry: {
      ProductName: "Windows 10 Pro",
      EditionID: "Professional",
      CurrentBuild: "19045",
      CurrentBuildNumber: "19045",
      CurrentVersion: "6.3",
    },
    imageBytes: 100_000,
    mergedRegFiles: [],
    propertyEdits: [],
    ...overrides,
  };
}

export function bootWimInfo(): string {
  return [
    "WIM Information:",
    "----------------",
    "Image Count:    2",
    "Compression:    LZX",
    "Boot Index:     2",
    "",
    "Available Images:",
    "-----------------",
    "Index:                  1",
    "Name:                   Microsoft Windows PE (amd64)",
    "Description:            Microsoft Windows PE (amd64)",
    "Flags:                  9",
    "",
    "Index:                  2",
    "Name:                   Microsoft Windows Setup (amd64)",
    "Description:            Microsoft Windows Setup (amd64)",
    "Display Name:           Windows Setup",
    "Flags:                  2",
    "",
  ].join("\n");
}

export function installWimInfo(displayNames: string[]): string {
  const lines = [
    "WIM Information:",
    "----------------",
    `Image Count:    ${displayNames.length}`,
    "Boot Index:     0",
    "",
  ];
  for (const [i, name] of displayNames.entries()) {
    lines.push(
      `Index:                  ${i + 1}`,
      `Name:                   ${name}`,
      `Description:            ${name}`,
      `Display Name:           ${name}`,
      `Display Description:    ${name}`,
      "",
    );
  }
  return lines.join("\n");
}

async function writeSized(filePath: string, size: number): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, Buffer.alloc(size));
}

function sevenZipListing(files: Record<string, number>): string {
  const dirs = new Set<string>();
  for (const rel of Object.keys(files)) {
    const parts = rel.split("/");
    for (let i = 1; i < parts.length; i += 1) dirs.add(parts.slice(0, i).join("/"));
  }
  const lines = ["7-Zip (fake)", "", "--", "Path = image.iso", "Type = Iso", "", "----------"];
  for (const dir of [...dirs].sort()) lines.push(`Path = ${dir}`, "Folder = +", "Size = ", "");
  for (const [rel, size] of Object.entries(files)) {
    lines.push(`Path = ${rel}`, "Folder = -", `Size = ${size}`, "");
  }
  return lines.join("\n");
}

function destDirArg(args: string[]): string {
  const arg = args.find((a) => a.startsWith("--dest-dir="));
  if (!arg) throw new Error(`no --dest-dir in ${args.join(" ")}`);
  return arg.slice("--dest-dir=".length);
}

function optionValue(args: string[], name: string): string | null {
  const idx = args.indexOf(name);
  return idx === -1 ? null : (args[idx + 1] ?? null);
}

// trees behind images fakeAuthor wrote, by output path
const fakeAuthoredTrees = new Map<string, Record<string, number>>();

async function authoredFiles(imagePath: string): Promise<Record<string, number> | null> {
  const tree = await readIsoTree(imagePath, { joliet: true }).catch((err: unknown) => {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") return null;
    throw err;
  });
  if (tree) {
    return Object.fromEntries(tree.filter((e) => !e.isDirectory).map((e) => [e.path, e.size]));
  }
  return fakeAuthoredTrees.get(imagePath) ?? null;
}

/** Registers wimlib, hivex and 7-Zip behaviour driven by the world description. */
export function installFakeWindowsTools(
  runner: ScriptedRunner,
  world: FakeWindowsWorld,
): ScriptedRunner {
  return runner
    .on("7z l", async (call) => {
      const image = call.args[2];
      const files = world.isoFiles[image] ?? (await authoredFiles(image));
      if (files) return ok(sevenZipListing(files));
      return fail(2, `ERROR: ${image}: Can not open the file as archive`);
    })
    .on("7z x", async (call) => {
      const dest = call.args[2].slice(2);
      const files = world.isoFiles[call.args[3]];
      if (!files) return fail(2, "ERROR: Can not open the file as archive");
      const wanted = call.args.slice(4).map((p) => p.toLowerCase());
      for (const [rel, size] of Object.entries(files)) {
        if (wanted.length && !wanted.includes(rel.toLowerCase())) continue;
        await writeSized(path.join(dest, rel), size);
      }
      return ok("Everything is Ok");
    })
    .on("wimlib-imagex info", (call) => {
      if (call.args.length === 2) {
        const install = path.basename(call.args[1]).toLowerCase().startsWith("install");
        return ok(install ? world.installWimInfo : world.bootWimInfo);
      }
      const properties = call.args.filter((_, i) => call.args[i - 1] === "--image-property");
      world.propertyEdits.push({ wim: call.args[1], index: Number(call.args[2]), properties });
      return ok();
    })
    .on("wimlib-imagex extract", async (call) => {
      const dest = destDirArg(call.args);
      const requested = call.args.slice(3).filter((a) => !a.startsWith("--"));
      if (!requested.length) {
        for (const [rel, size] of Object.entries(world.bootImageFiles)) {
          await writeSized(path.join(dest, rel), size);
        }
        return ok();
      }
      // without --preserve-dir-structure each path lands at <dest>/<basename>
      const preserve = call.args.includes("--preserve-dir-structure");
      for (const requestedPath of requested) {
        const rel = requestedPath.replace(/^\/+/, "");
        const size = world.bootImageFiles[rel] ?? 1024;
        await writeSized(path.join(dest, preserve ? rel : path.posix.basename(rel)), size);
      }
      return ok();
    })
    .on(
      (call: ScriptedCall) =>
        call.tool === "wimlib-imagex" &&
        ["export", "capture", "append"].includes(call.args[0]),
      async (call) => {
        const target = call.args[0] === "export" ? call.args[3] : call.args[2];
        await mkdir(path.dirname(target), { recursive: true });
        await appendFile(target, Buffer.alloc(world.imageBytes));
        return ok();
      },
    )
    .on("hivexget", (call) => {
      if (call.args.length < 3) return ok("usage: hivexget hivefile key [value]");
      const value = world.referenceRegistry[call.args[2]];
      if (value === undefined) {
        return fail(1, `hivexget: ${call.args[2]}: value not found`);
      }
      return ok(`${value}\n`);
    })
    .on("hivexregedit --merge", async (call) => {
      world.mergedRegFiles.push({
        prefix: call.args[2],
        hiveFile: call.args[3],
        text: await readFile(call.args[4], "utf8"),
      });
      return ok();
    });
}

/**
 * Behaves like mkisofs/xorriso: writes an image with real descriptors whose
 * size follows the source tree. `7z l` lists the authored tree afterwards.
 */
export async function fakeAuthor(
  call: ScriptedCall,
  opts?: { sizeFactor?: number },
): Promise<{ code: number }> {
  const output = optionValue(call.args, "-o");
  const label = optionValue(call.args, "-V");
  const sourceDir = call.args[call.args.length - 1];
  if (!output || !label) return { code: 2 };
  const tree = (await walkTree(sourceDir)).filter((e) => !e.isDirectory);
  const treeBytes = tree.reduce((sum, e) => sum + e.size, 0);
  fakeAuthoredTrees.set(output, Object.fromEntries(tree.map((e) => [e.relPath, e.size])));
  const image = buildIsoImage({
    volumeLabel: label,
    elTorito: call.args.includes("-b"),
    joliet: call.args.includes("-J"),
    totalBytes: Math.round(treeBytes * (opts?.sizeFactor ?? 1)) + 64 * 2048,
  });
  await writeFile(output, image);
  return { code: 0 };
}
