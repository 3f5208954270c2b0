import { ToolInvocationError } from "../errors.js";
import { isSuccess, type ToolRunner } from "./toolRunner.js";

export type IsoEntry = {
  // forward slashes, no leading slash
  path: string;
  isDirectory: boolean;
  size: number;
};

function normalizeEntryPath(p: string): string {
  return p.replace(/\\/g, "/").replace(/^\/+/, "").replace(/\/+$/, "");
}

function flush(block: Map<string, string>, out: IsoEntry[]): void {
  const rawPath = block.get("Path");
  if (rawPath === undefined) return;
  const entryPath = normalizeEntryPath(rawPath);
  if (!entryPath) return;
  const attrs = block.get("Attributes") ?? "";
  const isDirectory = block.get("Folder") === "+" || attrs.startsWith("D");
  const size = Number(block.get("Size") ?? 0);
  out.push({
    path: entryPath,
    isDirectory,
    size: Number.isFinite(size) ? size : 0,
  });
}

/**
 * Parses the technical listing of `7z l -slt`. Property blocks before the
 * "----------" separator describe the archive itself and are skipped.
 */
export function parseSevenZipListing(text: string): IsoEntry[] {
  const entries: IsoEntry[] = [];
  let inEntries = false;
  let block = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (!inEntries) {
      if (line.startsWith("----------")) inEntries = true;
      continue;
    }
    if (!line.trim()) {
      flush(block, entries);
      block = new Map();
      continue;
    }
    const idx = line.indexOf(" = ");
    if (idx > 0) {
      block.set(line.slice(0, idx).trim(), line.slice(idx + 3));
    } else if (line.endsWith(" =")) {
      block.set(line.slice(0, -2).trim(), "");
    }
  }
  flush(block, entries);
  return entries;
}

export function findEntry(
  entries: IsoEntry[],
  relPath: string,
): IsoEntry | null {
  const wanted = normalizeEntryPath(relPath).toLowerCase();
  return entries.find((e) => e.path.toLowerCase() === wanted) ?? null;
}

export class IsoExtractTool {
  constructor(
    private readonly opts: {
      runner: ToolRunner;
      binary: string;
      timeoutMs?: number;
    },
  ) {}

  async listEntries(
    isoPath: string,
    call?: { signal?: AbortSignal },
  ): Promise<IsoEntry[]> {
    const args = ["l", "-slt", isoPath];
    const res = await this.opts.runner.run(this.opts.binary, args, {
      signal: call?.signal,
      timeoutMs: this.opts.timeoutMs,
    });
    if (!isSuccess(res)) {
      throw new ToolInvocationError(this.opts.binary, args, res, "iso listing");
    }
    return parseSevenZipListing(res.stdout);
  }

  async extractAll(
    isoPath: string,
    destDir: string,
    call?: { signal?: AbortSignal },
  ): Promise<void> {
    const args = ["x", "-y", `-o${destDir}`, isoPath];
    const res = await this.opts.runner.run(this.opts.binary, args, {
      signal: call?.signal,
      timeoutMs: this.opts.timeoutMs,
    });
    if (!isSuccess(res)) {
      const label = "iso extraction";
      throw new ToolInvocationError(this.opts.binary, args, res, label);
    }
  }

  async extractEntries(
    isoPath: string,
    destDir: string,
    paths: string[],
    call?: { signal?: AbortSignal },
  ): Promise<void> {
    if (!paths.length) return;
    const args = ["x", "-y", `-o${destDir}`, isoPath, ...paths];
    const res = await this.opts.runner.run(this.opts.binary, args, {
      signal: call?.signal,
      timeoutMs: this.opts.timeoutMs,
    });
    if (!isSuccess(res)) {
      const label = `iso extraction of ${paths.join(", ")}`;
      throw new ToolInvocationError(this.opts.binary, args, res, label);
    }
  }
}
