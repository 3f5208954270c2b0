import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { LoggerFn } from "../logger.js";

/**
 * Temporary tree owned by one run:
 *   reference/  scratch area for the reference ISO
 *   target/     extracted target ISO, patched in place
 *   scratch/    named work directories
 *   output/     candidate image before it is moved to the destination
 */
export class BuildWorkspace {
  private released = false;

  private constructor(
    readonly root: string,
    private readonly log?: LoggerFn,
  ) {}

  static async acquire(opts?: {
    parentDir?: string;
    prefix?: string;
    log?: LoggerFn;
  }): Promise<BuildWorkspace> {
    const parentDir = opts?.parentDir ?? tmpdir();
    await mkdir(parentDir, { recursive: true });
    const prefix = opts?.prefix ?? "bootcamp-patcher-";
    const root = await mkdtemp(path.join(parentDir, prefix));
    const ws = new BuildWorkspace(root, opts?.log);
    try {
      const dirs = [ws.referenceDir, ws.targetDir, ws.outputDir];
      await Promise.all(dirs.map((d) => mkdir(d, { recursive: true })));
      await mkdir(path.join(root, "scratch"), { recursive: true });
    } catch (err) {
      await rm(root, { recursive: true, force: true });
      throw err;
    }
    opts?.log?.("workspace acquired", { root });
    return ws;
  }

  get referenceDir(): string {
    return path.join(this.root, "reference");
  }

  get targetDir(): string {
    return path.join(this.root, "target");
  }

  get outputDir(): string {
    return path.join(this.root, "output");
  }

  get candidateImage(): string {
    return path.join(this.outputDir, "candidate.iso");
  }

  get isReleased(): boolean {
    return this.released;
  }

  async scratch(name: string): Promise<string> {
    if (this.released) {
      throw new Error(`workspace already released: ${this.root}`);
    }
    const safe = name.replace(/[^A-Za-z0-9._-]+/g, "_");
    if (!safe || safe === "." || safe === "..") {
      throw new Error(`invalid scratch name: ${name}`);
    }
    const dir = path.join(this.root, "scratch", safe);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.root, { recursive: true, force: true });
    this.log?.("workspace released", { root: this.root });
  }
}
