import { access, mkdtemp, readdir, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { BuildWorkspace } from "./buildWorkspace.js";

describe("workspace/BuildWorkspace", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const d of dirs.splice(0)) await rm(d, { recursive: true, force: true });
  });

  async function parent(): Promise<string> {
    const dir = await mkdtemp(path.join(tmpdir(), "workspace-test-"));
    dirs.push(dir);
    return dir;
  }

  it("creates the fixed layout under the parent directory", async () => {
    const parentDir = await parent();
    const log = vi.fn();
    const ws = await BuildWorkspace.acquire({ parentDir, prefix: "run-", log });

    expect(path.dirname(ws.root)).toBe(parentDir);
    expect(path.basename(ws.root).startsWith("run-")).toBe(true);
    expect((await readdir(ws.root)).sort()).toEqual(["output", "reference", "scratch", "target"]);
    expect(ws.candidateImage).toBe(path.join(ws.root, "output", "candidate.iso"));
    expect(log).toHaveBeenCalledWith("workspace acquired", { root: ws.root });
  });

  it("sanitises scratch names", async () => {
    const ws = await BuildWorkspace.acquire({ parentDir: await parent() });
    const dir = await ws.scratch("boot image/../x");
    expect(dir).toBe(path.join(ws.root, "scratch", "boot_image_.._x"));
    expect((await stat(dir)).isDirectory()).toBe(true);
    await expect(ws.scratch("..")).rejects.toThrow("invalid scratch name: ..");
  });

  it("removes everything on release and tolerates a second release", async () => {
    const ws = await BuildWorkspace.acquire({ parentDir: await parent() });
    await ws.scratch("hive");
    await ws.release();
    await ws.release();
    expect(ws.isReleased).toBe(true);
    await expect(access(ws.root)).rejects.toThrow();
    await expect(ws.scratch("late")).rejects.toThrow(`workspace already released: ${ws.root}`);
  });
});
