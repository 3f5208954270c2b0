import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { describeBootCatalog, locateBootImages } from "./bootCatalog.js";

describe("authoring/bootCatalog", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const d of dirs.splice(0)) await rm(d, { recursive: true, force: true });
  });

  async function tempDir(): Promise<string> {
    const dir = await mkdtemp(path.join(tmpdir(), "boot-catalog-test-"));
    dirs.push(dir);
    return dir;
  }

  it("finds boot images with their on-disk spelling", async () => {
    const root = await tempDir();
    await mkdir(path.join(root, "BOOT"));
    await mkdir(path.join(root, "EFI", "Microsoft", "Boot"), { recursive: true });
    await writeFile(path.join(root, "BOOT", "etfsboot.com"), "b");
    await writeFile(path.join(root, "EFI", "Microsoft", "Boot", "efisys.bin"), "e");
    await writeFile(path.join(root, "bootmgr"), "m");

    const catalog = await locateBootImages(root);
    expect(catalog).toEqual({
      bios: "BOOT/etfsboot.com",
      uefi: "EFI/Microsoft/Boot/efisys.bin",
      bootmgr: "bootmgr",
    });
    expect(describeBootCatalog(catalog)).toBe(
      "bios=BOOT/etfsboot.com uefi=EFI/Microsoft/Boot/efisys.bin",
    );
  });

  it("reports absent images as null", async () => {
    const root = await tempDir();
    await mkdir(path.join(root, "boot", "etfsboot.com"), { recursive: true });
    await writeFile(path.join(root, "bootmgr"), "m");

    const catalog = await locateBootImages(root);
    expect(catalog).toEqual({ bios: null, uefi: null, bootmgr: "bootmgr" });
    expect(describeBootCatalog(catalog)).toBe("bootmgr=bootmgr");
    expect(describeBootCatalog({ bios: null, uefi: null, bootmgr: null })).toBe("no boot images");
  });
});
