import { stat } from "node:fs/promises";
import path from "node:path";

import { findPathCaseInsensitive } from "../utils/fsUtils.js";
import type { BootCatalogSpec } from "./types.js";

export const BIOS_BOOT_IMAGE = "boot/etfsboot.com";
export const UEFI_BOOT_IMAGE = "efi/microsoft/boot/efisys.bin";
export const BOOT_MANAGER = "bootmgr";

async function locateFile(
  sourceDir: string,
  relPath: string,
): Promise<string | null> {
  const found = await findPathCaseInsensitive(sourceDir, relPath);
  if (!found) return null;
  const st = await stat(found);
  if (!st.isFile()) return null;
  return path.relative(sourceDir, found).split(path.sep).join("/");
}

/** Boot images as they are spelled in the tree. */
export async function locateBootImages(
  sourceDir: string,
): Promise<BootCatalogSpec> {
  const [bios, uefi, bootmgr] = await Promise.all([
    locateFile(sourceDir, BIOS_BOOT_IMAGE),
    locateFile(sourceDir, UEFI_BOOT_IMAGE),
    locateFile(sourceDir, BOOT_MANAGER),
  ]);
  return { bios, uefi, bootmgr };
}

export function describeBootCatalog(catalog: BootCatalogSpec): string {
  const parts: string[] = [];
  if (catalog.bios) parts.push(`bios=${catalog.bios}`);
  if (catalog.uefi) parts.push(`uefi=${catalog.uefi}`);
  if (!catalog.bios && catalog.bootmgr) {
    parts.push(`bootmgr=${catalog.bootmgr}`);
  }
  return parts.length ? parts.join(" ") : "no boot images";
}
