import type { RegistryWrite } from "../tools/hivex.js";
import type { WimImageInfo } from "../tools/wimlib.js";
import {
  CURRENT_VERSION_KEY,
  VERSION_VALUE_NAMES,
  type SourceMetadata,
} from "../metadata/sourceMetadata.js";

export const LAB_CONFIG_KEY = "Setup\\LabConfig";

export const BYPASS_VALUE_NAMES = [
  "BypassTPMCheck",
  "BypassSecureBootCheck",
  "BypassRAMCheck",
  "BypassStorageCheck",
  "BypassCPUCheck",
] as const;

export type RegistryPatchPlan = {
  readonly writes: readonly RegistryWrite[];
};

/**
 * Bypass flags first, then the reference version strings. Same input, same
 * plan.
 */
export function planRegistryPatch(
  metadata: SourceMetadata,
): RegistryPatchPlan {
  const writes = BYPASS_VALUE_NAMES.map(
    (valueName): RegistryWrite => ({
      hive: "SYSTEM",
      keyPath: LAB_CONFIG_KEY,
      valueName,
      valueType: "REG_DWORD",
      valueData: 1,
    }),
  );

  for (const valueName of VERSION_VALUE_NAMES) {
    writes.push({
      hive: "SOFTWARE",
      keyPath: CURRENT_VERSION_KEY,
      valueName,
      valueType: "REG_SZ",
      valueData: metadata.registryValues[valueName],
    });
  }

  return Object.freeze({
    writes: Object.freeze(writes.map((w) => Object.freeze(w))),
  });
}

export type ImageRebrandEdit = {
  index: number;
  properties: Record<string, string>;
};

const FAMILY_RE = /Windows\s+\d+/i;
const DEFAULT_FAMILY = "Windows 10";

export function referenceFamily(metadata: SourceMetadata): string {
  const m = FAMILY_RE.exec(metadata.productName);
  return m ? m[0].replace(/\s+/, " ") : DEFAULT_FAMILY;
}

function rebrandText(text: string | null, family: string): string | null {
  if (!text) return null;
  const next = text.replace(new RegExp(FAMILY_RE.source, "gi"), family);
  return next === text ? null : next;
}

/**
 * Display string edits that make every install image read as the reference
 * family ("Windows 11 Pro" becomes "Windows 10 Pro"). Images whose strings
 * already match are left out.
 */
export function planImageRebrand(
  metadata: SourceMetadata,
  images: readonly WimImageInfo[],
): ImageRebrandEdit[] {
  const family = referenceFamily(metadata);
  const edits: ImageRebrandEdit[] = [];
  for (const image of images) {
    const properties: Record<string, string> = {};
    const displayName = rebrandText(image.displayName ?? image.name, family);
    const displayDescription = rebrandText(
      image.displayDescription ?? image.description,
      family,
    );
    if (displayName) properties.DISPLAYNAME = displayName;
    if (displayDescription) properties.DISPLAYDESCRIPTION = displayDescription;
    if (Object.keys(properties).length) {
      edits.push({ index: image.index, properties });
    }
  }
  return edits;
}
