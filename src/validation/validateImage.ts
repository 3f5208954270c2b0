import { stat } from "node:fs/promises";

import { ValidationFailure } from "../errors.js";
import {
  readIsoDescriptors,
  type VolumeDescriptorSet,
} from "../iso/volumeDescriptor.js";
import { findEntry, type IsoEntry } from "../tools/isoExtract.js";

export type ValidationPolicy = {
  minSizeRatio: number;
  maxSizeRatio: number;
};

export const DEFAULT_VALIDATION_POLICY: ValidationPolicy = Object.freeze({
  minSizeRatio: 0.9,
  maxSizeRatio: 1.25,
});

// files Windows setup cannot start without
export const ESSENTIAL_IMAGE_FILES = [
  "bootmgr",
  "setup.exe",
  "sources/boot.wim",
] as const;

export type ValidationResult = {
  sizeOk: boolean;
  structureOk: boolean;
  volumeLabelOk: boolean;
  bootRecordOk: boolean;
  overallPass: boolean;
  sizeBytes: number;
  expectedBytes: number;
  volumeLabel: string | null;
  // essential files absent from the listing; empty when nothing was listed
  missingFiles: string[];
  // fail the attempt
  problems: string[];
  // reported only
  warnings: string[];
};

export type ValidationInput = {
  expectedBytes: number;
  expectedVolumeLabel: string;
  policy?: ValidationPolicy;
  // lists the files inside an image; without it essential files go unchecked
  listEntries?: (imagePath: string) => Promise<IsoEntry[]>;
};

function mb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function missingEssentialFiles(entries: IsoEntry[]): string[] {
  return ESSENTIAL_IMAGE_FILES.filter((f) => {
    const entry = findEntry(entries, f);
    return !entry || entry.isDirectory;
  });
}

export function evaluateImage(
  sizeBytes: number,
  descriptors: VolumeDescriptorSet | null,
  input: ValidationInput,
  entries?: IsoEntry[],
): ValidationResult {
  const policy = input.policy ?? DEFAULT_VALIDATION_POLICY;
  const problems: string[] = [];
  const warnings: string[] = [];

  let sizeOk: boolean;
  if (input.expectedBytes > 0) {
    const min = input.expectedBytes * policy.minSizeRatio;
    const max = input.expectedBytes * policy.maxSizeRatio;
    sizeOk = sizeBytes >= min && sizeBytes <= max;
    if (!sizeOk) {
      problems.push(
        `image size ${mb(sizeBytes)} outside ${mb(min)}..${mb(max)} ` +
          `for a ${mb(input.expectedBytes)} tree`,
      );
    }
  } else {
    sizeOk = sizeBytes > 0;
    if (!sizeOk) problems.push("image is empty");
  }

  const descriptorsOk = !!descriptors?.primary && descriptors.hasTerminator;
  if (!descriptorsOk) {
    problems.push("no ISO 9660 primary volume descriptor set");
  }

  const missingFiles = entries ? missingEssentialFiles(entries) : [];
  if (missingFiles.length) {
    problems.push(
      `essential files missing from the image: ${missingFiles.join(", ")}`,
    );
  }
  const structureOk = descriptorsOk && !missingFiles.length;

  const volumeLabel = descriptors?.primary?.volumeLabel ?? null;
  const volumeLabelOk = volumeLabel === input.expectedVolumeLabel;
  if (descriptorsOk && !volumeLabelOk) {
    warnings.push(
      `volume label is "${volumeLabel ?? ""}", ` +
        `expected "${input.expectedVolumeLabel}"`,
    );
  }

  const bootRecordOk = !!descriptors?.hasElTorito;
  if (descriptorsOk && !bootRecordOk) {
    warnings.push("no El Torito boot record");
  }

  return {
    sizeOk,
    structureOk,
    volumeLabelOk,
    bootRecordOk,
    overallPass: sizeOk && structureOk,
    sizeBytes,
    expectedBytes: input.expectedBytes,
    volumeLabel,
    missingFiles,
    problems,
    warnings,
  };
}

/**
 * Checks an authored image by file size, its descriptor sectors and, when a
 * lister is given, the files Windows setup needs. Nothing is mounted.
 */
export async function validateImage(
  imagePath: string,
  input: ValidationInput,
): Promise<ValidationResult> {
  const st = await stat(imagePath).catch(() => null);
  if (!st?.isFile()) {
    const result = evaluateImage(0, null, input);
    return {
      ...result,
      problems: [`image not found: ${imagePath}`, ...result.problems],
    };
  }
  const descriptors = await readIsoDescriptors(imagePath);
  if (!input.listEntries) return evaluateImage(st.size, descriptors, input);

  let entries: IsoEntry[];
  try {
    entries = await input.listEntries(imagePath);
  } catch (err) {
    const result = evaluateImage(st.size, descriptors, input);
    const message = err instanceof Error ? err.message : String(err);
    return {
      ...result,
      structureOk: false,
      overallPass: false,
      problems: [...result.problems, `cannot list image contents: ${message}`],
    };
  }
  return evaluateImage(st.size, descriptors, input, entries);
}

export function assertValidationPassed(result: ValidationResult): void {
  if (!result.overallPass) throw new ValidationFailure(result);
}
