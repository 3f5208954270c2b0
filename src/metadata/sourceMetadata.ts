import path from "node:path";

import {
  CancelledError,
  MetadataExtractionError,
  PatcherError,
} from "../errors.js";
import { readIsoDescriptors } from "../iso/volumeDescriptor.js";
import type { LoggerFn } from "../logger.js";
import {
  HIVE_RELATIVE_PATH,
  type HivexTool,
  withHive,
} from "../tools/hivex.js";
import {
  findEntry,
  type IsoEntry,
  type IsoExtractTool,
} from "../tools/isoExtract.js";
import type { WimInfo, WimTool } from "../tools/wimlib.js";
import { findPathCaseInsensitive } from "../utils/fsUtils.js";

export const CURRENT_VERSION_KEY = "Microsoft\\Windows NT\\CurrentVersion";

export const VERSION_VALUE_NAMES = [
  "ProductName",
  "EditionID",
  "CurrentBuild",
  "CurrentBuildNumber",
  "CurrentVersion",
] as const;

export type VersionValueName = (typeof VERSION_VALUE_NAMES)[number];

export type SourceMetadata = Readonly<{
  buildNumber: string;
  productName: string;
  editionId: string;
  volumeLabel: string;
  applicationId: string;
  publisherId: string;
  registryValues: Readonly<Record<VersionValueName, string>>;
}>;

export type MetadataExtractorDeps = {
  isoTool: IsoExtractTool;
  wimTool: WimTool;
  hivexTool: HivexTool;
  log: LoggerFn;
};

export const BOOT_CONTAINER_PATH = "sources/boot.wim";
export const INSTALL_CONTAINER_PATHS = [
  "sources/install.wim",
  "sources/install.esd",
];

export function locateContainers(entries: IsoEntry[]): {
  boot: IsoEntry | null;
  install: IsoEntry | null;
} {
  const boot = findEntry(entries, BOOT_CONTAINER_PATH);
  let install: IsoEntry | null = null;
  for (const candidate of INSTALL_CONTAINER_PATHS) {
    install = findEntry(entries, candidate);
    if (install) break;
  }
  return {
    boot: boot && !boot.isDirectory ? boot : null,
    install: install && !install.isDirectory ? install : null,
  };
}

/** Header boot index when set, else the last image in the container. */
export function pickBootableImage(info: WimInfo): number | null {
  const { bootIndex, images } = info;
  if (bootIndex > 0 && images.some((i) => i.index === bootIndex)) {
    return bootIndex;
  }
  const last = images[images.length - 1];
  return last ? last.index : null;
}

async function readVersionValues(
  deps: MetadataExtractorDeps,
  hiveFile: string,
  scratchDir: string,
  signal?: AbortSignal,
): Promise<Record<VersionValueName, string>> {
  return await withHive(
    { tool: deps.hivexTool, hiveFile, hive: "SOFTWARE", scratchDir },
    async (session) => {
      const values: Partial<Record<VersionValueName, string>> = {};
      const missing: string[] = [];
      for (const name of VERSION_VALUE_NAMES) {
        const raw = await session.getValue(CURRENT_VERSION_KEY, name, signal);
        const value = raw?.trim();
        if (value) values[name] = value;
        else missing.push(name);
      }
      const {
        ProductName,
        EditionID,
        CurrentBuild,
        CurrentBuildNumber,
        CurrentVersion,
      } = values;
      if (
        !ProductName ||
        !EditionID ||
        !CurrentBuild ||
        !CurrentBuildNumber ||
        !CurrentVersion
      ) {
        throw new MetadataExtractionError(
          `reference registry is missing ${missing.join(", ")} ` +
            `under ${CURRENT_VERSION_KEY}`,
        );
      }
      return {
        ProductName,
        EditionID,
        CurrentBuild,
        CurrentBuildNumber,
        CurrentVersion,
      };
    },
  );
}

export async function extractSourceMetadata(
  deps: MetadataExtractorDeps,
  input: {
    referenceIso: string;
    scratchDir: string;
    volumeLabelOverride?: string;
    signal?: AbortSignal;
  },
): Promise<SourceMetadata> {
  const { referenceIso, scratchDir, signal } = input;
  try {
    const descriptors = await readIsoDescriptors(referenceIso);
    if (!descriptors.primary) {
      throw new MetadataExtractionError(
        `no ISO 9660 primary volume descriptor in ${referenceIso}`,
        ["the reference file does not look like an ISO image"],
      );
    }

    const entries = await deps.isoTool.listEntries(referenceIso, { signal });
    const containers = locateContainers(entries);
    if (!containers.boot) {
      throw new MetadataExtractionError(
        `${BOOT_CONTAINER_PATH} not found in the reference ISO`,
      );
    }
    if (!containers.install) {
      throw new MetadataExtractionError(
        "sources/install.wim or install.esd not found in the reference ISO",
        ["the reference must be a Windows installation ISO"],
      );
    }

    const bootPath = containers.boot.path;
    await deps.isoTool.extractEntries(referenceIso, scratchDir, [bootPath], {
      signal,
    });
    const bootWim = await findPathCaseInsensitive(scratchDir, bootPath);
    if (!bootWim) {
      throw new MetadataExtractionError(
        `extraction did not produce ${bootPath}`,
      );
    }

    const info = await deps.wimTool.info(bootWim, { signal });
    const index = pickBootableImage(info);
    if (index === null) {
      throw new MetadataExtractionError(`${bootPath} contains no images`);
    }
    deps.log("reference boot image selected", {
      index,
      images: info.images.length,
    });

    const hiveDir = path.join(scratchDir, "hive");
    const hivePath = HIVE_RELATIVE_PATH.SOFTWARE;
    await deps.wimTool.extractPaths(bootWim, index, [`/${hivePath}`], hiveDir, {
      signal,
    });
    const hiveFile = await findPathCaseInsensitive(hiveDir, hivePath);
    if (!hiveFile) {
      throw new MetadataExtractionError(
        `SOFTWARE hive not found in image ${index} of ${bootPath}`,
      );
    }

    const registryValues = await readVersionValues(
      deps,
      hiveFile,
      scratchDir,
      signal,
    );

    const override = input.volumeLabelOverride?.trim();
    const volumeLabel = override ? override : descriptors.primary.volumeLabel;
    if (!volumeLabel) {
      throw new MetadataExtractionError(
        "reference ISO has an empty volume label",
        ["set volume_label in the config or pass --volume-label"],
      );
    }

    const metadata: SourceMetadata = Object.freeze({
      buildNumber: registryValues.CurrentBuild,
      productName: registryValues.ProductName,
      editionId: registryValues.EditionID,
      volumeLabel,
      applicationId: descriptors.primary.applicationId,
      publisherId: descriptors.primary.publisherId,
      registryValues: Object.freeze({ ...registryValues }),
    });
    deps.log("reference metadata extracted", {
      productName: metadata.productName,
      build: metadata.buildNumber,
      volumeLabel: metadata.volumeLabel,
    });
    return metadata;
  } catch (err) {
    if (signal?.aborted) throw new CancelledError("metadata extraction");
    if (
      err instanceof MetadataExtractionError ||
      err instanceof CancelledError
    ) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    const hints = err instanceof PatcherError ? err.hints : [];
    throw new MetadataExtractionError(
      `cannot read reference metadata: ${message}`,
      hints,
      { cause: err },
    );
  }
}
