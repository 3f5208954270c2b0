import { open } from "node:fs/promises";

export const SECTOR_SIZE = 2048;
export const DESCRIPTOR_START_SECTOR = 16;
const MAX_DESCRIPTOR_SECTORS = 32;

const ISO_STANDARD_ID = "CD001";
const EL_TORITO_ID = "EL TORITO SPECIFICATION";
const JOLIET_ESCAPES = ["%/@", "%/C", "%/E"];
const UDF_BEGIN = "BEA01";
const UDF_NSR = ["NSR02", "NSR03"];
const UDF_END = "TEA01";

export type PrimaryVolumeDescriptor = {
  systemId: string;
  volumeLabel: string;
  volumeSpaceSize: number;
  publisherId: string;
  applicationId: string;
};

export type VolumeDescriptorSet = {
  primary: PrimaryVolumeDescriptor | null;
  hasElTorito: boolean;
  hasJoliet: boolean;
  hasTerminator: boolean;
  hasUdf: boolean;
  // descriptor types in on-disc order, UDF structures as their identifiers
  sequence: string[];
};

function ascii(buf: Buffer, start: number, end: number): string {
  return buf.toString("latin1", start, end).replace(/[\0 ]+$/, "");
}

function parsePrimary(sector: Buffer): PrimaryVolumeDescriptor {
  return {
    systemId: ascii(sector, 8, 40),
    volumeLabel: ascii(sector, 40, 72),
    volumeSpaceSize: sector.readUInt32LE(80),
    publisherId: ascii(sector, 318, 446),
    applicationId: ascii(sector, 574, 702),
  };
}

/**
 * Walks the volume descriptor area of an image, starting at sector 16. The
 * buffer may be the whole image or only its leading sectors.
 */
export function parseVolumeDescriptors(buf: Buffer): VolumeDescriptorSet {
  const result: VolumeDescriptorSet = {
    primary: null,
    hasElTorito: false,
    hasJoliet: false,
    hasTerminator: false,
    hasUdf: false,
    sequence: [],
  };

  let udfOpen = false;
  let udfNsr = false;

  for (let i = 0; i < MAX_DESCRIPTOR_SECTORS; i += 1) {
    const offset = (DESCRIPTOR_START_SECTOR + i) * SECTOR_SIZE;
    if (offset + SECTOR_SIZE > buf.length) break;
    const sector = buf.subarray(offset, offset + SECTOR_SIZE);
    const type = sector[0];
    const id = sector.toString("latin1", 1, 6);

    if (id === ISO_STANDARD_ID) {
      if (type === 0) {
        result.sequence.push("boot");
        if (ascii(sector, 7, 39) === EL_TORITO_ID) result.hasElTorito = true;
      } else if (type === 1) {
        result.sequence.push("primary");
        if (!result.primary) result.primary = parsePrimary(sector);
      } else if (type === 2) {
        result.sequence.push("supplementary");
        const escape = sector.toString("latin1", 88, 91);
        if (JOLIET_ESCAPES.includes(escape)) result.hasJoliet = true;
      } else if (type === 255) {
        result.sequence.push("terminator");
        result.hasTerminator = true;
      } else {
        result.sequence.push(`type-${type}`);
      }
      continue;
    }

    if (id === UDF_BEGIN) {
      result.sequence.push(id);
      udfOpen = true;
      continue;
    }
    if (UDF_NSR.includes(id)) {
      result.sequence.push(id);
      if (udfOpen) udfNsr = true;
      continue;
    }
    if (id === UDF_END) {
      result.sequence.push(id);
      if (udfOpen && udfNsr) result.hasUdf = true;
      udfOpen = false;
      continue;
    }

    // zeroed or unknown sector ends the descriptor area once the ISO set closed
    if (result.hasTerminator) break;
  }

  return result;
}

export async function readIsoDescriptors(
  isoPath: string,
): Promise<VolumeDescriptorSet> {
  const sectors = DESCRIPTOR_START_SECTOR + MAX_DESCRIPTOR_SECTORS;
  const length = sectors * SECTOR_SIZE;
  const handle = await open(isoPath, "r");
  try {
    const buf = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buf, 0, length, 0);
    return parseVolumeDescriptors(buf.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}
