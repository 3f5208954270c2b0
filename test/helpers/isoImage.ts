import { writeFile } from "node:fs/promises";

const SECTOR = 2048;

export type IsoImageSpec = {
  volumeLabel: string;
  systemId?: string;
  publisherId?: string;
  applicationId?: string;
  elTorito?: boolean;
  joliet?: boolean;
  udf?: boolean;
  // pads the image with zeros up to this many bytes
  totalBytes?: number;
};

function writeText(buf: Buffer, offset: number, length: number, text: string, pad = " "): void {
  buf.fill(pad, offset, offset + length);
  buf.write(text.slice(0, length), offset, "latin1");
}

function descriptor(type: number, id = "CD001"): Buffer {
  const sector = Buffer.alloc(SECTOR);
  sector[0] = type;
  sector.write(id, 1, "latin1");
  sector[6] = 1;
  return sector;
}

/** Minimal image with a real descriptor layout from sector 16. */
export function buildIsoImage(opts: IsoImageSpec): Buffer {
  const sectors: Buffer[] = [];

  const pvd = descriptor(1);
  writeText(pvd, 8, 32, opts.systemId ?? "");
  writeText(pvd, 40, 32, opts.volumeLabel);
  writeText(pvd, 318, 128, opts.publisherId ?? "");
  writeText(pvd, 574, 128, opts.applicationId ?? "");
  sectors.push(pvd);

  if (opts.elTorito) {
    const boot = descriptor(0);
    writeText(boot, 7, 32, "EL TORITO SPECIFICATION", "\0");
    sectors.push(boot);
  }

  if (opts.joliet) {
    const svd = descriptor(2);
    writeText(svd, 40, 32, opts.volumeLabel);
    svd.write("%/E", 88, "latin1");
    sectors.push(svd);
  }

  sectors.push(descriptor(255));

  if (opts.udf) {
    for (const id of ["BEA01", "NSR02", "TEA01"]) sectors.push(descriptor(0, id));
  }

  const minimum = (16 + sectors.length) * SECTOR;
  const total = Math.max(minimum, opts.totalBytes ?? 0);
  const image = Buffer.alloc(total);
  for (const [i, s] of sectors.entries()) s.copy(image, (16 + i) * SECTOR);
  image.writeUInt32LE(Math.ceil(total / SECTOR), 16 * SECTOR + 80);
  return image;
}

export async function writeIsoImage(
  filePath: string,
  opts: IsoImageSpec,
): Promise<Buffer> {
  const image = buildIsoImage(opts);
  await writeFile(filePath, image);
  return image;
}
