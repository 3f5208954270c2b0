import { open, stat, type FileHandle } from "node:fs/promises";

import { throwIfCancelled } from "../errors.js";
import {
  DESCRIPTOR_START_SECTOR,
  SECTOR_SIZE,
} from "../iso/volumeDescriptor.js";
import type {
  IsoBootEntry,
  IsoImageOptions,
  IsoImageWriter,
  IsoLibrary,
} from "./isoLibrary.js";

// largest sector-aligned length a 32-bit directory record field holds
export const MAX_EXTENT_BYTES = 0xffff_f800;

const COPY_CHUNK_BYTES = 4 * 1024 * 1024;
const PRIMARY_FILE_NAME_LIMIT = 30;
const PRIMARY_DIR_NAME_LIMIT = 31;
const PRIMARY_EXT_LIMIT = 8;
const JOLIET_NAME_LIMIT = 64;
const JOLIET_EXT_LIMIT = 16;
const FLAG_DIRECTORY = 0x02;
const FLAG_MULTI_EXTENT = 0x80;
const PLATFORM_ID = { bios: 0x00, efi: 0xef } as const;
const EL_TORITO_ID = "EL TORITO SPECIFICATION";
const UNSET_DATE = Buffer.from("0000000000000000\0", "latin1");

type Namespace = "primary" | "joliet";

type Placement = { id: Buffer; extent: number; size: number; number: number };

type FileNode = {
  kind: "file";
  name: string;
  sourcePath: string;
  size: number;
  extent: number;
  ids: Record<Namespace, Buffer>;
};

type DirNode = {
  kind: "dir";
  name: string;
  parent: DirNode | null;
  children: Map<string, FileNode | DirNode>;
  placed: Record<Namespace, Placement>;
};

type PathTableLayout = { size: number; lAt: number; mAt: number };

type ResolvedBootEntry = {
  platform: IsoBootEntry["platform"];
  file: FileNode;
  loadSectors: number;
};

function emptyPlacement(): Placement {
  return { id: Buffer.alloc(0), extent: 0, size: 0, number: 0 };
}

function newDir(name: string, parent: DirNode | null): DirNode {
  return {
    kind: "dir",
    name,
    parent,
    children: new Map(),
    placed: { primary: emptyPlacement(), joliet: emptyPlacement() },
  };
}

function sectors(bytes: number): number {
  return Math.ceil(bytes / SECTOR_SIZE);
}

function splitIsoPath(isoPath: string): string[] {
  const segments = isoPath.split("/").filter((s) => s.length > 0);
  for (const s of segments) {
    if (s === "." || s === "..") {
      throw new Error(`invalid path inside the image: ${isoPath}`);
    }
  }
  return segments;
}

function writeBoth16(buf: Buffer, offset: number, value: number): void {
  buf.writeUInt16LE(value, offset);
  buf.writeUInt16BE(value, offset + 2);
}

function writeBoth32(buf: Buffer, offset: number, value: number): void {
  buf.writeUInt32LE(value, offset);
  buf.writeUInt32BE(value, offset + 4);
}

function ucs2(text: string): Buffer {
  return Buffer.from(text, "utf16le").swap16();
}

function asciiField(
  buf: Buffer,
  offset: number,
  length: number,
  text: string,
): void {
  buf.fill(0x20, offset, offset + length);
  buf.write(text.slice(0, length), offset, "latin1");
}

function ucs2Field(
  buf: Buffer,
  offset: number,
  length: number,
  text: string,
): void {
  buf.fill(0, offset, offset + length);
  const chars = Math.floor(length / 2);
  for (let i = 0; i < chars; i += 1) buf[offset + i * 2 + 1] = 0x20;
  ucs2(text.slice(0, chars)).copy(buf, offset);
}

function recordDate(d: Date): Buffer {
  return Buffer.from([
    d.getUTCFullYear() - 1900,
    d.getUTCMonth() + 1,
    d.getUTCDate(),
    d.getUTCHours(),
    d.getUTCMinutes(),
    d.getUTCSeconds(),
    0,
  ]);
}

function volumeDate(d: Date): Buffer {
  const two = (n: number) => String(n).padStart(2, "0");
  const digits =
    String(d.getUTCFullYear()).padStart(4, "0") +
    two(d.getUTCMonth() + 1) +
    two(d.getUTCDate()) +
    two(d.getUTCHours()) +
    two(d.getUTCMinutes()) +
    two(d.getUTCSeconds()) +
    "00";
  return Buffer.concat([Buffer.from(digits, "latin1"), Buffer.from([0])]);
}

function directoryRecord(
  id: Buffer,
  extent: number,
  length: number,
  flags: number,
  date: Buffer,
): Buffer {
  const size = 33 + id.length + (id.length % 2 === 0 ? 1 : 0);
  const rec = Buffer.alloc(size);
  rec[0] = size;
  writeBoth32(rec, 2, extent);
  writeBoth32(rec, 10, length);
  date.copy(rec, 18);
  rec[25] = flags;
  writeBoth16(rec, 28, 1);
  rec[32] = id.length;
  id.copy(rec, 33);
  return rec;
}

/** Records never straddle a sector; the result is padded to whole sectors. */
function packRecords(records: Buffer[]): Buffer {
  const positions: number[] = [];
  let offset = 0;
  for (const rec of records) {
    const room = SECTOR_SIZE - (offset % SECTOR_SIZE);
    if (rec.length > room) offset += room;
    positions.push(offset);
    offset += rec.length;
  }
  const out = Buffer.alloc(sectors(offset) * SECTOR_SIZE);
  for (const [i, rec] of records.entries()) rec.copy(out, positions[i]);
  return out;
}

function unique(taken: Set<string>, make: (suffix: string) => string): string {
  let candidate = make("");
  for (let n = 1; taken.has(candidate); n += 1) candidate = make(`~${n}`);
  taken.add(candidate);
  return candidate;
}

function splitExtension(name: string): { base: string; ext: string } {
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return { base: name, ext: "" };
  return { base: name.slice(0, dot), ext: name.slice(dot + 1) };
}

/**
 * d-characters only, `NAME.EXT` for files; the `;1` version is added when
 * encoding.
 */
export function primaryIdentifier(
  name: string,
  isDirectory: boolean,
  taken: Set<string>,
): string {
  const clean = (s: string) => s.toUpperCase().replace(/[^A-Z0-9_]/g, "_");
  if (isDirectory) {
    const dir = clean(name);
    return unique(
      taken,
      (suffix) => dir.slice(0, PRIMARY_DIR_NAME_LIMIT - suffix.length) + suffix,
    );
  }
  const { base, ext } = splitExtension(name);
  const e = clean(ext).slice(0, PRIMARY_EXT_LIMIT);
  const b = clean(base);
  return unique(taken, (suffix) => {
    const room = PRIMARY_FILE_NAME_LIMIT - e.length - suffix.length;
    return `${b.slice(0, room)}${suffix}.${e}`;
  });
}

export function jolietIdentifier(name: string, taken: Set<string>): string {
  const clean = name.replace(/[*/:;?\\]/g, "_");
  const { base, ext } = splitExtension(clean);
  const e = ext ? `.${ext.slice(0, JOLIET_EXT_LIMIT - 1)}` : "";
  return unique(taken, (suffix) => {
    const room = JOLIET_NAME_LIMIT - e.length - suffix.length;
    return `${base.slice(0, room)}${suffix}${e}`;
  });
}

function idOf(node: FileNode | DirNode, ns: Namespace): Buffer {
  return node.kind === "dir" ? node.placed[ns].id : node.ids[ns];
}

function sortedChildren(
  dir: DirNode,
  ns: Namespace,
): Array<FileNode | DirNode> {
  return [...dir.children.values()].sort((a, b) =>
    Buffer.compare(idOf(a, ns), idOf(b, ns)),
  );
}

function assignIdentifiers(dir: DirNode, namespaces: Namespace[]): void {
  const byName = [...dir.children.values()].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  const taken: Record<Namespace, Set<string>> = {
    primary: new Set(),
    joliet: new Set(),
  };
  for (const child of byName) {
    const isDirectory = child.kind === "dir";
    for (const ns of namespaces) {
      const id =
        ns === "primary"
          ? primaryIdentifier(child.name, isDirectory, taken.primary)
          : jolietIdentifier(child.name, taken.joliet);
      const encoded =
        ns === "primary"
          ? Buffer.from(isDirectory ? id : `${id};1`, "latin1")
          : ucs2(id);
      if (child.kind === "dir") child.placed[ns].id = encoded;
      else child.ids[ns] = encoded;
    }
    if (child.kind === "dir") assignIdentifiers(child, namespaces);
  }
}

/** Breadth first, siblings by identifier: the order path tables require. */
function pathTableOrder(root: DirNode, ns: Namespace): DirNode[] {
  const order: DirNode[] = [root];
  for (const dir of order) {
    for (const child of sortedChildren(dir, ns)) {
      if (child.kind === "dir") order.push(child);
    }
  }
  if (order.length > 0xffff) {
    throw new Error(
      `too many directories for an ISO 9660 path table: ${order.length}`,
    );
  }
  for (const [i, dir] of order.entries()) dir.placed[ns].number = i + 1;
  return order;
}

function pathTable(
  order: DirNode[],
  ns: Namespace,
  littleEndian: boolean,
): Buffer {
  const parts: Buffer[] = [];
  for (const dir of order) {
    const placed = dir.placed[ns];
    const id = dir.parent ? placed.id : Buffer.from([0]);
    const parentNumber = (dir.parent ?? dir).placed[ns].number;
    const rec = Buffer.alloc(8 + id.length + (id.length % 2));
    rec[0] = id.length;
    if (littleEndian) {
      rec.writeUInt32LE(placed.extent, 2);
      rec.writeUInt16LE(parentNumber, 6);
    } else {
      rec.writeUInt32BE(placed.extent, 2);
      rec.writeUInt16BE(parentNumber, 6);
    }
    id.copy(rec, 8);
    parts.push(rec);
  }
  return Buffer.concat(parts);
}

type ExtentPart = { extent: number; length: number };

function fileExtents(file: FileNode, maxExtentBytes: number): ExtentPart[] {
  if (file.size === 0) return [{ extent: 0, length: 0 }];
  const parts: ExtentPart[] = [];
  for (let offset = 0; offset < file.size; offset += maxExtentBytes) {
    parts.push({
      extent: file.extent + offset / SECTOR_SIZE,
      length: Math.min(maxExtentBytes, file.size - offset),
    });
  }
  return parts;
}

function collectFiles(dir: DirNode, out: FileNode[]): FileNode[] {
  for (const child of sortedChildren(dir, "primary")) {
    if (child.kind === "file") out.push(child);
    else collectFiles(child, out);
  }
  return out;
}

function descriptorHeader(type: number): Buffer {
  const d = Buffer.alloc(SECTOR_SIZE);
  d[0] = type;
  d.write("CD001", 1, "latin1");
  d[6] = 1;
  return d;
}

function bootRecord(catalogAt: number): Buffer {
  const d = descriptorHeader(0);
  d.write(EL_TORITO_ID, 7, "latin1");
  d.writeUInt32LE(catalogAt, 71);
  return d;
}

function bootCatalog(entries: ResolvedBootEntry[]): Buffer {
  const cat = Buffer.alloc(SECTOR_SIZE);
  const writeEntry = (offset: number, entry: ResolvedBootEntry) => {
    cat[offset] = 0x88;
    cat.writeUInt16LE(entry.loadSectors, offset + 6);
    cat.writeUInt32LE(entry.file.extent, offset + 8);
  };

  const [first, ...rest] = entries;
  cat[0] = 1;
  cat[1] = PLATFORM_ID[first.platform];
  cat[30] = 0x55;
  cat[31] = 0xaa;
  let sum = 0;
  for (let i = 0; i < 32; i += 2) sum = (sum + cat.readUInt16LE(i)) & 0xffff;
  cat.writeUInt16LE((0x10000 - sum) & 0xffff, 28);
  writeEntry(32, first);

  let offset = 64;
  for (const [i, entry] of rest.entries()) {
    cat[offset] = i === rest.length - 1 ? 0x91 : 0x90;
    cat[offset + 1] = PLATFORM_ID[entry.platform];
    cat.writeUInt16LE(1, offset + 2);
    writeEntry(offset + 32, entry);
    offset += 64;
  }
  return cat;
}

async function copyInto(
  out: FileHandle,
  file: FileNode,
  signal?: AbortSignal,
): Promise<void> {
  if (file.size === 0) return;
  const input = await open(file.sourcePath, "r");
  try {
    const chunk = Buffer.alloc(Math.min(COPY_CHUNK_BYTES, file.size));
    let copied = 0;
    while (copied < file.size) {
      throwIfCancelled(signal, "in-process authoring");
      const want = Math.min(chunk.length, file.size - copied);
      const { bytesRead } = await input.read(chunk, 0, want, copied);
      if (bytesRead === 0) {
        throw new Error(
          `${file.sourcePath} shrank while the image was written`,
        );
      }
      await out.write(chunk, 0, bytesRead, file.extent * SECTOR_SIZE + copied);
      copied += bytesRead;
    }
  } finally {
    await input.close();
  }
}

class Iso9660ImageWriter implements IsoImageWriter {
  private readonly root = newDir("", null);
  private readonly bootEntries: IsoBootEntry[] = [];
  private closed = false;

  constructor(
    private readonly options: IsoImageOptions,
    private readonly maxExtentBytes: number,
    private readonly createdAt: Date,
  ) {
    if (options.volumeLabel.length > 32) {
      throw new Error(
        `volume label is longer than 32 characters: ${options.volumeLabel}`,
      );
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("image writer already closed");
  }

  private ensureDir(segments: string[], isoPath: string): DirNode {
    let dir = this.root;
    for (const segment of segments) {
      const existing = dir.children.get(segment);
      if (existing?.kind === "file") {
        throw new Error(`${isoPath}: ${segment} is already a file`);
      }
      if (existing) {
        dir = existing;
        continue;
      }
      const created = newDir(segment, dir);
      dir.children.set(segment, created);
      dir = created;
    }
    return dir;
  }

  private findFile(isoPath: string): FileNode | null {
    let node: FileNode | DirNode | undefined = this.root;
    for (const segment of splitIsoPath(isoPath)) {
      node = node?.kind === "dir" ? node.children.get(segment) : undefined;
    }
    return node?.kind === "file" ? node : null;
  }

  async addDirectory(isoPath: string): Promise<void> {
    this.assertOpen();
    this.ensureDir(splitIsoPath(isoPath), isoPath);
  }

  async addFile(sourcePath: string, isoPath: string): Promise<void> {
    this.assertOpen();
    const segments = splitIsoPath(isoPath);
    const name = segments.pop();
    if (!name) {
      throw new Error(`file path inside the image is empty: ${isoPath}`);
    }
    const st = await stat(sourcePath);
    if (!st.isFile()) throw new Error(`not a regular file: ${sourcePath}`);
    const parent = this.ensureDir(segments, isoPath);
    if (parent.children.has(name)) {
      throw new Error(`duplicate path inside the image: ${isoPath}`);
    }
    parent.children.set(name, {
      kind: "file",
      name,
      sourcePath,
      size: st.size,
      extent: 0,
      ids: { primary: Buffer.alloc(0), joliet: Buffer.alloc(0) },
    });
  }

  async addBootEntry(entry: IsoBootEntry): Promise<void> {
    this.assertOpen();
    if (this.bootEntries.some((e) => e.platform === entry.platform)) {
      throw new Error(`a ${entry.platform} boot entry is already set`);
    }
    this.bootEntries.push(entry);
  }

  private resolveBootEntries(): ResolvedBootEntry[] {
    // the BIOS entry is the catalog default
    const ordered = [...this.bootEntries].sort((a, b) =>
      a.platform === "bios" ? -1 : b.platform === "bios" ? 1 : 0,
    );
    return ordered.map((entry) => {
      const file = this.findFile(entry.imagePath);
      if (!file || file.size === 0) {
        throw new Error(
          `boot image is not a file in the image: ${entry.imagePath}`,
        );
      }
      const whole = Math.min(Math.ceil(file.size / 512), 0xffff);
      const loadSectors =
        entry.platform === "bios" ? (entry.loadSectors ?? whole) : whole;
      return { platform: entry.platform, file, loadSectors };
    });
  }

  private volumeDescriptor(
    ns: Namespace,
    totalSectors: number,
    table: PathTableLayout,
  ): Buffer {
    const d = descriptorHeader(ns === "primary" ? 1 : 2);
    const text = ns === "primary" ? asciiField : ucs2Field;
    const root = this.root.placed[ns];
    text(d, 8, 32, "");
    text(d, 40, 32, this.options.volumeLabel);
    writeBoth32(d, 80, totalSectors);
    if (ns === "joliet") d.write("%/E", 88, "latin1");
    writeBoth16(d, 120, 1);
    writeBoth16(d, 124, 1);
    writeBoth16(d, 128, SECTOR_SIZE);
    writeBoth32(d, 132, table.size);
    d.writeUInt32LE(table.lAt, 140);
    d.writeUInt32BE(table.mAt, 148);
    directoryRecord(
      Buffer.from([0]),
      root.extent,
      root.size,
      FLAG_DIRECTORY,
      recordDate(this.createdAt),
    ).copy(d, 156);
    text(d, 190, 128, this.options.volumeLabel);
    text(d, 318, 128, this.options.publisherId ?? "");
    text(d, 446, 128, "");
    text(d, 574, 128, this.options.applicationId ?? "");
    text(d, 702, 37, "");
    text(d, 739, 37, "");
    text(d, 776, 37, "");
    const created = volumeDate(this.createdAt);
    created.copy(d, 813);
    created.copy(d, 830);
    UNSET_DATE.copy(d, 847);
    UNSET_DATE.copy(d, 864);
    d[881] = 1;
    return d;
  }

  private directoryRecords(dir: DirNode, ns: Namespace): Buffer[] {
    const date = recordDate(this.createdAt);
    const self = dir.placed[ns];
    const parent = (dir.parent ?? dir).placed[ns];
    const dirRecord = (id: Buffer, at: Placement) =>
      directoryRecord(id, at.extent, at.size, FLAG_DIRECTORY, date);
    const records = [
      dirRecord(Buffer.from([0]), self),
      dirRecord(Buffer.from([1]), parent),
    ];
    for (const child of sortedChildren(dir, ns)) {
      if (child.kind === "dir") {
        records.push(dirRecord(child.placed[ns].id, child.placed[ns]));
        continue;
      }
      const parts = fileExtents(child, this.maxExtentBytes);
      for (const [i, part] of parts.entries()) {
        const flags = i < parts.length - 1 ? FLAG_MULTI_EXTENT : 0;
        records.push(
          directoryRecord(child.ids[ns], part.extent, part.length, flags, date),
        );
      }
    }
    return records;
  }

  async write(outputPath: string, signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    throwIfCancelled(signal, "in-process authoring");

    const namespaces: Namespace[] = this.options.joliet
      ? ["primary", "joliet"]
      : ["primary"];
    assignIdentifiers(this.root, namespaces);
    const orders = new Map<Namespace, DirNode[]>();
    for (const ns of namespaces) {
      const order = pathTableOrder(this.root, ns);
      for (const dir of order) {
        const packed = packRecords(this.directoryRecords(dir, ns));
        dir.placed[ns].size = packed.length;
      }
      orders.set(ns, order);
    }
    const boot = this.resolveBootEntries();

    let next = DESCRIPTOR_START_SECTOR;
    const take = (count: number): number => {
      const at = next;
      next += count;
      return at;
    };
    const pvdAt = take(1);
    const bootRecordAt = boot.length ? take(1) : null;
    const svdAt = this.options.joliet ? take(1) : null;
    const terminatorAt = take(1);
    const catalogAt = boot.length ? take(1) : null;

    const tables = new Map<Namespace, PathTableLayout>();
    for (const [ns, order] of orders) {
      const size = pathTable(order, ns, true).length;
      tables.set(ns, {
        size,
        lAt: take(sectors(size)),
        mAt: take(sectors(size)),
      });
    }
    for (const [ns, order] of orders) {
      for (const dir of order) {
        dir.placed[ns].extent = take(dir.placed[ns].size / SECTOR_SIZE);
      }
    }
    const files = collectFiles(this.root, []);
    for (const file of files) {
      file.extent = file.size ? take(sectors(file.size)) : 0;
    }
    const totalSectors = next;

    const out = await open(outputPath, "w");
    try {
      await out.truncate(totalSectors * SECTOR_SIZE);
      const put = async (at: number, data: Buffer) => {
        await out.write(data, 0, data.length, at * SECTOR_SIZE);
      };

      for (const [ns, order] of orders) {
        const table = tables.get(ns);
        const descriptorAt = ns === "primary" ? pvdAt : svdAt;
        if (!table || descriptorAt === null) {
          throw new Error(`no volume descriptor laid out for ${ns}`);
        }
        await put(descriptorAt, this.volumeDescriptor(ns, totalSectors, table));
        await put(table.lAt, pathTable(order, ns, true));
        await put(table.mAt, pathTable(order, ns, false));
        for (const dir of order) {
          const records = packRecords(this.directoryRecords(dir, ns));
          await put(dir.placed[ns].extent, records);
        }
      }
      if (bootRecordAt !== null && catalogAt !== null) {
        await put(bootRecordAt, bootRecord(catalogAt));
        await put(catalogAt, bootCatalog(boot));
      }
      await put(terminatorAt, descriptorHeader(255));

      for (const file of files) await copyInto(out, file, signal);
    } finally {
      await out.close();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.root.children.clear();
    this.bootEntries.length = 0;
  }
}

/**
 * Writes ISO 9660 images with Joliet names and an El Torito catalog holding
 * a BIOS and an EFI no-emulation entry. Files larger than one extent are
 * split across consecutive multi-extent records.
 */
export class Iso9660Library implements IsoLibrary {
  readonly name = "iso9660";
  private readonly maxExtentBytes: number;

  constructor(opts?: { maxExtentBytes?: number }) {
    const max = opts?.maxExtentBytes ?? MAX_EXTENT_BYTES;
    if (max <= 0 || max % SECTOR_SIZE !== 0 || max > MAX_EXTENT_BYTES) {
      throw new Error(
        `extent size must be a positive multiple of ${SECTOR_SIZE} ` +
          `up to ${MAX_EXTENT_BYTES}`,
      );
    }
    this.maxExtentBytes = max;
  }

  async open(options: IsoImageOptions): Promise<IsoImageWriter> {
    return new Iso9660ImageWriter(options, this.maxExtentBytes, new Date());
  }
}
