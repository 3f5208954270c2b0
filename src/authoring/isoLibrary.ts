export type IsoBootEntry = {
  platform: "bios" | "efi";
  // path of the boot image inside the ISO, leading slash
  imagePath: string;
  // 512-byte sectors loaded by BIOS firmware; EFI entries load the whole image
  loadSectors?: number;
};

export type IsoImageOptions = {
  volumeLabel: string;
  applicationId?: string;
  publisherId?: string;
  joliet: boolean;
};

/**
 * One image being assembled. Paths inside the ISO are absolute with forward
 * slashes.
 */
export interface IsoImageWriter {
  addDirectory(isoPath: string): Promise<void>;
  addFile(sourcePath: string, isoPath: string): Promise<void>;
  addBootEntry(entry: IsoBootEntry): Promise<void>;
  write(outputPath: string, signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

/**
 * In-process ISO 9660 writer used by the last authoring strategy. The binary
 * layout is the implementation's concern; callers only describe the tree.
 */
export interface IsoLibrary {
  readonly name: string;
  open(options: IsoImageOptions): Promise<IsoImageWriter>;
}
