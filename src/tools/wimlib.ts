import { ToolInvocationError } from "../errors.js";
import { isSuccess, type ExitResult, type ToolRunner } from "./toolRunner.js";

export type WimImageInfo = {
  index: number;
  name: string;
  description: string;
  displayName: string | null;
  displayDescription: string | null;
  flags: string | null;
  build: string | null;
  editionId: string | null;
  productName: string | null;
  properties: Record<string, string>;
};

export type WimInfo = {
  imageCount: number;
  // 0 when no image is marked bootable
  bootIndex: number;
  header: Record<string, string>;
  images: WimImageInfo[];
};

type CallOpts = { signal?: AbortSignal };

const FIELD_RE = /^([A-Za-z][A-Za-z0-9 ()/-]*?):\s*(.*)$/;

function pick(props: Record<string, string>, key: string): string | null {
  const v = props[key]?.trim();
  return v ? v : null;
}

function toImage(props: Record<string, string>): WimImageInfo {
  return {
    index: Number(props.Index),
    name: props.Name?.trim() ?? "",
    description: props.Description?.trim() ?? "",
    displayName: pick(props, "Display Name"),
    displayDescription: pick(props, "Display Description"),
    flags: pick(props, "Flags"),
    build: pick(props, "Build"),
    editionId: pick(props, "Edition ID"),
    productName: pick(props, "Product Name"),
    properties: props,
  };
}

export function parseWimInfo(text: string): WimInfo {
  const header: Record<string, string> = {};
  const images: WimImageInfo[] = [];
  let current: Record<string, string> | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const m = FIELD_RE.exec(rawLine.trim());
    if (!m) continue;
    const key = m[1].trim();
    const value = m[2];

    if (key === "Index") {
      if (current) images.push(toImage(current));
      current = { Index: value.trim() };
      continue;
    }

    // wimlib prints "Build" twice per image (WINDOWS/VERSION); keep the first
    if (current) {
      if (!(key in current)) current[key] = value;
    } else if (!(key in header)) {
      header[key] = value;
    }
  }
  if (current) images.push(toImage(current));

  const imageCount = Number(header["Image Count"] ?? images.length);
  const bootIndex = Number(header["Boot Index"] ?? 0);

  return {
    imageCount: Number.isFinite(imageCount) ? imageCount : images.length,
    bootIndex: Number.isFinite(bootIndex) ? bootIndex : 0,
    header,
    images: images.filter((i) => Number.isInteger(i.index) && i.index > 0),
  };
}

export class WimTool {
  constructor(
    private readonly opts: {
      runner: ToolRunner;
      binary: string;
      timeoutMs?: number;
    },
  ) {}

  get binary(): string {
    return this.opts.binary;
  }

  private async invoke(
    args: string[],
    label: string,
    call?: CallOpts,
  ): Promise<ExitResult> {
    const result = await this.opts.runner.run(this.opts.binary, args, {
      signal: call?.signal,
      timeoutMs: this.opts.timeoutMs,
    });
    if (!isSuccess(result)) {
      throw new ToolInvocationError(this.opts.binary, args, result, label);
    }
    return result;
  }

  async info(wimPath: string, call?: CallOpts): Promise<WimInfo> {
    const res = await this.invoke(["info", wimPath], "wim info", call);
    return parseWimInfo(res.stdout);
  }

  async extractImage(
    wimPath: string,
    index: number,
    destDir: string,
    call?: CallOpts,
  ): Promise<void> {
    await this.invoke(
      ["extract", wimPath, String(index), `--dest-dir=${destDir}`, "--no-acls"],
      `wim extract image ${index}`,
      call,
    );
  }

  async extractPaths(
    wimPath: string,
    index: number,
    paths: string[],
    destDir: string,
    call?: CallOpts,
  ): Promise<void> {
    await this.invoke(
      [
        "extract",
        wimPath,
        String(index),
        ...paths,
        `--dest-dir=${destDir}`,
        "--preserve-dir-structure",
        "--no-acls",
      ],
      `wim extract ${paths.join(", ")}`,
      call,
    );
  }

  async captureImage(
    sourceDir: string,
    wimPath: string,
    image: { name: string; description: string; boot: boolean },
    call?: CallOpts,
  ): Promise<void> {
    const args = [
      "capture",
      sourceDir,
      wimPath,
      image.name,
      image.description,
      "--compress=LZX",
      "--check",
    ];
    if (image.boot) args.push("--boot");
    await this.invoke(args, "wim capture", call);
  }

  async appendImage(
    sourceDir: string,
    wimPath: string,
    image: { name: string; description: string; boot: boolean },
    call?: CallOpts,
  ): Promise<void> {
    const args = [
      "append",
      sourceDir,
      wimPath,
      image.name,
      image.description,
      "--check",
    ];
    if (image.boot) args.push("--boot");
    await this.invoke(args, "wim append", call);
  }

  async exportImage(
    srcWim: string,
    index: number,
    destWim: string,
    opts: { boot: boolean; create: boolean },
    call?: CallOpts,
  ): Promise<void> {
    const args = ["export", srcWim, String(index), destWim];
    if (opts.create) args.push("--compress=LZX");
    if (opts.boot) args.push("--boot");
    await this.invoke(args, `wim export image ${index}`, call);
  }

  async setImageProperties(
    wimPath: string,
    index: number,
    props: Record<string, string>,
    call?: CallOpts,
  ): Promise<void> {
    const entries = Object.entries(props).filter(([k]) => k.trim());
    if (!entries.length) return;
    const args = ["info", wimPath, String(index)];
    for (const [key, value] of entries) {
      args.push("--image-property", `${key}=${value}`);
    }
    await this.invoke(args, `wim set properties of image ${index}`, call);
  }
}
