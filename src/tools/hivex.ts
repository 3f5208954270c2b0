import { rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { ToolInvocationError } from "../errors.js";
import { isSuccess, type ToolRunner } from "./toolRunner.js";

export type HiveName = "SYSTEM" | "SOFTWARE";

export type RegistryValueType = "REG_DWORD" | "REG_SZ";

export type RegistryWrite = {
  hive: HiveName;
  // relative to the hive root, backslash separated, e.g. "Setup\\LabConfig"
  keyPath: string;
  valueName: string;
  valueType: RegistryValueType;
  valueData: number | string;
};

export const HIVE_MOUNT_PREFIX: Record<HiveName, string> = {
  SYSTEM: "HKEY_LOCAL_MACHINE\\SYSTEM",
  SOFTWARE: "HKEY_LOCAL_MACHINE\\SOFTWARE",
};

export const HIVE_RELATIVE_PATH: Record<HiveName, string> = {
  SYSTEM: "Windows/System32/config/SYSTEM",
  SOFTWARE: "Windows/System32/config/SOFTWARE",
};

function normalizeKeyPath(keyPath: string): string {
  return keyPath
    .split(/[\\/]+/)
    .filter((s) => s.length > 0)
    .join("\\");
}

function escapeRegString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function renderRegValue(write: RegistryWrite): string {
  const name = `"${escapeRegString(write.valueName)}"`;
  if (write.valueType === "REG_DWORD") {
    const n = Number(write.valueData);
    if (!Number.isInteger(n) || n < 0 || n > 0xffffffff) {
      throw new Error(
        `invalid REG_DWORD data for ${write.valueName}: ` +
          String(write.valueData),
      );
    }
    return `${name}=dword:${n.toString(16).padStart(8, "0")}`;
  }
  return `${name}="${escapeRegString(String(write.valueData))}"`;
}

/**
 * Renders writes for one hive as a regedit 5.00 document. Keys keep the order
 * of their first write; a repeated (key, value name) keeps the last data.
 */
export function renderRegFile(
  hive: HiveName,
  writes: RegistryWrite[],
): string {
  const keys = new Map<string, Map<string, RegistryWrite>>();
  for (const w of writes) {
    if (w.hive !== hive) continue;
    const key = normalizeKeyPath(w.keyPath);
    let values = keys.get(key);
    if (!values) {
      values = new Map();
      keys.set(key, values);
    }
    values.set(w.valueName.toLowerCase(), w);
  }

  const lines = ["Windows Registry Editor Version 5.00", ""];
  for (const [key, values] of keys) {
    lines.push(`[${HIVE_MOUNT_PREFIX[hive]}\\${key}]`);
    for (const w of values.values()) lines.push(renderRegValue(w));
    lines.push("");
  }
  return lines.join("\r\n");
}

export class HivexTool {
  constructor(
    private readonly opts: {
      runner: ToolRunner;
      hivexget: string;
      hivexregedit: string;
      timeoutMs?: number;
    },
  ) {}

  async getValue(
    hiveFile: string,
    keyPath: string,
    valueName: string,
    call?: { signal?: AbortSignal },
  ): Promise<string | null> {
    const args = [hiveFile, `\\${normalizeKeyPath(keyPath)}`, valueName];
    const res = await this.opts.runner.run(this.opts.hivexget, args, {
      signal: call?.signal,
      timeoutMs: this.opts.timeoutMs,
    });
    if (res.spawnError) {
      const tool = this.opts.hivexget;
      throw new ToolInvocationError(tool, args, res, "hivexget");
    }
    if (res.code !== 0) return null;
    const value = res.stdout.replace(/\r?\n$/, "");
    return value.length ? value : null;
  }

  async merge(
    hiveFile: string,
    hive: HiveName,
    regFile: string,
    call?: { signal?: AbortSignal },
  ): Promise<void> {
    const args = [
      "--merge",
      "--prefix",
      HIVE_MOUNT_PREFIX[hive],
      hiveFile,
      regFile,
    ];
    const res = await this.opts.runner.run(this.opts.hivexregedit, args, {
      signal: call?.signal,
      timeoutMs: this.opts.timeoutMs,
    });
    if (!isSuccess(res)) {
      const label = `hive merge into ${hive}`;
      throw new ToolInvocationError(this.opts.hivexregedit, args, res, label);
    }
  }
}

/**
 * Offline edit session over one hive file. Writes are buffered until commit(),
 * which merges them through a temporary .reg file; close() drops anything
 * uncommitted.
 */
export class HiveSession {
  private readonly pending: RegistryWrite[] = [];
  private closed = false;
  private commits = 0;

  private constructor(
    private readonly tool: HivexTool,
    readonly hiveFile: string,
    readonly hive: HiveName,
    private readonly scratchDir: string,
  ) {}

  static async open(opts: {
    tool: HivexTool;
    hiveFile: string;
    hive: HiveName;
    scratchDir: string;
  }): Promise<HiveSession> {
    const st = await stat(opts.hiveFile).catch(() => null);
    if (!st?.isFile()) {
      throw new Error(`registry hive not found: ${opts.hiveFile}`);
    }
    const { tool, hiveFile, hive, scratchDir } = opts;
    return new HiveSession(tool, hiveFile, hive, scratchDir);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`hive session already closed: ${this.hiveFile}`);
    }
  }

  get pendingWrites(): number {
    return this.pending.length;
  }

  async getValue(
    keyPath: string,
    valueName: string,
    signal?: AbortSignal,
  ): Promise<string | null> {
    this.assertOpen();
    return await this.tool.getValue(this.hiveFile, keyPath, valueName, {
      signal,
    });
  }

  setValue(write: Omit<RegistryWrite, "hive">): void {
    this.assertOpen();
    this.pending.push({ ...write, hive: this.hive });
  }

  private regFilePath(): string {
    const name = `${this.hive.toLowerCase()}-patch-${this.commits}.reg`;
    return path.join(this.scratchDir, name);
  }

  async commit(signal?: AbortSignal): Promise<void> {
    this.assertOpen();
    if (!this.pending.length) return;
    const regFile = this.regFilePath();
    await writeFile(regFile, renderRegFile(this.hive, this.pending), "utf8");
    try {
      await this.tool.merge(this.hiveFile, this.hive, regFile, { signal });
      this.pending.length = 0;
    } finally {
      this.commits += 1;
      await rm(regFile, { force: true });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending.length = 0;
  }
}

export async function withHive<T>(
  opts: {
    tool: HivexTool;
    hiveFile: string;
    hive: HiveName;
    scratchDir: string;
  },
  fn: (session: HiveSession) => Promise<T>,
): Promise<T> {
  const session = await HiveSession.open(opts);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
