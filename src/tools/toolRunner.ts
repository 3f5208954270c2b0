import { spawn, type ChildProcess } from "node:child_process";

import type { LoggerFn } from "../logger.js";

export type ExitResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  // set when the binary could not be started at all (ENOENT, EACCES,
  // aborted before spawn)
  spawnError?: string;
};

export type ToolRunOpts = {
  cwd?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export interface ToolRunner {
  run(tool: string, args: string[], opts?: ToolRunOpts): Promise<ExitResult>;
  waitForIdle?(): Promise<void>;
}

const OUTPUT_TAIL_LIMIT = 64 * 1024;
const KILL_GRACE_MS = 5_000;

export function isSuccess(result: ExitResult): boolean {
  return !result.spawnError && result.code === 0;
}

export function formatCommand(tool: string, args: string[]): string {
  return [tool, ...args]
    .map((a) => (/[\s"'\\]/.test(a) ? JSON.stringify(a) : a))
    .join(" ");
}

export function describeFailure(result: ExitResult): string {
  const head = result.spawnError
    ? result.spawnError
    : result.signal
      ? `killed by ${result.signal}`
      : `exit code ${result.code ?? "unknown"}`;
  const output = `${result.stderr}\n${result.stdout}`.trim();
  if (!output) return head;
  const tail = output
    .split(/\r?\n/)
    .filter((l) => l.trim())
    .slice(-3)
    .join(" | ");
  return `${head}: ${tail}`;
}

function appendTail(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > OUTPUT_TAIL_LIMIT
    ? next.slice(next.length - OUTPUT_TAIL_LIMIT)
    : next;
}

export class ProcessToolRunner implements ToolRunner {
  private readonly active = new Map<ChildProcess, Promise<void>>();

  constructor(private readonly opts: { log: LoggerFn }) {}

  async run(
    tool: string,
    args: string[],
    opts?: ToolRunOpts,
  ): Promise<ExitResult> {
    if (opts?.signal?.aborted) {
      return {
        code: null,
        signal: null,
        stdout: "",
        stderr: "",
        spawnError: "aborted before start",
      };
    }

    this.opts.log("tool run", {
      cmd: formatCommand(tool, args),
      cwd: opts?.cwd,
    });

    const child = spawn(tool, args, {
      cwd: opts?.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (d) => {
      stdout = appendTail(stdout, String(d ?? ""));
    });
    child.stderr?.on("data", (d) => {
      stderr = appendTail(stderr, String(d ?? ""));
    });

    const timers: { kill?: NodeJS.Timeout } = {};
    const terminate = (reason: string) => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      this.opts.log("tool terminate", { tool, reason });
      child.kill("SIGTERM");
      timers.kill = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill("SIGKILL");
        }
      }, KILL_GRACE_MS);
      timers.kill.unref();
    };

    const onAbort = () => terminate("aborted");
    opts?.signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutMs = opts?.timeoutMs ?? 0;
    const timeout =
      timeoutMs > 0
        ? setTimeout(
            () => terminate(`timeout after ${timeoutMs}ms`),
            timeoutMs,
          )
        : null;
    timeout?.unref();

    const finished = new Promise<ExitResult>((resolve) => {
      child.once("error", (err) => {
        resolve({
          code: null,
          signal: null,
          stdout,
          stderr,
          spawnError: `cannot start ${tool}: ${err.message}`,
        });
      });
      child.once("close", (code, signal) => {
        resolve({ code, signal, stdout, stderr });
      });
    });

    const settled = finished.then(() => undefined);
    this.active.set(child, settled);

    try {
      return await finished;
    } finally {
      this.active.delete(child);
      opts?.signal?.removeEventListener("abort", onAbort);
      if (timeout) clearTimeout(timeout);
      if (timers.kill) clearTimeout(timers.kill);
    }
  }

  async waitForIdle(): Promise<void> {
    await Promise.all([...this.active.values()]);
  }
}
