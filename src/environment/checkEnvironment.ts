import { EnvironmentMissingToolError, throwIfCancelled } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import type { ToolRunner } from "../tools/toolRunner.js";

export type ToolRole = "container" | "registry" | "extraction" | "authoring";

export type ToolCheck = {
  key: string;
  binary: string;
  role: ToolRole;
  checkArgs: string[];
  installHint: string;
};

export type ToolAvailability = ToolCheck & {
  available: boolean;
  detail: string;
};

export type EnvironmentReport = {
  tools: ToolAvailability[];
  authoring: string[];
  libraryAvailable: boolean;
};

export type ToolBinaries = {
  wimlib: string;
  hivexget: string;
  hivexregedit: string;
  seven_zip: string;
  mkisofs: string;
  xorriso: string;
};

export function defaultToolChecks(tools: ToolBinaries): ToolCheck[] {
  return [
    {
      key: "wimlib",
      binary: tools.wimlib,
      role: "container",
      checkArgs: ["--version"],
      installHint: "brew install wimlib",
    },
    {
      key: "hivexget",
      binary: tools.hivexget,
      role: "registry",
      checkArgs: ["--help"],
      installHint: "brew install hivex",
    },
    {
      key: "hivexregedit",
      binary: tools.hivexregedit,
      role: "registry",
      checkArgs: ["--help"],
      installHint: "brew install hivex",
    },
    {
      key: "seven_zip",
      binary: tools.seven_zip,
      role: "extraction",
      checkArgs: ["i"],
      installHint: "brew install sevenzip",
    },
    {
      key: "mkisofs",
      binary: tools.mkisofs,
      role: "authoring",
      checkArgs: ["-version"],
      installHint: "brew install cdrtools",
    },
    {
      key: "xorriso",
      binary: tools.xorriso,
      role: "authoring",
      checkArgs: ["-version"],
      installHint: "brew install xorriso",
    },
  ];
}

async function checkTool(
  runner: ToolRunner,
  p: ToolCheck,
  signal?: AbortSignal,
): Promise<ToolAvailability> {
  const res = await runner.run(p.binary, p.checkArgs, {
    signal,
    timeoutMs: 15_000,
  });
  if (res.spawnError) {
    return { ...p, available: false, detail: res.spawnError };
  }
  // shells report 126 (not executable) and 127 (not found); other codes
  // still mean the binary ran
  if (res.code === 126 || res.code === 127) {
    return { ...p, available: false, detail: `exit code ${res.code}` };
  }
  const detail =
    res.code === 0 ? "ok" : `ran, exit code ${res.code ?? "unknown"}`;
  return { ...p, available: true, detail };
}

/**
 * Runs every external tool once before any work starts. Container, registry and
 * extraction tools are all required; for authoring one tool or an in-process
 * library is enough.
 */
export async function checkEnvironment(opts: {
  runner: ToolRunner;
  tools: ToolBinaries;
  libraryAvailable: boolean;
  signal?: AbortSignal;
  log?: LoggerFn;
}): Promise<EnvironmentReport> {
  const checks = defaultToolChecks(opts.tools);
  const results: ToolAvailability[] = [];
  throwIfCancelled(opts.signal, "environment check");
  for (const p of checks) {
    results.push(await checkTool(opts.runner, p, opts.signal));
  }
  // an abort mid-check reads as a missing tool
  throwIfCancelled(opts.signal, "environment check");

  for (const r of results) {
    opts.log?.("tool check", {
      tool: r.binary,
      available: r.available,
      detail: r.detail,
    });
  }

  const missingRequired = results.filter(
    (r) => r.role !== "authoring" && !r.available,
  );
  const authoring = results
    .filter((r) => r.role === "authoring" && r.available)
    .map((r) => r.key);
  const authoringMissing = !authoring.length && !opts.libraryAvailable;

  if (missingRequired.length || authoringMissing) {
    const missing = missingRequired.map((r) => r.binary);
    const hintSources = [...missingRequired];
    if (authoringMissing) {
      const authoringTools = results.filter((r) => r.role === "authoring");
      const binaries = authoringTools.map((r) => r.binary).join(" or ");
      missing.push(`an ISO authoring tool (${binaries})`);
      hintSources.push(...authoringTools);
    }
    const hints = [...new Set(hintSources.map((r) => r.installHint))];
    throw new EnvironmentMissingToolError(missing, hints);
  }

  return {
    tools: results,
    authoring,
    libraryAvailable: opts.libraryAvailable,
  };
}
