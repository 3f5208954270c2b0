import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { envOverrides, loadConfig, mergeConfig, type PatcherConfig } from "./config.js";

describe("loadConfig", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const d of dirs.splice(0)) await rm(d, { recursive: true, force: true });
  });

  async function tempDir(): Promise<string> {
    const dir = await mkdtemp(path.join(tmpdir(), "bootcamp-patcher-config-"));
    dirs.push(dir);
    return dir;
  }

  it("fills defaults when no config file exists", async () => {
    const cwd = await tempDir();
    const cfg = await loadConfig({ cwd, env: {} });
    expect(cfg.source).toBeNull();
    expect(cfg.work_dir).toBeUndefined();
    expect(cfg.volume_label).toBeUndefined();
    expect(cfg.tool_timeout_seconds).toBe(0);
    expect(cfg.tools).toEqual({
      wimlib: "wimlib-imagex",
      hivexget: "hivexget",
      hivexregedit: "hivexregedit",
      seven_zip: "7z",
      mkisofs: "mkisofs",
      xorriso: "xorriso",
    });
    expect(cfg.validation).toEqual({ enabled: true, min_size_ratio: 0.9, max_size_ratio: 1.25 });
  });

  it("picks up bootcamp-patcher.toml from the working directory", async () => {
    const cwd = await tempDir();
    await writeFile(
      path.join(cwd, "bootcamp-patcher.toml"),
      [
        'volume_label = "CCCOMA_X64FRE_EN-US_DV9"',
        "tool_timeout_seconds = 600",
        "",
        "[tools]",
        'mkisofs = "/opt/cdrtools/bin/mkisofs"',
        "",
        "[validation]",
        "min_size_ratio = 0.8",
      ].join("\n"),
      "utf8",
    );

    const cfg = await loadConfig({ cwd, env: {} });
    expect(cfg.source).toBe(path.join(cwd, "bootcamp-patcher.toml"));
    expect(cfg.volume_label).toBe("CCCOMA_X64FRE_EN-US_DV9");
    expect(cfg.tool_timeout_seconds).toBe(600);
    expect(cfg.tools.mkisofs).toBe("/opt/cdrtools/bin/mkisofs");
    expect(cfg.tools.xorriso).toBe("xorriso");
    expect(cfg.validation).toEqual({ enabled: true, min_size_ratio: 0.8, max_size_ratio: 1.25 });
  });

  it("applies a JSON profile over the base config", async () => {
    const cwd = await tempDir();
    const p = path.join(cwd, "custom.json");
    await writeFile(
      p,
      JSON.stringify({
        work_dir: "/scratch",
        profiles: {
          fast: { validation: { enabled: false }, tools: { xorriso: "/usr/local/bin/xorriso" } },
        },
      }),
      "utf8",
    );

    const cfg = await loadConfig({ configPath: "custom.json", profile: "fast", cwd, env: {} });
    expect(cfg.work_dir).toBe("/scratch");
    expect(cfg.validation.enabled).toBe(false);
    expect(cfg.validation.min_size_ratio).toBe(0.9);
    expect(cfg.tools.xorriso).toBe("/usr/local/bin/xorriso");
    expect(cfg.tools.mkisofs).toBe("mkisofs");
  });

  it("rejects an unknown profile", async () => {
    const cwd = await tempDir();
    const p = path.join(cwd, "base.json");
    await writeFile(p, JSON.stringify({}), "utf8");
    await expect(loadConfig({ configPath: p, profile: "missing", cwd, env: {} })).rejects.toThrow(
      "config profile not found: missing",
    );
  });

  it("rejects a volume label longer than 32 characters", async () => {
    const cwd = await tempDir();
    const p = path.join(cwd, "long.json");
    await writeFile(p, JSON.stringify({ volume_label: "X".repeat(33) }), "utf8");
    await expect(loadConfig({ configPath: p, cwd, env: {} })).rejects.toThrow(
      /at most 32 characters/,
    );
  });

  it("rejects inverted size ratios", async () => {
    const cwd = await tempDir();
    const p = path.join(cwd, "ratios.json");
    const validation = { min_size_ratio: 1.5, max_size_ratio: 1.1 };
    await writeFile(p, JSON.stringify({ validation }), "utf8");
    await expect(loadConfig({ configPath: p, cwd, env: {} })).rejects.toThrow(/max_size_ratio/);
  });

  it("lets environment variables override the file", async () => {
    const cwd = await tempDir();
    const p = path.join(cwd, "env.json");
    await writeFile(
      p,
      JSON.stringify({ volume_label: "FROM_FILE", tools: { seven_zip: "7zz" } }),
      "utf8",
    );

    const cfg = await loadConfig({
      configPath: p,
      cwd,
      env: {
        BOOTCAMP_PATCHER_VOLUME_LABEL: "FROM_ENV",
        BOOTCAMP_PATCHER_VALIDATION: "off",
        BOOTCAMP_PATCHER_WIMLIB: "/opt/wimlib/bin/wimlib-imagex",
      },
    });
    expect(cfg.volume_label).toBe("FROM_ENV");
    expect(cfg.validation.enabled).toBe(false);
    expect(cfg.tools.wimlib).toBe("/opt/wimlib/bin/wimlib-imagex");
    expect(cfg.tools.seven_zip).toBe("7zz");
  });
});

describe("mergeConfig", () => {
  it("keeps base values the override leaves unset", () => {
    const base: PatcherConfig = {
      tool_timeout_seconds: 0,
      tools: {
        wimlib: "wimlib-imagex",
        hivexget: "hivexget",
        hivexregedit: "hivexregedit",
        seven_zip: "7z",
        mkisofs: "mkisofs",
        xorriso: "xorriso",
      },
      validation: { enabled: true, min_size_ratio: 0.9, max_size_ratio: 1.25 },
    };
    const merged = mergeConfig(base, { validation: { max_size_ratio: 2 }, work_dir: "/scratch" });
    expect(merged.validation).toEqual({ enabled: true, min_size_ratio: 0.9, max_size_ratio: 2 });
    expect(merged.tools).toEqual(base.tools);
    expect(merged.work_dir).toBe("/scratch");
    expect(merged.volume_label).toBeUndefined();
  });

  it("maps every tool override from the environment", () => {
    expect(
      envOverrides({
        BOOTCAMP_PATCHER_WIMLIB: "/opt/wimlib/bin/wimlib-imagex",
        BOOTCAMP_PATCHER_HIVEXGET: "/opt/hivex/bin/hivexget",
        BOOTCAMP_PATCHER_HIVEXREGEDIT: " /opt/hivex/bin/hivexregedit ",
        BOOTCAMP_PATCHER_MKISOFS: "genisoimage",
        BOOTCAMP_PATCHER_XORRISO: "/usr/local/bin/xorriso",
      }),
    ).toEqual({
      tools: {
        wimlib: "/opt/wimlib/bin/wimlib-imagex",
        hivexget: "/opt/hivex/bin/hivexget",
        hivexregedit: "/opt/hivex/bin/hivexregedit",
        mkisofs: "genisoimage",
        xorriso: "/usr/local/bin/xorriso",
      },
    });
  });

  it("maps only non-empty environment values", () => {
    expect(
      envOverrides({
        BOOTCAMP_PATCHER_WORK_DIR: "  ",
        BOOTCAMP_PATCHER_7Z: " 7zz ",
      }),
    ).toEqual({ tools: { seven_zip: "7zz" } });
  });
});
