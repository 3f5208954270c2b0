import path from "node:path";
import { rm, stat } from "node:fs/promises";

import { afterEach, describe, expect, it, vi } from "vitest";

import { readIsoDescriptors } from "../iso/volumeDescriptor.js";
import { fakeAuthor } from "../../test/helpers/fakeWindowsTools.js";
import { readIsoTree } from "../../test/helpers/isoReader.js";
import {
  createScenario,
  PATCHED_TREE_BYTES,
  REFERENCE_LABEL,
  TARGET_FILES,
} from "../../test/helpers/scenario.js";
import { fail, ok, ScriptedRunner } from "../../test/helpers/scriptedRunner.js";
import { EXIT_CANCELLED, EXIT_FAILURE, EXIT_OK, runPatcherCli } from "./runPatcherCli.js";
import { USAGE } from "./usage.js";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    opts: {
      out: (t: string) => void out.push(t),
      err: (t: string) => void err.push(t),
    },
  };
}

describe("cli/runPatcherCli", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const d of dirs.splice(0)) await rm(d, { recursive: true, force: true });
  });

  it("prints usage on --help", async () => {
    const io = capture();
    expect(await runPatcherCli(["--help"], io.opts)).toBe(EXIT_OK);
    expect(io.out).toEqual([USAGE]);
    expect(io.err).toEqual([]);
  });

  it("lists the hivex path overrides in the usage text", () => {
    const lines = USAGE.split("\n");
    expect(lines).toContain("  tool paths: BOOTCAMP_PATCHER_WIMLIB, BOOTCAMP_PATCHER_HIVEXGET,");
    expect(lines).toContain("    BOOTCAMP_PATCHER_HIVEXREGEDIT, BOOTCAMP_PATCHER_7Z,");
  });

  it("fails with usage when inputs are missing", async () => {
    const io = capture();
    expect(await runPatcherCli([], io.opts)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual([
      "error: target ISO and reference ISO are required\n" +
        "  hint: usage: bootcamp-iso-patcher <target_iso> <reference_iso> " +
        "[output_iso]\n",
      USAGE,
    ]);
  });

  it("prints volume descriptors with --inspect", async () => {
    const s = await createScenario(dirs);
    const io = capture();
    expect(await runPatcherCli(["--inspect", s.referenceIso], io.opts)).toBe(EXIT_OK);
    const parsed: unknown = JSON.parse(io.out.join(""));
    expect(parsed).toMatchObject({
      primary: { volumeLabel: "CCCOMA_X64FRE_EN-US_DV9", publisherId: "MICROSOFT CORPORATION" },
      hasElTorito: true,
      hasTerminator: true,
    });
  });

  it("reports a missing target without touching any tool", async () => {
    const s = await createScenario(dirs);
    const io = capture();
    const missing = path.join(s.dir, "missing.iso");
    const code = await runPatcherCli([missing, s.referenceIso], {
      ...io.opts,
      cwd: s.dir,
      env: {},
      runner: s.runner,
      log: vi.fn(),
    });
    expect(code).toBe(EXIT_FAILURE);
    expect(io.err).toEqual([`error: target ISO not found: ${missing}\n`]);
    expect(s.runner.calls).toEqual([]);
  });

  it("writes the patched image next to the target by default", async () => {
    const runner = new ScriptedRunner().on("mkisofs", (call) =>
      call.args[0] === "-version" ? ok() : fakeAuthor(call),
    );
    const s = await createScenario(dirs, runner);
    const io = capture();

    const code = await runPatcherCli(
      [s.targetIso, s.referenceIso, "--volume-label", "BOOTCAMP_WIN"],
      {
        ...io.opts,
        cwd: s.dir,
        env: { BOOTCAMP_PATCHER_WORK_DIR: s.workDir },
        runner: s.runner,
        log: vi.fn(),
      },
    );

    const output = path.join(s.dir, "Win11_23H2_English_x64_bootcamp.iso");
    expect(io.err).toEqual([]);
    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([
      `Patched ISO written to ${output} ` +
        `(${PATCHED_TREE_BYTES + 64 * 2048} bytes, mkisofs (full))\n`,
    ]);
    expect(s.runner.callsTo("mkisofs")[1].args.slice(8, 10)).toEqual(["-V", "BOOTCAMP_WIN"]);
  });

  it("falls back to the built-in ISO writer when both tools fail", async () => {
    const runner = new ScriptedRunner()
      .on("mkisofs", () => fail(1, "mkisofs: write error"))
      .on("xorriso", () => fail(5, "xorriso : FAILURE : Image size exceeds limit"));
    const s = await createScenario(dirs, runner);
    const io = capture();

    const code = await runPatcherCli([s.targetIso, s.referenceIso, s.outputIso], {
      ...io.opts,
      cwd: s.dir,
      env: { BOOTCAMP_PATCHER_WORK_DIR: s.workDir },
      runner: s.runner,
      log: vi.fn(),
    });

    const { size } = await stat(s.outputIso);
    expect(io.err).toEqual([]);
    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([
      `Patched ISO written to ${s.outputIso} (${size} bytes, in-process library)\n`,
    ]);

    const descriptors = await readIsoDescriptors(s.outputIso);
    expect(descriptors.primary?.volumeLabel).toBe(REFERENCE_LABEL);
    expect(descriptors.hasElTorito).toBe(true);
    expect(descriptors.hasJoliet).toBe(true);

    const tree = (await readIsoTree(s.outputIso, { joliet: true })) ?? [];
    const files = tree.filter((e) => !e.isDirectory).map((e) => e.path);
    expect(files.sort()).toEqual(Object.keys(TARGET_FILES).sort());
    expect(tree.find((e) => e.path === "sources/install.wim")?.size).toBe(400_000);
  });

  it("exits with 130 when cancelled", async () => {
    const s = await createScenario(dirs);
    const io = capture();
    const controller = new AbortController();
    controller.abort();

    const code = await runPatcherCli([s.targetIso, s.referenceIso, s.outputIso], {
      ...io.opts,
      cwd: s.dir,
      env: { BOOTCAMP_PATCHER_WORK_DIR: s.workDir },
      signal: controller.signal,
      runner: s.runner,
      log: vi.fn(),
    });

    expect(code).toBe(EXIT_CANCELLED);
    expect(io.err).toEqual(["error: Cancelled during environment check\n"]);
    expect(s.runner.calls).toEqual([]);
  });
});
