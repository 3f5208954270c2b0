import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILES = [
  "bootcamp-patcher.toml",
  "bootcamp-patcher.json",
];

const toolsSchema = z.object({
  wimlib: z.string().min(1).default("wimlib-imagex"),
  hivexget: z.string().min(1).default("hivexget"),
  hivexregedit: z.string().min(1).default("hivexregedit"),
  seven_zip: z.string().min(1).default("7z"),
  mkisofs: z.string().min(1).default("mkisofs"),
  xorriso: z.string().min(1).default("xorriso"),
});

const validationSchema = z
  .object({
    enabled: z.boolean().default(true),
    min_size_ratio: z.coerce.number().positive().default(0.9),
    max_size_ratio: z.coerce.number().positive().default(1.25),
  })
  .superRefine((v, ctx) => {
    if (v.max_size_ratio < v.min_size_ratio) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "validation.max_size_ratio must not be lower than " +
          "validation.min_size_ratio",
      });
    }
  });

const volumeLabelSchema = z
  .string()
  .min(1)
  .max(32, "volume_label must be at most 32 characters");

const configCoreSchema = z.object({
  work_dir: z.string().min(1).optional(),
  volume_label: volumeLabelSchema.optional(),
  // 0 disables the per-command timeout
  tool_timeout_seconds: z.coerce.number().int().nonnegative().default(0),
  tools: toolsSchema.default({}),
  validation: validationSchema.default({}),
});

const configOverrideSchema = z.object({
  work_dir: z.string().min(1).optional(),
  volume_label: volumeLabelSchema.optional(),
  tool_timeout_seconds: z.coerce.number().int().nonnegative().optional(),
  tools: z
    .object({
      wimlib: z.string().min(1).optional(),
      hivexget: z.string().min(1).optional(),
      hivexregedit: z.string().min(1).optional(),
      seven_zip: z.string().min(1).optional(),
      mkisofs: z.string().min(1).optional(),
      xorriso: z.string().min(1).optional(),
    })
    .optional(),
  validation: z
    .object({
      enabled: z.boolean().optional(),
      min_size_ratio: z.coerce.number().positive().optional(),
      max_size_ratio: z.coerce.number().positive().optional(),
    })
    .optional(),
});

const configSchema = configCoreSchema.extend({
  profiles: z.record(z.string().min(1), configOverrideSchema).optional(),
});

export type PatcherConfig = z.infer<typeof configCoreSchema>;
export type PatcherConfigOverride = z.infer<typeof configOverrideSchema>;

export type LoadedPatcherConfig = PatcherConfig & {
  // absolute path of the file the config came from, null for defaults only
  source: string | null;
};

export function mergeConfig(
  base: PatcherConfig,
  override: PatcherConfigOverride,
): PatcherConfig {
  const tools = override.tools ?? {};
  const validation = override.validation ?? {};
  return {
    work_dir: override.work_dir ?? base.work_dir,
    volume_label: override.volume_label ?? base.volume_label,
    tool_timeout_seconds:
      override.tool_timeout_seconds ?? base.tool_timeout_seconds,
    tools: {
      wimlib: tools.wimlib ?? base.tools.wimlib,
      hivexget: tools.hivexget ?? base.tools.hivexget,
      hivexregedit: tools.hivexregedit ?? base.tools.hivexregedit,
      seven_zip: tools.seven_zip ?? base.tools.seven_zip,
      mkisofs: tools.mkisofs ?? base.tools.mkisofs,
      xorriso: tools.xorriso ?? base.tools.xorriso,
    },
    validation: {
      enabled: validation.enabled ?? base.validation.enabled,
      min_size_ratio:
        validation.min_size_ratio ?? base.validation.min_size_ratio,
      max_size_ratio:
        validation.max_size_ratio ?? base.validation.max_size_ratio,
    },
  };
}

function envFlag(raw: string): boolean {
  const v = raw.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

const TOOL_ENV_VARS: ReadonlyArray<[string, keyof PatcherConfig["tools"]]> = [
  ["BOOTCAMP_PATCHER_WIMLIB", "wimlib"],
  ["BOOTCAMP_PATCHER_HIVEXGET", "hivexget"],
  ["BOOTCAMP_PATCHER_HIVEXREGEDIT", "hivexregedit"],
  ["BOOTCAMP_PATCHER_7Z", "seven_zip"],
  ["BOOTCAMP_PATCHER_MKISOFS", "mkisofs"],
  ["BOOTCAMP_PATCHER_XORRISO", "xorriso"],
];

export function envOverrides(env: NodeJS.ProcessEnv): PatcherConfigOverride {
  const override: PatcherConfigOverride = {};
  const tools: NonNullable<PatcherConfigOverride["tools"]> = {};

  if (env.BOOTCAMP_PATCHER_WORK_DIR?.trim()) {
    override.work_dir = env.BOOTCAMP_PATCHER_WORK_DIR.trim();
  }
  if (env.BOOTCAMP_PATCHER_VOLUME_LABEL?.trim()) {
    override.volume_label = env.BOOTCAMP_PATCHER_VOLUME_LABEL.trim();
  }
  if (env.BOOTCAMP_PATCHER_VALIDATION?.trim()) {
    override.validation = { enabled: envFlag(env.BOOTCAMP_PATCHER_VALIDATION) };
  }
  for (const [name, key] of TOOL_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) tools[key] = value;
  }
  if (Object.keys(tools).length) override.tools = tools;

  return override;
}

async function exists(p: string): Promise<boolean> {
  return await access(p).then(
    () => true,
    () => false,
  );
}

async function findDefaultConfig(cwd: string): Promise<string | null> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    if (await exists(candidate)) return candidate;
  }
  return null;
}

export async function loadConfig(opts?: {
  configPath?: string;
  profile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<LoadedPatcherConfig> {
  const cwd = opts?.cwd ?? process.cwd();
  const env = opts?.env ?? process.env;

  const explicit = opts?.configPath?.trim() ? opts.configPath.trim() : null;
  const abs = explicit
    ? path.isAbsolute(explicit)
      ? explicit
      : path.join(cwd, explicit)
    : await findDefaultConfig(cwd);

  let data: unknown = {};
  if (abs) {
    const raw = await readFile(abs, "utf8");
    const isToml = path.extname(abs).toLowerCase() === ".toml";
    data = isToml ? parseToml(raw) : JSON.parse(raw);
  }
  const parsed = configSchema.parse(data);

  const profile = opts?.profile?.trim() ? opts.profile.trim() : null;
  const override = profile ? (parsed.profiles?.[profile] ?? null) : null;
  if (profile && !override) {
    throw new Error(`config profile not found: ${profile}`);
  }

  const core = configCoreSchema.parse(data);
  const merged = override ? mergeConfig(core, override) : core;
  const effective = configCoreSchema.parse(
    mergeConfig(merged, envOverrides(env)),
  );

  return { ...effective, source: abs };
}
