// packages/cli/src/config.ts
// Precedence, highest first: command-line options, HYDROCHECK_* environment
// variables, the config file (.hydrocheckrc.yaml or --config), defaults.
import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigError, errorMessage } from "../../model/src/index.js";

export const CONFIG_FILE_NAMES = [".hydrocheckrc.yaml", ".hydrocheckrc.yml", ".hydrocheckrc"] as const;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigFileSchema = z
  .object({
    rules: z.union([z.string().min(1).transform((s) => [s]), z.array(z.string().min(1))]).optional(),
    state: z.string().trim().min(1).optional(),
    bundled: z.boolean().optional(),
    strict: z.boolean().optional(),
    readTimeoutMs: z.number().int().positive().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    prettyLogs: z.boolean().optional(),
    archive: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type CliConfig = {
  /** Absolute paths of extra rule documents. */
  rules: string[];
  state: string | null;
  bundled: boolean;
  strict: boolean;
  readTimeoutMs: number;
  logLevel: LogLevel;
  prettyLogs: boolean;
  archive: string | null;
  /** Config file that was read, if any. */
  source: string | null;
};

export const DEFAULT_CONFIG: Omit<CliConfig, "source"> = {
  rules: [],
  state: null,
  bundled: true,
  strict: false,
  readTimeoutMs: 30_000,
  logLevel: "warn",
  prettyLogs: false,
  archive: null,
};

export type ConfigOverrides = Partial<Omit<CliConfig, "source">>;

export type LoadConfigOptions = {
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
  /** Explicit config file; it must exist. */
  configPath?: string;
  overrides?: ConfigOverrides;
};

/** Nearest config file in `startDir` or above. */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const path = join(dir, name);
      if (existsSync(path)) return path;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, "utf8"));
  } catch (e) {
    throw new ConfigError(`cannot read config file ${path}: ${errorMessage(e)}`, { path });
  }
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "config"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid config file ${path}: ${issues}`, { path });
  }
  return parsed.data;
}

const EnvSchema = z.object({
  HYDROCHECK_RULES: z.string().optional(),
  HYDROCHECK_STATE: z.string().optional(),
  HYDROCHECK_BUNDLED: z.stringbool().optional(),
  HYDROCHECK_STRICT: z.stringbool().optional(),
  HYDROCHECK_READ_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  HYDROCHECK_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  HYDROCHECK_PRETTY_LOGS: z.stringbool().optional(),
  HYDROCHECK_ARCHIVE: z.string().optional(),
  HYDROCHECK_CONFIG: z.string().optional(),
});

function readEnv(env: LoadConfigOptions["env"]) {
  const nonEmpty: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (k.startsWith("HYDROCHECK_") && v !== undefined && v.trim() !== "") nonEmpty[k] = v.trim();
  }
  const parsed = EnvSchema.safeParse(nonEmpty);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid environment: ${issues}`);
  }
  return parsed.data;
}

function splitPaths(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

export function loadConfig(options: LoadConfigOptions): CliConfig {
  const env = readEnv(options.env);
  const explicit = options.configPath ?? env.HYDROCHECK_CONFIG;

  let source: string | null = null;
  if (explicit !== undefined) {
    source = resolve(options.cwd, explicit);
    if (!existsSync(source)) throw new ConfigError(`config file not found: ${source}`, { path: source });
  } else {
    source = findConfigFile(options.cwd);
  }
  const file = source ? readConfigFile(source) : {};
  const fileDir = source ? dirname(source) : options.cwd;

  const merged: Omit<CliConfig, "source"> = {
    rules: file.rules?.map((p) => resolve(fileDir, p)) ?? DEFAULT_CONFIG.rules,
    state: file.state ?? DEFAULT_CONFIG.state,
    bundled: file.bundled ?? DEFAULT_CONFIG.bundled,
    strict: file.strict ?? DEFAULT_CONFIG.strict,
    readTimeoutMs: file.readTimeoutMs ?? DEFAULT_CONFIG.readTimeoutMs,
    logLevel: file.logLevel ?? DEFAULT_CONFIG.logLevel,
    prettyLogs: file.prettyLogs ?? DEFAULT_CONFIG.prettyLogs,
    archive: file.archive !== undefined ? resolve(fileDir, file.archive) : DEFAULT_CONFIG.archive,
  };

  if (env.HYDROCHECK_RULES !== undefined) merged.rules = splitPaths(env.HYDROCHECK_RULES).map((p) => resolve(options.cwd, p));
  if (env.HYDROCHECK_STATE !== undefined) merged.state = env.HYDROCHECK_STATE;
  if (env.HYDROCHECK_BUNDLED !== undefined) merged.bundled = env.HYDROCHECK_BUNDLED;
  if (env.HYDROCHECK_STRICT !== undefined) merged.strict = env.HYDROCHECK_STRICT;
  if (env.HYDROCHECK_READ_TIMEOUT_MS !== undefined) merged.readTimeoutMs = env.HYDROCHECK_READ_TIMEOUT_MS;
  if (env.HYDROCHECK_LOG_LEVEL !== undefined) merged.logLevel = env.HYDROCHECK_LOG_LEVEL;
  if (env.HYDROCHECK_PRETTY_LOGS !== undefined) merged.prettyLogs = env.HYDROCHECK_PRETTY_LOGS;
  if (env.HYDROCHECK_ARCHIVE !== undefined) merged.archive = resolve(options.cwd, env.HYDROCHECK_ARCHIVE);

  const o = options.overrides ?? {};
  return {
    rules: o.rules !== undefined && o.rules.length > 0 ? o.rules.map((p) => resolve(options.cwd, p)) : merged.rules,
    state: o.state ?? merged.state,
    bundled: o.bundled ?? merged.bundled,
    strict: o.strict ?? merged.strict,
    readTimeoutMs: o.readTimeoutMs ?? merged.readTimeoutMs,
    logLevel: o.logLevel ?? merged.logLevel,
    prettyLogs: o.prettyLogs ?? merged.prettyLogs,
    archive: o.archive != null ? resolve(options.cwd, o.archive) : merged.archive,
    source,
  };
}
