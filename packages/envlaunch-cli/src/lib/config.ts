import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { describeError, invalidConfig } from "./errors/catalog.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/envlaunch/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "envlaunch",
  "config.yaml"
);

export const CONFIG_DEFAULTS = {
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const EnvOverridesSchema = z.record(
  z.string().min(1).regex(/^[^=\0]+$/, "must not contain '=' or NUL"),
  z.string()
);

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
  launcher: z
    .object({
      /** Command the URL is appended to; the system opener is used when absent */
      command: z.tuple([z.string().min(1)]).rest(z.string()).optional(),
      /** Variables set around the launch only */
      env: EnvOverridesSchema.optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  logLevel: LogLevel;
  logJson: boolean;
  launcherCommand?: [string, ...string[]];
  launcherEnv: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${describeError(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${describeError(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
  if (source.launcher?.command !== undefined) {
    target.launcherCommand = source.launcher.command;
  }
  if (source.launcher?.env !== undefined) {
    target.launcherEnv = { ...target.launcherEnv, ...source.launcher.env };
  }
}

/**
 * Merge configuration sources with proper precedence:
 * User config > System config > Defaults
 *
 * `launcher.env` maps are merged key by key; everything else is replaced.
 */
export function resolveConfig(
  userConfig?: ConfigFile,
  systemConfig?: ConfigFile
): ResolvedConfig {
  const config: ResolvedConfig = {
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
    launcherEnv: {},
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  return config;
}

/**
 * Load configuration from the system and user files.
 *
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  const systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
  if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

  const userConfig = loadConfigFile(USER_CONFIG_PATH);
  if (userConfig) sources.push(USER_CONFIG_PATH);

  return { config: resolveConfig(userConfig, systemConfig), sources };
}
