import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { describeError } from "./errors/types.js";
import { LOG_LEVEL_NAMES, type LogThreshold } from "./logger.js";
import { DEFAULT_MANIFEST_URL, DEFAULT_SERVER_FOLDER } from "./manifest/resolver.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/serverjar/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "serverjar", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  manifestUrl: DEFAULT_MANIFEST_URL,
  folder: DEFAULT_SERVER_FOLDER,
  verifySize: false,
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    manifest: z
      .object({
        url: z.string().url().optional(),
      })
      .strict()
      .optional(),
    download: z
      .object({
        folder: z.string().min(1).optional(),
        verifySize: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  manifestUrl: string;
  folder: string;
  verifySize: boolean;
  logLevel: LogThreshold;
  logJson: boolean;
}

export type EnvSource = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist; throws a
 * VALIDATION_CONFIG_INVALID error if it exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`Cannot read file: ${describeError(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${describeError(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.manifest?.url !== undefined) {
    target.manifestUrl = source.manifest.url;
  }
  if (source.download?.folder !== undefined) {
    target.folder = source.download.folder;
  }
  if (source.download?.verifySize !== undefined) {
    target.verifySize = source.download.verifySize;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

function applyEnv(target: ResolvedConfig, env: EnvSource): void {
  if (env.SERVERJAR_MANIFEST_URL) {
    target.manifestUrl = env.SERVERJAR_MANIFEST_URL;
  }
  if (env.SERVERJAR_FOLDER) {
    target.folder = env.SERVERJAR_FOLDER;
  }
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: EnvSource = {}
): ResolvedConfig {
  const config: ResolvedConfig = { ...CONFIG_DEFAULTS };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  applyEnv(config, env);

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Optional path to a specific config file, used instead
 *   of the system and user files
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: EnvSource = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw invalidConfig(explicitPath, ["File not found"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, env);

  return { config, sources };
}
