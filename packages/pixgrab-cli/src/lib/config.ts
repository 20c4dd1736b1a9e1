import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import type { FetchSettings } from "./fetcher.js";
import type { LogLevel } from "./logger.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/pixgrab/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "pixgrab", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  timeoutSeconds: 10,
  maxAttempts: 3,
  retryDelayMs: 500,
  maxSizeMiB: 50,
  allowedTypePrefixes: ["image/"],
  userAgent: "pixgrab/1.0.0",
  outputDir: "Fetched_Images",
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Network and validation limits */
const FetchSchema = z.object({
  timeoutSeconds: z.number().min(1).max(300).optional(),
  maxAttempts: z.number().int().min(1).max(10).optional(),
  retryDelayMs: z.number().int().min(0).max(60000).optional(),
  maxSizeMiB: z.number().min(1).max(1024).optional(),
  allowedTypePrefixes: z.array(z.string().min(1)).min(1).optional(),
  userAgent: z.string().min(1).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  fetch: FetchSchema.optional(),
  output: z
    .object({
      dir: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  timeoutSeconds: number;
  maxAttempts: number;
  retryDelayMs: number;
  maxSizeMiB: number;
  allowedTypePrefixes: string[];
  userAgent: string;
  outputDir: string;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 *
 * @throws CLIError VALIDATION_CONFIG_INVALID when it exists but is invalid
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { fetch, output, logging } = source;

  if (fetch?.timeoutSeconds !== undefined) target.timeoutSeconds = fetch.timeoutSeconds;
  if (fetch?.maxAttempts !== undefined) target.maxAttempts = fetch.maxAttempts;
  if (fetch?.retryDelayMs !== undefined) target.retryDelayMs = fetch.retryDelayMs;
  if (fetch?.maxSizeMiB !== undefined) target.maxSizeMiB = fetch.maxSizeMiB;
  if (fetch?.allowedTypePrefixes !== undefined) {
    target.allowedTypePrefixes = [...fetch.allowedTypePrefixes];
  }
  if (fetch?.userAgent !== undefined) target.userAgent = fetch.userAgent;
  if (output?.dir !== undefined) target.outputDir = output.dir;
  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
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
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    timeoutSeconds: CONFIG_DEFAULTS.timeoutSeconds,
    maxAttempts: CONFIG_DEFAULTS.maxAttempts,
    retryDelayMs: CONFIG_DEFAULTS.retryDelayMs,
    maxSizeMiB: CONFIG_DEFAULTS.maxSizeMiB,
    allowedTypePrefixes: [...CONFIG_DEFAULTS.allowedTypePrefixes],
    userAgent: CONFIG_DEFAULTS.userAgent,
    outputDir: CONFIG_DEFAULTS.outputDir,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Optional path to a specific config file, used in
 *   place of the user and system files
 * @param cliOptions - Values from command-line flags
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
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
      throw invalidConfig(explicitPath, ["file not found"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}

/**
 * Convert resolved configuration into the pipeline's fixed settings.
 */
export function toFetchSettings(config: ResolvedConfig): FetchSettings {
  return {
    timeoutMs: Math.round(config.timeoutSeconds * 1000),
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    maxBytes: Math.floor(config.maxSizeMiB * 1024 * 1024),
    allowedTypePrefixes: config.allowedTypePrefixes.map((p) => p.toLowerCase()),
    outputDir: config.outputDir,
    userAgent: config.userAgent,
  };
}
