import { loadConfig as c12LoadConfig } from "c12";
import { access } from "node:fs/promises";
import { constants } from "node:fs";
import { resolve } from "node:path";
import { ConfigFileNotFoundError, ConfigParseError } from "../errors.js";
import { CONFIG_KEYS, shardConfigSchema, type ShardConfig } from "./schema.js";

export const CONFIG_NAME = "idshard";
export const ENV_PREFIX = "JAMF_";

export type ConfigLayer = Record<string, unknown>;

export interface ResolveConfigOptions {
  /** Explicit config file. When omitted, `idshard.config.*` is looked up in `cwd`. */
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from command-line flags, keyed by config key. */
  flags?: ConfigLayer;
}

export interface ResolvedShardConfig {
  config: ShardConfig;
  /** The config file that was read, if any. */
  configFile: string | undefined;
}

/**
 * Checks if a file exists using async API.
 */
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads `JAMF_<KEY>` variables for every known config key. Empty values count as unset.
 */
export function readEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const key of CONFIG_KEYS) {
    const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (value !== undefined && value !== "") {
      layer[key] = value;
    }
  }
  return layer;
}

/**
 * Later layers win key by key. `undefined` never overrides a value, and lists are replaced,
 * not concatenated.
 */
export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

export function parseShardConfig(layer: ConfigLayer): ShardConfig {
  const result = shardConfigSchema.safeParse(layer);
  if (!result.success) {
    throw new ConfigParseError(
      result.error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
  return result.data;
}

/**
 * Loads the config file layer with c12 (YAML, JSON and the other formats it supports).
 */
export async function loadConfigFile(
  options: Pick<ResolveConfigOptions, "configFile" | "cwd">,
): Promise<{ layer: ConfigLayer; configFile: string | undefined }> {
  const cwd = options.cwd ?? process.cwd();

  if (options.configFile) {
    const explicitPath = resolve(cwd, options.configFile);
    if (!(await fileExists(explicitPath))) {
      throw new ConfigFileNotFoundError(explicitPath);
    }
  }

  const { config, configFile } = await c12LoadConfig<ConfigLayer>({
    name: CONFIG_NAME,
    cwd,
    configFile: options.configFile,
    rcFile: false,
    globalRc: false,
    dotenv: false,
    packageJson: false,
  });

  const used = configFile && (await fileExists(configFile)) ? configFile : undefined;
  return { layer: config ?? {}, configFile: used };
}

/**
 * Resolves the configuration from, lowest precedence first: defaults, the config file,
 * `JAMF_*` environment variables and command-line flags.
 */
export async function resolveShardConfig(
  options: ResolveConfigOptions = {},
): Promise<ResolvedShardConfig> {
  const { layer: fileLayer, configFile } = await loadConfigFile(options);
  const envLayer = readEnvLayer(options.env ?? process.env);

  return {
    config: parseShardConfig(mergeLayers(fileLayer, envLayer, options.flags ?? {})),
    configFile,
  };
}
