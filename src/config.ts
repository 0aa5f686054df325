import * as fs from "node:fs/promises";
import { ConfigSchema, type Config } from "./schemas";
import { getConfigPath, getDocbumpDir, resolveProjectPath } from "./fs/paths";
import { safeWriteJson } from "./fs/atomic";
import {
  ConfigError,
  InvalidJsonError,
  SchemaValidationError,
  errnoCode,
} from "./errors";

export interface ConfigResolved {
  schema_version: number;
  observed: string[];
  hash_file: string;
  version_file: string;
}

export interface ConfigOverrides {
  observed?: string[];
  hashFile?: string;
  versionFile?: string;
}

export const DEFAULT_CONFIG: ConfigResolved = {
  schema_version: 1,
  observed: [],
  hash_file: ".docbump/hash",
  version_file: "version.tex",
};

/** Hash store used when there is no `.docbump/` directory to hold it. */
export const STANDALONE_HASH_FILE = ".docbump-hash";

export function mergeWithDefaults(partial: Partial<Config>): ConfigResolved {
  return {
    schema_version: partial.schema_version ?? DEFAULT_CONFIG.schema_version,
    observed: partial.observed ?? [...DEFAULT_CONFIG.observed],
    hash_file: partial.hash_file ?? DEFAULT_CONFIG.hash_file,
    version_file: partial.version_file ?? DEFAULT_CONFIG.version_file,
  };
}

export function applyOverrides(
  config: ConfigResolved,
  overrides: ConfigOverrides,
): ConfigResolved {
  // An explicit --file list replaces the configured set rather than extending it
  const observed =
    overrides.observed !== undefined && overrides.observed.length > 0
      ? [...overrides.observed]
      : config.observed;

  return {
    schema_version: config.schema_version,
    observed,
    hash_file: overrides.hashFile ?? config.hash_file,
    version_file: overrides.versionFile ?? config.version_file,
  };
}

export async function loadConfig(
  root: string,
  overrides?: ConfigOverrides,
): Promise<ConfigResolved> {
  const configPath = getConfigPath(root);
  let partial: Partial<Config> = {};

  try {
    const content = await fs.readFile(configPath, "utf-8");
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new InvalidJsonError(`Invalid JSON in file: ${configPath}`);
    }

    const result = ConfigSchema.safeParse(data);
    if (!result.success) {
      throw new SchemaValidationError(
        `Schema validation failed for ${configPath}: ${result.error.message}`,
      );
    }
    partial = result.data;
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
  }

  const resolved = mergeWithDefaults(partial);

  if (overrides) {
    return applyOverrides(resolved, overrides);
  }

  return resolved;
}

export interface ResolvedPaths {
  observed: string[];
  hashFile: string;
  versionFile: string;
}

/**
 * Absolute paths of everything a reconcile touches. Fails when nothing is
 * observed, since an empty set would fingerprint to a constant, and when a
 * store is itself observed, since every bump would then change the
 * fingerprint again.
 */
export function resolvePaths(
  root: string,
  config: ConfigResolved,
): ResolvedPaths {
  if (config.observed.length === 0) {
    throw new ConfigError(
      `No observed files configured. Add them to "observed" in ${getConfigPath(root)} or pass --file.`,
    );
  }

  const observed = config.observed.map((file) => resolveProjectPath(root, file));
  const hashFile = resolveProjectPath(root, config.hash_file);
  const versionFile = resolveProjectPath(root, config.version_file);

  for (const store of [hashFile, versionFile]) {
    if (observed.includes(store)) {
      throw new ConfigError(
        `${store} is written by docbump and cannot be an observed file. Remove it from "observed" or --file.`,
      );
    }
  }

  return { observed, hashFile, versionFile };
}

export async function writeConfig(
  root: string,
  config: ConfigResolved,
): Promise<void> {
  await fs.mkdir(getDocbumpDir(root), { recursive: true });
  await safeWriteJson(getConfigPath(root), config);
}
