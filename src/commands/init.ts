import type { Logger } from "../logging";
import { ConfigExistsError } from "../errors";
import {
  applyOverrides,
  DEFAULT_CONFIG,
  resolvePaths,
  writeConfig,
  type ConfigOverrides,
  type ConfigResolved,
} from "../config";
import { getConfigPath, resolveCwd, resolveProjectPath } from "../fs/paths";
import { pathExists } from "../fs/util";
import { bootstrapStores, createFileStorePair } from "../store";

export interface InitOptions extends ConfigOverrides {
  cwd?: string;
  force?: boolean;
}

/**
 * Write `.docbump/config.json` in the working directory and create both
 * stores.
 */
export async function initCommand(
  options: InitOptions,
  logger: Logger,
): Promise<ConfigResolved> {
  const root = resolveCwd(options.cwd);
  const configPath = getConfigPath(root);

  if (await pathExists(configPath)) {
    if (!options.force) {
      throw new ConfigExistsError(
        `${configPath} already exists. Use --force to overwrite.`,
      );
    }
    logger.warn(`Overwriting existing ${configPath}`);
  }

  const config = applyOverrides(DEFAULT_CONFIG, options);
  if (config.observed.length > 0) {
    resolvePaths(root, config);
  }
  await writeConfig(root, config);
  logger.info(`✓ Wrote ${configPath}`);

  const pair = createFileStorePair({
    hashFile: resolveProjectPath(root, config.hash_file),
    versionFile: resolveProjectPath(root, config.version_file),
  });
  const created = await bootstrapStores(pair, logger);
  if (created.hashCreated) {
    logger.info(`✓ Created ${config.hash_file}`);
  }
  if (created.versionCreated) {
    logger.info(`✓ Created ${config.version_file}`);
  }

  if (config.observed.length === 0) {
    logger.warn(
      `No observed files yet. Add them to "observed" in ${configPath} or pass --file.`,
    );
  }

  return config;
}
