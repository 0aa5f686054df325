import {
  applyOverrides,
  DEFAULT_CONFIG,
  loadConfig,
  resolvePaths,
  STANDALONE_HASH_FILE,
  type ConfigOverrides,
  type ConfigResolved,
  type ResolvedPaths,
} from "../config";
import { ProjectNotFoundError } from "../errors";
import { findProjectRoot, resolveCwd } from "../fs/paths";
import { createFileStorePair, type StorePair } from "../store";

export interface ProjectOptions extends ConfigOverrides {
  cwd?: string;
}

export interface Project {
  root: string;
  config: ConfigResolved;
  paths: ResolvedPaths;
  pair: StorePair;
}

/**
 * Locate the project and resolve its configuration. Without a `.docbump/`
 * directory the working directory is used, provided the observed files were
 * named on the command line; the hash store then defaults to
 * `.docbump-hash` beside them.
 */
export async function openProject(options: ProjectOptions): Promise<Project> {
  const cwd = resolveCwd(options.cwd);

  let root: string;
  let config: ConfigResolved;
  try {
    root = findProjectRoot(cwd);
    config = await loadConfig(root, options);
  } catch (err) {
    const hasFiles = (options.observed?.length ?? 0) > 0;
    if (!(err instanceof ProjectNotFoundError) || !hasFiles) {
      throw err;
    }
    root = cwd;
    config = applyOverrides(
      { ...DEFAULT_CONFIG, hash_file: STANDALONE_HASH_FILE },
      options,
    );
  }

  const paths = resolvePaths(root, config);
  return {
    root,
    config,
    paths,
    pair: createFileStorePair(paths),
  };
}
