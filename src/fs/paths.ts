import * as fs from "node:fs";
import * as path from "node:path";
import { ProjectNotFoundError } from "../errors";

export const DOCBUMP_DIR = ".docbump";

/**
 * Walk up from `startCwd` to the nearest directory holding a `.docbump/`
 * directory.
 */
export function findProjectRoot(startCwd: string): string {
  let current = path.resolve(startCwd);

  while (true) {
    const docbumpDir = path.join(current, DOCBUMP_DIR);
    if (fs.existsSync(docbumpDir) && fs.statSync(docbumpDir).isDirectory()) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  throw new ProjectNotFoundError(
    `Could not find a ${DOCBUMP_DIR}/ directory in ${path.resolve(startCwd)} or any parent. Run 'docbump init' first.`,
  );
}

export function resolveCwd(cwdOption?: string): string {
  if (cwdOption) {
    return path.resolve(cwdOption);
  }
  return process.cwd();
}

export function getDocbumpDir(root: string): string {
  return path.join(root, DOCBUMP_DIR);
}

export function getConfigPath(root: string): string {
  return path.join(getDocbumpDir(root), "config.json");
}

export function resolveProjectPath(root: string, filePath: string): string {
  return path.resolve(root, filePath);
}
