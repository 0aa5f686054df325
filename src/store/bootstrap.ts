import type { Logger } from "../logging";
import { INITIAL_VERSION, renderVersionFile } from "../domain";
import type { StorePair } from "./storePair";

export interface BootstrapResult {
  hashCreated: boolean;
  versionCreated: boolean;
}

/**
 * Make sure both stores exist: HashStore empty, VersionStore at version 0.
 * Existing stores are not touched. Parent directories are not created, so a
 * missing directory surfaces as a StoreIoError.
 */
export async function bootstrapStores(
  pair: StorePair,
  logger?: Logger,
): Promise<BootstrapResult> {
  const hashCreated = !(await pair.hash.exists());
  if (hashCreated) {
    logger?.debug(`Creating hash store ${pair.hash.location}`);
    await pair.hash.create("");
  }

  const versionCreated = !(await pair.version.exists());
  if (versionCreated) {
    logger?.debug(`Creating version store ${pair.version.location}`);
    await pair.version.create(renderVersionFile(INITIAL_VERSION));
  }

  return { hashCreated, versionCreated };
}
