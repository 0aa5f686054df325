import type { Logger } from "../logging";
import { inspectStores, type StoreStatus } from "../integrity";
import { openProject, type ProjectOptions } from "./project";

export interface StatusOptions extends ProjectOptions {
  json?: boolean;
}

function describe(status: StoreStatus): string {
  switch (status.status) {
    case "uninitialized":
      return "Stores not created yet; the next run will initialize them";
    case "in_sync":
      return "Up to date";
    case "stale":
      return "Sources changed since the last run";
  }
}

/**
 * Show whether the next run would advance the version. Never writes.
 */
export async function statusCommand(
  options: StatusOptions,
  logger: Logger,
): Promise<StoreStatus> {
  const project = await openProject(options);
  const status = await inspectStores(project.pair, project.paths.observed);

  if (options.json) {
    logger.json({
      ...status,
      hashFile: project.paths.hashFile,
      versionFile: project.paths.versionFile,
      observed: project.config.observed,
    });
    return status;
  }

  logger.info(describe(status));
  logger.info(
    `Version: ${status.version ?? "unknown"}${status.willAdvance && status.version !== null ? ` (next run: ${status.version + 1})` : ""}`,
  );
  if (status.versionError) {
    logger.warn(`${project.config.version_file}: ${status.versionError}`);
  }
  logger.debug(`Stored fingerprint:  ${status.storedFingerprint || "(none)"}`);
  logger.debug(`Current fingerprint: ${status.currentFingerprint}`);

  return status;
}
