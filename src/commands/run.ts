import type { Logger } from "../logging";
import { reconcile, type ReconcileResult } from "../integrity";
import { openProject, type ProjectOptions } from "./project";

export type RunOptions = ProjectOptions;

/**
 * Reconcile once: bump the version if the observed files changed.
 */
export async function runCommand(
  options: RunOptions,
  logger: Logger,
): Promise<ReconcileResult> {
  const project = await openProject(options);
  logger.debug(`Project root: ${project.root}`);

  const result = await reconcile(project.pair, project.paths.observed, {
    logger,
  });

  if (result.state === "advanced") {
    logger.info(
      `✓ Version ${result.previousVersion} -> ${result.version} (${project.config.version_file})`,
    );
  } else {
    logger.info("✓ Sources unchanged, version kept");
  }

  return result;
}
