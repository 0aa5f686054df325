import type { Logger } from "../logging";
import { FileWatcher, reconcile } from "../integrity";
import { openProject, type ProjectOptions } from "./project";

export interface WatchOptions extends ProjectOptions {
  debounceMs?: number;
}

/**
 * Reconcile once, then again after every change to an observed file, until
 * the process is interrupted.
 */
export async function watchCommand(
  options: WatchOptions,
  logger: Logger,
): Promise<FileWatcher> {
  const project = await openProject(options);

  const initial = await reconcile(project.pair, project.paths.observed, {
    logger,
  });
  logger.info(
    initial.state === "advanced"
      ? `✓ Version advanced to ${initial.version}`
      : "✓ Sources unchanged, version kept",
  );

  const watcher = new FileWatcher({
    pair: project.pair,
    observed: project.paths.observed,
    debounceMs: options.debounceMs,
    logger,
  });
  watcher.start();
  return watcher;
}
