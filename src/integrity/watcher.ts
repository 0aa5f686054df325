import { watch, type FSWatcher } from "chokidar";
import type { Logger } from "../logging";
import type { StorePair } from "../store";
import { isDocbumpError } from "../errors";
import type { FileReader } from "./checksum";
import { reconcile, type ReconcileResult } from "./reconciler";

export interface WatcherOptions {
  pair: StorePair;
  observed: readonly string[];
  debounceMs?: number;
  logger?: Logger;
  readFile?: FileReader;
  onChange?: (files: string[]) => void;
  onReconcile?: (result: ReconcileResult) => void;
  onError?: (error: unknown) => void;
}

export interface WatcherHandle {
  stop: () => Promise<void>;
}

const DEFAULT_DEBOUNCE_MS = 500;

/**
 * Re-runs the reconciler whenever an observed file changes.
 *
 * Bursts of changes are debounced into one run. Runs never overlap: a change
 * that lands while a run is in progress queues a single follow-up run.
 */
export class FileWatcher {
  private watcher?: FSWatcher;
  private debounceTimer?: NodeJS.Timeout;
  private running?: Promise<void>;
  private rerunRequested = false;
  private pendingFiles: string[] = [];
  private readonly debounceMs: number;

  constructor(private readonly options: WatcherOptions) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  private get log(): Logger | undefined {
    return this.options.logger;
  }

  /**
   * Start watching the observed files.
   */
  start(): WatcherHandle {
    const paths = [...this.options.observed];

    this.log?.info(`Watching ${paths.length} file(s) for changes`);
    this.log?.debug(`Watching: ${paths.join(", ")}`);

    this.watcher = watch(paths, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 100,
      },
    });

    for (const event of ["add", "change", "unlink"] as const) {
      this.watcher.on(event, (filePath: string) => {
        this.log?.debug(`File ${event}: ${filePath}`);
        this.schedule(filePath);
      });
    }

    this.watcher.on("error", (error: unknown) => {
      this.log?.error(`Watcher error: ${String(error)}`);
    });

    this.watcher.on("ready", () => {
      this.log?.info("File watcher ready");
    });

    return {
      stop: () => this.stop(),
    };
  }

  private schedule(filePath: string): void {
    this.pendingFiles.push(filePath);

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      const files = this.pendingFiles;
      this.pendingFiles = [];
      this.options.onChange?.(files);
      this.trigger();
    }, this.debounceMs);
  }

  /**
   * Start a run, or queue one if a run is already in progress.
   */
  private trigger(): void {
    if (this.running) {
      this.rerunRequested = true;
      return;
    }

    this.running = this.runLoop().finally(() => {
      this.running = undefined;
    });
  }

  private async runLoop(): Promise<void> {
    do {
      this.rerunRequested = false;
      await this.runOnce();
    } while (this.rerunRequested && this.watcher);
  }

  private async runOnce(): Promise<void> {
    try {
      const result = await reconcile(this.options.pair, this.options.observed, {
        logger: this.log,
        readFile: this.options.readFile,
      });
      if (result.state === "advanced") {
        this.log?.info(`✓ Version advanced to ${result.version}`);
      } else {
        this.log?.info("Content unchanged, version kept");
      }
      this.options.onReconcile?.(result);
    } catch (error) {
      // A failed run leaves the stores intact; keep watching for the next change
      if (isDocbumpError(error)) {
        this.log?.error(`[${error.code}] ${error.message}`);
      } else {
        this.log?.error(`Reconcile failed: ${String(error)}`);
      }
      this.options.onError?.(error);
    }
  }

  /**
   * Wait for the run in progress, if any.
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  /**
   * Stop watching. A debounced run that has not started is dropped; a run in
   * progress is allowed to finish.
   */
  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
    this.pendingFiles = [];

    if (this.watcher) {
      this.log?.info("Stopping file watcher...");
      const watcher = this.watcher;
      this.watcher = undefined;
      await watcher.close();
    }

    await this.idle();
  }
}

/**
 * Start a file watcher over the observed files.
 */
export function startWatcher(options: WatcherOptions): WatcherHandle {
  const watcher = new FileWatcher(options);
  return watcher.start();
}
