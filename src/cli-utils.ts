import type { Logger } from "./logging";
import { toExitCode, isDocbumpError } from "./errors";

export interface CommandOptions {
  verbose?: boolean;
  quiet?: boolean;
  cwd?: string;
}

export async function executeCommand(
  fn: () => Promise<void>,
  logger: Logger,
  options: CommandOptions,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    handleError(error, logger, options);
    process.exit(toExitCode(error));
  }
}

/**
 * The one place fatal errors are reported.
 */
export function handleError(
  error: unknown,
  logger: Logger,
  options: CommandOptions,
): void {
  if (isDocbumpError(error)) {
    logger.error(`[${error.code}] ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(error.message);
    if (options.verbose) {
      logger.debug(error.stack || "");
    }
  } else {
    logger.error(String(error));
  }
}

export interface CleanupHandler {
  cleanup: () => Promise<void>;
  timeout?: number; // Default 10 seconds
}

export function setupInterruptHandler(
  logger: Logger,
  cleanup?: CleanupHandler,
): void {
  let interrupted = false;

  process.on("SIGINT", () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;

    if (!cleanup) {
      process.exit(130);
    }

    logger.info("Interrupted. Cleaning up...");
    const timeout = cleanup.timeout || 10000;
    let timer: NodeJS.Timeout | undefined;
    void Promise.race([
      cleanup.cleanup(),
      new Promise<void>((_, reject) => {
        timer = setTimeout(() => reject(new Error("Cleanup timeout")), timeout);
      }),
    ])
      .then(
        () => logger.info("Cleanup completed"),
        (err: unknown) =>
          logger.error(
            `Cleanup failed: ${err instanceof Error ? err.message : String(err)}`,
          ),
      )
      .finally(() => {
        clearTimeout(timer);
        process.exit(130);
      });
  });
}
