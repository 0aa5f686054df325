#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { initLogger, logger } from "./logging";
import { toExitCode } from "./errors";
import { executeCommand, setupInterruptHandler } from "./cli-utils";
import {
  initCommand,
  runCommand,
  statusCommand,
  watchCommand,
  type ProjectOptions,
} from "./commands";

export * from "./integrity";
export * from "./store";
export * from "./errors";
export { parseVersion, formatVersion, incrementVersion } from "./domain";

interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
  quiet?: boolean;
  debug?: boolean;
  color: boolean;
  file: string[];
  hashFile?: string;
  versionFile?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function projectOptions(opts: GlobalOptions): ProjectOptions {
  return {
    cwd: opts.cwd,
    observed: opts.file,
    hashFile: opts.hashFile,
    versionFile: opts.versionFile,
  };
}

export const program = new Command();

program
  .name("docbump")
  .description(
    "Advance a document's version number whenever its source files change",
  )
  .version("0.1.0")
  .option("--cwd <path>", "Override the working directory")
  .option("--verbose", "Enable verbose output")
  .option("--quiet", "Only report failures")
  .option("--debug", "Output structured JSON logs (ndjson format)")
  .option("--no-color", "Disable coloured output")
  .option(
    "-f, --file <path>",
    "Observed file, in order (repeatable; replaces the configured list)",
    collect,
    [],
  )
  .option("--hash-file <path>", "Fingerprint store path")
  .option("--version-file <path>", "Version file path");

program
  .command("run", { isDefault: true })
  .description("Bump the version if the observed files changed")
  .action(async (_options: Record<string, never>, cmd: Command) => {
    const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
    await executeCommand(
      async () => {
        await runCommand(projectOptions(globalOpts), logger);
      },
      logger,
      globalOpts,
    );
  });

program
  .command("status")
  .description("Show whether the next run would bump the version")
  .option("--json", "Output JSON")
  .option("--check", "Exit with status 1 when the next run would bump")
  .action(
    async (options: { json?: boolean; check?: boolean }, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      await executeCommand(
        async () => {
          const status = await statusCommand(
            { ...projectOptions(globalOpts), json: options.json },
            logger,
          );
          if (options.check && status.willAdvance) {
            process.exitCode = 1;
          }
        },
        logger,
        globalOpts,
      );
    },
  );

program
  .command("init")
  .description("Create .docbump/config.json and the version stores")
  .option("--force", "Overwrite an existing configuration")
  .action(async (options: { force?: boolean }, cmd: Command) => {
    const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
    await executeCommand(
      async () => {
        await initCommand(
          { ...projectOptions(globalOpts), force: options.force },
          logger,
        );
      },
      logger,
      globalOpts,
    );
  });

program
  .command("watch")
  .description("Bump the version every time an observed file changes")
  .option(
    "--debounce <ms>",
    "Wait this long after the last change before running",
    parseNonNegativeInt,
    500,
  )
  .action(async (options: { debounce: number }, cmd: Command) => {
    const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
    await executeCommand(
      async () => {
        const watcher = await watchCommand(
          { ...projectOptions(globalOpts), debounceMs: options.debounce },
          logger,
        );
        setupInterruptHandler(logger, { cleanup: () => watcher.stop() });
      },
      logger,
      globalOpts,
    );
  });

async function main(): Promise<void> {
  process.on("unhandledRejection", (reason) => {
    const msg = reason instanceof Error ? reason.message : String(reason);
    logger.error(`[FATAL] Unhandled Rejection: ${msg}`);
    process.exit(1);
  });

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    initLogger({
      verbose: opts.verbose,
      quiet: opts.quiet,
      debug: opts.debug,
      noColor: !opts.color,
    });
  });

  try {
    await program.parseAsync();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(toExitCode(error));
  }
}

if (require.main === module) {
  void main();
}
