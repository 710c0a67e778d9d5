#!/usr/bin/env node
import { config } from "dotenv";
config();

import { Writable } from "stream";
import { Command, Option } from "commander";
import { Logger } from "pino";
import { createContentManager, PipelineOptions, streamDocumentsFromSources } from "./pipeline.js";
import { startContentServer } from "./server.js";
import { CommandLineOptions, RefreshCommandOptions, ServeCommandOptions } from "./model/cli.js";
import { ValidationError } from "./model/error/ValidationError.js";
import { getErrorMessage } from "./model/error/BackendError.js";
import { createLogger } from "./util/logger.js";
import { getPackageVersion } from "./util/files.js";
import { validateAndParseOptions, validateServeOptions } from "./util/optsValidation.js";
import { RepositoryClientFactory } from "./services/interfaces/repositoryClient.js";
import { PATH_CONSTANTS, SYNC_DEFAULTS } from "./constant.js";

export interface ProgramDependencies {
  logger: Logger;
  stdout?: Writable;
  /** Replaces the git-backed client, for tests */
  clientFactory?: RepositoryClientFactory;
  setExitCode?: (code: number) => void;
}

function pipelineOptions(command: Command, deps: ProgramDependencies, force?: boolean): PipelineOptions {
  const parsed = validateAndParseOptions(command.optsWithGlobals<CommandLineOptions>());
  return {
    logger: deps.logger,
    configPath: parsed.configPath,
    concurrency: parsed.concurrency,
    fetchTimeoutMs: parsed.fetchTimeoutMs,
    gitToken: parsed.gitToken,
    force,
    clientFactory: deps.clientFactory,
  };
}

function writeLine(stream: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(`${line}\n`, (error) => (error ? reject(error) : resolve()));
  });
}

export function createProgram(deps: ProgramDependencies): Command {
  const { logger } = deps;
  const stdout = deps.stdout ?? process.stdout;
  const setExitCode =
    deps.setExitCode ??
    ((code: number): void => {
      process.exitCode = code;
    });
  const program = new Command();

  program
    .name("content-sync")
    .version(getPackageVersion(logger))
    .description("Keeps git-backed content sources up to date and lists their documents")
    .addOption(
      new Option("--config <path>", "Content source configuration file")
        .env("CONTENT_SOURCES_CONFIG")
        .default(PATH_CONSTANTS.DEFAULT_CONFIG_FILE),
    )
    .addOption(
      new Option("--concurrency <n>", "Maximum number of sources fetched at once")
        .env("SYNC_CONCURRENCY")
        .default(String(SYNC_DEFAULTS.CONCURRENCY)),
    )
    .addOption(
      new Option("--timeout <seconds>", "Time budget of a single source fetch")
        .env("SYNC_TIMEOUT")
        .default(String(SYNC_DEFAULTS.FETCH_TIMEOUT_MS / 1000)),
    )
    // no default shown in help, the token stays out of the terminal
    .addOption(new Option("--git-token <token>", "Token for private repositories").env("GIT_TOKEN"));

  program
    .command("refresh")
    .description("Sync every source that is due; exits non-zero if any sync failed")
    .option("--force", "Sync all sources regardless of their update frequency", false)
    .action(async (options: RefreshCommandOptions, command: Command) => {
      const manager = await createContentManager(pipelineOptions(command, deps));
      try {
        const success = await manager.refresh(options.force ?? false);
        setExitCode(success ? 0 : 1);
      } finally {
        manager.destroy();
      }
    });

  program
    .command("stats")
    .description("Print file counts and last sync times as JSON")
    .action(async (_options: object, command: Command) => {
      const manager = await createContentManager(pipelineOptions(command, deps));
      try {
        await writeLine(stdout, JSON.stringify(await manager.stats(), null, 2));
      } finally {
        manager.destroy();
      }
    });

  program
    .command("documents")
    .description("Refresh, then write one JSON document per line to stdout")
    .option("--force", "Sync all sources regardless of their update frequency", false)
    .action(async (options: RefreshCommandOptions, command: Command) => {
      let count = 0;
      for await (const document of streamDocumentsFromSources(pipelineOptions(command, deps, options.force))) {
        await writeLine(stdout, JSON.stringify(document));
        count++;
      }
      logger.info(`Successfully loaded ${count} documents`);
    });

  program
    .command("serve")
    .description("Refresh periodically and expose status and manual refresh over HTTP")
    .addOption(new Option("--host <host>", "Host for server, without port").env("SERVER_HOST").default("0.0.0.0"))
    .addOption(new Option("--port <port>", "Server port").env("SERVER_PORT").default("8080"))
    .addOption(
      new Option("--interval <minutes>", "Minutes between scheduled refreshes")
        .env("REFRESH_INTERVAL")
        .default(String(SYNC_DEFAULTS.REFRESH_INTERVAL_MS / 60000)),
    )
    .action(async (options: ServeCommandOptions, command: Command) => {
      const serverOptions = validateServeOptions(options);
      const manager = await createContentManager(pipelineOptions(command, deps));
      const shutdown = await startContentServer(serverOptions, manager, logger);

      const onSignal = (signal: NodeJS.Signals): void => {
        logger.info(`Received ${signal}, shutting down`);
        shutdown().catch((error: unknown) => {
          logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
          setExitCode(1);
        });
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);
    });

  return program;
}

/**
 * Runs one command and resolves with the exit code it asks for. `serve` keeps
 * running after this resolves, until a signal shuts it down.
 */
export async function runCli(argv: string[], deps: ProgramDependencies): Promise<number> {
  let exitCode = 0;
  const program = createProgram({
    ...deps,
    setExitCode: (code) => {
      exitCode = code;
      deps.setExitCode?.(code);
    },
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof ValidationError) {
      deps.logger.error(`Invalid options:${error.message}`);
    } else {
      deps.logger.fatal({ err: error }, getErrorMessage(error));
    }
    exitCode = 1;
  }
  return exitCode;
}

if (require.main === module) {
  const setExitCode = (code: number): void => {
    process.exitCode = code;
  };
  runCli(process.argv, { logger: createLogger(), setExitCode })
    .then(setExitCode)
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
      process.exit(1);
    });
}
