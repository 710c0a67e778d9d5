import fastify, {
  FastifyInstance,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from "fastify";
import { Logger } from "pino";
import statusRouter from "./routes/statusRouter.js";
import refreshRouter from "./routes/refreshRouter.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { ContentManager } from "./services/contentManager.js";
import { RefreshScheduler } from "./services/refreshScheduler.js";
import { getPackageVersion } from "./util/files.js";
import { ContentServerOptions } from "./model/server.js";

export type { ContentServerOptions };

type ShutdownFunction = () => Promise<void>;

export type ContentServer = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression,
  RawReplyDefaultExpression,
  Logger
>;

export interface ServerDependencies {
  logger: Logger;
  contentManager: ContentManager;
  scheduler: RefreshScheduler;
}

/**
 * Builds the fastify instance with its routes registered but not listening.
 */
export async function buildServer(deps: ServerDependencies): Promise<ContentServer> {
  const { logger, contentManager, scheduler } = deps;
  const version = getPackageVersion(logger);

  const server = fastify({
    loggerInstance: logger,
    routerOptions: {
      ignoreTrailingSlash: true,
    },
  });

  server.setErrorHandler(errorHandler);

  await server.register(statusRouter, { scheduler, contentManager });
  await server.register(refreshRouter, { scheduler });

  server.get("/health", { logLevel: "error" }, async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      version,
      refreshInProgress: scheduler.isRefreshInProgress(),
    };
  });

  server.addHook("onSend", (_request, reply, _, done) => {
    reply.header("x-content-sync-version", version);
    done();
  });

  return server;
}

/**
 * Starts periodic refreshes and the HTTP surface. The returned function stops
 * both and releases every source's git worker.
 */
export async function startContentServer(
  opts: ContentServerOptions,
  contentManager: ContentManager,
  logger: Logger,
): Promise<ShutdownFunction> {
  logger.info("============================================================");
  logger.info("Content Source Sync");
  logger.info("============================================================");
  logger.info(`>> Sources: ${contentManager.getSources().length}`);
  logger.info(`>> Host: ${opts.host}`);
  logger.info(`>> Port: ${opts.port}`);
  logger.info(`>> Refresh interval: ${opts.refreshIntervalMs / 1000}s`);

  const scheduler = new RefreshScheduler({ intervalMs: opts.refreshIntervalMs }, contentManager, logger);
  const server = await buildServer({ logger, contentManager, scheduler });

  await server.listen({ port: opts.port, host: opts.host });
  server.log.info(`Server started on port ${opts.port}`);

  scheduler.start();

  return async () => {
    try {
      server.log.info("Stopping refresh scheduler...");
      scheduler.stop();

      await server.close();
      contentManager.destroy();
      server.log.info("Server shutdown complete");
    } catch (err) {
      server.log.error(`Error during server shutdown: ${err}`);
      throw err;
    }
  };
}
