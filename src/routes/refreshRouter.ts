import { FastifyInstance, FastifyPluginOptions } from "fastify";
import fp from "fastify-plugin";
import { RefreshScheduler } from "../services/refreshScheduler.js";
import { RefreshReport } from "../services/contentManager.js";
import { PATH_CONSTANTS } from "../constant.js";

interface RefreshRouterOptions extends FastifyPluginOptions {
  scheduler: RefreshScheduler;
}

interface RefreshQuerystring {
  force: boolean;
}

export type RefreshResponse = RefreshReport;

function refreshRouter(fastify: FastifyInstance, opts: RefreshRouterOptions, done: () => void): void {
  fastify.post<{ Querystring: RefreshQuerystring }>(
    PATH_CONSTANTS.REFRESH_ENDPOINT,
    {
      schema: {
        querystring: {
          type: "object",
          properties: {
            force: { type: "boolean", default: false },
          },
        },
      },
    },
    async (request): Promise<RefreshResponse> => {
      // RefreshInProgressError propagates to the error handler as a 409
      return await opts.scheduler.triggerRefresh(request.query.force);
    },
  );

  return done();
}

export default fp(refreshRouter, {
  name: "refresh-router",
});
