import { FastifyInstance, FastifyPluginOptions } from "fastify";
import fp from "fastify-plugin";
import { ContentManager } from "../services/contentManager.js";
import { RefreshScheduler, RefreshStatus } from "../services/refreshScheduler.js";
import { ContentStats } from "../model/sourceConfig.js";
import { PATH_CONSTANTS } from "../constant.js";

export interface StatusResponse {
  scheduler: RefreshStatus;
  content: ContentStats;
}

interface StatusRouterOptions extends FastifyPluginOptions {
  scheduler: RefreshScheduler;
  contentManager: ContentManager;
}

function statusRouter(fastify: FastifyInstance, opts: StatusRouterOptions, done: () => void): void {
  fastify.get(PATH_CONSTANTS.STATUS_ENDPOINT, async (): Promise<StatusResponse> => {
    return {
      scheduler: opts.scheduler.getStatus(),
      content: await opts.contentManager.stats(),
    };
  });

  return done();
}

export default fp(statusRouter, {
  name: "status-router",
});
