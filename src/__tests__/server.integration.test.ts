import * as path from "path";
import { buildServer, ContentServer } from "../server.js";
import { ContentManager } from "../services/contentManager.js";
import { RefreshScheduler } from "../services/refreshScheduler.js";
import { PATH_CONSTANTS } from "../constant.js";
import {
  buildSourceConfig,
  createSilentLogger,
  createTempDir,
  FakeRepositoryClient,
  fakeClientFactory,
  removeDir,
} from "./setup/testSetup.js";

describe("Server Integration", () => {
  const logger = createSilentLogger();

  let baseDir: string;
  let client: FakeRepositoryClient;
  let contentManager: ContentManager;
  let scheduler: RefreshScheduler;
  let server: ContentServer;

  beforeEach(async () => {
    baseDir = await createTempDir();
    client = new FakeRepositoryClient({ "guide.md": "# Guide", "faq.md": "# FAQ" });
    contentManager = new ContentManager([buildSourceConfig({ name: "docs", localPath: path.join(baseDir, "docs") })], {
      logger,
      clientFactory: fakeClientFactory({ docs: client }),
    });
    await contentManager.initialize();
    scheduler = new RefreshScheduler({ intervalMs: 60000 }, contentManager, logger);
    server = await buildServer({ logger, contentManager, scheduler });
  });

  afterEach(async () => {
    scheduler.stop();
    await server.close();
    contentManager.destroy();
    await removeDir(baseDir);
  });

  describe(`GET ${PATH_CONSTANTS.STATUS_ENDPOINT}`, () => {
    it("should report scheduler state and content before any refresh", async () => {
      const response = await server.inject({ method: "GET", url: "/api/v1/status" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        scheduler: {
          lastRefreshTime: null,
          lastRefreshSucceeded: null,
          lastReport: null,
          refreshInProgress: false,
          failedRefreshes: 0,
          nextRefreshTime: null,
        },
        content: {
          sourceCount: 1,
          sources: [
            {
              name: "docs",
              url: "https://git.example.com/docs.git",
              branch: "main",
              fileCount: 0,
              lastSyncTime: null,
              priority: 1,
            },
          ],
          totalFileCount: 0,
        },
      });
    });
  });

  describe(`POST ${PATH_CONSTANTS.REFRESH_ENDPOINT}`, () => {
    it("should refresh and report which sources were updated", async () => {
      const response = await server.inject({ method: "POST", url: "/api/v1/refresh" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ success: true, updated: ["docs"], failed: [], skipped: [] });

      const status = await server.inject({ method: "GET", url: "/api/v1/status" });
      expect(status.json().content.totalFileCount).toBe(2);
      expect(status.json().scheduler.lastRefreshSucceeded).toBe(true);
    });

    it("should skip fresh sources unless forced", async () => {
      await server.inject({ method: "POST", url: "/api/v1/refresh" });

      const unforced = await server.inject({ method: "POST", url: "/api/v1/refresh" });
      expect(unforced.json()).toEqual({ success: true, updated: [], failed: [], skipped: ["docs"] });

      const forced = await server.inject({ method: "POST", url: "/api/v1/refresh?force=true" });
      expect(forced.json()).toEqual({ success: true, updated: ["docs"], failed: [], skipped: [] });
      expect(client.pullCalls).toHaveLength(1);
    });

    it("should answer 409 while a refresh is running", async () => {
      client.hang = true;
      const first = server.inject({ method: "POST", url: "/api/v1/refresh" });
      while (client.cloneCalls.length === 0) {
        await new Promise((resolve) => setTimeout(resolve, 5));
      }

      const second = await server.inject({ method: "POST", url: "/api/v1/refresh" });

      expect(second.statusCode).toBe(409);
      expect(second.json()).toEqual({ error: { code: "REFRESH_IN_PROGRESS", message: "Refresh already in progress" } });

      scheduler.stop();
      const firstResponse = await first;
      expect(firstResponse.statusCode).toBe(200);
      expect(firstResponse.json()).toEqual({ success: false, updated: [], failed: ["docs"], skipped: [] });
    });

    it("should reject an invalid force flag", async () => {
      const response = await server.inject({ method: "POST", url: "/api/v1/refresh?force=sometimes" });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe("VALIDATION_ERROR");
      expect(response.json().error.target).toBe("request");
      expect(client.fetchCount).toBe(0);
    });
  });

  describe("GET /health", () => {
    it("should report the service version", async () => {
      const response = await server.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok", version: "0.1.0", refreshInProgress: false });
      expect(response.headers["x-content-sync-version"]).toBe("0.1.0");
    });
  });
});
