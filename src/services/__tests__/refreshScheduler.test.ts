import { RefreshScheduler } from "../refreshScheduler.js";
import { ContentManager, RefreshReport } from "../contentManager.js";
import { RefreshInProgressError } from "../../model/error/SystemErrors.js";
import { createMockLogger } from "../../__tests__/setup/testSetup.js";

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const SUCCESS: RefreshReport = { success: true, updated: ["docs"], failed: [], skipped: [] };
const FAILURE: RefreshReport = { success: false, updated: [], failed: ["docs"], skipped: [] };

describe("RefreshScheduler", () => {
  const intervalMs = 15 * 60 * 1000;
  let refreshWithReport: jest.Mock<Promise<RefreshReport>, [boolean, AbortSignal]>;
  let scheduler: RefreshScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date("2024-05-01T12:00:00.000Z"));
    refreshWithReport = jest.fn().mockResolvedValue(SUCCESS);
    const contentManager = { refreshWithReport } as unknown as ContentManager;
    scheduler = new RefreshScheduler({ intervalMs }, contentManager, createMockLogger().asLogger());
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  describe("start", () => {
    it("should refresh immediately and then on every interval", async () => {
      scheduler.start();
      await Promise.resolve();

      expect(refreshWithReport).toHaveBeenCalledTimes(1);
      expect(refreshWithReport.mock.calls[0][0]).toBe(false);
      expect(scheduler.getStatus().nextRefreshTime).toEqual(new Date("2024-05-01T12:15:00.000Z"));

      await jest.advanceTimersByTimeAsync(intervalMs);

      expect(refreshWithReport).toHaveBeenCalledTimes(2);
      expect(scheduler.getStatus().nextRefreshTime).toEqual(new Date("2024-05-01T12:30:00.000Z"));
    });

    it("should skip a tick while a refresh is still running", async () => {
      const running = deferred<RefreshReport>();
      refreshWithReport.mockReturnValueOnce(running.promise);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(intervalMs);

      expect(refreshWithReport).toHaveBeenCalledTimes(1);

      running.resolve(SUCCESS);
      await jest.advanceTimersByTimeAsync(intervalMs);

      expect(refreshWithReport).toHaveBeenCalledTimes(2);
    });

    it("should keep running after a refresh throws", async () => {
      refreshWithReport.mockRejectedValueOnce(new Error("disk unavailable"));

      scheduler.start();
      await jest.advanceTimersByTimeAsync(intervalMs);

      expect(refreshWithReport).toHaveBeenCalledTimes(2);
      expect(scheduler.getStatus().failedRefreshes).toBe(1);
    });
  });

  describe("triggerRefresh", () => {
    it("should refresh with the requested force flag", async () => {
      const report = await scheduler.triggerRefresh(true);

      expect(report).toBe(SUCCESS);
      expect(refreshWithReport.mock.calls[0][0]).toBe(true);
    });

    it("should refuse to start while a refresh is running", async () => {
      const running = deferred<RefreshReport>();
      refreshWithReport.mockReturnValueOnce(running.promise);

      const first = scheduler.triggerRefresh();

      await expect(scheduler.triggerRefresh()).rejects.toBeInstanceOf(RefreshInProgressError);
      running.resolve(SUCCESS);
      await expect(first).resolves.toBe(SUCCESS);
    });
  });

  describe("getStatus", () => {
    it("should start empty", () => {
      expect(scheduler.getStatus()).toEqual({
        lastRefreshTime: null,
        lastRefreshSucceeded: null,
        lastReport: null,
        refreshInProgress: false,
        failedRefreshes: 0,
        nextRefreshTime: null,
      });
    });

    it("should record the outcome of each refresh", async () => {
      await scheduler.triggerRefresh();
      expect(scheduler.getStatus()).toMatchObject({
        lastRefreshTime: new Date("2024-05-01T12:00:00.000Z"),
        lastRefreshSucceeded: true,
        failedRefreshes: 0,
      });

      refreshWithReport.mockResolvedValueOnce(FAILURE);
      await scheduler.triggerRefresh();
      expect(scheduler.getStatus()).toMatchObject({
        lastRefreshSucceeded: false,
        lastReport: FAILURE,
        failedRefreshes: 1,
      });
    });

    it("should report a refresh in progress", async () => {
      const running = deferred<RefreshReport>();
      refreshWithReport.mockReturnValueOnce(running.promise);

      const result = scheduler.triggerRefresh();
      expect(scheduler.getStatus().refreshInProgress).toBe(true);

      running.resolve(SUCCESS);
      await result;
      expect(scheduler.getStatus().refreshInProgress).toBe(false);
    });
  });

  describe("events", () => {
    it("should emit started and completed around a refresh", async () => {
      const events: string[] = [];
      scheduler.on("refresh-started", () => events.push("started"));
      scheduler.on("refresh-completed", (report: RefreshReport) => events.push(`completed:${report.success}`));

      refreshWithReport.mockResolvedValueOnce(FAILURE);
      await scheduler.triggerRefresh();

      expect(events).toEqual(["started", "completed:false"]);
    });

    it("should emit failed when the refresh throws", async () => {
      const failure = new Error("disk unavailable");
      const onFailed = jest.fn();
      scheduler.on("refresh-failed", onFailed);
      refreshWithReport.mockRejectedValueOnce(failure);

      await expect(scheduler.triggerRefresh()).rejects.toBe(failure);

      expect(onFailed).toHaveBeenCalledWith(failure);
      expect(scheduler.getStatus().failedRefreshes).toBe(1);
    });
  });

  describe("stop", () => {
    it("should abort the running refresh and stop scheduling", async () => {
      const running = deferred<RefreshReport>();
      refreshWithReport.mockReturnValueOnce(running.promise);

      scheduler.start();
      await Promise.resolve();
      const signal = refreshWithReport.mock.calls[0][1];

      scheduler.stop();

      expect(signal.aborted).toBe(true);
      expect(scheduler.getStatus().nextRefreshTime).toBeNull();

      running.resolve(FAILURE);
      await jest.advanceTimersByTimeAsync(intervalMs * 2);
      expect(refreshWithReport).toHaveBeenCalledTimes(1);
    });
  });
});
