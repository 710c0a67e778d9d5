import { EventEmitter } from "events";
import { Logger } from "pino";
import { ContentManager, RefreshReport } from "./contentManager.js";
import { RefreshInProgressError } from "../model/error/SystemErrors.js";
import { getErrorMessage } from "../model/error/BackendError.js";

export interface RefreshSchedulerConfig {
  intervalMs: number;
}

export interface RefreshStatus {
  lastRefreshTime: Date | null;
  lastRefreshSucceeded: boolean | null;
  lastReport: RefreshReport | null;
  refreshInProgress: boolean;
  failedRefreshes: number;
  nextRefreshTime: Date | null;
}

/**
 * Drives ContentManager.refresh for a long-lived process: once at start, then
 * on a fixed interval, plus manual triggers.
 */
export class RefreshScheduler extends EventEmitter {
  private readonly config: RefreshSchedulerConfig;
  private readonly contentManager: ContentManager;
  private readonly logger: Logger;

  private interval: NodeJS.Timeout | null = null;
  private abortController: AbortController | null = null;
  private refreshInProgress = false;
  private lastRefreshTime: Date | null = null;
  private lastReport: RefreshReport | null = null;
  private failedRefreshes = 0;
  private nextRefreshTime: Date | null = null;

  public constructor(config: RefreshSchedulerConfig, contentManager: ContentManager, logger: Logger) {
    super();
    this.config = config;
    this.contentManager = contentManager;
    this.logger = logger;
  }

  public start(): void {
    this.stopInterval();

    this.interval = setInterval(() => {
      this.runScheduledRefresh();
    }, this.config.intervalMs);
    this.nextRefreshTime = new Date(Date.now() + this.config.intervalMs);

    this.logger.info(`Started periodic content refresh (every ${Math.round(this.config.intervalMs / 1000)}s)`);
    this.runScheduledRefresh();
  }

  public async triggerRefresh(force: boolean = false): Promise<RefreshReport> {
    if (this.refreshInProgress) {
      throw new RefreshInProgressError();
    }
    this.logger.info(`Starting manual ${force ? "forced " : ""}refresh`);
    return await this.performRefresh(force);
  }

  private runScheduledRefresh(): void {
    if (this.interval) {
      this.nextRefreshTime = new Date(Date.now() + this.config.intervalMs);
    }

    if (this.refreshInProgress) {
      this.logger.debug("Skipping scheduled refresh - refresh already in progress");
      return;
    }

    this.performRefresh(false).catch((error: unknown) => {
      this.logger.error(`Scheduled refresh failed: ${getErrorMessage(error)}`);
    });
  }

  private async performRefresh(force: boolean): Promise<RefreshReport> {
    this.refreshInProgress = true;
    this.abortController = new AbortController();
    this.emit("refresh-started");

    try {
      const report = await this.contentManager.refreshWithReport(force, this.abortController.signal);

      this.lastRefreshTime = new Date();
      this.lastReport = report;
      if (!report.success) {
        this.failedRefreshes++;
      }
      this.emit("refresh-completed", report);
      return report;
    } catch (error) {
      this.failedRefreshes++;
      this.emit("refresh-failed", error);
      throw error;
    } finally {
      this.refreshInProgress = false;
      this.abortController = null;
    }
  }

  public getStatus(): RefreshStatus {
    return {
      lastRefreshTime: this.lastRefreshTime,
      lastRefreshSucceeded: this.lastReport ? this.lastReport.success : null,
      lastReport: this.lastReport,
      refreshInProgress: this.refreshInProgress,
      failedRefreshes: this.failedRefreshes,
      nextRefreshTime: this.nextRefreshTime,
    };
  }

  public isRefreshInProgress(): boolean {
    return this.refreshInProgress;
  }

  private stopInterval(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.nextRefreshTime = null;
  }

  public stop(): void {
    this.stopInterval();

    if (this.abortController) {
      this.abortController.abort();
    }
  }
}
