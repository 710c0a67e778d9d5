import pLimit from "p-limit";
import { Logger } from "pino";
import { ContentSource } from "./contentSource.js";
import { RepositoryClientFactory } from "./interfaces/repositoryClient.js";
import { ContentStats, SourceConfig } from "../model/sourceConfig.js";
import { DocumentCandidate } from "../model/document.js";
import { getErrorMessage } from "../model/error/BackendError.js";
import { SYNC_DEFAULTS } from "../constant.js";

export interface ContentManagerOptions {
  logger: Logger;
  clientFactory: RepositoryClientFactory;
  concurrency?: number;
  fetchTimeoutMs?: number;
  gitToken?: string;
  clock?: () => Date;
}

export type SourceRefreshOutcome = "updated" | "failed" | "skipped";

export interface RefreshReport {
  success: boolean;
  updated: string[];
  failed: string[];
  skipped: string[];
}

export class ContentManager {
  private readonly sources: ContentSource[];
  private readonly logger: Logger;
  private readonly concurrency: number;
  private currentRefresh: Promise<RefreshReport> | null = null;

  public constructor(configs: SourceConfig[], options: ContentManagerOptions) {
    this.logger = options.logger;
    this.concurrency = Math.max(1, options.concurrency ?? SYNC_DEFAULTS.CONCURRENCY);
    this.sources = configs.map(
      (config) =>
        new ContentSource(config, {
          client: options.clientFactory({ url: config.url, branch: config.branch, token: options.gitToken }),
          logger: options.logger,
          fetchTimeoutMs: options.fetchTimeoutMs,
          clock: options.clock,
        }),
    );
  }

  /**
   * Loads every source's persisted sync marker
   */
  public async initialize(): Promise<void> {
    await Promise.all(this.sources.map((source) => source.initialize()));
  }

  public getSources(): readonly ContentSource[] {
    return this.sources;
  }

  public isRefreshing(): boolean {
    return this.currentRefresh !== null;
  }

  /**
   * Syncs every source that is due (or all of them when forced).
   *
   * @returns true only if every attempted sync succeeded
   */
  public async refresh(force: boolean = false, signal?: AbortSignal): Promise<boolean> {
    const report = await this.refreshWithReport(force, signal);
    return report.success;
  }

  public refreshWithReport(force: boolean = false, signal?: AbortSignal): Promise<RefreshReport> {
    if (this.currentRefresh) {
      this.logger.debug("Refresh already running, joining it");
      return this.currentRefresh;
    }

    this.currentRefresh = this.performRefresh(force, signal).finally(() => {
      this.currentRefresh = null;
    });
    return this.currentRefresh;
  }

  private async performRefresh(force: boolean, signal?: AbortSignal): Promise<RefreshReport> {
    if (this.sources.length === 0) {
      this.logger.warn("No content sources configured");
      return { success: false, updated: [], failed: [], skipped: [] };
    }

    const limit = pLimit(this.concurrency);
    const abortInFlight = (): void => {
      this.logger.warn("Refresh aborted, abandoning in-flight syncs");
      this.sources.forEach((source) => source.abort());
    };
    signal?.addEventListener("abort", abortInFlight, { once: true });

    let outcomes: SourceRefreshOutcome[];
    try {
      outcomes = await Promise.all(
        this.sources.map((source) => limit(() => this.refreshSource(source, force, signal))),
      );
    } finally {
      signal?.removeEventListener("abort", abortInFlight);
    }

    const report: RefreshReport = { success: true, updated: [], failed: [], skipped: [] };
    outcomes.forEach((outcome, index) => {
      report[outcome].push(this.sources[index].name);
    });
    report.success = report.failed.length === 0;

    if (report.updated.length > 0) {
      this.logger.info(`Updated ${report.updated.length}/${this.sources.length} content sources`);
    } else if (report.failed.length === 0) {
      this.logger.info("All content sources up to date");
    }
    if (report.failed.length > 0) {
      this.logger.warn(`Failed to update content sources: ${report.failed.join(", ")}`);
    }

    return report;
  }

  private async refreshSource(
    source: ContentSource,
    force: boolean,
    signal?: AbortSignal,
  ): Promise<SourceRefreshOutcome> {
    if (signal?.aborted) {
      this.logger.warn(`Skipping sync of ${source.name}: refresh aborted`);
      return "failed";
    }

    try {
      if (!force && !(await source.needsUpdate())) {
        return "skipped";
      }
    } catch (error) {
      this.logger.error(`Could not determine whether ${source.name} needs an update: ${getErrorMessage(error)}`);
      return "failed";
    }

    return (await source.sync()) ? "updated" : "failed";
  }

  /**
   * Waits for a running refresh so that nothing reads a checkout mid-fetch
   */
  private async waitForRefresh(): Promise<void> {
    if (this.currentRefresh) {
      await this.currentRefresh;
    }
  }

  /**
   * Lists the selected files of every source as they are on disk now,
   * whether or not the last refresh of that source succeeded.
   */
  public async collectDocuments(): Promise<DocumentCandidate[]> {
    await this.waitForRefresh();

    const limit = pLimit(this.concurrency);
    const perSource = await Promise.all(
      this.sources.map((source) => limit(() => this.collectSource(source))),
    );

    const candidates = perSource.flat();
    this.logger.info(`Total files from all sources: ${candidates.length}`);
    return candidates;
  }

  private async collectSource(source: ContentSource): Promise<DocumentCandidate[]> {
    let files: string[];
    try {
      files = await source.getFiles();
    } catch (error) {
      this.logger.error(`Failed to list files of ${source.name}: ${getErrorMessage(error)}`);
      return [];
    }

    return files.map((file) => ({
      path: file,
      sourceName: source.name,
      priority: source.config.priority,
      sourceLabel: source.config.sourceLabel,
    }));
  }

  public async stats(): Promise<ContentStats> {
    await this.waitForRefresh();

    const sources = await Promise.all(this.sources.map((source) => source.toStats()));
    return {
      sourceCount: this.sources.length,
      sources,
      totalFileCount: sources.reduce((total, source) => total + source.fileCount, 0),
    };
  }

  public abort(): void {
    this.sources.forEach((source) => source.abort());
  }

  public destroy(): void {
    this.sources.forEach((source) => source.destroy());
  }
}
