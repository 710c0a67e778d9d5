import * as fs from "fs/promises";
import * as path from "path";
import { Logger } from "pino";
import { SourceConfig, SourceStats } from "../model/sourceConfig.js";
import { RepositoryClient, RepositorySyncResult } from "./interfaces/repositoryClient.js";
import { hasClockSkew, needsUpdate, usesElapsedTime } from "./frequencyPolicy.js";
import { selectFiles } from "./pathFilter.js";
import { readSyncMarker, writeSyncMarker } from "../util/syncMarker.js";
import { getStagingPath } from "../util/pathUtils.js";
import { createProgressHandler } from "../util/progressHandler.js";
import { withTimeout } from "../util/timeout.js";
import { BackendError, getErrorMessage } from "../model/error/BackendError.js";
import { TimeoutError } from "../model/error/SystemErrors.js";
import { SYNC_DEFAULTS } from "../constant.js";

export interface ContentSourceOptions {
  client: RepositoryClient;
  logger: Logger;
  fetchTimeoutMs?: number;
  clock?: () => Date;
}

/**
 * One configured content source: its checkout directory, the sidecar marker
 * recording the last successful sync, and the fetch that moves both forward.
 */
export class ContentSource {
  public readonly config: SourceConfig;
  private readonly client: RepositoryClient;
  private readonly logger: Logger;
  private readonly fetchTimeoutMs: number;
  private readonly clock: () => Date;

  private lastSyncTime: Date | null = null;
  private syncedThisRun = false;
  private currentSync: Promise<boolean> | null = null;
  private abandoned = false;

  public constructor(config: SourceConfig, options: ContentSourceOptions) {
    this.config = config;
    this.client = options.client;
    this.logger = options.logger.child({ source: config.name });
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? SYNC_DEFAULTS.FETCH_TIMEOUT_MS;
    this.clock = options.clock ?? ((): Date => new Date());
  }

  public get name(): string {
    return this.config.name;
  }

  public get localPath(): string {
    return this.config.localPath;
  }

  public async initialize(): Promise<void> {
    this.lastSyncTime = await readSyncMarker(this.localPath);
    if (this.lastSyncTime) {
      this.logger.debug(`Loaded last sync time for ${this.name}: ${this.lastSyncTime.toISOString()}`);
    }
  }

  public getLastSyncTime(): Date | null {
    return this.lastSyncTime;
  }

  public isSyncing(): boolean {
    return this.currentSync !== null;
  }

  public async checkoutExists(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.localPath);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  public async needsUpdate(now: Date = this.clock()): Promise<boolean> {
    if (usesElapsedTime(this.config.updateFrequency) && hasClockSkew(this.lastSyncTime, now)) {
      this.logger.warn(
        `Last sync of ${this.name} (${this.lastSyncTime?.toISOString()}) is later than the current time; treating it as stale`,
      );
    }

    return needsUpdate({
      cadence: this.config.updateFrequency,
      lastSyncTime: this.lastSyncTime,
      checkoutExists: await this.checkoutExists(),
      now,
      syncedThisRun: this.syncedThisRun,
    });
  }

  /**
   * Clones or fast-forwards the checkout. Never throws: a failure is logged and
   * leaves the checkout and the last sync time as they were.
   */
  public sync(): Promise<boolean> {
    if (this.currentSync) {
      this.logger.debug(`Sync of ${this.name} already running, joining it`);
      return this.currentSync;
    }

    this.currentSync = this.performSync().finally(() => {
      this.currentSync = null;
    });
    return this.currentSync;
  }

  /**
   * Abandons an in-flight sync, which then resolves as failed
   */
  public abort(): void {
    if (this.currentSync) {
      this.abandoned = true;
      this.client.abort();
    }
  }

  public destroy(): void {
    this.client.destroy();
  }

  public async getFiles(): Promise<string[]> {
    const files = await selectFiles(
      this.localPath,
      this.config.includePaths,
      this.config.excludePaths,
      this.logger,
    );
    this.logger.debug(`Found ${files.length} files in ${this.name}`);
    return files;
  }

  public async toStats(): Promise<SourceStats> {
    const fileCount = (await this.checkoutExists()) ? (await this.getFiles()).length : 0;
    return {
      name: this.name,
      url: this.config.url,
      branch: this.config.branch,
      fileCount,
      lastSyncTime: this.lastSyncTime ? this.lastSyncTime.toISOString() : null,
      priority: this.config.priority,
    };
  }

  private async performSync(): Promise<boolean> {
    this.logger.info(`Updating content source: ${this.name}`);
    this.abandoned = false;
    const startTime = Date.now();

    try {
      const isExistingCheckout = await this.checkoutExists();
      const operation = isExistingCheckout ? this.update() : this.acquire();

      const result = await withTimeout(operation, this.fetchTimeoutMs, () => {
        this.abandoned = true;
        this.client.abort();
        return TimeoutError.forOperation(`Sync of ${this.name}`, this.fetchTimeoutMs, this.config.url);
      });

      if (this.abandoned) {
        throw new Error(`Sync of ${this.name} was aborted`);
      }

      this.logOutcome(result, Date.now() - startTime);
      await this.recordSuccess();
      return true;
    } catch (error) {
      this.logFailure(error);
      return false;
    }
  }

  private async update(): Promise<RepositorySyncResult> {
    this.logger.info(`Pulling latest from ${this.name}`);
    return await this.client.pull(this.localPath, this.progressHandler());
  }

  /**
   * First acquisition: clone next to the checkout path and move it into place
   * only once complete, so a failed clone never leaves a half-written checkout.
   */
  private async acquire(): Promise<RepositorySyncResult> {
    const stagingDir = getStagingPath(this.localPath);
    this.logger.info(`Cloning ${this.config.url} to ${this.localPath}`);

    await fs.rm(stagingDir, { recursive: true, force: true });
    await fs.mkdir(path.dirname(this.localPath), { recursive: true });

    try {
      const result = await this.client.clone(stagingDir, this.progressHandler());
      if (this.abandoned) {
        throw new Error(`Clone of ${this.name} was abandoned`);
      }
      await fs.rename(stagingDir, this.localPath);
      return result;
    } catch (error) {
      try {
        await fs.rm(stagingDir, { recursive: true, force: true });
      } catch (cleanupError) {
        this.logger.warn(`Failed to remove staging directory ${stagingDir}: ${cleanupError}`);
      }
      throw error;
    }
  }

  private async recordSuccess(): Promise<void> {
    const now = this.clock();
    const previous = this.lastSyncTime;
    // never moves backwards, even when the wall clock does
    const syncTime = previous && previous.getTime() > now.getTime() ? previous : now;
    this.lastSyncTime = syncTime;
    this.syncedThisRun = true;

    try {
      await writeSyncMarker(this.localPath, syncTime);
    } catch (error) {
      this.logger.warn(`Could not save sync timestamp for ${this.name}: ${getErrorMessage(error)}`);
    }
  }

  private progressHandler(): ReturnType<typeof createProgressHandler> {
    return createProgressHandler({ logger: this.logger, label: `[${this.name}]` });
  }

  private logOutcome(result: RepositorySyncResult, durationMs: number): void {
    const duration = (durationMs / 1000).toFixed(2);
    const commit = result.currentCommit ? result.currentCommit.substring(0, 7) : "unknown";

    switch (result.outcome) {
      case "cloned":
        this.logger.info(`Cloned ${this.name} at ${commit} in ${duration}s`);
        break;
      case "up-to-date":
        this.logger.info(`${this.name} already up to date at ${commit}`);
        break;
      case "advanced":
        this.logger.info(
          `Updated ${this.name} from ${result.previousCommit?.substring(0, 7) ?? "unknown"} to ${commit} in ${duration}s`,
        );
        break;
    }
  }

  private logFailure(error: unknown): void {
    if (error instanceof BackendError) {
      this.logger.error({ err: error, detail: error.errorItem }, `Failed to update ${this.name}: ${error.message}`);
    } else {
      this.logger.error({ err: error }, `Unexpected error updating ${this.name}: ${getErrorMessage(error)}`);
    }
  }
}
