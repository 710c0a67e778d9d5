import * as fs from "fs";
import git from "isomorphic-git";
import { Logger } from "pino";
import {
  RemoteConfig,
  RepositoryClient,
  RepositoryClientFactory,
  RepositorySyncResult,
  SyncProgressCallback,
} from "./interfaces/repositoryClient.js";
import { GitWorkerManager } from "./gitWorkerManager.js";
import { GitAuth } from "../workers/gitWorkerTypes.js";
import {
  BranchNotFoundError,
  DivergedHistoryError,
  GitOperationError,
  RepositoryAuthError,
  RepositoryNetworkError,
} from "../model/error/GitErrors.js";
import { DiskSpaceError } from "../model/error/SystemErrors.js";

const NETWORK_ERROR_MARKERS = [
  "Could not resolve host",
  "Connection refused",
  "Network is unreachable",
  "ENOTFOUND",
  "ECONNREFUSED",
  "ECONNRESET",
  "ENETUNREACH",
  "ETIMEDOUT",
];

const DIVERGED_HISTORY_CODES = ["FastForwardError", "MergeNotSupportedError", "MergeConflictError"];

export class GitRepositoryClient implements RepositoryClient {
  private readonly remote: RemoteConfig;
  private readonly logger: Logger;
  private readonly gitWorker: GitWorkerManager;

  public constructor(remote: RemoteConfig, logger: Logger) {
    this.remote = remote;
    this.logger = logger;
    this.gitWorker = new GitWorkerManager();
  }

  public async clone(targetDir: string, onProgress?: SyncProgressCallback): Promise<RepositorySyncResult> {
    this.logger.debug(`Cloning ${this.remote.url} (branch: ${this.remote.branch}) to ${targetDir}`);

    try {
      await fs.promises.mkdir(targetDir, { recursive: true });
      await this.gitWorker.clone(this.remote.url, targetDir, this.remote.branch, this.getAuth(), onProgress);
    } catch (error) {
      throw this.classifyError(error, targetDir);
    }

    return {
      outcome: "cloned",
      previousCommit: null,
      currentCommit: await this.getCurrentCommitHash(targetDir),
    };
  }

  public async pull(targetDir: string, onProgress?: SyncProgressCallback): Promise<RepositorySyncResult> {
    const previousCommit = await this.getCurrentCommitHash(targetDir);
    this.logger.debug(`Fast-forwarding ${targetDir} to origin/${this.remote.branch} from ${shortSha(previousCommit)}`);

    try {
      await this.gitWorker.pull(targetDir, this.remote.branch, this.getAuth(), onProgress);
    } catch (error) {
      throw this.classifyError(error, targetDir);
    }

    const currentCommit = await this.getCurrentCommitHash(targetDir);
    const outcome = previousCommit !== null && previousCommit === currentCommit ? "up-to-date" : "advanced";

    return { outcome, previousCommit, currentCommit };
  }

  public abort(): void {
    this.gitWorker.abort();
  }

  public destroy(): void {
    this.gitWorker.destroy();
  }

  private getAuth(): GitAuth | undefined {
    if (!this.remote.token) {
      return undefined;
    }

    // Hosted git services accept a token as the basic auth username
    return {
      username: this.remote.token,
      password: "x-oauth-basic",
    };
  }

  private async getCurrentCommitHash(dir: string): Promise<string | null> {
    try {
      return await git.resolveRef({ fs, dir, ref: "HEAD" });
    } catch (error) {
      this.logger.debug(`Could not resolve HEAD in ${dir}: ${error}`);
      return null;
    }
  }

  /**
   * Maps a failure from the git layer onto the error class that names its cause
   */
  public classifyError(error: unknown, targetDir: string): Error {
    if (!(error instanceof Error)) {
      return new GitOperationError(String(error), undefined, targetDir);
    }

    const gitCode = error instanceof GitOperationError ? error.gitCode : undefined;
    const statusCode = error instanceof GitOperationError ? error.remoteStatusCode : undefined;

    if (gitCode && DIVERGED_HISTORY_CODES.includes(gitCode)) {
      return DivergedHistoryError.forBranch(this.remote.branch, targetDir, error);
    }

    if (gitCode === "NotFoundError") {
      return BranchNotFoundError.forBranch(this.remote.branch, this.remote.url, error);
    }

    if (statusCode === 401 || statusCode === 403 || gitCode === "UserCanceledError") {
      return RepositoryAuthError.fromError(error, this.remote.url);
    }

    if (NETWORK_ERROR_MARKERS.some((marker) => error.message.includes(marker))) {
      return RepositoryNetworkError.fromError(error, this.remote.url);
    }

    if (error.message.includes("No space left on device") || error.message.includes("ENOSPC")) {
      return DiskSpaceError.fromError(error, targetDir);
    }

    return error;
  }
}

function shortSha(sha: string | null): string {
  return sha ? sha.substring(0, 7) : "unknown";
}

export function createGitRepositoryClient(logger: Logger): RepositoryClientFactory {
  return (remote) => new GitRepositoryClient(remote, logger);
}
