import { GitProgressEvent } from "../../workers/gitWorkerTypes.js";

/** Logging detail only: every outcome is a successful sync */
export type SyncOutcome = "cloned" | "advanced" | "up-to-date";

export interface RepositorySyncResult {
  outcome: SyncOutcome;
  previousCommit: string | null;
  currentCommit: string | null;
}

export interface RemoteConfig {
  url: string;
  branch: string;
  token?: string;
}

export type SyncProgressCallback = (progress: GitProgressEvent) => void;

/**
 * Fetches one remote branch into a local directory.
 *
 * Both operations either complete or leave the directory as it was: `clone`
 * writes into a directory the caller discards on failure, `pull` only
 * fast-forwards.
 */
export interface RepositoryClient {
  clone(targetDir: string, onProgress?: SyncProgressCallback): Promise<RepositorySyncResult>;
  pull(targetDir: string, onProgress?: SyncProgressCallback): Promise<RepositorySyncResult>;
  abort(): void;
  destroy(): void;
}

export type RepositoryClientFactory = (remote: RemoteConfig) => RepositoryClient;
