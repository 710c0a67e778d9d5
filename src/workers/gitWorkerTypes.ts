export interface GitAuth {
  username: string;
  password: string;
}

export interface GitOperationData {
  url?: string;
  dir: string;
  ref: string;
  singleBranch?: boolean;
  depth?: number;
  auth?: GitAuth;
}

/**
 * `fetch` only writes objects and the remote-tracking ref, so the thread can be
 * terminated during it. `fastForward` moves the branch and checks it out and
 * must run to completion.
 */
export type GitOperationType = "clone" | "fetch" | "fastForward";

export interface GitOperation {
  type: GitOperationType;
  data: GitOperationData;
}

export interface GitProgressEvent {
  phase: string;
  loaded?: number;
  total?: number;
}

export interface GitOperationFailure {
  message: string;
  code?: string;
  statusCode?: number;
}

export interface WorkerProgressMessage {
  type: "progress";
  data: GitProgressEvent;
}

export interface WorkerResultMessage {
  type: "result";
  error?: GitOperationFailure;
}

export type WorkerMessage = WorkerProgressMessage | WorkerResultMessage;

export const REMOTE_NAME = "origin";

export const GIT_COMMIT_AUTHOR = {
  name: "Content Source Sync",
  email: "noreply@content-source-sync",
};
