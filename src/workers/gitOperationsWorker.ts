import { parentPort, MessagePort } from "worker_threads";
import * as fs from "fs";
import git from "isomorphic-git";
import http from "isomorphic-git/http/node";
import {
  GIT_COMMIT_AUTHOR,
  GitOperation,
  GitOperationData,
  GitOperationFailure,
  GitProgressEvent,
  REMOTE_NAME,
  WorkerMessage,
} from "./gitWorkerTypes.js";

function toFailure(error: unknown): GitOperationFailure {
  const failure: GitOperationFailure = {
    message: error instanceof Error ? error.message : String(error),
  };
  if (typeof error === "object" && error !== null) {
    if ("code" in error && typeof error.code === "string") {
      failure.code = error.code;
    }
    // isomorphic-git's HttpError carries the response status in data
    if ("data" in error && typeof error.data === "object" && error.data !== null && "statusCode" in error.data) {
      const statusCode = error.data.statusCode;
      if (typeof statusCode === "number") {
        failure.statusCode = statusCode;
      }
    }
  }
  return failure;
}

class GitWorker {
  private readonly port: MessagePort;

  public constructor(port: MessagePort | null) {
    if (!port) {
      throw new Error("This file must be run as a worker thread");
    }
    this.port = port;

    this.port.on("message", (operation: GitOperation) => {
      this.handleOperation(operation)
        .then(() => this.send({ type: "result" }))
        .catch((error: unknown) => this.send({ type: "result", error: toFailure(error) }));
    });
  }

  private send(message: WorkerMessage): void {
    this.port.postMessage(message);
  }

  private sendProgress(data: GitProgressEvent): void {
    this.send({ type: "progress", data });
  }

  private getAuthCallback(data: GitOperationData): (() => { username: string; password: string }) | undefined {
    const auth = data.auth;
    return auth ? (): { username: string; password: string } => auth : undefined;
  }

  private async handleOperation(operation: GitOperation): Promise<void> {
    switch (operation.type) {
      case "clone":
        await this.handleClone(operation.data);
        break;
      case "fetch":
        await this.handleFetch(operation.data);
        break;
      case "fastForward":
        await this.handleFastForward(operation.data);
        break;
    }
  }

  private async handleClone(data: GitOperationData): Promise<void> {
    if (!data.url) {
      throw new Error("Clone operation requires a url");
    }

    await git.clone({
      fs,
      http,
      dir: data.dir,
      url: data.url,
      ref: data.ref,
      singleBranch: data.singleBranch ?? true,
      depth: data.depth ?? 1,
      onAuth: this.getAuthCallback(data),
      onProgress: (progressEvent): void => {
        this.sendProgress(progressEvent);
      },
    });
  }

  private async handleFetch(data: GitOperationData): Promise<void> {
    await git.fetch({
      fs,
      http,
      dir: data.dir,
      remote: REMOTE_NAME,
      ref: data.ref,
      singleBranch: data.singleBranch ?? true,
      onAuth: this.getAuthCallback(data),
      onProgress: (progressEvent): void => {
        this.sendProgress(progressEvent);
      },
    });
  }

  private async handleFastForward(data: GitOperationData): Promise<void> {
    await git.merge({
      fs,
      dir: data.dir,
      ours: data.ref,
      theirs: `${REMOTE_NAME}/${data.ref}`,
      fastForwardOnly: true,
      author: GIT_COMMIT_AUTHOR,
    });
    await git.checkout({ fs, dir: data.dir, ref: data.ref });
  }
}

new GitWorker(parentPort);
