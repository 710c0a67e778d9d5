import * as path from "path";
import { Worker } from "worker_threads";
import { GitAuth, GitOperation, GitProgressEvent, WorkerMessage } from "../workers/gitWorkerTypes.js";
import { GitOperationError } from "../model/error/GitErrors.js";

const WORKER_PATH = path.join(__dirname, "..", "workers", "gitOperationsWorker.js");

/**
 * Runs isomorphic-git operations on a dedicated worker thread so that a stuck
 * fetch can be abandoned by terminating the thread.
 */
export class GitWorkerManager {
  private worker: Worker | null = null;
  private currentOperation: Promise<void> | null = null;
  private currentTerminable = true;
  private abortRequested = false;

  private ensureWorker(): Worker {
    if (!this.worker) {
      this.worker = new Worker(WORKER_PATH);
    }
    return this.worker;
  }

  private terminateWorker(): void {
    if (this.worker) {
      const worker = this.worker;
      this.worker = null;
      void worker.terminate();
    }
  }

  public executeOperation(operation: GitOperation, onProgress?: (progress: GitProgressEvent) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      let worker: Worker;
      try {
        worker = this.ensureWorker();
      } catch (error) {
        reject(error);
        return;
      }

      const cleanup = (): void => {
        // eslint-disable-next-line @typescript-eslint/no-use-before-define
        worker.off("message", messageHandler);
        // eslint-disable-next-line @typescript-eslint/no-use-before-define
        worker.off("error", errorHandler);
        // eslint-disable-next-line @typescript-eslint/no-use-before-define
        worker.off("exit", exitHandler);
      };

      const errorHandler = (error: Error): void => {
        cleanup();
        if (this.worker === worker) {
          this.worker = null;
        }
        reject(error);
      };

      const exitHandler = (exitCode: number): void => {
        cleanup();
        if (this.worker === worker) {
          this.worker = null;
        }
        reject(new GitOperationError(`Git ${operation.type} abandoned (worker exited with code ${exitCode})`, "ABORTED"));
      };

      const messageHandler = (message: WorkerMessage): void => {
        if (message.type === "progress") {
          onProgress?.(message.data);
          return;
        }

        cleanup();
        if (message.error) {
          const { message: errorMessage, code, statusCode } = message.error;
          reject(new GitOperationError(errorMessage, code, operation.data.dir, statusCode));
        } else {
          resolve();
        }
      };

      worker.on("message", messageHandler);
      worker.on("error", errorHandler);
      worker.on("exit", exitHandler);

      worker.postMessage(operation);
    });
  }

  private async run(
    operation: GitOperation,
    onProgress?: (progress: GitProgressEvent) => void,
    terminable: boolean = true,
  ): Promise<void> {
    await this.waitForIdle();
    this.currentTerminable = terminable;
    this.currentOperation = this.executeOperation(operation, onProgress);

    try {
      await this.currentOperation;
    } finally {
      this.currentOperation = null;
    }
  }

  /**
   * One operation at a time per worker: an operation abandoned by a timeout may
   * still be finishing when the next sync starts.
   */
  private async waitForIdle(): Promise<void> {
    while (this.currentOperation) {
      // its failure belongs to whoever started it
      await this.currentOperation.then(
        () => undefined,
        () => undefined,
      );
    }
  }

  public async clone(
    url: string,
    dir: string,
    ref: string,
    auth?: GitAuth,
    onProgress?: (progress: GitProgressEvent) => void,
  ): Promise<void> {
    this.abortRequested = false;
    await this.run({ type: "clone", data: { url, dir, ref, singleBranch: true, depth: 1, auth } }, onProgress);
  }

  /**
   * Fetches, then fast-forwards and checks out. Only the fetch can be
   * terminated; once the branch starts moving the update runs to completion so
   * the working tree always matches the branch it is on.
   */
  public async pull(
    dir: string,
    ref: string,
    auth?: GitAuth,
    onProgress?: (progress: GitProgressEvent) => void,
  ): Promise<void> {
    this.abortRequested = false;
    await this.run({ type: "fetch", data: { dir, ref, singleBranch: true, auth } }, onProgress);

    if (this.abortRequested) {
      throw new GitOperationError("Git pull abandoned before fast-forward", "ABORTED", dir);
    }
    await this.run({ type: "fastForward", data: { dir, ref } }, undefined, false);
  }

  public isBusy(): boolean {
    return this.currentOperation !== null;
  }

  /**
   * Abandons the running operation. A clone or fetch is stopped by terminating
   * the worker, which rejects it through the exit handler. A fast-forward in
   * progress is left to finish.
   */
  public abort(): void {
    if (!this.currentOperation) {
      return;
    }
    this.abortRequested = true;
    if (this.worker && this.currentTerminable) {
      this.terminateWorker();
    }
  }

  /**
   * Releases the worker thread, after a running fast-forward has finished
   */
  public destroy(): void {
    if (this.currentOperation && !this.currentTerminable) {
      const release = (): void => this.terminateWorker();
      void this.currentOperation.then(release, release);
      return;
    }
    this.terminateWorker();
  }
}
