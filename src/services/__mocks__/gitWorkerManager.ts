import { GitAuth, GitOperation, GitProgressEvent } from "../../workers/gitWorkerTypes.js";

// Runs no git at all: tests replace clone/pull with jest.fn implementations as needed
export class GitWorkerManager {
  public async clone(
    _url: string,
    _dir: string,
    _ref: string,
    _auth?: GitAuth,
    onProgress?: (progress: GitProgressEvent) => void,
  ): Promise<void> {
    if (onProgress) {
      onProgress({ phase: "Receiving objects", loaded: 100, total: 100 });
    }
    return await Promise.resolve();
  }

  public async pull(
    _dir: string,
    _ref: string,
    _auth?: GitAuth,
    _onProgress?: (progress: GitProgressEvent) => void,
  ): Promise<void> {
    return await Promise.resolve();
  }

  public executeOperation(_operation: GitOperation, onProgress?: (progress: GitProgressEvent) => void): Promise<void> {
    if (onProgress) {
      onProgress({ phase: "Complete", loaded: 100, total: 100 });
    }
    return Promise.resolve();
  }

  public isBusy(): boolean {
    return false;
  }

  public abort(): void {
    // nothing running
  }

  public destroy(): void {
    // nothing to release
  }
}
