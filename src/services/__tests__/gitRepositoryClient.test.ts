import * as fs from "fs/promises";
import * as path from "path";
import git from "isomorphic-git";
import { GitRepositoryClient } from "../gitRepositoryClient.js";
import { GitWorkerManager } from "../gitWorkerManager.js";
import {
  BranchNotFoundError,
  DivergedHistoryError,
  GitOperationError,
  RepositoryAuthError,
  RepositoryNetworkError,
} from "../../model/error/GitErrors.js";
import { DiskSpaceError } from "../../model/error/SystemErrors.js";
import { createSilentLogger, createTempDir, removeDir } from "../../__tests__/setup/testSetup.js";

jest.mock("../gitWorkerManager.js");
jest.mock("isomorphic-git", () => ({
  __esModule: true,
  default: { resolveRef: jest.fn() },
}));

const resolveRef = jest.mocked(git.resolveRef);

describe("GitRepositoryClient", () => {
  const remote = { url: "https://git.example.com/docs.git", branch: "main" };
  const shaA = "a".repeat(40);
  const shaB = "b".repeat(40);

  let dir: string;

  beforeEach(async () => {
    jest.restoreAllMocks();
    resolveRef.mockReset();
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("clone", () => {
    it("should create the target directory and report the checked out commit", async () => {
      const clone = jest.spyOn(GitWorkerManager.prototype, "clone");
      resolveRef.mockResolvedValue(shaA);
      const target = path.join(dir, "docs.staging");
      const client = new GitRepositoryClient(remote, createSilentLogger());

      const result = await client.clone(target);

      expect(result).toEqual({ outcome: "cloned", previousCommit: null, currentCommit: shaA });
      expect((await fs.stat(target)).isDirectory()).toBe(true);
      expect(clone).toHaveBeenCalledWith(remote.url, target, "main", undefined, undefined);
    });

    it("should authenticate with the token as user name", async () => {
      const clone = jest.spyOn(GitWorkerManager.prototype, "clone");
      resolveRef.mockResolvedValue(shaA);
      const client = new GitRepositoryClient({ ...remote, token: "test-token" }, createSilentLogger());

      await client.clone(dir);

      expect(clone.mock.calls[0][3]).toEqual({ username: "test-token", password: "x-oauth-basic" });
    });

    it("should report an unknown commit when HEAD cannot be resolved", async () => {
      resolveRef.mockRejectedValue(new Error("Could not find HEAD"));
      const client = new GitRepositoryClient(remote, createSilentLogger());

      expect((await client.clone(dir)).currentCommit).toBeNull();
    });

    it("should classify clone failures", async () => {
      jest
        .spyOn(GitWorkerManager.prototype, "clone")
        .mockRejectedValue(new GitOperationError("Could not find main.", "NotFoundError", dir));
      const client = new GitRepositoryClient(remote, createSilentLogger());

      await expect(client.clone(dir)).rejects.toBeInstanceOf(BranchNotFoundError);
    });
  });

  describe("pull", () => {
    it("should report up-to-date when HEAD did not move", async () => {
      resolveRef.mockResolvedValue(shaA);
      const client = new GitRepositoryClient(remote, createSilentLogger());

      expect(await client.pull(dir)).toEqual({ outcome: "up-to-date", previousCommit: shaA, currentCommit: shaA });
    });

    it("should report advanced when HEAD moved", async () => {
      resolveRef.mockResolvedValueOnce(shaA).mockResolvedValueOnce(shaB);
      const pull = jest.spyOn(GitWorkerManager.prototype, "pull");
      const client = new GitRepositoryClient(remote, createSilentLogger());

      expect(await client.pull(dir)).toEqual({ outcome: "advanced", previousCommit: shaA, currentCommit: shaB });
      expect(pull).toHaveBeenCalledWith(dir, "main", undefined, undefined);
    });

    it("should turn a rejected fast-forward into a diverged history error", async () => {
      resolveRef.mockResolvedValue(shaA);
      jest
        .spyOn(GitWorkerManager.prototype, "pull")
        .mockRejectedValue(new GitOperationError("A simple fast-forward merge was not possible.", "FastForwardError"));
      const client = new GitRepositoryClient(remote, createSilentLogger());

      const error: unknown = await client.pull(dir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DivergedHistoryError);
      expect(error instanceof DivergedHistoryError && error.message).toBe(
        `Cannot fast-forward 'main' in ${dir}: local and remote histories have diverged`,
      );
    });
  });

  describe("classifyError", () => {
    const client = new GitRepositoryClient(remote, createSilentLogger());

    it.each([
      ["FastForwardError", DivergedHistoryError],
      ["MergeNotSupportedError", DivergedHistoryError],
      ["MergeConflictError", DivergedHistoryError],
      ["NotFoundError", BranchNotFoundError],
      ["UserCanceledError", RepositoryAuthError],
    ])("should map git code %s", (code, expected) => {
      expect(client.classifyError(new GitOperationError("failed", code), "/data/docs")).toBeInstanceOf(expected);
    });

    it.each([401, 403])("should map HTTP status %d to an auth error", (status) => {
      const error = new GitOperationError(`HTTP Error: ${status}`, "HttpError", "/data/docs", status);

      expect(client.classifyError(error, "/data/docs")).toBeInstanceOf(RepositoryAuthError);
    });

    it.each(["getaddrinfo ENOTFOUND git.example.com", "connect ECONNREFUSED 127.0.0.1:443", "read ECONNRESET"])(
      "should map '%s' to a network error",
      (message) => {
        expect(client.classifyError(new Error(message), "/data/docs")).toBeInstanceOf(RepositoryNetworkError);
      },
    );

    it("should map a full disk", () => {
      const error = client.classifyError(new Error("ENOSPC: no space left on device, write"), "/data/docs");

      expect(error).toBeInstanceOf(DiskSpaceError);
    });

    it("should keep errors it cannot classify", () => {
      const original = new Error("something else");

      expect(client.classifyError(original, "/data/docs")).toBe(original);
    });

    it("should wrap values that are not errors", () => {
      const error = client.classifyError("boom", "/data/docs");

      expect(error).toBeInstanceOf(GitOperationError);
      expect(error.message).toBe("boom");
    });
  });

  it("should pass abort and destroy to the worker", () => {
    const abort = jest.spyOn(GitWorkerManager.prototype, "abort");
    const destroy = jest.spyOn(GitWorkerManager.prototype, "destroy");
    const client = new GitRepositoryClient(remote, createSilentLogger());

    client.abort();
    client.destroy();

    expect(abort).toHaveBeenCalledTimes(1);
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
