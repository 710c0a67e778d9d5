import { BackendError, DetailError } from "./BackendError.js";

function originalErrorDetails(error?: Error): DetailError[] {
  if (!error) {
    return [];
  }
  return [
    {
      code: "ORIGINAL_ERROR",
      message: error.message,
    },
  ];
}

export class RepositoryNetworkError extends BackendError {
  public name = "RepositoryNetworkError";
  public httpStatusCode = 503;

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, "REPOSITORY_NETWORK_ERROR", target, details);
  }

  public static fromError(error: Error, url: string): RepositoryNetworkError {
    return new RepositoryNetworkError(`Unable to reach repository ${url}`, url, [
      {
        code: "CONNECTION_ERROR",
        message: error.message,
      },
    ]);
  }
}

export class RepositoryAuthError extends BackendError {
  public name = "RepositoryAuthError";
  public httpStatusCode = 401;

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, "REPOSITORY_AUTH_ERROR", target, details);
  }

  public static fromError(error: Error, url: string): RepositoryAuthError {
    return new RepositoryAuthError(`Access to repository ${url} was denied`, url, originalErrorDetails(error));
  }
}

export class BranchNotFoundError extends BackendError {
  public name = "BranchNotFoundError";
  public httpStatusCode = 404;

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, "BRANCH_NOT_FOUND", target, details);
  }

  public static forBranch(branch: string, url: string, originalError?: Error): BranchNotFoundError {
    return new BranchNotFoundError(`Branch '${branch}' not found in ${url}`, url, originalErrorDetails(originalError));
  }
}

/**
 * Local and remote histories have diverged, so a fast-forward update is impossible.
 * The checkout is left exactly as it was.
 */
export class DivergedHistoryError extends BackendError {
  public name = "DivergedHistoryError";
  public httpStatusCode = 409;

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, "DIVERGED_HISTORY", target, details);
  }

  public static forBranch(branch: string, dir: string, originalError?: Error): DivergedHistoryError {
    return new DivergedHistoryError(
      `Cannot fast-forward '${branch}' in ${dir}: local and remote histories have diverged`,
      dir,
      originalErrorDetails(originalError),
    );
  }
}

/**
 * Any other failure reported by the git layer, carrying its error code
 */
export class GitOperationError extends BackendError {
  public name = "GitOperationError";
  public httpStatusCode = 502;
  public readonly gitCode?: string;
  public readonly remoteStatusCode?: number;

  public constructor(message: string, gitCode?: string, target?: string, remoteStatusCode?: number) {
    super(message, "GIT_OPERATION_ERROR", target, gitCode ? [{ code: gitCode, message }] : undefined);
    this.gitCode = gitCode;
    this.remoteStatusCode = remoteStatusCode;
  }
}
