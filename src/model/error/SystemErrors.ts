import { BackendError, DetailError } from "./BackendError.js";

/**
 * Error thrown when the system runs out of disk space
 */
export class DiskSpaceError extends BackendError {
  public name = "DiskSpaceError";
  public httpStatusCode = 507; // Insufficient Storage

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, "DISK_SPACE_ERROR", target, details);
  }

  public static fromError(error: Error, target?: string): DiskSpaceError {
    return new DiskSpaceError("No disk space available", target, [
      {
        code: "ENOSPC",
        message: error.message || "No space left on device",
      },
    ]);
  }
}

/**
 * Error thrown when an operation does not finish within its time budget
 */
export class TimeoutError extends BackendError {
  public name = "TimeoutError";
  public httpStatusCode = 504;

  public constructor(message: string, target?: string, details?: DetailError[]) {
    super(message, "TIMEOUT_ERROR", target, details);
  }

  public static forOperation(operation: string, timeoutMs: number, target?: string): TimeoutError {
    return new TimeoutError(`${operation} timed out after ${Math.round(timeoutMs / 1000)}s`, target, [
      {
        code: "OPERATION_TIMEOUT",
        message: `Exceeded ${timeoutMs}ms`,
      },
    ]);
  }
}

/**
 * Error thrown when a refresh is requested while another one is still running
 */
export class RefreshInProgressError extends BackendError {
  public name = "RefreshInProgressError";
  public httpStatusCode = 409;

  public constructor(message: string = "Refresh already in progress") {
    super(message, "REFRESH_IN_PROGRESS");
  }
}
