export interface ErrorResponse {
  error: ErrorItem;
}

export interface ErrorItem {
  code: string;
  message: string;
  target?: string;
  details?: DetailError[];
}

export interface DetailError {
  code: string;
  message: string;
}

/**
 * Base class for every error this service raises on purpose.
 *
 * Sync and loading code never lets these escape a single source or file; they
 * are thrown inside that boundary so the catch site can log a classified error,
 * and the HTTP layer turns them into error responses.
 */
export abstract class BackendError extends Error {
  public name = "BackendError";

  /**
   * The HTTP response status code that this error should result in
   */
  public httpStatusCode = 500;

  public errorItem: ErrorItem;

  public constructor(message: string, code?: string, target?: string, details?: DetailError[]) {
    super(message);
    this.errorItem = {
      message: message,
      code: code ?? "INTERNAL_SERVER_ERROR",
    };
    if (target) {
      this.errorItem.target = target;
    }
    if (details) {
      this.errorItem.details = details;
    }
  }

  public get code(): string {
    return this.errorItem.code;
  }

  public getErrorResponse(): ErrorResponse {
    return {
      error: this.errorItem,
    };
  }

  public getHttpStatusCode(): number {
    return this.httpStatusCode;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
