import { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { BackendError } from "../model/error/BackendError.js";
import { InternalServerError } from "../model/error/InternalServerError.js";
import { ValidationError } from "../model/error/ValidationError.js";

function isFastifyError(err: unknown): err is FastifyError {
  return err instanceof Error && "statusCode" in err && "code" in err;
}

/**
 * Converts whatever a route throws into an error response body
 * `{ error: { code, message, target?, details? } }` with a matching status.
 */
export function errorHandler(err: unknown, req: FastifyRequest, reply: FastifyReply): void {
  let castedError: BackendError;

  if (err instanceof BackendError) {
    castedError = err;
  } else if (isFastifyError(err) && err.statusCode === 400) {
    // request validation (querystring schema, malformed body)
    castedError = new ValidationError(err.message, [{ code: err.code, message: err.message }], "request");
  } else if (err instanceof Error) {
    castedError = new InternalServerError(`Internal Server error: ${err.message}`);
  } else {
    castedError = new InternalServerError("Unsupported throw use.");
  }

  req.log.error({ response: castedError.getErrorResponse() }, `ERROR ${castedError.getHttpStatusCode()}`);

  reply
    .code(castedError.getHttpStatusCode())
    .header("Content-Type", "application/json; charset=utf-8")
    .send(castedError.getErrorResponse());
}
