import { NextFunction, Request, Response } from "express";
import { InvalidRequestError, toServiceError } from "../errors";
import { logger } from "../logger";

const log = logger.child({ component: "http" });

/**
 * body-parser rejects bad bodies with http-errors carrying a 4xx `status` and
 * `expose: true` (unparseable JSON, too large, unsupported charset).
 */
function clientError(err: unknown): InvalidRequestError | null {
  if (!(err instanceof Error) || !("status" in err) || !("expose" in err)) return null;
  const { status, expose } = err;
  if (typeof status !== "number" || status < 400 || status > 499 || expose !== true) return null;
  const prefix = err instanceof SyntaxError ? "Malformed JSON body" : "Invalid request body";
  return new InvalidRequestError(`${prefix}: ${err.message}`, status);
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const error = clientError(err) ?? toServiceError(err);
  if (error.status >= 500) {
    log.error({ kind: error.kind, status: error.status, path: req.path }, error.message);
  } else {
    log.warn({ kind: error.kind, status: error.status, path: req.path }, error.message);
  }
  res.status(error.status).send({ detail: error.message, error: error.kind });
}
