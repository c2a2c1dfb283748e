export const ERROR_KINDS = [
  "ConfigurationError",
  "UpstreamUnavailable",
  "UpstreamError",
  "MalformedResponse",
  "InvalidItem",
  "NegativeStockRejected",
  "IncompleteIntent",
  "UnsupportedOperation",
  "InvalidRequest",
  "InternalError"
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: string): value is ErrorKind {
  return (ERROR_KINDS as readonly string[]).includes(value);
}

/**
 * Base for every failure that reaches an HTTP caller. `status` is the response
 * code and `message` is sent as the `detail` field.
 */
export class ServiceError extends Error {
  constructor(readonly kind: ErrorKind, readonly status: number, message: string) {
    super(message);
    this.name = kind;
  }
}

export class ConfigurationError extends ServiceError {
  constructor(message: string) {
    super("ConfigurationError", 500, message);
  }
}

export class UpstreamUnavailableError extends ServiceError {
  constructor(message: string) {
    super("UpstreamUnavailable", 503, message);
  }
}

/** Downstream answered with a non-success status; that status is passed on. */
export class UpstreamError extends ServiceError {
  constructor(status: number, message: string) {
    super("UpstreamError", status, message);
  }
}

export class MalformedResponseError extends ServiceError {
  constructor(message: string) {
    super("MalformedResponse", 500, message);
  }
}

export class InvalidItemError extends ServiceError {
  constructor(message: string) {
    super("InvalidItem", 400, message);
  }
}

export class NegativeStockError extends ServiceError {
  constructor(message: string) {
    super("NegativeStockRejected", 400, message);
  }
}

export class IncompleteIntentError extends ServiceError {
  constructor(message: string) {
    super("IncompleteIntent", 400, message);
  }
}

export class UnsupportedOperationError extends ServiceError {
  constructor(message: string) {
    super("UnsupportedOperation", 400, message);
  }
}

export class InvalidRequestError extends ServiceError {
  constructor(message: string, status = 400) {
    super("InvalidRequest", status, message);
  }
}

export class InternalError extends ServiceError {
  constructor(message: string) {
    super("InternalError", 500, message);
  }
}

export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  if (err instanceof Error) {
    return new InternalError(`An unexpected error occurred: ${err.name}: ${err.message}`);
  }
  return new InternalError(`An unexpected error occurred: ${String(err)}`);
}
