// backend/services/shared/src/http/errors.ts
/**
 * Purpose:
 * - Error taxonomy for the binding pipeline:
 *   • HttpError         : anything that already knows its HTTP status + biz code
 *   • BindError         : a binder failed to decode its source (400 class)
 *   • DecodeError       : key-based conversion failures (string → declared kind)
 *   • BodyTooLargeError : body read past the configured ceiling (413, terminal)
 *
 * Invariants:
 * - No Express imports; these travel through the transport-agnostic pipeline.
 * - Wrapping always sets `cause`, so the size-exceeded condition survives any
 *   number of binder-level wraps (see isBodyTooLarge()).
 */

export const BizCode = Object.freeze({
  OK: "OK",
  BadRequest: "BAD_REQUEST",
  Unauthorized: "UNAUTHORIZED",
  Forbidden: "FORBIDDEN",
  NotFound: "NOT_FOUND",
  Conflict: "CONFLICT",
  TooManyRequests: "TOO_MANY_REQUESTS",
  Validation: "VALIDATION_FAILED",
  RequestEntityTooLarge: "REQUEST_ENTITY_TOO_LARGE",
  Internal: "INTERNAL_ERROR",
} as const);

export class HttpError extends Error {
  public readonly httpStatus: number;
  public readonly bizCode: string;

  constructor(
    httpStatus: number,
    bizCode: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HttpError";
    this.httpStatus = httpStatus;
    this.bizCode = bizCode;
  }

  public static badRequest(message = "Bad Request", cause?: unknown): HttpError {
    return new HttpError(400, BizCode.BadRequest, message, { cause });
  }

  public static validation(message: string, cause?: unknown): HttpError {
    return new HttpError(400, BizCode.Validation, message, { cause });
  }

  public static tooLarge(cause?: unknown): HttpError {
    return new HttpError(
      413,
      BizCode.RequestEntityTooLarge,
      "Request Entity Too Large",
      { cause }
    );
  }

  public static notFound(message = "Not Found"): HttpError {
    return new HttpError(404, BizCode.NotFound, message);
  }

  public static conflict(message = "Conflict"): HttpError {
    return new HttpError(409, BizCode.Conflict, message);
  }

  public static unauthorized(message = "Unauthorized"): HttpError {
    return new HttpError(401, BizCode.Unauthorized, message);
  }
}

export class BodyTooLargeError extends Error {
  public readonly limit: number;

  constructor(limit: number) {
    super(`request body too large (limit ${limit} bytes)`);
    this.name = "BodyTooLargeError";
    this.limit = limit;
  }
}

export class BindError extends Error {
  public readonly binder: string;

  constructor(binder: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BindError";
    this.binder = binder;
  }
}

export type DecodeIssue = {
  key: string;
  value: string;
  message: string;
};

/** One or more values could not be converted to their field's declared kind. */
export class DecodeError extends Error {
  public readonly issues: ReadonlyArray<DecodeIssue>;

  constructor(issues: ReadonlyArray<DecodeIssue>) {
    super(DecodeError.summarize(issues));
    this.name = "DecodeError";
    this.issues = issues;
  }

  private static summarize(issues: ReadonlyArray<DecodeIssue>): string {
    if (issues.length === 0) return "decode error";
    const first = issues[0].message;
    if (issues.length === 1) return first;
    const others = issues.length - 1;
    return `${first} (and ${others} other error${others === 1 ? "" : "s"})`;
  }
}

/** True when `err`, or anything in its cause chain, is a BodyTooLargeError. */
export function isBodyTooLarge(err: unknown): boolean {
  let cur: unknown = err;
  for (let depth = 0; depth < 16 && cur != null; depth++) {
    if (cur instanceof BodyTooLargeError) return true;
    cur = cur instanceof Error ? cur.cause : undefined;
  }
  return false;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
