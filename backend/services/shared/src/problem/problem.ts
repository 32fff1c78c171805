// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC7807-ish): the wire shape and
 *   a small factory that stamps the service identity on every problem.
 *
 * Invariants:
 * - No Express imports.
 */

import { HttpError } from "../http/errors";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;

  detail?: string;
  code?: string;
  requestId?: string;
  service?: string;
};

const TITLES: Readonly<Record<number, string>> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  409: "Conflict",
  413: "Request Entity Too Large",
  429: "Too Many Requests",
  500: "Internal Server Error",
};

export function titleFor(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Internal Server Error" : "Request Failed");
}

export class ProblemFactory {
  private readonly service: string;

  public constructor(opts: { service: string }) {
    if (!opts.service.trim()) {
      throw new Error("PROBLEM_FACTORY_INVALID: service is required.");
    }
    this.service = opts.service.trim();
  }

  private base(p: Omit<ProblemJson, "service">): ProblemJson {
    return { service: this.service, ...p };
  }

  public fromHttpError(err: HttpError, requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: titleFor(err.httpStatus),
      status: err.httpStatus,
      code: err.bizCode,
      detail: err.message,
      requestId,
    });
  }

  public notFound(requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: "Route not found",
      requestId,
    });
  }

  public internalError(requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: "An unexpected error occurred.",
      requestId,
    });
  }
}
