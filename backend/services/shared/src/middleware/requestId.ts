// backend/services/shared/src/middleware/requestId.ts
/**
 * Purpose:
 * - Give every inbound request a stable correlation id before any logger runs.
 *
 * Notes:
 * - Never overwrites a caller-supplied id. Headers honored, in order:
 *   x-request-id, x-correlation-id, x-amzn-trace-id.
 * - The id lands on `req.id` (typed by pino-http as string | number | object)
 *   and is echoed as `x-request-id`. Read it back with requestIdOf().
 */

import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import type {} from "pino-http";

export const REQUEST_ID_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

/** The correlation id set by requestIdMiddleware, when it is a string. */
export function requestIdOf(req: IncomingMessage): string | undefined {
  const id: unknown = req.id;
  return typeof id === "string" && id !== "" ? id : undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    let id: string | undefined;
    for (const name of REQUEST_ID_HEADERS) {
      const h = req.headers[name];
      const v = Array.isArray(h) ? h[0] : h;
      if (v) {
        id = v;
        break;
      }
    }

    const rid = id ?? randomUUID();
    req.id = rid;
    res.setHeader("x-request-id", rid);
    next();
  };
}
