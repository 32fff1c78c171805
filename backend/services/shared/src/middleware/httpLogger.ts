// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured access logs (pino-http) on the shared root logger.
 *
 * Order:
 * - Mount immediately after requestIdMiddleware so `req.id` is reused.
 *
 * Notes:
 * - Severity: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes and favicons are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { RequestHandler } from "express";
import { getRootLogger } from "../logger/Logger";
import { requestIdOf } from "./requestId";

const QUIET_PATHS: ReadonlySet<string> = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/favicon.ico",
]);

function existingId(req: IncomingMessage): string | undefined {
  const id = requestIdOf(req);
  if (id) return id;
  const hdr = req.headers["x-request-id"];
  return Array.isArray(hdr) ? hdr[0] : hdr;
}

export function makeHttpLogger(serviceName: string): RequestHandler {
  const logger = getRootLogger().child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const id = existingId(req) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has((req.url ?? "").split("?")[0]),
    },

    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
