// backend/services/shared/src/problem/createProblemMiddleware.ts
/**
 * Purpose:
 * - Express-only tails: a 404 responder and the final error handler.
 * - HttpError keeps its status and code; anything else becomes a logged 500.
 *
 * Notes:
 * - Errors that went through a BindPipeline never reach here; the pipeline
 *   hands them to the route's ResponseFormatter. This catches the rest
 *   (thrown middleware, formatter failures, malformed routing).
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { HttpError } from "../http/errors";
import type { IBoundLogger } from "../logger/Logger";
import { requestIdOf } from "../middleware/requestId";
import { ProblemFactory } from "./problem";

const PROBLEM_TYPE = "application/problem+json";

export function createNotFoundMiddleware(opts: { service: string }): RequestHandler {
  const pf = new ProblemFactory({ service: opts.service });
  return (req, res) => {
    res.status(404).type(PROBLEM_TYPE).json(pf.notFound(requestIdOf(req)));
  };
}

export function createProblemMiddleware(opts: {
  log: IBoundLogger;
  service: string;
}): ErrorRequestHandler {
  const { log, service } = opts;
  const pf = new ProblemFactory({ service });

  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof HttpError) {
      res.status(err.httpStatus).type(PROBLEM_TYPE).json(pf.fromHttpError(err, requestIdOf(req)));
      return;
    }

    log.error(
      { requestId: requestIdOf(req), error: log.serializeError(err) },
      "unhandled error in request pipeline"
    );
    res.status(500).type(PROBLEM_TYPE).json(pf.internalError(requestIdOf(req)));
  };
}
