// backend/services/shared/src/http/express/bindRoute.ts
/**
 * Purpose:
 * - Express adapter for BindPipeline: one RequestHandler per route.
 *
 * Usage:
 *   router.get("/items/:id", bindRoute(GetItemRequest, getItem, { formatter }));
 *
 * Notes:
 * - Express must NOT parse the body for these routes (no express.json /
 *   urlencoded ahead of them); the binders read the raw stream.
 * - Failures inside the pipeline are written by the formatter; only a
 *   formatter failure reaches next(err).
 */

import type { RequestHandler, Response } from "express";
import type { BindableType } from "../../binding/dsl/types";
import { InboundRequest } from "../InboundRequest";
import { BindPipeline, type BindPipelineOptions } from "../pipeline/BindPipeline";
import type { BusinessFn, ResponseFormatter } from "../pipeline/types";

export type BindRouteOptions = BindPipelineOptions & {
  formatter: ResponseFormatter<Response>;
};

export function bindRoute<T extends object, R>(
  type: BindableType<T>,
  fn: BusinessFn<T, R>,
  opts: BindRouteOptions
): RequestHandler {
  const { formatter, ...pipelineOpts } = opts;
  const pipeline = new BindPipeline(type, fn, pipelineOpts);

  return (req, res, next) => {
    pipeline
      .run(InboundRequest.fromExpress(req))
      .then((outcome) => formatter.write(res, outcome))
      .catch(next);
  };
}
