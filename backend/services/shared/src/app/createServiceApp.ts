// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Assemble the standard Express stack for a binding service:
 *     requestId → http logger → health → routes → 404 → problem handler
 *
 * Notes:
 * - No body parsers are mounted. Routes built with bindRoute() read the raw
 *   body stream through their binders, under the pipeline's byte ceiling.
 */

import express, { type Express, type Router } from "express";
import { getLogger } from "../logger/Logger";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  createNotFoundMiddleware,
  createProblemMiddleware,
} from "../problem/createProblemMiddleware";
import { requestIdMiddleware, requestIdOf } from "../middleware/requestId";

export type CreateServiceAppOptions = {
  serviceName: string;
  /** Mount point for the service router, e.g. "/" or "/api". */
  apiPrefix?: string;
  mountRoutes: (router: Router) => void;
  /** Access logging; on by default. */
  httpLogging?: boolean;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, mountRoutes } = opts;
  const log = getLogger({ service: serviceName, component: "app" });

  const app = express();
  app.disable("x-powered-by");

  app.use(requestIdMiddleware());
  if (opts.httpLogging ?? true) app.use(makeHttpLogger(serviceName));

  app.get("/health", (req, res) => {
    res.json({ service: serviceName, ok: true, requestId: requestIdOf(req) });
  });

  const router = express.Router();
  mountRoutes(router);
  app.use(opts.apiPrefix ?? "/", router);

  app.use(createNotFoundMiddleware({ service: serviceName }));
  app.use(createProblemMiddleware({ log, service: serviceName }));

  return app;
}
