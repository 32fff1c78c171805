// backend/services/catalog/src/routes/oauthRoutes.ts
import { Router } from "express";
import { defaultBinders } from "@reqbind/shared/binding/bind";
import { ClientAuthBinder } from "@reqbind/shared/binding/binders/ClientAuthBinder";
import { bindRoute } from "@reqbind/shared/http/express/bindRoute";
import { EnvelopeFormatter } from "../http/EnvelopeFormatter";
import { makeIssueToken, type ClientRegistry } from "../handlers/oauth/issueToken";
import { TokenRequest } from "../requests/token.request";
import type { RouteDefaults } from "./routeDefaults";

export function oauthRoutes(clients: ClientRegistry, defaults: RouteDefaults): Router {
  const router = Router();

  // Basic auth runs after the body so form credentials take priority.
  const binders = [...defaultBinders({ json: defaults.pipeline.json }), new ClientAuthBinder()];

  router.post(
    "/token",
    bindRoute(TokenRequest, makeIssueToken(clients), {
      ...defaults.pipeline,
      binders,
      noVarySearch: false,
      route: "POST /oauth/token",
      formatter: new EnvelopeFormatter({ noEnvelope: true }),
    })
  );

  return router;
}
