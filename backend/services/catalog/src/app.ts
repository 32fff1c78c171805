// backend/services/catalog/src/app.ts
/**
 * Purpose:
 * - Build the catalog Express app on the shared service stack:
 *     requestId → httpLogger → health → /items, /oauth → 404 → problem
 *
 * Notes:
 * - Dependencies are passed in, so tests build the app with their own repo
 *   and client registry without touching process.env.
 */

import type { Express } from "express";
import { createServiceApp } from "@reqbind/shared/app/createServiceApp";
import type { BindingConfig } from "@reqbind/shared/config/bindingConfig";
import type { ClientRegistry } from "./handlers/oauth/issueToken";
import type { ItemRepo } from "./repo/itemRepo";
import { itemRoutes } from "./routes/itemRoutes";
import { oauthRoutes } from "./routes/oauthRoutes";
import { routeDefaults } from "./routes/routeDefaults";

export type CatalogDeps = {
  config: BindingConfig;
  repo: ItemRepo;
  clients: ClientRegistry;
  httpLogging?: boolean;
};

export function buildCatalogApp(deps: CatalogDeps): Express {
  const defaults = routeDefaults(deps.config);

  return createServiceApp({
    serviceName: deps.config.serviceName,
    httpLogging: deps.httpLogging,
    mountRoutes: (api) => {
      api.use("/items", itemRoutes(deps.repo, defaults));
      api.use("/oauth", oauthRoutes(deps.clients, defaults));
    },
  });
}
