// backend/services/catalog/src/index.ts
/**
 * Purpose:
 * - Process entry for the catalog service: env → config → logger → app → listen.
 */

import path from "node:path";
import { loadEnvFiles } from "@reqbind/shared/env";
import { loadBindingConfig } from "@reqbind/shared/config/bindingConfig";
import { createRootLogger, getLogger, setRootLogger } from "@reqbind/shared/logger/Logger";
import { buildCatalogApp } from "./app";
import { loadSeed, parseClients } from "./config";
import { InMemoryItemRepo } from "./repo/itemRepo";

const serviceRoot = path.resolve(__dirname, "..");
loadEnvFiles([".env", path.join(serviceRoot, ".env")], { allowMissing: true });

const config = loadBindingConfig(process.env);
setRootLogger(createRootLogger({ level: config.logLevel, service: config.serviceName }));
const log = getLogger({ service: config.serviceName, component: "boot" });

const seedFile =
  process.env.CATALOG_SEED_FILE || path.join(serviceRoot, "data", "items.seed.json");

const app = buildCatalogApp({
  config,
  repo: new InMemoryItemRepo(loadSeed(seedFile)),
  clients: parseClients(process.env.CATALOG_CLIENTS),
});

const server = app.listen(config.port, () => {
  log.info({ port: config.port, maxBodySize: config.maxBodySize }, "catalog listening");
});

function shutdown(signal: string): void {
  log.info({ signal }, "shutting down");
  server.close((err) => {
    if (err) {
      log.error({ error: log.serializeError(err) }, "close failed");
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
