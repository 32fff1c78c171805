// backend/services/catalog/src/config.ts
/**
 * Purpose:
 * - Catalog-only settings on top of the shared BindingConfig.
 *
 * Env:
 * - CATALOG_CLIENTS   "id:secret[,id:secret...]" client registry for /oauth/token
 * - CATALOG_SEED_FILE path to a JSON array of items (optional)
 */

import fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "@reqbind/shared/config/bindingConfig";
import type { NewItem } from "./repo/itemRepo";

const SeedItem = z.object({
  sku: z.string().min(1),
  name: z.string().min(1),
  price: z.number().nonnegative(),
  tags: z.array(z.string()).default([]),
  inStock: z.boolean().default(true),
  attributes: z.unknown().optional(),
});

const SeedFile = z.array(SeedItem);

export function parseClients(raw: string | undefined): Map<string, string> {
  const out = new Map<string, string>();
  for (const pair of (raw ?? "").split(",")) {
    const p = pair.trim();
    if (!p) continue;
    const idx = p.indexOf(":");
    if (idx <= 0 || idx === p.length - 1) {
      throw new ConfigError("CATALOG_CLIENTS", `entry "${p}" must be id:secret`);
    }
    out.set(p.slice(0, idx), p.slice(idx + 1));
  }
  return out;
}

export function loadSeed(file: string): NewItem[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError("CATALOG_SEED_FILE", `unreadable (${String(err)})`);
  }
  const res = SeedFile.safeParse(raw);
  if (!res.success) {
    throw new ConfigError("CATALOG_SEED_FILE", `invalid (${res.error.issues[0]?.message ?? "bad shape"})`);
  }
  return res.data;
}
