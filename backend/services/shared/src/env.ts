// backend/services/shared/src/env.ts
/**
 * Purpose:
 * - Load .env files into process.env with dotenv. Later files override
 *   earlier ones; already-set process variables are never overwritten.
 *
 * Notes:
 * - Validation is not done here; see config/bindingConfig.ts.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

/** Load one file if present; returns true when loaded. */
function loadIfExists(absPath: string, loaded: Record<string, string>): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.parse(fs.readFileSync(absPath));
  Object.assign(loaded, parsed);
  return true;
}

/**
 * Load `files` in order (relative paths resolve against `cwd`).
 * Throws when none exist, unless `allowMissing`.
 */
export function loadEnvFiles(
  files: ReadonlyArray<string>,
  opts: { cwd?: string; allowMissing?: boolean; target?: NodeJS.ProcessEnv } = {}
): string[] {
  const cwd = opts.cwd ?? process.cwd();
  const target = opts.target ?? process.env;
  const merged: Record<string, string> = {};
  const used: string[] = [];

  for (const f of files) {
    const abs = path.resolve(cwd, f);
    if (loadIfExists(abs, merged)) used.push(abs);
  }
  if (used.length === 0 && !opts.allowMissing) {
    throw new Error(`No env files loaded from: ${files.join(", ")}`);
  }

  for (const [k, v] of Object.entries(merged)) {
    if (target[k] === undefined) target[k] = v;
  }
  return used;
}
