// backend/services/shared/src/http/pipeline/noVarySearch.ts
/**
 * Purpose:
 * - Build the No-Vary-Search response header value for a route: caches may
 *   ignore every query parameter except the ones the record binds.
 *
 * Format (structured-field dictionary):
 *   params, except=("page" "q")      some keys bound
 *   params                           none bound
 */

function quote(key: string): string {
  return `"${key.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function buildNoVarySearch(keys: ReadonlyArray<string>): string {
  const unique = [...new Set(keys.filter((k) => k !== ""))];
  if (unique.length === 0) return "params";
  return `params, except=(${unique.map(quote).join(" ")})`;
}
