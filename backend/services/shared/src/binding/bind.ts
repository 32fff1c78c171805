// backend/services/shared/src/binding/bind.ts
/**
 * Purpose:
 * - Run a binder chain against one request.
 *
 * Rules:
 * - Binders run in list order; non-matching ones are skipped.
 * - At most one "body" binder runs (a request body is readable once).
 * - The first rejection stops the chain and propagates unchanged.
 * - Later binders overwrite earlier ones on the same key, so with the
 *   default order the precedence is Body > Query > Path.
 */

import type { InboundRequest } from "../http/InboundRequest";
import type { IBoundLogger } from "../logger/Logger";
import type { Binder } from "./Binder";
import { FormBinder } from "./binders/FormBinder";
import { JsonBinder } from "./binders/JsonBinder";
import { PathBinder } from "./binders/PathBinder";
import { QueryBinder } from "./binders/QueryBinder";

export type DefaultBinderOptions = {
  json?: { disallowUnknownFields?: boolean; disallowTrailingData?: boolean };
  multipartMemory?: number;
  tmpDir?: string;
};

/** Fresh default chain: Path, Query, JSON, Form. */
export function defaultBinders(opts: DefaultBinderOptions = {}): Binder[] {
  return [
    new PathBinder(),
    new QueryBinder(),
    new JsonBinder(opts.json),
    new FormBinder({ maxMemory: opts.multipartMemory, tmpDir: opts.tmpDir }),
  ];
}

/**
 * Copy of `binders` with every FormBinder swapped for one carrying `maxMemory`
 * (appended when the chain has none). The input list is left untouched.
 */
export function withMultipartMemory(
  binders: ReadonlyArray<Binder>,
  maxMemory: number,
  tmpDir?: string
): Binder[] {
  let replaced = false;
  const out = binders.map((b) => {
    if (!(b instanceof FormBinder)) return b;
    replaced = true;
    return new FormBinder({ maxMemory, tmpDir });
  });
  if (!replaced) out.push(new FormBinder({ maxMemory, tmpDir }));
  return out;
}

export async function bind(
  req: InboundRequest,
  record: object,
  binders: ReadonlyArray<Binder> = defaultBinders(),
  log?: IBoundLogger
): Promise<void> {
  let bodyConsumed = false;

  for (const binder of binders) {
    if (!binder.matches(req)) continue;

    if (binder.kind() === "body") {
      if (bodyConsumed) continue;
      bodyConsumed = true;
    }

    log?.debug({ binder: binder.name() }, "binder run");
    await binder.bind(req, record);
  }
}
