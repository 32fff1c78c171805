// backend/services/shared/src/binding/Binder.ts
/**
 * Purpose:
 * - Contract for one request-source extractor.
 *
 * Kinds:
 * - "metadata": reads request metadata (path, query, headers). Any number run.
 * - "body": consumes the body stream. At most one runs per request.
 *
 * Invariants:
 * - matches() is cheap and never touches the body.
 * - Binders are shared across requests; they hold immutable config only.
 */

import type { InboundRequest } from "../http/InboundRequest";

export type BinderKind = "metadata" | "body";

export interface Binder {
  name(): string;
  kind(): BinderKind;
  matches(req: InboundRequest): boolean;
  /** Populate `record` from this binder's source. Rejects with the bind error. */
  bind(req: InboundRequest, record: object): Promise<void>;
}
