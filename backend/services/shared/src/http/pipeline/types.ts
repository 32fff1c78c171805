// backend/services/shared/src/http/pipeline/types.ts
/**
 * Purpose:
 * - Shapes shared by the bind pipeline and its collaborators.
 */

import type { InboundRequest } from "../InboundRequest";
import type { IBoundLogger } from "../../logger/Logger";

export type PipelineStage = "bind" | "validate" | "handler";

export type PipelineSuccess<R> = {
  ok: true;
  value: R;
  traceId?: string;
  headers: Readonly<Record<string, string>>;
};

export type PipelineFailure = {
  ok: false;
  error: unknown;
  stage: PipelineStage;
  traceId?: string;
  headers: Readonly<Record<string, string>>;
};

export type PipelineOutcome<R> = PipelineSuccess<R> | PipelineFailure;

/** Context handed to the error hook. */
export type ErrorScope = {
  stage: PipelineStage;
  req: InboundRequest;
  traceId?: string;
  log: IBoundLogger;
};

export type ErrorHook = (err: unknown, scope: ErrorScope) => void;

export type TraceIdFn = (req: InboundRequest) => string | undefined;

export type BusinessFn<T, R> = (record: T, req: InboundRequest) => R | Promise<R>;

/** Writes the final outcome to the transport's response object. */
export interface ResponseFormatter<Res> {
  write(res: Res, outcome: PipelineOutcome<unknown>): void;
}
