// backend/services/catalog/src/http/EnvelopeFormatter.ts
/**
 * Purpose:
 * - Writes pipeline outcomes as the catalog's JSON envelope:
 *     success  { code: "OK", message: "success", data, trace_id? }
 *     failure  { code, message, trace_id? }
 * - HttpError keeps its status and business code; anything else is a 500
 *   INTERNAL_ERROR whose message never leaks the underlying error.
 *
 * Notes:
 * - `noEnvelope` writes the bare success value (token endpoints, probes).
 * - Pipeline headers (No-Vary-Search) are applied on success only; an error
 *   response must not be cached by query shape.
 */

import type { Response } from "express";
import { BizCode, HttpError } from "@reqbind/shared/http/errors";
import type { PipelineOutcome, ResponseFormatter } from "@reqbind/shared/http/pipeline/types";

export const TRACE_ID_HEADER = "X-Trace-ID";

export type EnvelopeFormatterOptions = {
  successStatus?: number;
  noEnvelope?: boolean;
};

export type SuccessEnvelope<T> = {
  code: "OK";
  message: "success";
  data: T;
  trace_id?: string;
};

export type ErrorEnvelope = {
  code: string;
  message: string;
  trace_id?: string;
};

export class EnvelopeFormatter implements ResponseFormatter<Response> {
  private readonly successStatus: number;
  private readonly noEnvelope: boolean;

  constructor(opts: EnvelopeFormatterOptions = {}) {
    this.successStatus = opts.successStatus ?? 200;
    this.noEnvelope = opts.noEnvelope ?? false;
  }

  public write(res: Response, outcome: PipelineOutcome<unknown>): void {
    if (outcome.traceId) res.setHeader(TRACE_ID_HEADER, outcome.traceId);

    if (outcome.ok) {
      for (const [k, v] of Object.entries(outcome.headers)) res.setHeader(k, v);
      if (this.noEnvelope) {
        res.status(this.successStatus).json(outcome.value);
        return;
      }
      const body: SuccessEnvelope<unknown> = {
        code: BizCode.OK,
        message: "success",
        data: outcome.value,
      };
      if (outcome.traceId) body.trace_id = outcome.traceId;
      res.status(this.successStatus).json(body);
      return;
    }

    const err = outcome.error;
    const status = err instanceof HttpError ? err.httpStatus : 500;
    const body: ErrorEnvelope =
      err instanceof HttpError
        ? { code: err.bizCode, message: err.message }
        : { code: BizCode.Internal, message: "Internal Server Error" };
    if (outcome.traceId) body.trace_id = outcome.traceId;
    res.status(status).json(body);
  }
}
