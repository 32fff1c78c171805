// backend/services/shared/src/http/pipeline/BindPipeline.ts
/**
 * Purpose:
 * - Request-scoped rails around one business function:
 *     body ceiling → new record → bind → validate → business fn
 * - Every failure leaves through fail(): trace id attached, error hook run,
 *   failure outcome returned. Nothing is thrown past run().
 *
 * Error mapping:
 * - Size exceeded anywhere in the bind error's cause chain → 413.
 * - Any other bind error → 400 BAD_REQUEST carrying the binder's message.
 * - Validator and business errors pass through unchanged.
 *
 * Invariants:
 * - Binder list and No-Vary-Search value are computed once, at construction.
 * - Spilled multipart temp files are removed before run() resolves.
 */

import type { Binder } from "../../binding/Binder";
import { bind, defaultBinders, withMultipartMemory } from "../../binding/bind";
import { getDescriptor } from "../../binding/DescriptorCache";
import type { BindableType } from "../../binding/dsl/types";
import { getLogger, type IBoundLogger } from "../../logger/Logger";
import { RecordValidator, type IRecordValidator } from "../../validation/RecordValidator";
import { limitBody } from "../bodyLimit";
import {
  BodyTooLargeError,
  HttpError,
  errorMessage,
  isBodyTooLarge,
} from "../errors";
import type { InboundRequest } from "../InboundRequest";
import { buildNoVarySearch } from "./noVarySearch";
import type {
  BusinessFn,
  ErrorHook,
  ErrorScope,
  PipelineOutcome,
  PipelineStage,
  TraceIdFn,
} from "./types";

export const DEFAULT_MAX_BODY_SIZE = 2 << 20;
export const NO_VARY_SEARCH_HEADER = "No-Vary-Search";

export type BindPipelineOptions = {
  /** Replaces the default chain (Path, Query, JSON, Form). */
  binders?: ReadonlyArray<Binder>;
  /** Run ahead of the chain; registration point for custom binders. */
  prependBinders?: ReadonlyArray<Binder>;
  maxBodySize?: number;
  /** In-memory multipart ceiling; also raises maxBodySize when larger. */
  multipartMemory?: number;
  json?: { disallowUnknownFields?: boolean; disallowTrailingData?: boolean };
  tmpDir?: string;
  traceId?: TraceIdFn;
  onError?: ErrorHook;
  /** true (default): derive from bound keys; false: off; list: explicit keys. */
  noVarySearch?: boolean | ReadonlyArray<string>;
  validator?: IRecordValidator;
  log?: IBoundLogger;
  /** Route label for logs, e.g. "GET /items/:id". */
  route?: string;
};

function positiveInt(name: string, v: number | undefined): number | undefined {
  if (v === undefined) return undefined;
  if (!Number.isSafeInteger(v) || v <= 0) {
    throw new Error(
      `BIND_PIPELINE_INVALID: ${name} must be a positive integer (got ${String(v)}).`
    );
  }
  return v;
}

/** Default error hook: 4xx → warn, everything else → error. */
export function logPipelineError(err: unknown, scope: ErrorScope): void {
  const status = err instanceof HttpError ? err.httpStatus : 500;
  const entry = {
    stage: scope.stage,
    status,
    traceId: scope.traceId,
    error: scope.log.serializeError(err),
  };
  if (status < 500) scope.log.warn(entry, "request failed");
  else scope.log.error(entry, "request failed");
}

export class BindPipeline<T extends object, R> {
  public readonly maxBodySize: number;
  public readonly binders: ReadonlyArray<Binder>;
  public readonly noVarySearch?: string;

  private readonly validator: IRecordValidator;
  private readonly onError: ErrorHook;
  private readonly traceIdOf?: TraceIdFn;
  private readonly log: IBoundLogger;

  constructor(
    private readonly type: BindableType<T>,
    private readonly fn: BusinessFn<T, R>,
    opts: BindPipelineOptions = {}
  ) {
    let maxBodySize = positiveInt("maxBodySize", opts.maxBodySize) ?? DEFAULT_MAX_BODY_SIZE;
    const multipartMemory = positiveInt("multipartMemory", opts.multipartMemory);

    let chain: Binder[] = opts.binders
      ? [...opts.binders]
      : defaultBinders({ json: opts.json, tmpDir: opts.tmpDir });
    if (multipartMemory !== undefined) {
      chain = withMultipartMemory(chain, multipartMemory, opts.tmpDir);
      if (maxBodySize < multipartMemory) maxBodySize = multipartMemory;
    }
    if (opts.prependBinders && opts.prependBinders.length > 0) {
      chain = [...opts.prependBinders, ...chain];
    }

    this.maxBodySize = maxBodySize;
    this.binders = Object.freeze(chain);
    this.validator = opts.validator ?? new RecordValidator();
    this.onError = opts.onError ?? logPipelineError;
    this.traceIdOf = opts.traceId;
    this.log = (opts.log ?? getLogger()).bind({
      component: "BindPipeline",
      route: opts.route ?? type.name,
    });

    const nvs = opts.noVarySearch ?? true;
    if (nvs === true) this.noVarySearch = buildNoVarySearch(getDescriptor(type).allKeys);
    else if (nvs !== false) this.noVarySearch = buildNoVarySearch(nvs);
  }

  public async run(req: InboundRequest): Promise<PipelineOutcome<R>> {
    const traceId = this.traceIdOf?.(req);
    const log = this.log.bind({ requestId: req.requestId, traceId });
    const headers: Record<string, string> = {};
    if (this.noVarySearch !== undefined) headers[NO_VARY_SEARCH_HEADER] = this.noVarySearch;

    let stage: PipelineStage = "bind";
    try {
      const record = await this.bindStage(req, log);

      stage = "validate";
      await this.validator.validate(record, this.type);

      stage = "handler";
      const value = await this.fn(record, req);
      return { ok: true, value, traceId, headers };
    } catch (err) {
      return this.fail(err, { stage, req, traceId, log }, headers);
    } finally {
      await this.cleanup(req, log);
    }
  }

  private async bindStage(req: InboundRequest, log: IBoundLogger): Promise<T> {
    const declared = req.contentLength();
    if (declared !== undefined && declared > this.maxBodySize) {
      throw HttpError.tooLarge(new BodyTooLargeError(this.maxBodySize));
    }
    if (req.body !== null && !req.bodyLimited) {
      req.body = limitBody(req.body, this.maxBodySize);
      req.markBodyLimited();
    }

    const record = new this.type();
    try {
      await bind(req, record, this.binders, log);
    } catch (err) {
      if (isBodyTooLarge(err)) throw HttpError.tooLarge(err);
      throw HttpError.badRequest(errorMessage(err), err);
    }
    return record;
  }

  private fail(
    err: unknown,
    scope: ErrorScope,
    headers: Record<string, string>
  ): PipelineOutcome<R> {
    this.onError(err, scope);
    return { ok: false, error: err, stage: scope.stage, traceId: scope.traceId, headers };
  }

  private async cleanup(req: InboundRequest, log: IBoundLogger): Promise<void> {
    const form = req.form;
    if (!form || form.fileCount() === 0) return;
    try {
      await form.removeAll();
    } catch (err) {
      log.warn({ error: log.serializeError(err) }, "upload cleanup failed");
    }
  }
}
