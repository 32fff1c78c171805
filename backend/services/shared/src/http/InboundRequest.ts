// backend/services/shared/src/http/InboundRequest.ts
/**
 * Purpose:
 * - Transport-agnostic view of an already-routed request: method, target,
 *   headers, route parameters and the (single-read) body stream.
 * - Built by the Express adapter (fromExpress) or directly in tests.
 *
 * Invariants:
 * - Header names are lower-cased; multi-valued headers keep their first value
 *   for the single-value accessors.
 * - `body` is replaced, never wrapped twice, by the pipeline's byte ceiling.
 * - `form` is set by the form binder once the body has been parsed; the
 *   pipeline removes any spilled upload files after the request completes.
 */

import { Readable } from "node:stream";
import type { IncomingHttpHeaders } from "node:http";
import type { Request } from "express";
import type { ParsedForm } from "./form/ParsedForm";
import { requestIdOf } from "../middleware/requestId";

export type InboundRequestInit = {
  method?: string;
  url: string;
  headers?: IncomingHttpHeaders | Record<string, string | string[] | undefined>;
  pathParams?: Readonly<Record<string, string | undefined>>;
  body?: Readable | Buffer | string | null;
  requestId?: string;
};

export class InboundRequest {
  public readonly method: string;
  /** Request target as received: path plus optional "?query". */
  public readonly url: string;
  public readonly headers: Readonly<Record<string, string | string[] | undefined>>;
  public readonly requestId?: string;
  public body: Readable | null;
  public form?: ParsedForm;

  readonly #pathParams: Readonly<Record<string, string | undefined>>;
  #bodyLimited = false;

  constructor(init: InboundRequestInit) {
    this.method = (init.method ?? "GET").toUpperCase();
    this.url = init.url;
    this.requestId = init.requestId;
    this.#pathParams = init.pathParams ?? {};

    const headers: Record<string, string | string[] | undefined> = {};
    for (const [k, v] of Object.entries(init.headers ?? {})) {
      headers[k.toLowerCase()] = v;
    }
    this.headers = headers;

    const body = init.body ?? null;
    if (body === null) this.body = null;
    else if (typeof body === "string" || Buffer.isBuffer(body)) {
      const buf = typeof body === "string" ? Buffer.from(body, "utf8") : body;
      this.body = Readable.from(buf.length > 0 ? [buf] : [], { objectMode: false });
    } else this.body = body;
  }

  public static fromExpress(req: Request): InboundRequest {
    const rid = req.headers["x-request-id"];
    return new InboundRequest({
      method: req.method,
      url: req.originalUrl || req.url,
      headers: req.headers,
      pathParams: req.params,
      body: req,
      requestId: requestIdOf(req) ?? (Array.isArray(rid) ? rid[0] : rid),
    });
  }

  /** Route parameter value, or "" when the route did not capture it. */
  public pathValue(name: string): string {
    return this.#pathParams[name] ?? "";
  }

  public header(name: string): string {
    const v = this.headers[name.toLowerCase()];
    if (Array.isArray(v)) return v[0] ?? "";
    return v ?? "";
  }

  /** Raw query string without the leading "?" ("" when absent). */
  public rawQuery(): string {
    const idx = this.url.indexOf("?");
    if (idx === -1) return "";
    const hash = this.url.indexOf("#", idx);
    return hash === -1 ? this.url.slice(idx + 1) : this.url.slice(idx + 1, hash);
  }

  /** Lower-cased media type without parameters ("" when absent). */
  public mediaType(): string {
    const ct = this.header("content-type");
    const semi = ct.indexOf(";");
    return (semi === -1 ? ct : ct.slice(0, semi)).trim().toLowerCase();
  }

  /** Declared Content-Length, or undefined when absent / not a number. */
  public contentLength(): number | undefined {
    const raw = this.header("content-length").trim();
    if (!/^\d+$/.test(raw)) return undefined;
    return Number(raw);
  }

  public get bodyLimited(): boolean {
    return this.#bodyLimited;
  }

  public markBodyLimited(): void {
    this.#bodyLimited = true;
  }
}
