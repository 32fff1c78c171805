// backend/services/shared/src/binding/binders/JsonBinder.ts
/**
 * Purpose:
 * - Decode an application/json (or +json) body into the record.
 *
 * Notes:
 * - The body is read whole (raw-body) before anything is assigned, so a
 *   size-exceeded read never leaves a half-populated record.
 * - Strict by default: unknown keys and trailing bytes both fail.
 */

import getRawBody from "raw-body";
import type { InboundRequest } from "../../http/InboundRequest";
import { BindError, errorMessage } from "../../http/errors";
import type { Binder, BinderKind } from "../Binder";
import { descriptorOf } from "../DescriptorCache";
import { decodeJson, type JsonDecodeOptions } from "../jsonDecoder";

export type JsonBinderOptions = Partial<JsonDecodeOptions>;

export function isJsonMediaType(mediaType: string): boolean {
  return mediaType === "application/json" || mediaType.endsWith("+json");
}

export class JsonBinder implements Binder {
  private readonly opts: JsonDecodeOptions;

  constructor(opts: JsonBinderOptions = {}) {
    this.opts = Object.freeze({
      disallowUnknownFields: opts.disallowUnknownFields ?? true,
      disallowTrailingData: opts.disallowTrailingData ?? true,
    });
  }

  public get options(): Readonly<JsonDecodeOptions> {
    return this.opts;
  }

  public name(): string {
    return "json";
  }

  public kind(): BinderKind {
    return "body";
  }

  public matches(req: InboundRequest): boolean {
    return isJsonMediaType(req.mediaType());
  }

  public async bind(req: InboundRequest, record: object): Promise<void> {
    if (req.body === null) return;

    let text: string;
    try {
      text = await getRawBody(req.body, { encoding: "utf8" });
    } catch (err) {
      throw new BindError(this.name(), `bind json error: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      decodeJson(descriptorOf(record), text, record, this.opts);
    } catch (err) {
      throw new BindError(this.name(), `bind json error: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
