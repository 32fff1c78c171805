// backend/services/shared/src/binding/binders/QueryBinder.ts
/**
 * Purpose:
 * - Feed fields from the URL query string (key-based decoding, last value
 *   wins for scalars, every value for lists).
 */

import type { InboundRequest } from "../../http/InboundRequest";
import { BindError, errorMessage } from "../../http/errors";
import type { Binder, BinderKind } from "../Binder";
import { descriptorOf } from "../DescriptorCache";
import { decodeValues, toValueMap } from "../valueDecoder";

export class QueryBinder implements Binder {
  public name(): string {
    return "query";
  }

  public kind(): BinderKind {
    return "metadata";
  }

  public matches(req: InboundRequest): boolean {
    return req.rawQuery() !== "";
  }

  public async bind(req: InboundRequest, record: object): Promise<void> {
    const desc = descriptorOf(record);
    if (desc.fields.length === 0) return;

    const values = toValueMap(new URLSearchParams(req.rawQuery()));
    try {
      decodeValues(desc, values, record);
    } catch (err) {
      throw new BindError(this.name(), errorMessage(err), { cause: err });
    }
  }
}
