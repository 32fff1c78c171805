// backend/services/shared/src/binding/binders/PathBinder.ts
/**
 * Purpose:
 * - Feed fields tagged with `path` from the matched route parameters.
 * - Empty parameters are skipped; the rest go through the key-based decoder.
 */

import type { InboundRequest } from "../../http/InboundRequest";
import { BindError, errorMessage } from "../../http/errors";
import type { Binder, BinderKind } from "../Binder";
import { descriptorOf } from "../DescriptorCache";
import { decodeValues } from "../valueDecoder";

export class PathBinder implements Binder {
  public name(): string {
    return "path";
  }

  public kind(): BinderKind {
    return "metadata";
  }

  public matches(_req: InboundRequest): boolean {
    return true;
  }

  public async bind(req: InboundRequest, record: object): Promise<void> {
    const desc = descriptorOf(record);
    if (desc.pathFields.length === 0) return;

    const values = new Map<string, string[]>();
    for (const pf of desc.pathFields) {
      const v = req.pathValue(pf.sourceKey);
      if (v !== "") values.set(pf.destKey, [v]);
    }
    if (values.size === 0) return;

    try {
      decodeValues(desc, values, record);
    } catch (err) {
      throw new BindError(this.name(), errorMessage(err), { cause: err });
    }
  }
}
