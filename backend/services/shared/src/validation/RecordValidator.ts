// backend/services/shared/src/validation/RecordValidator.ts
/**
 * Purpose:
 * - Validate a bound record after binding, before the business function.
 * - Order: the record's own validate() (fast path) if it has one, otherwise
 *   the record class's static zod `schema`. Neither → valid.
 *
 * Errors:
 * - HttpError thrown by validate() passes through unchanged.
 * - Anything else becomes HttpError(400, VALIDATION_FAILED, <message>).
 */

import { ZodType, type ZodError, type ZodTypeAny } from "zod";
import type { SelfValidating } from "../binding/dsl/types";
import { HttpError, errorMessage } from "../http/errors";

export interface IRecordValidator {
  validate(record: object, type: Function): Promise<void>;
}

function hasValidate(x: object): x is SelfValidating {
  return typeof Reflect.get(x, "validate") === "function";
}

function schemaOf(type: Function): ZodTypeAny | undefined {
  const s: unknown = Reflect.get(type, "schema");
  return s instanceof ZodType ? s : undefined;
}

/** "name: Required; tags.0: Expected string" */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}

export class RecordValidator implements IRecordValidator {
  public async validate(record: object, type: Function): Promise<void> {
    if (hasValidate(record)) {
      try {
        await record.validate();
      } catch (err) {
        if (err instanceof HttpError) throw err;
        throw HttpError.validation(errorMessage(err), err);
      }
      return;
    }

    const schema = schemaOf(type);
    if (!schema) return;

    const res = await schema.safeParseAsync(record);
    if (!res.success) {
      throw HttpError.validation(formatZodError(res.error), res.error);
    }
  }
}
