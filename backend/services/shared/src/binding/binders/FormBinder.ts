// backend/services/shared/src/binding/binders/FormBinder.ts
/**
 * Purpose:
 * - Decode an application/x-www-form-urlencoded or multipart/form-data body.
 * - Ordinary values use the key-based decoder; uploaded files are assigned
 *   straight onto `file` / `files` fields.
 *
 * Notes:
 * - Only body values are decoded here; the query string belongs to QueryBinder.
 * - The parsed form is kept on `req.form` so the pipeline can remove spilled
 *   temp files once the request is finished.
 */

import type { InboundRequest } from "../../http/InboundRequest";
import { BindError, errorMessage } from "../../http/errors";
import { DEFAULT_MULTIPART_MEMORY, parseForm } from "../../http/form/parseForm";
import type { ParsedForm } from "../../http/form/ParsedForm";
import type { Binder, BinderKind } from "../Binder";
import type { TypeDescriptor } from "../descriptor";
import { descriptorOf } from "../DescriptorCache";
import { decodeValues } from "../valueDecoder";

export const FORM_URLENCODED = "application/x-www-form-urlencoded";
export const MULTIPART_FORM = "multipart/form-data";

export type FormBinderOptions = {
  /** In-memory ceiling for uploaded files, in bytes. */
  maxMemory?: number;
  tmpDir?: string;
};

function assignFiles(desc: TypeDescriptor, form: ParsedForm, record: object): void {
  for (const ff of desc.fileFields) {
    const files = form.files.get(ff.formKey);
    if (!files || files.length === 0) continue;
    if (ff.multiplicity === "single") Reflect.set(record, ff.fieldRef, files[0]);
    else Reflect.set(record, ff.fieldRef, [...files]);
  }
}

export class FormBinder implements Binder {
  public readonly maxMemory: number;
  private readonly tmpDir?: string;

  constructor(opts: FormBinderOptions = {}) {
    this.maxMemory = opts.maxMemory ?? DEFAULT_MULTIPART_MEMORY;
    this.tmpDir = opts.tmpDir;
  }

  public name(): string {
    return "form";
  }

  public kind(): BinderKind {
    return "body";
  }

  public matches(req: InboundRequest): boolean {
    const mt = req.mediaType();
    return mt === FORM_URLENCODED || mt === MULTIPART_FORM;
  }

  public async bind(req: InboundRequest, record: object): Promise<void> {
    if (req.body === null) return;

    let form: ParsedForm;
    try {
      form = await parseForm(req.body, {
        contentType: req.header("content-type"),
        maxMemory: this.maxMemory,
        tmpDir: this.tmpDir,
      });
    } catch (err) {
      throw new BindError(this.name(), `parse form error: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    req.form = form;

    const desc = descriptorOf(record);
    try {
      decodeValues(desc, form.values, record);
    } catch (err) {
      throw new BindError(this.name(), `decode form error: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    assignFiles(desc, form, record);
  }
}
