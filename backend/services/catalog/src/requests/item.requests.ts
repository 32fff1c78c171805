// backend/services/catalog/src/requests/item.requests.ts
/**
 * Purpose:
 * - Record classes for the /items routes. Each declares where its fields
 *   come from (path / query / body) and, where needed, how it validates.
 */

import { z } from "zod";
import { field } from "@reqbind/shared/binding/dsl";
import type { FormFile } from "@reqbind/shared/http/form/FormFile";
import { HttpError } from "@reqbind/shared/http/errors";

/** GET /items/:id?expand=attachments */
export class GetItemRequest {
  static readonly fields = {
    id: field.int({ path: "id" }),
    expand: field.list("string", { form: "expand" }),
  };

  id = 0;
  expand: string[] = [];
}

/** GET /items?q=&tag=&tag=&in_stock=&page=&limit= */
export class SearchItemsRequest {
  static readonly fields = {
    q: field.string(),
    tags: field.list("string", { form: "tag" }),
    onlyInStock: field.boolean({ form: "in_stock" }),
    page: field.int(),
    limit: field.int(),
    debugToken: field.ignored(),
  };

  static readonly schema = z.object({
    page: z.number().int().min(1),
    limit: z.number().int().min(1).max(100),
  });

  q = "";
  tags: string[] = [];
  onlyInStock = false;
  page = 1;
  limit = 20;
  debugToken = "";
}

/** POST /items (JSON body) */
export class CreateItemRequest {
  static readonly fields = {
    sku: field.string(),
    name: field.string(),
    price: field.float(),
    tags: field.list("string"),
    inStock: field.boolean({ json: "in_stock,omitempty" }),
    attributes: field.json(),
  };

  static readonly schema = z.object({
    sku: z.string().regex(/^[A-Z0-9-]{3,32}$/, "must be 3-32 chars of A-Z, 0-9 or -"),
    name: z.string().min(1, "is required").max(200),
    price: z.number().nonnegative(),
    tags: z.array(z.string().min(1)).max(20),
  });

  sku = "";
  name = "";
  price = 0;
  tags: string[] = [];
  inStock = false;
  attributes: unknown = undefined;
}

/** POST /items/:id/attachments (multipart) */
export class UploadAttachmentsRequest {
  static readonly fields = {
    id: field.int({ path: "id" }),
    note: field.string(),
    file: field.file(),
    extras: field.files({ form: "extra" }),
  };

  id = 0;
  note = "";
  file: FormFile | null = null;
  extras: FormFile[] = [];

  validate(): void {
    if (!this.file) throw HttpError.validation("file is required");
    if (this.note.length > 500) throw HttpError.validation("note must be at most 500 chars");
  }
}
