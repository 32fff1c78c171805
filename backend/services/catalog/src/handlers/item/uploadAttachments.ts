// backend/services/catalog/src/handlers/item/uploadAttachments.ts
/**
 * Purpose:
 * - Record attachment metadata for an item from a multipart upload.
 *
 * Notes:
 * - Upload handles are only valid during the call; spilled temp files are
 *   removed by the pipeline afterwards. Content is hashed here, not kept.
 */

import { createHash } from "node:crypto";
import { HttpError } from "@reqbind/shared/http/errors";
import type { FormFile } from "@reqbind/shared/http/form/FormFile";
import type { AttachmentMeta, ItemRepo } from "../../repo/itemRepo";
import type { UploadAttachmentsRequest } from "../../requests/item.requests";

export type UploadedView = AttachmentMeta & { sha256: string; in_memory: boolean };

export type UploadResult = {
  item_id: number;
  uploaded: UploadedView[];
  attachment_count: number;
};

async function describe(file: FormFile, note?: string): Promise<UploadedView> {
  const hash = createHash("sha256");
  for await (const chunk of file.open()) hash.update(chunk);
  const view: UploadedView = {
    name: file.originalname,
    mimetype: file.mimetype,
    size: file.size,
    sha256: hash.digest("hex"),
    in_memory: file.inMemory,
  };
  if (note) view.note = note;
  return view;
}

export function makeUploadAttachments(repo: ItemRepo) {
  return async (req: UploadAttachmentsRequest): Promise<UploadResult> => {
    if (!repo.findById(req.id)) throw HttpError.notFound(`item ${req.id} not found`);

    const files = req.file ? [req.file, ...req.extras] : [...req.extras];
    const uploaded: UploadedView[] = [];
    for (const [i, f] of files.entries()) {
      uploaded.push(await describe(f, i === 0 ? req.note : undefined));
    }

    const item = repo.addAttachments(
      req.id,
      uploaded.map(({ name, mimetype, size, note }) =>
        note === undefined ? { name, mimetype, size } : { name, mimetype, size, note }
      )
    );
    return {
      item_id: req.id,
      uploaded,
      attachment_count: item ? item.attachments.length : 0,
    };
  };
}
