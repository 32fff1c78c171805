// backend/services/catalog/src/handlers/item/getItem.ts
import { HttpError } from "@reqbind/shared/http/errors";
import type { ItemRepo } from "../../repo/itemRepo";
import type { GetItemRequest } from "../../requests/item.requests";
import { toItemView, type ItemView } from "./itemView";

export function makeGetItem(repo: ItemRepo) {
  return (req: GetItemRequest): ItemView => {
    const item = repo.findById(req.id);
    if (!item) throw HttpError.notFound(`item ${req.id} not found`);
    return toItemView(item, req.expand.includes("attachments"));
  };
}
