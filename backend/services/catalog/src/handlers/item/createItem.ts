// backend/services/catalog/src/handlers/item/createItem.ts
/**
 * Purpose:
 * - Create an item from a validated CreateItemRequest. SKUs are unique.
 */

import { HttpError } from "@reqbind/shared/http/errors";
import type { ItemRepo } from "../../repo/itemRepo";
import type { CreateItemRequest } from "../../requests/item.requests";
import { toItemView, type ItemView } from "./itemView";

export function makeCreateItem(repo: ItemRepo) {
  return (req: CreateItemRequest): ItemView => {
    if (repo.findBySku(req.sku)) {
      throw HttpError.conflict(`sku "${req.sku}" already exists`);
    }
    const item = repo.create({
      sku: req.sku,
      name: req.name,
      price: req.price,
      tags: req.tags,
      inStock: req.inStock,
      attributes: req.attributes,
    });
    return toItemView(item);
  };
}
