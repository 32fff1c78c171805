// backend/services/catalog/src/handlers/item/searchItems.ts
import type { ItemRepo, Page } from "../../repo/itemRepo";
import type { SearchItemsRequest } from "../../requests/item.requests";
import { toItemView, type ItemView } from "./itemView";

export function makeSearchItems(repo: ItemRepo) {
  return (req: SearchItemsRequest): Page<ItemView> => {
    const page = repo.search({
      q: req.q,
      tags: req.tags,
      onlyInStock: req.onlyInStock,
      page: req.page,
      limit: req.limit,
    });
    return { ...page, items: page.items.map((it) => toItemView(it)) };
  };
}
