// backend/services/catalog/src/handlers/item/itemView.ts
/**
 * Purpose:
 * - Wire shape of an item. Attachments are only listed when asked for.
 */

import type { AttachmentMeta, Item } from "../../repo/itemRepo";

export type ItemView = {
  id: number;
  sku: string;
  name: string;
  price: number;
  tags: string[];
  in_stock: boolean;
  attributes?: unknown;
  attachment_count: number;
  attachments?: AttachmentMeta[];
};

export function toItemView(item: Item, withAttachments = false): ItemView {
  const view: ItemView = {
    id: item.id,
    sku: item.sku,
    name: item.name,
    price: item.price,
    tags: [...item.tags],
    in_stock: item.inStock,
    attachment_count: item.attachments.length,
  };
  if (item.attributes !== undefined) view.attributes = item.attributes;
  if (withAttachments) view.attachments = item.attachments.map((a) => ({ ...a }));
  return view;
}
