// backend/services/catalog/src/repo/itemRepo.ts
/**
 * Purpose:
 * - Item storage for the catalog service. The in-memory implementation is
 *   the only one; it backs both the runnable service and the tests.
 */

export type AttachmentMeta = {
  name: string;
  mimetype: string;
  size: number;
  note?: string;
};

export type Item = {
  id: number;
  sku: string;
  name: string;
  price: number;
  tags: string[];
  inStock: boolean;
  attributes?: unknown;
  attachments: AttachmentMeta[];
};

export type NewItem = Omit<Item, "id" | "attachments">;

export type ItemSearch = {
  q: string;
  tags: ReadonlyArray<string>;
  onlyInStock: boolean;
  page: number;
  limit: number;
};

export type Page<T> = { items: T[]; total: number; page: number; limit: number };

export interface ItemRepo {
  findById(id: number): Item | undefined;
  findBySku(sku: string): Item | undefined;
  search(s: ItemSearch): Page<Item>;
  create(input: NewItem): Item;
  addAttachments(id: number, attachments: ReadonlyArray<AttachmentMeta>): Item | undefined;
}

export class InMemoryItemRepo implements ItemRepo {
  private readonly items = new Map<number, Item>();
  private nextId = 1;

  constructor(seed: ReadonlyArray<NewItem> = []) {
    for (const s of seed) this.create(s);
  }

  public findById(id: number): Item | undefined {
    return this.items.get(id);
  }

  public findBySku(sku: string): Item | undefined {
    for (const it of this.items.values()) if (it.sku === sku) return it;
    return undefined;
  }

  public search(s: ItemSearch): Page<Item> {
    const q = s.q.trim().toLowerCase();
    const matched = [...this.items.values()].filter((it) => {
      if (q && !it.name.toLowerCase().includes(q)) return false;
      if (s.tags.length > 0 && !s.tags.some((t) => it.tags.includes(t))) return false;
      if (s.onlyInStock && !it.inStock) return false;
      return true;
    });

    const start = (s.page - 1) * s.limit;
    return {
      items: matched.slice(start, start + s.limit),
      total: matched.length,
      page: s.page,
      limit: s.limit,
    };
  }

  public create(input: NewItem): Item {
    const item: Item = { ...input, tags: [...input.tags], id: this.nextId++, attachments: [] };
    this.items.set(item.id, item);
    return item;
  }

  public addAttachments(
    id: number,
    attachments: ReadonlyArray<AttachmentMeta>
  ): Item | undefined {
    const item = this.items.get(id);
    if (!item) return undefined;
    item.attachments.push(...attachments);
    return item;
  }
}
