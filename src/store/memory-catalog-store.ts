import type { CatalogItem } from '../types/catalog.js';
import type { CatalogStore } from './catalog-store.js';
import { NotFoundError } from '../errors.js';

export class MemoryCatalogStore implements CatalogStore {
  private items: Map<string, CatalogItem> = new Map();

  constructor(items: CatalogItem[] = []) {
    for (const item of items) {
      this.items.set(item.itemId, item);
    }
  }

  async getItem(itemId: string): Promise<CatalogItem> {
    const item = this.items.get(itemId);
    if (!item) {
      throw new NotFoundError(`Movie ${itemId} not found`);
    }
    return { ...item };
  }

  async listItems(params: { includeUnavailable?: boolean } = {}): Promise<CatalogItem[]> {
    return Array.from(this.items.values()).filter((item) => params.includeUnavailable || item.available);
  }

  async upsertItem(item: CatalogItem): Promise<CatalogItem> {
    this.items.set(item.itemId, { ...item });
    return { ...item };
  }
}
