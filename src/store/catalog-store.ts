import type { CatalogItem } from '../types/catalog.js';

export interface CatalogStore {
  /** Throws NotFoundError for unknown ids. */
  getItem(itemId: string): Promise<CatalogItem>;
  listItems(params?: { includeUnavailable?: boolean }): Promise<CatalogItem[]>;
  /** Creates the movie or replaces its title, price and availability. */
  upsertItem(item: CatalogItem): Promise<CatalogItem>;
}
