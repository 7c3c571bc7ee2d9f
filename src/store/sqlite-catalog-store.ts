import type { CatalogItem } from '../types/catalog.js';
import type { CatalogStore } from './catalog-store.js';
import { NotFoundError } from '../errors.js';
import * as moviesRepo from '../storage/moviesRepo.js';

function toCatalogItem(row: moviesRepo.MovieRow): CatalogItem {
  return {
    itemId: row.movie_id,
    title: row.title,
    price: row.price_cents,
    currency: row.currency,
    available: row.available === 1,
  };
}

export class SqliteCatalogStore implements CatalogStore {
  async getItem(itemId: string): Promise<CatalogItem> {
    const row = moviesRepo.getMovie(itemId);
    if (!row) {
      throw new NotFoundError(`Movie ${itemId} not found`);
    }
    return toCatalogItem(row);
  }

  async listItems(params: { includeUnavailable?: boolean } = {}): Promise<CatalogItem[]> {
    return moviesRepo.listMovies(params).map(toCatalogItem);
  }

  async upsertItem(item: CatalogItem): Promise<CatalogItem> {
    moviesRepo.upsertMovie({
      movieId: item.itemId,
      title: item.title,
      priceCents: item.price,
      currency: item.currency,
      available: item.available,
    });
    return this.getItem(item.itemId);
  }
}
