import { getDatabase } from './db.js';

export interface MovieRow {
  movie_id: string;
  title: string;
  price_cents: number;
  currency: string;
  available: number;
  created_at: string;
  updated_at: string;
}

export function getMovie(movieId: string): MovieRow | null {
  const db = getDatabase();
  const row = db.prepare('SELECT * FROM movies WHERE movie_id = ?').get(movieId) as MovieRow | undefined;
  return row || null;
}

export function listMovies(params: { includeUnavailable?: boolean } = {}): MovieRow[] {
  const db = getDatabase();
  if (params.includeUnavailable) {
    return db.prepare('SELECT * FROM movies ORDER BY title ASC').all() as MovieRow[];
  }
  return db.prepare('SELECT * FROM movies WHERE available = 1 ORDER BY title ASC').all() as MovieRow[];
}

export function upsertMovie(params: {
  movieId: string;
  title: string;
  priceCents: number;
  currency: string;
  available: boolean;
}): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO movies (movie_id, title, price_cents, currency, available, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT (movie_id) DO UPDATE SET
      title = excluded.title,
      price_cents = excluded.price_cents,
      currency = excluded.currency,
      available = excluded.available,
      updated_at = excluded.updated_at
  `).run(
    params.movieId,
    params.title,
    params.priceCents,
    params.currency,
    params.available ? 1 : 0,
    now,
    now
  );
}
