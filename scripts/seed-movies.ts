/**
 * Loads the movie catalog from data/movies.json (or the file given as the
 * first argument) into the database. Existing movies are updated in place.
 */

import fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { loadConfig } from '../src/config/env.js';
import { initDatabase, closeDatabase, runInTransaction } from '../src/storage/db.js';
import { upsertMovie } from '../src/storage/moviesRepo.js';

dotenv.config();

const moviesFileSchema = z.array(
  z.object({
    movieId: z.string().min(1),
    title: z.string().min(1),
    price: z.number().int().min(0),
    currency: z.string().length(3),
    available: z.boolean().default(true),
  })
);

function seedMovies(): void {
  const config = loadConfig();
  const file = process.argv[2] || new URL('../data/movies.json', import.meta.url);

  const movies = moviesFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));

  initDatabase(config.databasePath);
  try {
    runInTransaction(() => {
      for (const movie of movies) {
        upsertMovie({
          movieId: movie.movieId,
          title: movie.title,
          priceCents: movie.price,
          currency: movie.currency.toLowerCase(),
          available: movie.available,
        });
      }
    });
    console.log(`✅ Seeded ${movies.length} movies into ${config.databasePath}`);
  } finally {
    closeDatabase();
  }
}

try {
  seedMovies();
} catch (error) {
  console.error('❌ Seeding failed:', error);
  process.exit(1);
}
