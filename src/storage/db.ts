import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

let db: Database.Database | null = null;

export function initDatabase(dbPath: string): Database.Database {
  if (db) {
    return db;
  }

  // In-memory databases (tests) have no directory to create
  if (dbPath !== ':memory:') {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db);

  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Runs `fn` inside a single SQLite transaction. Any throw rolls the whole
 * unit back.
 */
export function runInTransaction<T>(fn: () => T): T {
  return getDatabase().transaction(fn)();
}

function runMigrations(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS movies (
      movie_id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      price_cents INTEGER NOT NULL CHECK (price_cents >= 0),
      currency TEXT NOT NULL,
      available INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS cart_items (
      user_id TEXT NOT NULL,
      movie_id TEXT NOT NULL,
      quantity INTEGER NOT NULL CHECK (quantity >= 1),
      added_at TEXT NOT NULL,
      PRIMARY KEY (user_id, movie_id)
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS orders (
      order_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      user_email TEXT,
      status TEXT NOT NULL,
      currency TEXT NOT NULL,
      total_cents INTEGER NOT NULL,
      payment_reference TEXT,
      frozen INTEGER NOT NULL DEFAULT 0,
      anomaly TEXT,
      version INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS order_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      order_id TEXT NOT NULL REFERENCES orders(order_id),
      position INTEGER NOT NULL,
      movie_id TEXT NOT NULL,
      title TEXT NOT NULL,
      quantity INTEGER NOT NULL CHECK (quantity >= 1),
      unit_price_cents INTEGER NOT NULL CHECK (unit_price_cents >= 0),
      UNIQUE (order_id, position)
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS payment_attempts (
      attempt_id TEXT PRIMARY KEY,
      order_id TEXT NOT NULL REFERENCES orders(order_id),
      sequence INTEGER NOT NULL,
      idempotency_key TEXT NOT NULL UNIQUE,
      gateway_reference TEXT UNIQUE,
      payment_url TEXT,
      payment_intent TEXT,
      amount_cents INTEGER NOT NULL,
      currency TEXT NOT NULL,
      status TEXT NOT NULL,
      reconcile_attempts INTEGER NOT NULL DEFAULT 0,
      next_check_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE (order_id, sequence)
    )
  `);

  // Webhook deliveries already applied
  database.exec(`
    CREATE TABLE IF NOT EXISTS payment_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      gateway_event_id TEXT UNIQUE,
      gateway_reference TEXT NOT NULL,
      event TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS jobs (
      job_id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_type TEXT NOT NULL,
      payload TEXT NOT NULL,
      dedupe_key TEXT UNIQUE,
      status TEXT NOT NULL,
      attempts INTEGER NOT NULL DEFAULT 0,
      run_at TEXT NOT NULL,
      last_error TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_orders_user_id ON orders(user_id);
    CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);
    CREATE INDEX IF NOT EXISTS idx_order_items_order_id ON order_items(order_id);
    CREATE INDEX IF NOT EXISTS idx_payment_attempts_order_id ON payment_attempts(order_id);
    CREATE INDEX IF NOT EXISTS idx_payment_attempts_payment_intent ON payment_attempts(payment_intent);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_payment_attempts_one_success
      ON payment_attempts(order_id) WHERE status = 'succeeded';
    CREATE INDEX IF NOT EXISTS idx_jobs_due ON jobs(status, run_at);
  `);
}
