import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { dbLogger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;

const BUSY_TIMEOUT_MS = 5000; // 5 seconds busy timeout

// Log warning for queries slower than this
const SLOW_QUERY_THRESHOLD_MS = 100;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return db;
}

/**
 * Read the schema file shipped next to this module.
 */
export function loadSchema(): string {
  return readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
}

export function initDb(path: string = config.database.path): Database.Database {
  if (path !== ':memory:') {
    const dbDir = dirname(path);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  db = new Database(path);

  // WAL lets readers proceed while a write is in progress
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(loadSchema());

  dbLogger.info({ path }, 'Database initialized');
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Run a function within a database transaction.
 * If the function throws, the transaction is rolled back.
 * If the function succeeds, the transaction is committed.
 */
export function runInTransaction<T>(fn: () => T): T {
  const database = getDb();
  return database.transaction(fn)();
}

/**
 * Run a database operation with timing instrumentation.
 * Logs slow queries (over 100ms) at warn level.
 *
 * @param operationName - A descriptive name for the operation (for logging)
 */
export function withQueryTiming<T>(operationName: string, fn: () => T): T {
  const start = Date.now();
  try {
    return fn();
  } finally {
    const durationMs = Date.now() - start;
    if (durationMs > SLOW_QUERY_THRESHOLD_MS) {
      dbLogger.warn({ operation: operationName, durationMs }, 'Slow database query detected');
    } else {
      dbLogger.debug({ operation: operationName, durationMs }, 'Query executed');
    }
  }
}
