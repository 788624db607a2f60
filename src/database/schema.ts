/**
 * Database Schema
 *
 * Table definitions and migration runner for SQLite.
 */

import type Database from 'better-sqlite3';
import { dbManager } from './connection.js';
import { logger } from '../utils/logger.js';

/**
 * Schema version for migration tracking
 */
const SCHEMA_VERSION = 1;

const SCHEMA_SQL = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at INTEGER NOT NULL
);

-- Application policies (attempt ceiling per application)
CREATE TABLE IF NOT EXISTS applications (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  attempts_allowed INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

-- Issued one-time passcodes
CREATE TABLE IF NOT EXISTS otps (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  customer_id TEXT NOT NULL,
  msisdn TEXT NOT NULL,
  pin INTEGER NOT NULL,
  status TEXT NOT NULL CHECK(status IN ('ACTIVE', 'VERIFIED', 'EXPIRED', 'TOO_MANY_ATTEMPTS')),
  attempt_count INTEGER NOT NULL DEFAULT 0,
  application_id TEXT NOT NULL,
  created_on INTEGER NOT NULL,
  expires INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_otps_msisdn ON otps(msisdn);
`;

function hasTable(db: Database.Database, name: string): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name);
  return row !== undefined;
}

/**
 * Run database migrations
 */
export function runMigrations(db: Database.Database = dbManager.getDb()): void {
  logger.info('Running database migrations...');

  let currentVersion = 0;
  if (hasTable(db, 'schema_version')) {
    const row = db
      .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
      .get();
    currentVersion = row?.version || 0;
  }

  if (currentVersion >= SCHEMA_VERSION) {
    logger.info('Database schema is up to date', { version: currentVersion });
    return;
  }

  if (currentVersion === 0) {
    logger.info('Applying base schema...', { version: 1 });
    db.exec(SCHEMA_SQL);
  }

  db.prepare('INSERT OR REPLACE INTO schema_version (version, applied_at) VALUES (?, ?)').run(
    SCHEMA_VERSION,
    Date.now()
  );

  logger.info('Database migrations complete', { version: SCHEMA_VERSION });
}
