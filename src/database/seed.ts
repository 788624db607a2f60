/**
 * Database Seed Data
 *
 * Registers the default application so OTPs issued under it can be validated.
 */

import type Database from 'better-sqlite3';
import { dbManager } from './connection.js';
import { logger } from '../utils/logger.js';

export interface ApplicationSeed {
  id: string;
  attemptsAllowed: number;
}

/**
 * Seed the default application
 * Idempotent - an existing row keeps its stored ceiling
 */
export function seedDefaultApplication(
  seed: ApplicationSeed,
  db: Database.Database = dbManager.getDb()
): void {
  const result = db
    .prepare(`
      INSERT OR IGNORE INTO applications (id, name, description, attempts_allowed, created_at)
      VALUES (?, ?, ?, ?, ?)
    `)
    .run(seed.id, seed.id, 'Default OTP application', seed.attemptsAllowed, Date.now());

  if (result.changes > 0) {
    logger.info('Seeded default application', { id: seed.id, attemptsAllowed: seed.attemptsAllowed });
  }
}
