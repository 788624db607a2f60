/**
 * Database Connection Manager
 *
 * SQLite connection holding OTP and application records.
 * WAL mode for file databases; `:memory:` is accepted for tests.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';

export const IN_MEMORY = ':memory:';

/**
 * Open a SQLite database with the pragmas the repositories rely on
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  return db;
}

class DatabaseManager {
  private db: Database.Database | null = null;

  isConnected(): boolean {
    return this.db !== null;
  }

  /**
   * Get the underlying database instance (throws if not connected)
   */
  getDb(): Database.Database {
    if (!this.db) {
      throw new Error('Database is not connected');
    }
    return this.db;
  }

  connect(dbPath: string): Database.Database {
    if (this.db) {
      logger.warn('Database already connected');
      return this.db;
    }

    logger.info('Connecting to database...', { path: dbPath });

    try {
      this.db = openDatabase(dbPath);
      logger.info('Database connected successfully', { path: dbPath });
      return this.db;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to connect to database', { error: message, path: dbPath });
      throw error;
    }
  }

  close(): void {
    if (this.db) {
      try {
        this.db.close();
        logger.info('Database connection closed');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Error closing database', { error: message });
      }
      this.db = null;
    }
  }
}

/**
 * Singleton database manager instance
 */
export const dbManager = new DatabaseManager();

export function isDbConnected(): boolean {
  return dbManager.isConnected();
}

export function getDb(): Database.Database {
  return dbManager.getDb();
}
