/**
 * Application Repository
 *
 * Read access to application policies.
 */

import type Database from 'better-sqlite3';
import { getDb } from '../database/index.js';
import type { Application } from '../domain/Otp.js';

interface ApplicationRow {
  id: string;
  name: string;
  description: string | null;
  attempts_allowed: number;
  created_at: number;
}

export class ApplicationRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDb();
  }

  async findById(id: string): Promise<Application | null> {
    const row = this.db.prepare<[string], ApplicationRow>('SELECT * FROM applications WHERE id = ?').get(id);

    if (!row) {
      return null;
    }

    return {
      id: row.id,
      name: row.name,
      description: row.description,
      attemptsAllowed: row.attempts_allowed,
    };
  }
}
