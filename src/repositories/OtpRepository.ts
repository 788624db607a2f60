/**
 * OTP Repository
 *
 * Persistence for issued OTPs. Methods are async so callers compose them
 * like any other collaborator call; statements run on better-sqlite3.
 */

import type Database from 'better-sqlite3';
import { getDb } from '../database/index.js';
import type { NewOtp, Otp, OtpStatus } from '../domain/Otp.js';

/**
 * Row shape of the otps table
 */
interface OtpRow {
  id: number;
  customer_id: string;
  msisdn: string;
  pin: number;
  status: OtpStatus;
  attempt_count: number;
  application_id: string;
  created_on: number;
  expires: number;
}

function toOtp(row: OtpRow): Otp {
  return {
    id: row.id,
    customerId: row.customer_id,
    msisdn: row.msisdn,
    pin: row.pin,
    createdOn: row.created_on,
    expires: row.expires,
    status: row.status,
    attemptCount: row.attempt_count,
    applicationId: row.application_id,
  };
}

export class OtpRepository {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db || getDb();
  }

  /**
   * Insert a new OTP; the id is assigned by SQLite
   */
  async create(input: NewOtp): Promise<Otp> {
    const stmt = this.db.prepare(`
      INSERT INTO otps (
        customer_id, msisdn, pin, status, attempt_count,
        application_id, created_on, expires
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      input.customerId,
      input.msisdn,
      input.pin,
      input.status,
      input.attemptCount,
      input.applicationId,
      input.createdOn,
      input.expires
    );

    return { ...input, id: Number(result.lastInsertRowid) };
  }

  /**
   * Persist the mutable fields (status, attempt count) of an existing OTP,
   * only if the stored row still holds the state `previous` was read with.
   * Returns false when another write got there first; pin and expires are
   * never rewritten.
   */
  async saveIfUnchanged(otp: Otp, previous: Pick<Otp, 'status' | 'attemptCount'>): Promise<boolean> {
    const stmt = this.db.prepare(`
      UPDATE otps
      SET status = ?, attempt_count = ?
      WHERE id = ? AND status = ? AND attempt_count = ?
    `);
    const result = stmt.run(otp.status, otp.attemptCount, otp.id, previous.status, previous.attemptCount);

    return result.changes > 0;
  }

  async findById(id: number): Promise<Otp | null> {
    const row = this.db.prepare<[number], OtpRow>('SELECT * FROM otps WHERE id = ?').get(id);
    return row ? toOtp(row) : null;
  }

  /**
   * All OTPs issued for a phone number, newest first
   */
  async findByMsisdn(msisdn: string): Promise<Otp[]> {
    const rows = this.db
      .prepare<[string], OtpRow>('SELECT * FROM otps WHERE msisdn = ? ORDER BY created_on DESC, id DESC')
      .all(msisdn);
    return rows.map(toOtp);
  }
}
