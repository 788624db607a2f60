import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IN_MEMORY, openDatabase, runMigrations, seedDefaultApplication } from '../database/index.js';
import type { NewOtp } from '../domain/Otp.js';
import { ApplicationRepository } from './ApplicationRepository.js';
import { OtpRepository } from './OtpRepository.js';

describe('OtpRepository', () => {
  let db: Database.Database;
  let repo: OtpRepository;

  const newOtp = (overrides: Partial<NewOtp> = {}): NewOtp => ({
    customerId: 'acc-1',
    msisdn: '+306941234567',
    pin: 123456,
    createdOn: 1_000,
    expires: 61_000,
    status: 'ACTIVE',
    attemptCount: 0,
    applicationId: 'PPR',
    ...overrides,
  });

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
    runMigrations(db);
    repo = new OtpRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('assigns ids on create and reads the record back', async () => {
    const first = await repo.create(newOtp());
    const second = await repo.create(newOtp({ pin: 654321 }));

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(await repo.findById(1)).toEqual({ ...newOtp(), id: 1 });
  });

  it('returns null for an unknown id', async () => {
    expect(await repo.findById(42)).toBeNull();
  });

  it('updates status and attempt count without touching pin or expiry', async () => {
    const created = await repo.create(newOtp());

    const saved = await repo.saveIfUnchanged(
      { ...created, status: 'VERIFIED', attemptCount: 1, pin: 999999, expires: 0 },
      created
    );

    expect(saved).toBe(true);
    expect(await repo.findById(created.id)).toEqual({ ...created, status: 'VERIFIED', attemptCount: 1 });
  });

  it('refuses to overwrite a row changed since it was read', async () => {
    const created = await repo.create(newOtp());
    await repo.saveIfUnchanged({ ...created, status: 'VERIFIED', attemptCount: 1 }, created);

    const saved = await repo.saveIfUnchanged({ ...created, attemptCount: 1 }, created);

    expect(saved).toBe(false);
    expect(await repo.findById(created.id)).toEqual({ ...created, status: 'VERIFIED', attemptCount: 1 });
  });

  it('reports an OTP that was never created as not saved', async () => {
    const otp = { ...newOtp(), id: 7 };

    expect(await repo.saveIfUnchanged(otp, otp)).toBe(false);
  });

  it('lists OTPs for a phone number newest first', async () => {
    await repo.create(newOtp({ createdOn: 1_000 }));
    await repo.create(newOtp({ createdOn: 5_000 }));
    await repo.create(newOtp({ msisdn: '+306949999999' }));

    const otps = await repo.findByMsisdn('+306941234567');

    expect(otps.map((o) => o.id)).toEqual([2, 1]);
    expect(await repo.findByMsisdn('+15550000000')).toEqual([]);
  });

  it('enforces the status values at the schema level', async () => {
    await expect(repo.create({ ...newOtp(), status: 'PENDING' as NewOtp['status'] })).rejects.toThrow();
  });
});

describe('ApplicationRepository', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
    runMigrations(db);
  });

  afterEach(() => {
    db.close();
  });

  it('reads a seeded application', async () => {
    seedDefaultApplication({ id: 'PPR', attemptsAllowed: 3 }, db);

    const app = await new ApplicationRepository(db).findById('PPR');

    expect(app).toEqual({
      id: 'PPR',
      name: 'PPR',
      description: 'Default OTP application',
      attemptsAllowed: 3,
    });
  });

  it('keeps the stored ceiling when seeding twice', async () => {
    seedDefaultApplication({ id: 'PPR', attemptsAllowed: 3 }, db);
    seedDefaultApplication({ id: 'PPR', attemptsAllowed: 10 }, db);

    const app = await new ApplicationRepository(db).findById('PPR');

    expect(app?.attemptsAllowed).toBe(3);
  });

  it('returns null for an unknown application', async () => {
    expect(await new ApplicationRepository(db).findById('NONE')).toBeNull();
  });
});
