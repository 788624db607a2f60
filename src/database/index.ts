/**
 * Database Module
 *
 * Exports all database functionality.
 */

export { dbManager, getDb, isDbConnected, openDatabase, IN_MEMORY } from './connection.js';
export { runMigrations } from './schema.js';
export { seedDefaultApplication } from './seed.js';
export type { ApplicationSeed } from './seed.js';
