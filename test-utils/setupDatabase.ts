import Database from 'better-sqlite3';
import runMigrations from '../models/runMigrations';

/**
 * Fresh in-memory database with the full schema applied.
 */
export const setupTestDatabase = (): Database.Database => {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
};

/**
 * Clock pinned to a local date and time, for services that stamp records.
 */
export const fixedClock = (isoLocal: string) => () => new Date(isoLocal);
