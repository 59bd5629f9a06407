import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';

const DB_PATH_ENV = 'LIFEPLAN_DB_PATH';

// Singleton instance holder
let dbInstance: Database.Database | null = null;

/**
 * Returns the singleton database instance.
 * Throws an error if the database has not been initialized via initDb().
 */
export function getDb(): Database.Database {
    if (!dbInstance) {
        logger.error('[DB] getDb called before database was initialized.');
        throw new Error('Database accessed before initialization. Call initDb first.');
    }
    return dbInstance;
}

/**
 * Initializes a database connection.
 * Creates the database file and directory if they don't exist and enables WAL mode.
 * Sets the singleton instance returned by `getDb()` *only if* called without an
 * explicit `dbPath`; an explicit path yields a standalone connection.
 * Does NOT run migrations - that is handled by runMigrations.
 *
 * @param dbPath Optional path to the database file. If omitted, uses `getDbPath()`. If ':memory:', creates an in-memory DB.
 */
export function initDb(dbPath?: string): Database.Database {
    const targetPath = dbPath ?? getDbPath();

    if (!dbPath && dbInstance) {
        if (dbInstance.open) {
            logger.warn('[DB] initDb called for default path; returning existing OPEN singleton instance.');
            return dbInstance;
        }
        logger.warn('[DB] initDb called for default path; existing singleton was CLOSED. Creating a new instance.');
    }

    if (targetPath !== ':memory:') {
        ensureDirectoryExists(path.dirname(targetPath));
    }

    logger.info(`[DB] Initializing new database connection at: ${targetPath}`);
    const newDb = new Database(targetPath);
    newDb.pragma('foreign_keys = ON');

    // WAL is not applicable to :memory:
    if (targetPath !== ':memory:') {
        try {
            newDb.pragma('journal_mode = WAL');
            logger.info('[DB] WAL mode enabled.');
        } catch (walError) {
            // May fail on some network file systems
            logger.warn('[DB] Could not enable WAL mode (may be normal for some file systems): ', walError);
        }
    }

    if (!dbPath) {
        dbInstance = newDb;
        logger.info('[DB] Singleton database instance (re)set.');
    }

    return newDb;
}

/**
 * Closes the singleton database connection, if it exists.
 */
export function closeDb(): void {
    if (dbInstance && dbInstance.open) {
        logger.info('[DB] Closing singleton database connection...');
        dbInstance.close();
        dbInstance = null;
        logger.info('[DB] Singleton database connection closed.');
    } else {
        logger.debug('[DB] No active singleton database connection to close.');
    }
}

/**
 * Gets the path for the planner database.
 * 1. Uses `LIFEPLAN_DB_PATH` if set (':memory:' is returned as is, other paths are resolved).
 * 2. Otherwise falls back to `./data/lifeplan.db` relative to `process.cwd()`.
 */
export function getDbPath(): string {
    const envPath = process.env[DB_PATH_ENV];

    if (envPath) {
        if (envPath === ':memory:') {
            logger.info(`[DB] Using in-memory database (from ${DB_PATH_ENV}).`);
            return ':memory:';
        }
        const resolvedEnvPath = path.resolve(envPath);
        logger.info(`[DB] Using database path from ${DB_PATH_ENV}: ${resolvedEnvPath}`);
        return resolvedEnvPath;
    }

    const cwdDefaultPath = path.resolve(process.cwd(), 'data', 'lifeplan.db');
    logger.debug(`[DB] ${DB_PATH_ENV} not set. Using default path: ${cwdDefaultPath}`);
    return cwdDefaultPath;
}

function ensureDirectoryExists(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
        try {
            fs.mkdirSync(dirPath, { recursive: true });
            logger.info(`[DB] Created database directory: ${dirPath}`);
        } catch (mkdirError) {
            logger.error(`[DB] Failed to create database directory ${dirPath}:`, mkdirError);
            throw new Error(`Failed to create required data directory: ${mkdirError instanceof Error ? mkdirError.message : String(mkdirError)}`);
        }
    }
}
