import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { getDb } from './db';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR_NAME = 'migrations';
const MIGRATIONS_TABLE_NAME = 'schema_migrations';

/**
 * Ensures the schema_migrations table exists on the given DB instance.
 */
function ensureMigrationsTableExists(db: Database.Database): void {
    try {
        db.exec(`
            CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE_NAME} (
                version TEXT PRIMARY KEY,
                applied_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%S.000Z', 'now'))
            );
        `);
        logger.debug(`[Migrations] Ensured table '${MIGRATIONS_TABLE_NAME}' exists.`);
    } catch (error) {
        logger.error(`[Migrations] Failed to ensure migrations table '${MIGRATIONS_TABLE_NAME}':`, error);
        throw error;
    }
}

/**
 * Gets the set of already applied migration versions.
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
    try {
        ensureMigrationsTableExists(db);
        const rows = db.prepare<[], { version: string }>(`SELECT version FROM ${MIGRATIONS_TABLE_NAME}`).all();
        return new Set(rows.map(r => r.version));
    } catch (error) {
        logger.error('[Migrations] Failed to query applied migrations:', error);
        throw error;
    }
}

/**
 * Locates the SQL files. From source (tests) they sit beside this file; a
 * compiled build in dist/models reads them from the source tree.
 */
function resolveMigrationsPath(): string {
    const besideModule = path.join(__dirname, MIGRATIONS_DIR_NAME);
    if (fs.existsSync(besideModule)) {
        return besideModule;
    }
    return path.resolve(__dirname, '..', '..', 'models', MIGRATIONS_DIR_NAME);
}

/**
 * Reads migration filenames from the migrations directory, sorted alphabetically.
 */
function getMigrationFiles(migrationsPath: string): string[] {
    logger.debug(`[Migrations] Looking for migration files in: ${migrationsPath}`);

    try {
        if (!fs.existsSync(migrationsPath)) {
            logger.warn(`[Migrations] Migrations directory not found: ${migrationsPath}. No migrations will be applied.`);
            return [];
        }
        const files = fs.readdirSync(migrationsPath)
            .filter(file => file.endsWith('.sql'))
            .sort(); // 0001_.., 0002_..
        logger.debug(`[Migrations] Migration files: ${files.join(', ') || 'None'}`);
        return files;
    } catch (error) {
        logger.error(`[Migrations] Failed to read migrations directory ${migrationsPath}:`, error);
        throw error;
    }
}

/**
 * Runs all pending database migrations on the provided DB instance or the default singleton.
 * Each migration is applied in its own transaction together with its version record.
 *
 * @param dbInstance Optional: the database to migrate. If omitted, uses getDb().
 * @returns The versions applied by this call.
 */
function runMigrations(dbInstance?: Database.Database): string[] {
    const db = dbInstance ?? getDb();
    const context = dbInstance ? 'provided DB instance' : 'default singleton DB';
    logger.info(`[Migrations] Starting database migration check on ${context}...`);

    try {
        const appliedVersions = getAppliedMigrations(db);
        const migrationsPath = resolveMigrationsPath();
        const applied: string[] = [];

        for (const filename of getMigrationFiles(migrationsPath)) {
            const version = path.basename(filename, '.sql');

            if (appliedVersions.has(version)) {
                logger.debug(`[Migrations] Skipping already applied migration: ${version}`);
                continue;
            }

            logger.info(`[Migrations] Applying migration: ${version}...`);
            const filePath = path.join(migrationsPath, filename);
            let sql: string;
            try {
                sql = fs.readFileSync(filePath, 'utf8');
            } catch (readError) {
                logger.error(`[Migrations] FAILED to read migration file ${filePath}:`, readError);
                throw new Error(`Failed to read migration file ${filename}. Halting further migrations.`);
            }

            const runMigrationTx = db.transaction(() => {
                db.exec(sql);
                db.prepare(`INSERT INTO ${MIGRATIONS_TABLE_NAME} (version) VALUES (?)`).run(version);
            });

            try {
                runMigrationTx();
                logger.info(`[Migrations] Successfully applied migration: ${version}`);
                applied.push(version);
            } catch (migrationError) {
                logger.error(`[Migrations] FAILED to apply migration ${version}:`, migrationError);
                throw new Error(`Migration ${version} failed. Halting further migrations.`);
            }
        }

        if (applied.length > 0) {
            logger.info(`[Migrations] Applied ${applied.length} new migration(s) to ${context}.`);
        } else {
            logger.info(`[Migrations] Database schema is up to date on ${context}.`);
        }
        return applied;
    } catch (error) {
        logger.error(`[Migrations] Migration process failed on ${context}:`, error);
        throw error;
    }
}

export default runMigrations;
export { runMigrations };
