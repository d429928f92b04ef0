/**
 * SQLite database wrapper.
 *
 * All reads and writes go through this wrapper so repositories never touch
 * better-sqlite3 statements directly. Multi-statement mutations must use
 * `transaction()`, which runs the callback synchronously inside a single
 * BEGIN IMMEDIATE ... COMMIT; a thrown error rolls the whole unit back.
 *
 * Usage:
 *   const db = createLicenseDB(openDatabase(config.databasePath));
 *   const row = await db.first<LicenseRow>('SELECT * FROM licenses WHERE id = ?', [id]);
 */

import { mkdirSync, readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';

/** Values accepted as bound parameters. Booleans must be mapped to 0/1. */
export type SqlValue = string | number | bigint | Buffer | null;

/** Row type constraint - must be a record/object */
export type Row = Record<string, unknown>;

export interface QueryResult<T> {
    results: T[];
    success: boolean;
    meta: RunMeta;
}

export interface RunMeta {
    duration: number;
    changes: number;
    last_row_id: number;
}

export interface BatchStatement {
    sql: string;
    params?: SqlValue[];
}

/**
 * Synchronous executor handed to transaction callbacks.
 */
export interface SqlExecutor {
    first<T extends Row>(sql: string, params?: SqlValue[]): T | null;
    all<T extends Row>(sql: string, params?: SqlValue[]): T[];
    run(sql: string, params?: SqlValue[]): RunMeta;
}

export interface LicenseDB {
    /** Execute a query and return the first matching row. */
    first<T extends Row>(sql: string, params?: SqlValue[]): Promise<T | null>;

    /** Execute a query and return all matching rows. */
    all<T extends Row>(sql: string, params?: SqlValue[]): Promise<QueryResult<T>>;

    /** Execute a write query (INSERT, UPDATE, DELETE). */
    run(sql: string, params?: SqlValue[]): Promise<RunMeta>;

    /** Execute multiple write statements atomically. */
    batch(statements: BatchStatement[]): Promise<RunMeta[]>;

    /**
     * Run a unit of work atomically. The callback must not await:
     * everything it reads and writes happens under one write lock.
     */
    transaction<T>(work: (tx: SqlExecutor) => T): Promise<T>;

    close(): void;
}

export function openDatabase(path: string): Database.Database {
    if (path !== ':memory:') {
        mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    return db;
}

function createExecutor(db: Database.Database): SqlExecutor {
    return {
        first<T extends Row>(sql: string, params: SqlValue[] = []): T | null {
            const row = db.prepare<SqlValue[], T>(sql).get(...params);
            return row ?? null;
        },

        all<T extends Row>(sql: string, params: SqlValue[] = []): T[] {
            return db.prepare<SqlValue[], T>(sql).all(...params);
        },

        run(sql: string, params: SqlValue[] = []): RunMeta {
            const start = performance.now();
            const result = db.prepare(sql).run(...params);
            return {
                duration: performance.now() - start,
                changes: result.changes,
                last_row_id: Number(result.lastInsertRowid),
            };
        },
    };
}

export function createLicenseDB(db: Database.Database): LicenseDB {
    const executor = createExecutor(db);

    return {
        async first<T extends Row>(sql: string, params: SqlValue[] = []): Promise<T | null> {
            return executor.first<T>(sql, params);
        },

        async all<T extends Row>(sql: string, params: SqlValue[] = []): Promise<QueryResult<T>> {
            const start = performance.now();
            const results = executor.all<T>(sql, params);
            return {
                results,
                success: true,
                meta: { duration: performance.now() - start, changes: 0, last_row_id: 0 },
            };
        },

        async run(sql: string, params: SqlValue[] = []): Promise<RunMeta> {
            return executor.run(sql, params);
        },

        async batch(statements: BatchStatement[]): Promise<RunMeta[]> {
            const runAll = db.transaction((items: BatchStatement[]) =>
                items.map(({ sql, params = [] }) => executor.run(sql, params))
            );
            return runAll.immediate(statements);
        },

        async transaction<T>(work: (tx: SqlExecutor) => T): Promise<T> {
            const unit = db.transaction(() => work(executor));
            return unit.immediate();
        },

        close(): void {
            db.close();
        },
    };
}

// ============================================================================
// Migrations
// ============================================================================

const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

/**
 * Applies every `*.sql` file in the migrations directory that has not been
 * recorded in `schema_migrations`, in filename order.
 */
export function applyMigrations(
    db: Database.Database,
    migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): string[] {
    db.exec(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
            version TEXT PRIMARY KEY,
            applied_at INTEGER NOT NULL
        )`
    );

    const applied = new Set(
        db.prepare('SELECT version FROM schema_migrations')
            .all()
            .map((row) => (row as { version: string }).version)
    );

    const pending = readdirSync(migrationsDir)
        .filter((file) => file.endsWith('.sql') && !applied.has(file))
        .sort();

    const record = db.prepare('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)');
    for (const file of pending) {
        const sql = readFileSync(join(migrationsDir, file), 'utf8');
        db.transaction(() => {
            db.exec(sql);
            record.run(file, Date.now());
        })();
    }

    return pending;
}

/**
 * Opens a migrated in-memory database. Used by tests and local tooling.
 */
export function createMemoryDB(): LicenseDB {
    const db = openDatabase(':memory:');
    applyMigrations(db);
    return createLicenseDB(db);
}
