/**
 * SQLite-backed search history (sql.js)
 *
 * The database lives in memory and is written back to its file after every
 * change. The path ':memory:' keeps it in memory only.
 */

import fs from 'fs';
import initSqlJs, { type Database, type ParamsObject } from 'sql.js';
import { config } from '../config';
import { StorageError } from '../errors';
import {
    clampHistoryLimit,
    type Clock,
    type HistoryRecord,
    type NewHistoryRecord,
    type SearchHistoryStore,
} from './types';

export const IN_MEMORY_PATH = ':memory:';

let sqlJs: ReturnType<typeof initSqlJs> | null = null;

function loadSqlJs(): ReturnType<typeof initSqlJs> {
    if (!sqlJs) {
        sqlJs = initSqlJs().catch((error: unknown) => {
            sqlJs = null;
            throw error;
        });
    }
    return sqlJs;
}

export async function openDb(path: string = config.history.dbPath): Promise<Database> {
    const SQL = await loadSqlJs();
    if (path !== IN_MEMORY_PATH && fs.existsSync(path)) {
        return new SQL.Database(fs.readFileSync(path));
    }
    return new SQL.Database();
}

export function initDb(db: Database): void {
    db.run(
        `CREATE TABLE IF NOT EXISTS weather_history(
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            city TEXT NOT NULL,
            temperature REAL NOT NULL,
            observed_at TEXT NOT NULL,
            recorded_at TEXT NOT NULL
        )`
    );
}

export function saveDb(db: Database, path: string): void {
    if (path === IN_MEMORY_PATH) return;
    fs.writeFileSync(path, Buffer.from(db.export()));
}

function readText(row: ParamsObject, column: string): string {
    const value = row[column];
    if (typeof value !== 'string') {
        throw new Error(`column ${column} is not text`);
    }
    return value;
}

function readNumber(row: ParamsObject, column: string): number {
    const value = row[column];
    if (typeof value !== 'number') {
        throw new Error(`column ${column} is not numeric`);
    }
    return value;
}

export interface SqliteHistoryStoreOptions {
    path?: string;
    clock?: Clock;
}

export class SqliteHistoryStore implements SearchHistoryStore {
    private closed = false;

    private constructor(
        private readonly db: Database,
        private readonly path: string,
        private readonly clock: Clock
    ) {}

    /**
     * Open (or create) the history database and make sure the table exists.
     */
    static async open(options: SqliteHistoryStoreOptions = {}): Promise<SqliteHistoryStore> {
        const path = options.path ?? config.history.dbPath;
        try {
            const db = await openDb(path);
            initDb(db);
            saveDb(db, path);
            return new SqliteHistoryStore(db, path, options.clock ?? (() => new Date()));
        } catch (error) {
            throw new StorageError('open', error);
        }
    }

    async append(record: NewHistoryRecord): Promise<HistoryRecord> {
        this.assertOpen('append');
        const recordedAt = this.clock();
        try {
            this.db.run(
                `INSERT INTO weather_history(city, temperature, observed_at, recorded_at)
                 VALUES(?, ?, ?, ?)`,
                [record.city, record.temperatureCelsius, record.observedAt, recordedAt.toISOString()]
            );
            saveDb(this.db, this.path);
        } catch (error) {
            throw new StorageError('append', error);
        }
        return { ...record, recordedAt };
    }

    async recent(limit: number = config.history.limit): Promise<HistoryRecord[]> {
        this.assertOpen('recent');
        const bounded = clampHistoryLimit(limit);
        try {
            // id follows insertion order, which recorded_at cannot break ties for
            const stmt = this.db.prepare(
                `SELECT city, temperature, observed_at, recorded_at
                 FROM weather_history
                 ORDER BY id DESC
                 LIMIT ?`
            );
            const records: HistoryRecord[] = [];
            try {
                stmt.bind([bounded]);
                while (stmt.step()) {
                    const row = stmt.getAsObject();
                    records.push({
                        city: readText(row, 'city'),
                        temperatureCelsius: readNumber(row, 'temperature'),
                        observedAt: readText(row, 'observed_at'),
                        recordedAt: new Date(readText(row, 'recorded_at')),
                    });
                }
            } finally {
                stmt.free();
            }
            return records;
        } catch (error) {
            throw new StorageError('recent', error);
        }
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        try {
            saveDb(this.db, this.path);
            this.db.close();
        } catch (error) {
            throw new StorageError('close', error);
        }
    }

    private assertOpen(operation: 'append' | 'recent'): void {
        if (this.closed) {
            throw new StorageError(operation, new Error('store is closed'));
        }
    }
}
