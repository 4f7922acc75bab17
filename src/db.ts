import sqlite3 from 'sqlite3';
import { open, Database as SQLiteDatabase } from 'sqlite';
import path from 'path';
import fs from 'fs';
import { config } from './config';

export interface DBRunResult {
    lastID?: number;
    changes?: number;
}

// ------------------------------------------------------------------
// INTERFACCIA ASTRAZIONE DB
// ------------------------------------------------------------------
export interface DatabaseManager {
    query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
    get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined>;
    exec(sql: string, params?: unknown[]): Promise<void>;
    run(sql: string, params?: unknown[]): Promise<DBRunResult>;
    close(): Promise<void>;
}

// ------------------------------------------------------------------
// WRAPPER SQLITE
// ------------------------------------------------------------------
class SQLiteManager implements DatabaseManager {
    private db: SQLiteDatabase;

    constructor(db: SQLiteDatabase) {
        this.db = db;
    }

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        return this.db.all<T[]>(sql, params);
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        return this.db.get<T>(sql, params);
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        // exec() accetta più statement ma nessun parametro
        if (params && params.length > 0) {
            await this.db.run(sql, params);
        } else {
            await this.db.exec(sql);
        }
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.db.run(sql, params);
        return {
            lastID: result.lastID,
            changes: result.changes,
        };
    }

    async close(): Promise<void> {
        await this.db.close();
    }
}

// ------------------------------------------------------------------
// APERTURA E MIGRAZIONI
// ------------------------------------------------------------------
let dbInstance: DatabaseManager | null = null;

function resolveMigrationDirectory(): string {
    const cwdMigrations = path.resolve(process.cwd(), 'src', 'db', 'migrations');
    if (fs.existsSync(cwdMigrations)) {
        return cwdMigrations;
    }
    const compiledMigrations = path.resolve(__dirname, 'db', 'migrations');
    if (fs.existsSync(compiledMigrations)) {
        return compiledMigrations;
    }
    throw new Error('Cartella migrazioni non trovata.');
}

function isInMemory(filename: string): boolean {
    return filename === ':memory:' || filename.startsWith('file::memory:');
}

export async function openDatabase(filename: string): Promise<DatabaseManager> {
    if (!isInMemory(filename)) {
        fs.mkdirSync(path.dirname(filename), { recursive: true });
    }

    const sqliteDb = await open({
        filename,
        driver: sqlite3.Database,
    });

    // Le foreign key in SQLite sono per connessione: vanno attivate ogni volta.
    await sqliteDb.exec(`PRAGMA foreign_keys = ON;`);
    await sqliteDb.exec(`PRAGMA busy_timeout = 10000;`);
    if (!isInMemory(filename)) {
        await sqliteDb.exec(`PRAGMA journal_mode = WAL;`);
        await sqliteDb.exec(`PRAGMA synchronous = NORMAL;`);
    }

    return new SQLiteManager(sqliteDb);
}

export async function applyMigrations(database: DatabaseManager): Promise<string[]> {
    await database.exec(`
        CREATE TABLE IF NOT EXISTS _migrations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL UNIQUE,
            applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
        );
    `);

    const migrationDir = resolveMigrationDirectory();
    const files = fs
        .readdirSync(migrationDir)
        .filter((file) => file.endsWith('.sql'))
        .sort((a, b) => a.localeCompare(b));

    const applied: string[] = [];
    for (const fileName of files) {
        const alreadyApplied = await database.get<{ count: number }>(
            `SELECT COUNT(*) as count FROM _migrations WHERE name = ?`,
            [fileName]
        );
        if (Number(alreadyApplied?.count ?? 0) > 0) {
            continue;
        }

        const sql = fs.readFileSync(path.join(migrationDir, fileName), 'utf8');
        await database.exec('BEGIN');
        try {
            await database.exec(sql);
            await database.run(`INSERT OR IGNORE INTO _migrations (name) VALUES (?)`, [fileName]);
            await database.exec('COMMIT');
        } catch (error) {
            await database.exec('ROLLBACK');
            console.error(`Errore migrazione nel file ${fileName}`);
            throw error;
        }
        applied.push(fileName);
    }
    return applied;
}

export async function getDatabase(): Promise<DatabaseManager> {
    if (dbInstance) return dbInstance;
    dbInstance = await openDatabase(config.dbPath);
    return dbInstance;
}

export async function initDatabase(): Promise<DatabaseManager> {
    const database = await getDatabase();
    await applyMigrations(database);
    return database;
}

export async function closeDatabase(): Promise<void> {
    if (dbInstance) {
        await dbInstance.close();
        dbInstance = null;
    }
}
