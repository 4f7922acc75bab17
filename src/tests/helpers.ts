import http from 'http';
import { applyMigrations, DatabaseManager, DBRunResult, openDatabase } from '../db';
import { Clock } from '../core/clock';
import { insertLead, insertWorker } from '../core/repositories';
import { GeoPoint } from '../types/domain';

export const T0 = Date.parse('2026-01-15T08:00:00.000Z');

export class FakeClock implements Clock {
    current: number;
    readonly sleeps: number[] = [];

    constructor(start: number = T0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.current += ms;
    }

    advance(ms: number): void {
        this.current += ms;
    }
}

export async function createTestDatabase(): Promise<DatabaseManager> {
    const db = await openDatabase(':memory:');
    await applyMigrations(db);
    return db;
}

/**
 * Wrapper che fa fallire gli statement il cui SQL contiene `failOn`.
 */
export class FailingDatabase implements DatabaseManager {
    private readonly inner: DatabaseManager;
    private readonly failOn: RegExp;

    constructor(inner: DatabaseManager, failOn: RegExp) {
        this.inner = inner;
        this.failOn = failOn;
    }

    private guard(sql: string): void {
        if (this.failOn.test(sql)) {
            throw new Error(`forced failure: ${this.failOn.source}`);
        }
    }

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        this.guard(sql);
        return this.inner.query<T>(sql, params);
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        this.guard(sql);
        return this.inner.get<T>(sql, params);
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        this.guard(sql);
        return this.inner.exec(sql, params);
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        this.guard(sql);
        return this.inner.run(sql, params);
    }

    async close(): Promise<void> {
        return this.inner.close();
    }
}

export interface SeedLead {
    name: string;
    category?: string;
    location?: GeoPoint | null;
    phone?: string;
    email?: string;
}

export async function seedLead(db: DatabaseManager, lead: SeedLead): Promise<number> {
    const outcome = await insertLead(
        db,
        {
            name: lead.name,
            category: lead.category ?? 'plumbing',
            address: `${lead.name} address`,
            location: lead.location ?? null,
            phone: lead.phone ?? '',
            email: lead.email ?? '',
        },
        new Date(T0).toISOString()
    );
    if (outcome.status !== 'inserted') {
        throw new Error(`seed lead duplicato: ${lead.name}`);
    }
    return outcome.id;
}

export interface SeedWorker {
    name: string;
    skills: string;
    location?: GeoPoint | null;
    phone?: string;
    rating?: number;
    jobsCompleted?: number;
    status?: 'active' | 'inactive';
}

export async function seedWorker(db: DatabaseManager, worker: SeedWorker): Promise<number> {
    const outcome = await insertWorker(
        db,
        {
            name: worker.name,
            skills: worker.skills,
            phone: worker.phone ?? '',
            email: '',
            location: worker.location ?? null,
        },
        new Date(T0).toISOString()
    );
    if (outcome.status !== 'inserted') {
        throw new Error(`seed worker duplicato: ${worker.name}`);
    }
    await db.run(`UPDATE workers SET rating = ?, jobs_completed = ?, status = ? WHERE id = ?`, [
        worker.rating ?? 0,
        worker.jobsCompleted ?? 0,
        worker.status ?? 'active',
        outcome.id,
    ]);
    return outcome.id;
}

/**
 * Inserisce worker riempitivi finché il prossimo id è `targetId`.
 */
export async function padWorkersUntil(db: DatabaseManager, targetId: number): Promise<void> {
    for (;;) {
        const row = await db.get<{ next_id: number }>(`SELECT IFNULL(MAX(id), 0) + 1 AS next_id FROM workers`);
        if (Number(row?.next_id ?? 1) >= targetId) {
            return;
        }
        await seedWorker(db, { name: `filler ${row?.next_id ?? 0}`, skills: 'gardening', status: 'inactive' });
    }
}

export interface StallingServer {
    url: string;
    close: () => Promise<void>;
}

/**
 * Server locale che invia gli header e un primo frammento di body, poi non risponde più.
 */
export async function startStallingServer(status: number): Promise<StallingServer> {
    const server = http.createServer((_request, response) => {
        response.writeHead(status, { 'content-type': 'application/json' });
        response.write('[');
    });
    await new Promise<void>((resolve) => {
        server.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('indirizzo del server di test non disponibile');
    }
    return {
        url: `http://127.0.0.1:${address.port}/search`,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close((error) => (error ? reject(error) : resolve()));
            }),
    };
}
