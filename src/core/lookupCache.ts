import crypto from 'crypto';
import { DatabaseManager } from '../db';
import { Clock, isoAt } from './clock';
import { getLiveCacheEntry, parseJsonColumn, upsertCacheEntry } from './repositories';

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export function lookupFingerprint(city: string, query: string): string {
    const normalized = `${city.trim().toLowerCase()}:${query.trim().toLowerCase()}`;
    return crypto.createHash('md5').update(normalized).digest('hex');
}

export class LookupCache {
    private readonly db: DatabaseManager;
    private readonly clock: Clock;
    private readonly ttlMs: number;

    constructor(db: DatabaseManager, clock: Clock, ttlMs: number = DEFAULT_CACHE_TTL_MS) {
        this.db = db;
        this.clock = clock;
        this.ttlMs = ttlMs;
    }

    /**
     * Risultati in cache ancora validi, anche se vuoti. `null` = assente o scaduto.
     */
    async get(city: string, query: string): Promise<unknown[] | null> {
        const entry = await getLiveCacheEntry(this.db, lookupFingerprint(city, query), isoAt(this.clock));
        if (!entry) {
            return null;
        }
        const payload = parseJsonColumn(entry.response_data);
        return Array.isArray(payload) ? payload : null;
    }

    async put(city: string, query: string, params: Record<string, unknown>, results: unknown[]): Promise<void> {
        await upsertCacheEntry(this.db, {
            queryHash: lookupFingerprint(city, query),
            queryParams: params,
            responseData: results,
            createdAt: isoAt(this.clock),
            expiresAt: isoAt(this.clock, this.ttlMs),
        });
    }
}
