/**
 * repositories/cache.ts
 * Cache delle risposte del provider esterno, indicizzata per fingerprint.
 */

import { DatabaseManager } from '../../db';
import { CachedQueryRecord } from '../../types/domain';

export async function getLiveCacheEntry(
    db: DatabaseManager,
    queryHash: string,
    nowIso: string
): Promise<CachedQueryRecord | null> {
    const row = await db.get<CachedQueryRecord>(
        `
        SELECT id, query_hash, query_params, response_data, created_at, expires_at
        FROM api_cache
        WHERE query_hash = ? AND expires_at > ?
    `,
        [queryHash, nowIso]
    );
    return row ?? null;
}

export interface CacheEntryInput {
    queryHash: string;
    queryParams: Record<string, unknown>;
    responseData: unknown;
    createdAt: string;
    expiresAt: string;
}

/**
 * Upsert: riscrivere un fingerprint esistente (es. scaduto) rinnova il TTL.
 */
export async function upsertCacheEntry(db: DatabaseManager, entry: CacheEntryInput): Promise<void> {
    await db.run(
        `
        INSERT INTO api_cache (query_hash, query_params, response_data, created_at, expires_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(query_hash) DO UPDATE SET
            query_params = excluded.query_params,
            response_data = excluded.response_data,
            created_at = excluded.created_at,
            expires_at = excluded.expires_at
    `,
        [
            entry.queryHash,
            JSON.stringify(entry.queryParams),
            JSON.stringify(entry.responseData),
            entry.createdAt,
            entry.expiresAt,
        ]
    );
}

export async function countCacheEntries(db: DatabaseManager): Promise<number> {
    const row = await db.get<{ total: number }>(`SELECT COUNT(*) AS total FROM api_cache`);
    return Number(row?.total ?? 0);
}

export async function deleteExpiredCacheEntries(db: DatabaseManager, nowIso: string): Promise<number> {
    const result = await db.run(`DELETE FROM api_cache WHERE expires_at <= ?`, [nowIso]);
    return result.changes ?? 0;
}
