import { DatabaseManager } from '../db';
import { logInfo } from '../telemetry/logger';
import { Clock, isoAt, systemClock } from './clock';
import { deleteDegenerateLeads, deleteDuplicateLeads, deleteExpiredCacheEntries, vacuumDatabase, withTransaction } from './repositories';

export interface CleanupReport {
    degenerateLeads: number;
    duplicateLeads: number;
    expiredCacheEntries: number;
}

/**
 * Pulizia periodica. I lead referenziati da job o messaggi restano sempre.
 * VACUUM gira fuori dalla transazione (SQLite non lo accetta al suo interno).
 */
export async function cleanupDatabase(db: DatabaseManager, clock: Clock = systemClock): Promise<CleanupReport> {
    const report = await withTransaction(db, async () => ({
        degenerateLeads: await deleteDegenerateLeads(db),
        duplicateLeads: await deleteDuplicateLeads(db),
        expiredCacheEntries: await deleteExpiredCacheEntries(db, isoAt(clock)),
    }));
    await vacuumDatabase(db);
    await logInfo('cleanup.completed', { ...report });
    return report;
}
