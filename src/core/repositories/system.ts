/**
 * repositories/system.ts
 * Audit log, statistiche aggregate e query di manutenzione.
 */

import { DatabaseManager } from '../../db';
import { LogLevel } from '../../types/domain';

export async function recordSystemLog(
    db: DatabaseManager,
    level: LogLevel,
    component: string,
    message: string,
    details: Record<string, unknown>
): Promise<void> {
    await db.run(
        `
        INSERT INTO system_logs (level, component, message, details, created_at)
        VALUES (?, ?, ?, ?, ?)
    `,
        [level, component, message, JSON.stringify(details), new Date().toISOString()]
    );
}

export interface SystemStats {
    leads: { total: number; categories: number; byStatus: Record<string, number> };
    workers: { active: number; averageRating: number; jobsCompleted: number };
    jobs: { total: number; revenue: number; byStatus: Record<string, number> };
    messages: { byChannel: Record<string, number> };
}

async function countBy(db: DatabaseManager, sql: string): Promise<Record<string, number>> {
    const rows = await db.query<{ label: string; total: number }>(sql);
    const output: Record<string, number> = {};
    for (const row of rows) {
        output[row.label] = Number(row.total);
    }
    return output;
}

export async function getSystemStats(db: DatabaseManager): Promise<SystemStats> {
    const leadTotals = await db.get<{ total: number; categories: number }>(
        `SELECT COUNT(*) AS total, COUNT(DISTINCT category) AS categories FROM leads`
    );
    const activeWorkers = await db.get<{ total: number }>(`SELECT COUNT(*) AS total FROM workers WHERE status = 'active'`);
    const workerTotals = await db.get<{ avg_rating: number | null; jobs_completed: number | null }>(
        `SELECT AVG(rating) AS avg_rating, SUM(jobs_completed) AS jobs_completed FROM workers`
    );
    const jobTotals = await db.get<{ total: number; revenue: number | null }>(
        `SELECT COUNT(*) AS total, SUM(price) AS revenue FROM jobs`
    );

    return {
        leads: {
            total: Number(leadTotals?.total ?? 0),
            categories: Number(leadTotals?.categories ?? 0),
            byStatus: await countBy(db, `SELECT status AS label, COUNT(*) AS total FROM leads GROUP BY status`),
        },
        workers: {
            active: Number(activeWorkers?.total ?? 0),
            averageRating: Number(workerTotals?.avg_rating ?? 0),
            jobsCompleted: Number(workerTotals?.jobs_completed ?? 0),
        },
        jobs: {
            total: Number(jobTotals?.total ?? 0),
            revenue: Number(jobTotals?.revenue ?? 0),
            byStatus: await countBy(db, `SELECT status AS label, COUNT(*) AS total FROM jobs GROUP BY status`),
        },
        messages: {
            byChannel: await countBy(db, `SELECT channel AS label, COUNT(*) AS total FROM messages GROUP BY channel`),
        },
    };
}

// I lead referenziati da job o messaggi non vengono mai cancellati (foreign key).
const UNREFERENCED_LEAD_CLAUSE = `
    id NOT IN (SELECT lead_id FROM jobs)
    AND id NOT IN (SELECT lead_id FROM messages)`;

/**
 * Lead senza posizione e senza alcun recapito: inutilizzabili sia per il matching sia per l'outreach.
 */
export async function deleteDegenerateLeads(db: DatabaseManager): Promise<number> {
    const result = await db.run(
        `
        DELETE FROM leads
        WHERE (lat IS NULL OR lon IS NULL OR (lat = 0 AND lon = 0))
          AND phone = '' AND email = ''
          AND ${UNREFERENCED_LEAD_CLAUSE}
    `
    );
    return result.changes ?? 0;
}

export async function deleteDuplicateLeads(db: DatabaseManager): Promise<number> {
    const result = await db.run(
        `
        DELETE FROM leads
        WHERE id NOT IN (
            SELECT MIN(id) FROM leads
            GROUP BY name, IFNULL(lat, 1000.0), IFNULL(lon, 1000.0)
        )
          AND ${UNREFERENCED_LEAD_CLAUSE}
    `
    );
    return result.changes ?? 0;
}

export async function vacuumDatabase(db: DatabaseManager): Promise<void> {
    await db.exec('VACUUM');
}
