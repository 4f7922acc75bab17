/**
 * repositories/workers.ts
 */

import { DatabaseManager } from '../../db';
import { GeoPoint, WorkerRecord } from '../../types/domain';
import { InsertOutcome, isUniqueConstraintError, requireLastId } from './shared';

export const WORKER_SELECT_COLUMNS = `id, name, skills, phone, email, lat, lon, status, rating, rating_count,
    jobs_completed, note, created_at, updated_at`;

export interface NewWorkerInput {
    name: string;
    skills: string;
    phone: string;
    email: string;
    location: GeoPoint | null;
    note?: string;
}

export async function insertWorker(db: DatabaseManager, input: NewWorkerInput, now: string): Promise<InsertOutcome> {
    try {
        const result = await db.run(
            `
            INSERT INTO workers (name, skills, phone, email, lat, lon, note, status, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, 'active', ?)
        `,
            [
                input.name,
                input.skills,
                // telefono vuoto = NULL, altrimenti il vincolo UNIQUE blocca i worker senza telefono
                input.phone || null,
                input.email,
                input.location?.lat ?? null,
                input.location?.lon ?? null,
                input.note || null,
                now,
            ]
        );
        return { status: 'inserted', id: requireLastId(result.lastID, 'workers') };
    } catch (error) {
        if (isUniqueConstraintError(error)) {
            return { status: 'duplicate' };
        }
        throw error;
    }
}

export async function getWorkerById(db: DatabaseManager, workerId: number): Promise<WorkerRecord | null> {
    const row = await db.get<WorkerRecord>(`SELECT ${WORKER_SELECT_COLUMNS} FROM workers WHERE id = ?`, [workerId]);
    return row ?? null;
}

export async function listActiveWorkers(db: DatabaseManager, limit: number): Promise<WorkerRecord[]> {
    return db.query<WorkerRecord>(
        `
        SELECT ${WORKER_SELECT_COLUMNS} FROM workers
        WHERE status = 'active'
        ORDER BY jobs_completed DESC, id DESC
        LIMIT ?
    `,
        [Math.max(1, limit)]
    );
}

export async function listAllWorkers(db: DatabaseManager): Promise<WorkerRecord[]> {
    return db.query<WorkerRecord>(`SELECT ${WORKER_SELECT_COLUMNS} FROM workers ORDER BY id`);
}

/**
 * Worker attivi con la skill richiesta (sottostringa, case-insensitive).
 * L'ordinamento è anche il tie-break del matching: rating, poi lavori completati.
 */
export async function findEligibleWorkers(db: DatabaseManager, service: string): Promise<WorkerRecord[]> {
    return db.query<WorkerRecord>(
        `
        SELECT ${WORKER_SELECT_COLUMNS} FROM workers
        WHERE status = 'active' AND instr(lower(skills), lower(?)) > 0
        ORDER BY rating DESC, jobs_completed DESC, id ASC
    `,
        [service]
    );
}

/**
 * Registra un lavoro completato; il voto (se presente) entra nella media mobile del worker.
 */
export async function recordWorkerCompletion(
    db: DatabaseManager,
    workerId: number,
    rating: number | null,
    now: string
): Promise<number> {
    if (rating === null) {
        const result = await db.run(
            `UPDATE workers SET jobs_completed = jobs_completed + 1, updated_at = ? WHERE id = ?`,
            [now, workerId]
        );
        return result.changes ?? 0;
    }
    const result = await db.run(
        `
        UPDATE workers
        SET jobs_completed = jobs_completed + 1,
            rating = ((rating * rating_count) + ?) / (rating_count + 1),
            rating_count = rating_count + 1,
            updated_at = ?
        WHERE id = ?
    `,
        [rating, now, workerId]
    );
    return result.changes ?? 0;
}
