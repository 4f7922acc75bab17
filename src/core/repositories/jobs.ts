/**
 * repositories/jobs.ts
 * Registro dei job di dispatch: inserimento, lettura filtrata per stato, aggiornamento stato.
 */

import { DatabaseManager } from '../../db';
import { JobListItem, JobRecord, JobStatus } from '../../types/domain';
import { requireLastId } from './shared';

const JOB_SELECT_COLUMNS = `id, lead_id, worker_id, service, price, status, evidence, notes,
    created_at, updated_at, completed_at`;

export interface NewJobInput {
    leadId: number;
    workerId: number;
    service: string;
    price: number;
}

export async function insertJob(db: DatabaseManager, input: NewJobInput, now: string): Promise<number> {
    const result = await db.run(
        `
        INSERT INTO jobs (lead_id, worker_id, service, price, status, created_at)
        VALUES (?, ?, ?, ?, 'dispatched', ?)
    `,
        [input.leadId, input.workerId, input.service, input.price, now]
    );
    return requireLastId(result.lastID, 'jobs');
}

export async function getJobById(db: DatabaseManager, jobId: number): Promise<JobRecord | null> {
    const row = await db.get<JobRecord>(`SELECT ${JOB_SELECT_COLUMNS} FROM jobs WHERE id = ?`, [jobId]);
    return row ?? null;
}

export async function listJobsForLead(db: DatabaseManager, leadId: number): Promise<JobRecord[]> {
    return db.query<JobRecord>(`SELECT ${JOB_SELECT_COLUMNS} FROM jobs WHERE lead_id = ? ORDER BY id`, [leadId]);
}

export async function listJobs(db: DatabaseManager, status: JobStatus | null, limit: number): Promise<JobListItem[]> {
    const whereClause = status ? 'WHERE j.status = ?' : '';
    const params: unknown[] = status ? [status, Math.max(1, limit)] : [Math.max(1, limit)];
    return db.query<JobListItem>(
        `
        SELECT j.id, j.service, j.status, j.price, j.created_at,
               l.name AS lead_name, w.name AS worker_name, w.phone AS worker_phone
        FROM jobs j
        JOIN leads l ON j.lead_id = l.id
        JOIN workers w ON j.worker_id = w.id
        ${whereClause}
        ORDER BY j.id DESC
        LIMIT ?
    `,
        params
    );
}

export interface JobExportRow {
    id: number;
    service: string;
    status: JobStatus;
    price: number;
    created_at: string;
    lead_name: string;
    lead_phone: string;
    worker_name: string;
    worker_phone: string | null;
}

export async function listJobsForExport(db: DatabaseManager): Promise<JobExportRow[]> {
    return db.query<JobExportRow>(
        `
        SELECT j.id, j.service, j.status, j.price, j.created_at,
               l.name AS lead_name, l.phone AS lead_phone,
               w.name AS worker_name, w.phone AS worker_phone
        FROM jobs j
        JOIN leads l ON j.lead_id = l.id
        JOIN workers w ON j.worker_id = w.id
        ORDER BY j.id
    `
    );
}

export interface JobStatusPatch {
    evidence?: string;
    notes?: string;
    completedAt?: string;
}

export async function setJobStatus(
    db: DatabaseManager,
    jobId: number,
    fromStatus: JobStatus,
    toStatus: JobStatus,
    patch: JobStatusPatch,
    now: string
): Promise<number> {
    const result = await db.run(
        `
        UPDATE jobs
        SET status = ?,
            evidence = COALESCE(?, evidence),
            notes = COALESCE(?, notes),
            completed_at = COALESCE(?, completed_at),
            updated_at = ?
        WHERE id = ? AND status = ?
    `,
        [toStatus, patch.evidence ?? null, patch.notes ?? null, patch.completedAt ?? null, now, jobId, fromStatus]
    );
    return result.changes ?? 0;
}
