import { DatabaseManager } from '../db';
import { logInfo } from '../telemetry/logger';
import { JobListItem, JobRecord, JobStatus } from '../types/domain';
import { MAX_NOTE_LENGTH, sanitizeString } from '../validation/inputValidator';
import { Clock, isoAt, systemClock } from './clock';
import { InvalidTransitionError, NotFoundError, ValidationError } from './errors';
import * as repositories from './repositories';

export const DEFAULT_JOB_LIST_LIMIT = 50;
export const MIN_RATING = 0;
export const MAX_RATING = 5;

const allowedJobTransitions: Record<JobStatus, JobStatus[]> = {
    dispatched: ['complete', 'cancelled'],
    complete: ['paid'],
    paid: [],
    cancelled: [],
};

export function isValidJobTransition(fromStatus: JobStatus, toStatus: JobStatus): boolean {
    return allowedJobTransitions[fromStatus].includes(toStatus);
}

export interface ListJobsOptions {
    status?: JobStatus;
    limit?: number;
}

export interface JobStatusUpdate {
    evidence?: string;
    notes?: string;
    rating?: number;
}

export type UpdateJobStatusResult =
    | { ok: true; job: JobRecord; previousStatus: JobStatus }
    | { ok: false; reason: 'not_found' | 'invalid_transition' | 'invalid_rating'; message: string };

export async function listJobs(db: DatabaseManager, options: ListJobsOptions = {}): Promise<JobListItem[]> {
    return repositories.listJobs(db, options.status ?? null, options.limit ?? DEFAULT_JOB_LIST_LIMIT);
}

export async function getJobById(db: DatabaseManager, jobId: number): Promise<JobRecord | null> {
    return repositories.getJobById(db, jobId);
}

/**
 * Avanza lo stato di un job. Il passaggio a `complete` registra anche il feedback sul worker
 * (lavori completati e, se presente, il voto) nella stessa transazione.
 */
export async function updateJobStatus(
    db: DatabaseManager,
    jobId: number,
    nextStatus: JobStatus,
    update: JobStatusUpdate = {},
    clock: Clock = systemClock
): Promise<UpdateJobStatusResult> {
    const rating = update.rating;
    if (rating !== undefined && (!Number.isFinite(rating) || rating < MIN_RATING || rating > MAX_RATING)) {
        return { ok: false, reason: 'invalid_rating', message: `Voto fuori intervallo [${MIN_RATING}, ${MAX_RATING}].` };
    }

    const now = isoAt(clock);
    try {
        const outcome = await repositories.withTransaction(db, async () => {
            const job = await repositories.getJobById(db, jobId);
            if (!job) {
                throw new NotFoundError('job', jobId);
            }
            if (!isValidJobTransition(job.status, nextStatus)) {
                throw new InvalidTransitionError('job', job.status, nextStatus);
            }

            const changes = await repositories.setJobStatus(
                db,
                jobId,
                job.status,
                nextStatus,
                {
                    evidence: update.evidence !== undefined ? sanitizeString(update.evidence, MAX_NOTE_LENGTH) : undefined,
                    notes: update.notes !== undefined ? sanitizeString(update.notes, MAX_NOTE_LENGTH) : undefined,
                    completedAt: nextStatus === 'complete' ? now : undefined,
                },
                now
            );
            if (changes === 0) {
                throw new ValidationError(`Job ${jobId} modificato in concorrenza.`);
            }
            if (nextStatus === 'complete') {
                await repositories.recordWorkerCompletion(db, job.worker_id, rating ?? null, now);
            }

            const updated = await repositories.getJobById(db, jobId);
            if (!updated) {
                throw new NotFoundError('job', jobId);
            }
            return { job: updated, previousStatus: job.status };
        });
        await logInfo('job.status_changed', { jobId, from: outcome.previousStatus, to: nextStatus });
        return { ok: true, ...outcome };
    } catch (error) {
        if (error instanceof NotFoundError) {
            return { ok: false, reason: 'not_found', message: error.message };
        }
        if (error instanceof InvalidTransitionError) {
            return { ok: false, reason: 'invalid_transition', message: error.message };
        }
        throw error;
    }
}
