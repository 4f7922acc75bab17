/**
 * Motore di matching lead -> worker.
 *
 * Greedy, un lead alla volta: nessuna esclusività sui worker, nessuna ottimizzazione globale.
 * Il punteggio combina distanza e rating (più basso = migliore).
 */

import { DatabaseManager } from '../db';
import { haversineKm, toGeoPoint } from '../geo/distance';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { BatchSummary, LeadRecord, WorkerRecord } from '../types/domain';
import { normalizeServiceKeyword } from '../validation/inputValidator';
import { emptySummary } from './batchSummary';
import { Clock, isoAt, systemClock } from './clock';
import { errorMessage, InvalidTransitionError, NotFoundError } from './errors';
import { assertLeadTransition } from './leadStateService';
import {
    findEligibleWorkers,
    getLeadById,
    getWorkerById,
    insertJob,
    listNewLeadsForService,
    setLeadStatus,
    withTransaction,
} from './repositories';

export const UNKNOWN_DISTANCE_PENALTY_KM = 999;
export const RATING_WEIGHT = 2;
export const DEFAULT_MAX_MATCHES = 50;

export type MatchResult =
    | { kind: 'matched'; worker: WorkerRecord; distanceKm: number; score: number }
    | { kind: 'no_match' }
    | { kind: 'not_found' };

export type CreateJobFailureReason = 'not_found' | 'invalid_transition' | 'write_failed';

export type CreateJobResult =
    | { ok: true; jobId: number }
    | { ok: false; reason: CreateJobFailureReason; message: string };

export type LeadMatchOutcome =
    | { leadId: number; status: 'created'; jobId: number; workerId: number; distanceKm: number; score: number }
    | { leadId: number; status: 'no_match' }
    | { leadId: number; status: 'failed'; reason: CreateJobFailureReason | 'lookup_failed'; message: string };

export interface MatchReport {
    service: string;
    created: number;
    outcomes: LeadMatchOutcome[];
    summary: BatchSummary;
}

export function scoreCandidate(lead: LeadRecord, worker: WorkerRecord): { distanceKm: number; score: number } {
    const distance = haversineKm(toGeoPoint(lead.lat, lead.lon), toGeoPoint(worker.lat, worker.lon));
    const distanceKm = distance ?? UNKNOWN_DISTANCE_PENALTY_KM;
    return { distanceKm, score: distanceKm - RATING_WEIGHT * Number(worker.rating) };
}

export async function findBestWorker(db: DatabaseManager, leadId: number, service: string): Promise<MatchResult> {
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        return { kind: 'not_found' };
    }

    const keyword = normalizeServiceKeyword(service);
    if (!keyword) {
        return { kind: 'no_match' };
    }
    const candidates = await findEligibleWorkers(db, keyword);

    let best: { worker: WorkerRecord; distanceKm: number; score: number } | null = null;
    for (const worker of candidates) {
        const scored = scoreCandidate(lead, worker);
        // strettamente minore: a parità resta il primo nell'ordine rating/lavori/id
        if (best === null || scored.score < best.score) {
            best = { worker, ...scored };
        }
    }

    if (best === null) {
        return { kind: 'no_match' };
    }
    return { kind: 'matched', ...best };
}

/**
 * Inserisce il job e porta il lead a `contacted` nella stessa transazione.
 * Qualsiasi errore annulla entrambe le scritture.
 */
export async function createJob(
    db: DatabaseManager,
    leadId: number,
    workerId: number,
    service: string,
    price: number = 0,
    clock: Clock = systemClock
): Promise<CreateJobResult> {
    const now = isoAt(clock);
    try {
        const jobId = await withTransaction(db, async () => {
            const lead = await getLeadById(db, leadId);
            if (!lead) {
                throw new NotFoundError('lead', leadId);
            }
            const worker = await getWorkerById(db, workerId);
            if (!worker) {
                throw new NotFoundError('worker', workerId);
            }
            assertLeadTransition(lead.status, 'contacted');

            const insertedId = await insertJob(db, { leadId, workerId, service, price }, now);
            await setLeadStatus(db, leadId, 'contacted', now);
            return insertedId;
        });
        await logInfo('match.job_created', { jobId, leadId, workerId, service });
        return { ok: true, jobId };
    } catch (error) {
        const message = errorMessage(error);
        if (error instanceof NotFoundError) {
            return { ok: false, reason: 'not_found', message };
        }
        if (error instanceof InvalidTransitionError) {
            return { ok: false, reason: 'invalid_transition', message };
        }
        await logError('match.job_write_failed', { leadId, workerId, error: message });
        return { ok: false, reason: 'write_failed', message };
    }
}

export async function matchAllLeads(
    db: DatabaseManager,
    service: string,
    maxMatches: number = DEFAULT_MAX_MATCHES,
    clock: Clock = systemClock
): Promise<MatchReport> {
    const keyword = normalizeServiceKeyword(service);
    const report: MatchReport = { service: keyword, created: 0, outcomes: [], summary: emptySummary() };
    if (!keyword || maxMatches <= 0) {
        return report;
    }

    const leads = await listNewLeadsForService(db, keyword, maxMatches);
    for (const lead of leads) {
        let match: MatchResult;
        try {
            match = await findBestWorker(db, lead.id, keyword);
        } catch (error) {
            const message = errorMessage(error);
            report.outcomes.push({ leadId: lead.id, status: 'failed', reason: 'lookup_failed', message });
            report.summary.errors += 1;
            await logError('match.lookup_failed', { leadId: lead.id, error: message });
            continue;
        }

        if (match.kind !== 'matched') {
            report.outcomes.push({ leadId: lead.id, status: 'no_match' });
            report.summary.skipped += 1;
            await logWarn('match.no_worker', { leadId: lead.id, service: keyword });
            continue;
        }

        const created = await createJob(db, lead.id, match.worker.id, keyword, 0, clock);
        if (created.ok) {
            report.created += 1;
            report.summary.succeeded += 1;
            report.outcomes.push({
                leadId: lead.id,
                status: 'created',
                jobId: created.jobId,
                workerId: match.worker.id,
                distanceKm: match.distanceKm,
                score: match.score,
            });
        } else {
            report.summary.errors += 1;
            report.outcomes.push({ leadId: lead.id, status: 'failed', reason: created.reason, message: created.message });
            await logWarn('match.job_failed', { leadId: lead.id, reason: created.reason, error: created.message });
        }
    }

    await logInfo('match.completed', { service: keyword, created: report.created, ...report.summary });
    return report;
}
