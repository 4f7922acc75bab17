import { DatabaseManager } from '../db';
import { logInfo, logWarn } from '../telemetry/logger';
import { WorkerRecord } from '../types/domain';
import { DowngradedField, RawContactFields, sanitizeContactFields } from '../validation/inputValidator';
import { Clock, isoAt, systemClock } from './clock';
import { NewWorkerInput, insertWorker, listActiveWorkers } from './repositories';

export const DEFAULT_WORKER_LIST_LIMIT = 50;

export interface PreparedWorker {
    input: NewWorkerInput;
    downgraded: DowngradedField[];
}

export type PrepareWorkerResult =
    | { ok: true; worker: PreparedWorker }
    | { ok: false; message: string };

/**
 * Normalizza un worker grezzo: skills minuscole e separate da virgola, recapiti non validi azzerati.
 */
export function prepareWorker(raw: RawContactFields): PrepareWorkerResult {
    const cleaned = sanitizeContactFields(raw);
    const skills = cleaned.value.skills
        .split(',')
        .map((skill) => skill.trim())
        .filter((skill) => skill.length > 0)
        .join(',');

    if (!cleaned.value.name) {
        return { ok: false, message: 'Nome worker mancante.' };
    }
    if (!skills) {
        return { ok: false, message: 'Skills worker mancanti.' };
    }

    return {
        ok: true,
        worker: {
            input: {
                name: cleaned.value.name,
                skills,
                phone: cleaned.value.phone,
                email: cleaned.value.email,
                location: cleaned.value.location,
                note: cleaned.value.note,
            },
            downgraded: cleaned.downgraded,
        },
    };
}

export type AddWorkerResult =
    | { ok: true; workerId: number; downgraded: DowngradedField[] }
    | { ok: false; reason: 'invalid_input' | 'duplicate'; message: string };

/**
 * Inserimento singolo: a differenza dell'import massivo, telefono o email non validi
 * bloccano la scrittura invece di essere azzerati.
 */
export async function addWorker(
    db: DatabaseManager,
    raw: RawContactFields,
    clock: Clock = systemClock
): Promise<AddWorkerResult> {
    const prepared = prepareWorker(raw);
    if (!prepared.ok) {
        return { ok: false, reason: 'invalid_input', message: prepared.message };
    }

    const rejected = prepared.worker.downgraded.filter(
        (entry) => entry.reason === 'invalid_phone' || entry.reason === 'invalid_email'
    );
    if (rejected.length > 0) {
        const fields = rejected.map((entry) => entry.field).join(', ');
        return { ok: false, reason: 'invalid_input', message: `Campi non validi: ${fields}.` };
    }
    if (prepared.worker.downgraded.length > 0) {
        await logWarn('worker.fields_downgraded', {
            name: prepared.worker.input.name,
            downgraded: prepared.worker.downgraded,
        });
    }

    const inserted = await insertWorker(db, prepared.worker.input, isoAt(clock));
    if (inserted.status === 'duplicate') {
        return { ok: false, reason: 'duplicate', message: 'Esiste già un worker con questo telefono.' };
    }
    await logInfo('worker.added', { workerId: inserted.id, skills: prepared.worker.input.skills });
    return { ok: true, workerId: inserted.id, downgraded: prepared.worker.downgraded };
}

export async function listWorkers(db: DatabaseManager, limit: number = DEFAULT_WORKER_LIST_LIMIT): Promise<WorkerRecord[]> {
    return listActiveWorkers(db, limit);
}
