import fs from 'fs';
import csv from 'csv-parser';
import { DatabaseManager } from './db';
import { emptySummary } from './core/batchSummary';
import { Clock, isoAt, systemClock } from './core/clock';
import { errorMessage } from './core/errors';
import { insertWorker } from './core/repositories';
import { prepareWorker } from './core/workerManager';
import { logError, logInfo, logWarn } from './telemetry/logger';
import { BatchSummary } from './types/domain';

export interface ImportRowError {
    row: number;
    message: string;
}

export interface ImportResult {
    summary: BatchSummary;
    rowErrors: ImportRowError[];
}

/**
 * Legge un valore da un record CSV provando più possibili nomi di colonna in ordine.
 */
function pickField(row: Record<string, string>, ...keys: string[]): string {
    for (const key of keys) {
        const val = row[key];
        if (val && val.trim()) {
            return val.trim();
        }
    }
    return '';
}

export async function readCsvRows(filePath: string): Promise<Array<Record<string, string>>> {
    const rows: Array<Record<string, string>> = [];

    await new Promise<void>((resolve, reject) => {
        fs.createReadStream(filePath)
            .on('error', reject)
            .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
            .on('data', (row: Record<string, string>) => rows.push(row))
            .on('end', resolve)
            .on('error', reject);
    });

    return rows;
}

/**
 * Import massivo dei worker. Recapiti non validi vengono azzerati, coordinate mancanti
 * o non valide diventano posizione sconosciuta; un telefono già presente conta come duplicato.
 */
export async function importWorkersFromCSV(
    db: DatabaseManager,
    filePath: string,
    clock: Clock = systemClock
): Promise<ImportResult> {
    const rows = await readCsvRows(filePath);
    const summary = emptySummary();
    const rowErrors: ImportRowError[] = [];

    for (const [index, row] of rows.entries()) {
        // riga 1 = intestazione
        const rowNumber = index + 2;
        const prepared = prepareWorker({
            name: pickField(row, 'name', 'full_name'),
            skills: pickField(row, 'skills'),
            phone: pickField(row, 'phone'),
            email: pickField(row, 'email'),
            lat: pickField(row, 'lat', 'latitude'),
            lon: pickField(row, 'lon', 'lng', 'longitude'),
        });
        if (!prepared.ok) {
            summary.errors += 1;
            rowErrors.push({ row: rowNumber, message: prepared.message });
            continue;
        }
        if (prepared.worker.downgraded.length > 0) {
            await logWarn('import.fields_downgraded', { row: rowNumber, downgraded: prepared.worker.downgraded });
        }

        try {
            const inserted = await insertWorker(db, prepared.worker.input, isoAt(clock));
            if (inserted.status === 'inserted') {
                summary.succeeded += 1;
            } else {
                summary.skipped += 1;
            }
        } catch (error) {
            const message = errorMessage(error);
            summary.errors += 1;
            rowErrors.push({ row: rowNumber, message });
            await logError('import.row_failed', { row: rowNumber, error: message });
        }
    }

    await logInfo('import.completed', { file: filePath, ...summary });
    return { summary, rowErrors };
}
