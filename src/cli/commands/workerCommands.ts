/**
 * workerCommands.ts — Anagrafica worker
 *
 * import-workers, add-worker, list-workers
 */

import { DatabaseManager } from '../../db';
import { formatSummary } from '../../core/batchSummary';
import { addWorker, listWorkers } from '../../core/workerManager';
import { importWorkersFromCSV } from '../../csvImporter';
import { getOptionValue, getPositionalArgs, parsePositiveInt, requireOption } from '../cliParser';

export async function runImportWorkersCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const filePath = getOptionValue(args, '--file') ?? getPositionalArgs(args)[0];
    if (!filePath) {
        throw new Error('Specifica il CSV: import-workers --file path/to/workers.csv');
    }

    const result = await importWorkersFromCSV(db, filePath);
    for (const rowError of result.rowErrors) {
        console.warn(`[IMPORT] riga ${rowError.row}: ${rowError.message}`);
    }
    console.log(`Import worker completato: ${formatSummary(result.summary)}`);
}

export async function runAddWorkerCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const usage = 'add-worker --name <nome> --skills <a,b> [--phone <tel>] [--email <email>] [--lat <lat> --lon <lon>]';
    const result = await addWorker(db, {
        name: requireOption(args, '--name', usage),
        skills: requireOption(args, '--skills', usage),
        phone: getOptionValue(args, '--phone'),
        email: getOptionValue(args, '--email'),
        lat: getOptionValue(args, '--lat'),
        lon: getOptionValue(args, '--lon'),
        note: getOptionValue(args, '--note'),
    });
    if (!result.ok) {
        console.error(`Worker non aggiunto (${result.reason}): ${result.message}`);
        process.exitCode = 1;
        return;
    }
    console.log(`Worker aggiunto: id=${result.workerId}`);
}

export async function runListWorkersCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const limitRaw = getOptionValue(args, '--limit') ?? getPositionalArgs(args)[0];
    const limit = limitRaw ? parsePositiveInt(limitRaw, '--limit') : 50;
    const workers = await listWorkers(db, limit);
    console.log(JSON.stringify(workers, null, 2));
}
