/**
 * adminCommands.ts — Export, statistiche e manutenzione
 *
 * export, stats, cleanup
 */

import { DatabaseManager } from '../../db';
import { cleanupDatabase } from '../../core/maintenance';
import { getSystemStats } from '../../core/repositories';
import { EXPORT_KINDS, ExportKind, exportByKind } from '../../reporting/exporter';
import { getOptionValue, getPositionalArgs } from '../cliParser';

function parseExportKind(raw: string | undefined): ExportKind {
    const match = EXPORT_KINDS.find((kind) => kind === raw);
    if (!match) {
        throw new Error(`Uso: export <${EXPORT_KINDS.join('|')}> [--output <file.csv>]`);
    }
    return match;
}

export async function runExportCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const kind = parseExportKind(getOptionValue(args, '--type') ?? getPositionalArgs(args)[0]);
    const result = await exportByKind(db, kind, getOptionValue(args, '--output'));
    if (result.rows === 0) {
        console.log(`Nessun record ${kind} da esportare.`);
        return;
    }
    console.log(`Esportati ${result.rows} ${kind} in ${result.path}`);
}

export async function runStatsCommand(db: DatabaseManager): Promise<void> {
    const stats = await getSystemStats(db);
    console.log(JSON.stringify(stats, null, 2));
}

export async function runCleanupCommand(db: DatabaseManager): Promise<void> {
    const report = await cleanupDatabase(db);
    console.log(
        `Pulizia completata: ${report.degenerateLeads} lead non validi, ${report.duplicateLeads} duplicati, ${report.expiredCacheEntries} voci cache scadute rimossi.`
    );
}
