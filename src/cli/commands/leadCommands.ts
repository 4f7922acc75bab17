/**
 * leadCommands.ts — Raccolta e gestione dei lead
 *
 * collect, list-leads, lead-status
 */

import { config } from '../../config';
import { DatabaseManager } from '../../db';
import { formatSummary } from '../../core/batchSummary';
import { isoAt, systemClock } from '../../core/clock';
import { InvalidTransitionError, NotFoundError } from '../../core/errors';
import { DEFAULT_COLLECT_LIMIT, collectLeads } from '../../core/leadCollector';
import { transitionLead } from '../../core/leadStateService';
import { createPlaceLookupService } from '../../core/placeLookup';
import { listLeads } from '../../core/repositories';
import { getOptionValue, getPositionalArgs, parseIntStrict, parseLeadStatus, parsePositiveInt, requireOption } from '../cliParser';

export async function runCollectCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const usage = 'collect --city <città> --service <servizio> [--limit <n>]';
    const city = requireOption(args, '--city', usage);
    const service = requireOption(args, '--service', usage);
    const limitRaw = getOptionValue(args, '--limit');
    const requested = limitRaw ? parsePositiveInt(limitRaw, '--limit') : DEFAULT_COLLECT_LIMIT;
    const limit = Math.min(requested, config.lookupMaxResults);

    const lookup = createPlaceLookupService(db, config, systemClock);
    const report = await collectLeads(db, lookup, city, service, limit, systemClock);
    if (report.failure) {
        console.error(`Ricerca fallita (${report.failure}): nessun lead raccolto.`);
        process.exitCode = 1;
        return;
    }
    console.log(`Raccolta ${report.service} @ ${report.city} [${report.source ?? 'n/d'}]: ${formatSummary(report.summary)}`);
}

export async function runListLeadsCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const limitRaw = getOptionValue(args, '--limit') ?? getPositionalArgs(args)[0];
    const limit = limitRaw ? parsePositiveInt(limitRaw, '--limit') : 50;
    const leads = await listLeads(db, limit);
    console.log(JSON.stringify(leads, null, 2));
}

export async function runLeadStatusCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const [leadIdRaw, statusRaw] = getPositionalArgs(args);
    if (!leadIdRaw || !statusRaw) {
        throw new Error('Uso: lead-status <leadId> <new|contacted|converted|invalid>');
    }
    const leadId = parseIntStrict(leadIdRaw, 'leadId');
    const status = parseLeadStatus(statusRaw);
    try {
        const previous = await transitionLead(db, leadId, status, isoAt(systemClock));
        console.log(`Lead ${leadId}: ${previous} -> ${status}`);
    } catch (error) {
        if (error instanceof NotFoundError || error instanceof InvalidTransitionError) {
            console.error(error.message);
            process.exitCode = 1;
            return;
        }
        throw error;
    }
}
