/**
 * dispatchCommands.ts — Matching e registro job
 *
 * match, list-jobs, job-status
 */

import { config } from '../../config';
import { DatabaseManager } from '../../db';
import { formatSummary } from '../../core/batchSummary';
import { listJobs, updateJobStatus } from '../../core/jobLedger';
import { matchAllLeads } from '../../core/jobMatcher';
import {
    getOptionValue,
    getPositionalArgs,
    parseFloatStrict,
    parseIntStrict,
    parseJobStatus,
    parsePositiveInt,
    requireOption,
} from '../cliParser';

export async function runMatchCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const service = requireOption(args, '--service', 'match --service <servizio> [--max <n>]');
    const maxRaw = getOptionValue(args, '--max');
    const maxMatches = maxRaw ? parsePositiveInt(maxRaw, '--max') : config.matchDefaultMax;

    const report = await matchAllLeads(db, service, maxMatches);
    for (const outcome of report.outcomes) {
        if (outcome.status === 'created') {
            console.log(
                `  lead ${outcome.leadId} -> worker ${outcome.workerId} (job ${outcome.jobId}, ${outcome.distanceKm.toFixed(1)} km)`
            );
        } else if (outcome.status === 'failed') {
            console.warn(`  lead ${outcome.leadId}: ${outcome.reason} ${outcome.message}`);
        }
    }
    console.log(`Matching ${report.service}: ${report.created} job creati. ${formatSummary(report.summary)}`);
}

export async function runListJobsCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const statusRaw = getOptionValue(args, '--status');
    const limitRaw = getOptionValue(args, '--limit');
    const jobs = await listJobs(db, {
        status: statusRaw ? parseJobStatus(statusRaw) : undefined,
        limit: limitRaw ? parsePositiveInt(limitRaw, '--limit') : undefined,
    });
    console.log(JSON.stringify(jobs, null, 2));
}

export async function runJobStatusCommand(db: DatabaseManager, args: string[]): Promise<void> {
    const [jobIdRaw, statusRaw] = getPositionalArgs(args);
    if (!jobIdRaw || !statusRaw) {
        throw new Error('Uso: job-status <jobId> <complete|paid|cancelled> [--rating <0-5>] [--evidence <testo>] [--notes <testo>]');
    }
    const ratingRaw = getOptionValue(args, '--rating');
    const result = await updateJobStatus(db, parseIntStrict(jobIdRaw, 'jobId'), parseJobStatus(statusRaw), {
        rating: ratingRaw !== undefined ? parseFloatStrict(ratingRaw, '--rating') : undefined,
        evidence: getOptionValue(args, '--evidence'),
        notes: getOptionValue(args, '--notes'),
    });
    if (!result.ok) {
        console.error(`Job non aggiornato (${result.reason}): ${result.message}`);
        process.exitCode = 1;
        return;
    }
    console.log(`Job ${result.job.id}: ${result.previousStatus} -> ${result.job.status}`);
}
