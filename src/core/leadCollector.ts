import { DatabaseManager } from '../db';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { BatchSummary } from '../types/domain';
import { MAX_QUERY_LENGTH, sanitizeContactFields, sanitizeString } from '../validation/inputValidator';
import { emptySummary } from './batchSummary';
import { Clock, isoAt, systemClock } from './clock';
import { errorMessage } from './errors';
import { LookupFailureReason, PlaceLookupService } from './placeLookup';
import { insertLead } from './repositories';

export const DEFAULT_COLLECT_LIMIT = 20;

export interface PlaceCandidate {
    displayName: string;
    lat: unknown;
    lon: unknown;
    phone: unknown;
    email: unknown;
}

export interface CollectReport {
    city: string;
    service: string;
    source: 'cache' | 'network' | null;
    failure: LookupFailureReason | null;
    summary: BatchSummary;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Estrae i campi utili da un candidato grezzo del provider.
 * Senza `display_name` il candidato non è utilizzabile: `null`.
 */
export function parsePlaceCandidate(raw: unknown): PlaceCandidate | null {
    if (!isRecord(raw)) {
        return null;
    }
    const displayName = raw.display_name;
    if (typeof displayName !== 'string' || displayName.trim() === '') {
        return null;
    }
    const extratags = isRecord(raw.extratags) ? raw.extratags : {};
    return {
        displayName,
        lat: raw.lat,
        lon: raw.lon,
        phone: extratags.phone ?? extratags['contact:phone'],
        email: extratags.email ?? extratags['contact:email'],
    };
}

export async function collectLeads(
    db: DatabaseManager,
    lookup: PlaceLookupService,
    city: string,
    service: string,
    limit: number = DEFAULT_COLLECT_LIMIT,
    clock: Clock = systemClock
): Promise<CollectReport> {
    const category = sanitizeString(service, MAX_QUERY_LENGTH);
    const report: CollectReport = {
        city,
        service: category,
        source: null,
        failure: null,
        summary: emptySummary(),
    };

    const outcome = await lookup.search(city, category, limit);
    if (!outcome.ok) {
        report.failure = outcome.reason;
        await logWarn('collect.lookup_failed', { city, service: category, reason: outcome.reason });
        return report;
    }
    report.source = outcome.source;

    for (const raw of outcome.results) {
        const candidate = parsePlaceCandidate(raw);
        if (!candidate) {
            report.summary.errors += 1;
            await logWarn('collect.malformed_candidate', { city, service: category });
            continue;
        }

        const cleaned = sanitizeContactFields({
            name: candidate.displayName,
            address: candidate.displayName,
            phone: candidate.phone,
            email: candidate.email,
            lat: candidate.lat,
            lon: candidate.lon,
        });
        if (cleaned.downgraded.length > 0) {
            await logWarn('collect.fields_downgraded', { name: cleaned.value.name, downgraded: cleaned.downgraded });
        }

        try {
            const inserted = await insertLead(
                db,
                {
                    name: cleaned.value.name,
                    category,
                    address: cleaned.value.address,
                    location: cleaned.value.location,
                    phone: cleaned.value.phone,
                    email: cleaned.value.email,
                    source: 'nominatim',
                },
                isoAt(clock)
            );
            if (inserted.status === 'inserted') {
                report.summary.succeeded += 1;
            } else {
                report.summary.skipped += 1;
            }
        } catch (error) {
            report.summary.errors += 1;
            await logError('collect.insert_failed', {
                name: cleaned.value.name,
                error: errorMessage(error),
            });
        }
    }

    await logInfo('collect.completed', { city, service: category, source: report.source, ...report.summary });
    return report;
}
