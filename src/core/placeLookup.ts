import { DatabaseManager } from '../db';
import { NominatimClient, PlaceSearchProvider } from '../integrations/nominatimClient';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { MAX_QUERY_LENGTH, sanitizeString } from '../validation/inputValidator';
import { Clock, systemClock } from './clock';
import { errorMessage, LookupFailureKind, LookupTransportError } from './errors';
import { classifyTransportFailure } from './integrationPolicy';
import { LookupCache } from './lookupCache';
import { RateGate } from './rateGate';

export type LookupFailureReason = LookupFailureKind | 'invalid_query';

export type LookupOutcome =
    | { ok: true; source: 'cache' | 'network'; results: unknown[] }
    | { ok: false; reason: LookupFailureReason; message: string; results: [] };

/**
 * Ricerca "<query>, <city>" sul provider esterno passando da cache e rate gate.
 * I fallimenti di trasporto non vengono mai messi in cache.
 */
export class PlaceLookupService {
    private readonly provider: PlaceSearchProvider;
    private readonly cache: LookupCache;
    private readonly gate: RateGate;

    constructor(provider: PlaceSearchProvider, cache: LookupCache, gate: RateGate) {
        this.provider = provider;
        this.cache = cache;
        this.gate = gate;
    }

    async search(rawCity: string, rawQuery: string, limit: number): Promise<LookupOutcome> {
        const city = sanitizeString(rawCity, MAX_QUERY_LENGTH);
        const query = sanitizeString(rawQuery, MAX_QUERY_LENGTH);
        if (!city || !query) {
            return { ok: false, reason: 'invalid_query', message: 'Città e query sono obbligatorie.', results: [] };
        }

        const cached = await this.readCache(city, query);
        if (cached !== null) {
            await logInfo('lookup.cache_hit', { city, query, results: cached.length });
            return { ok: true, source: 'cache', results: cached };
        }

        const waitedMs = await this.gate.acquire();
        let results: unknown[];
        try {
            results = await this.provider.search({ query: `${query}, ${city}`, limit });
        } catch (error) {
            const reason = error instanceof LookupTransportError ? error.kind : classifyTransportFailure(error);
            const message = errorMessage(error);
            await logWarn('lookup.failed', { city, query, reason, error: message });
            return { ok: false, reason, message, results: [] };
        }

        await this.writeCache(city, query, limit, results);
        await logInfo('lookup.fetched', { city, query, results: results.length, waitedMs });
        return { ok: true, source: 'network', results };
    }

    // Un errore in lettura vale come miss.
    private async readCache(city: string, query: string): Promise<unknown[] | null> {
        try {
            return await this.cache.get(city, query);
        } catch (error) {
            await logError('lookup.cache_failed', { city, query, operation: 'read', error: errorMessage(error) });
            return null;
        }
    }

    // I risultati già scaricati valgono anche se la scrittura in cache fallisce.
    private async writeCache(city: string, query: string, limit: number, results: unknown[]): Promise<void> {
        try {
            await this.cache.put(city, query, { city, query, limit }, results);
        } catch (error) {
            await logError('lookup.cache_failed', { city, query, operation: 'write', error: errorMessage(error) });
        }
    }
}

export interface PlaceLookupSettings {
    lookupBaseUrl: string;
    lookupUserAgent: string;
    lookupTimeoutMs: number;
    lookupMinIntervalMs: number;
    lookupCacheTtlHours: number;
}

export function createPlaceLookupService(db: DatabaseManager, settings: PlaceLookupSettings, clock: Clock = systemClock): PlaceLookupService {
    const provider = new NominatimClient({
        baseUrl: settings.lookupBaseUrl,
        userAgent: settings.lookupUserAgent,
        timeoutMs: settings.lookupTimeoutMs,
    });
    const cache = new LookupCache(db, clock, settings.lookupCacheTtlHours * 60 * 60 * 1000);
    return new PlaceLookupService(provider, cache, new RateGate(settings.lookupMinIntervalMs, clock));
}
