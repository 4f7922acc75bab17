import { errorMessage, LookupTransportError } from '../core/errors';
import { classifyTransportFailure, fetchWithTimeout } from '../core/integrationPolicy';

export const PROVIDER_MAX_RESULTS = 50;

export interface PlaceSearchRequest {
    query: string;
    limit: number;
}

/**
 * Provider di ricerca luoghi. Restituisce i candidati grezzi, nell'ordine del provider;
 * la validazione dei singoli candidati spetta al chiamante.
 */
export interface PlaceSearchProvider {
    search(request: PlaceSearchRequest): Promise<unknown[]>;
}

export interface NominatimClientOptions {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
}

export function buildSearchParams(request: PlaceSearchRequest): URLSearchParams {
    return new URLSearchParams({
        q: request.query,
        format: 'jsonv2',
        limit: String(Math.max(1, Math.min(request.limit, PROVIDER_MAX_RESULTS))),
        addressdetails: '1',
        extratags: '1',
    });
}

// `text` null = risposta non 2xx, body non letto.
interface FetchedBody {
    status: number;
    text: string | null;
}

export class NominatimClient implements PlaceSearchProvider {
    private readonly options: NominatimClientOptions;

    constructor(options: NominatimClientOptions) {
        this.options = options;
    }

    async search(request: PlaceSearchRequest): Promise<unknown[]> {
        const url = `${this.options.baseUrl}?${buildSearchParams(request).toString()}`;
        let fetched: FetchedBody;
        try {
            fetched = await fetchWithTimeout(
                url,
                {
                    method: 'GET',
                    headers: {
                        'User-Agent': this.options.userAgent,
                        Accept: 'application/json',
                    },
                },
                { integration: 'nominatim', timeoutMs: this.options.timeoutMs },
                async (response) => ({
                    status: response.status,
                    text: response.ok ? await response.text() : null,
                })
            );
        } catch (error) {
            throw new LookupTransportError(errorMessage(error), classifyTransportFailure(error));
        }

        if (fetched.text === null) {
            throw new LookupTransportError(`nominatim HTTP ${fetched.status}`, 'transport');
        }

        let payload: unknown;
        try {
            payload = JSON.parse(fetched.text);
        } catch (error) {
            throw new LookupTransportError(`nominatim risposta non JSON: ${errorMessage(error)}`, 'transport');
        }
        if (!Array.isArray(payload)) {
            throw new LookupTransportError('nominatim risposta inattesa (atteso un array)', 'transport');
        }
        return payload;
    }
}
