import { errorMessage, LookupFailureKind } from './errors';

export class IntegrationTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(integration: string, timeoutMs: number) {
        super(`${integration}: timeout dopo ${timeoutMs}ms`);
        this.name = 'IntegrationTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export interface TimedFetchOptions {
    integration: string;
    timeoutMs: number;
}

function createTimedAbortController(parent: AbortSignal | null | undefined, reason: Error, timeoutMs: number): {
    signal: AbortSignal;
    cleanup: () => void;
} {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(reason), timeoutMs);

    const onAbort = () => controller.abort(parent?.reason);
    if (parent) {
        if (parent.aborted) {
            controller.abort(parent.reason);
        } else {
            parent.addEventListener('abort', onAbort, { once: true });
        }
    }

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeout);
            if (parent) {
                parent.removeEventListener('abort', onAbort);
            }
        },
    };
}

/**
 * fetch con timeout rigido. Il timeout copre anche la lettura del body in `readResponse`:
 * il segnale resta armato finché il callback non termina.
 * Nessun retry: ogni chiamata passa già dal rate gate del chiamante.
 */
export async function fetchWithTimeout<T>(
    url: string,
    init: RequestInit,
    options: TimedFetchOptions,
    readResponse: (response: Response) => Promise<T>
): Promise<T> {
    const timeoutMs = Math.max(250, options.timeoutMs);
    const timeoutError = new IntegrationTimeoutError(options.integration, timeoutMs);
    const controller = createTimedAbortController(init.signal, timeoutError, timeoutMs);
    try {
        const response = await fetch(url, {
            ...init,
            signal: controller.signal,
        });
        return await readResponse(response);
    } catch (error) {
        if (controller.signal.aborted && controller.signal.reason === timeoutError) {
            throw timeoutError;
        }
        throw error;
    } finally {
        controller.cleanup();
    }
}

export function classifyTransportFailure(error: unknown): LookupFailureKind {
    if (error instanceof IntegrationTimeoutError) {
        return 'timeout';
    }
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return 'timeout';
    }
    const normalized = errorMessage(error).toLowerCase();
    return normalized.includes('timeout') || normalized.includes('timed out') ? 'timeout' : 'transport';
}
