export class NotFoundError extends Error {
    public readonly code = 'NOT_FOUND';
    public readonly entity: string;
    public readonly entityId: number;

    constructor(entity: string, entityId: number) {
        super(`${entity} ${entityId} non trovato.`);
        this.name = 'NotFoundError';
        this.entity = entity;
        this.entityId = entityId;
    }
}

export class InvalidTransitionError extends Error {
    public readonly code = 'INVALID_TRANSITION';

    constructor(entity: string, fromStatus: string, toStatus: string) {
        super(`Transizione ${entity} non consentita: ${fromStatus} -> ${toStatus}.`);
        this.name = 'InvalidTransitionError';
    }
}

export class ValidationError extends Error {
    public readonly code = 'VALIDATION';

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export type LookupFailureKind = 'timeout' | 'transport';

export class LookupTransportError extends Error {
    public readonly code = 'LOOKUP_TRANSPORT';
    public readonly kind: LookupFailureKind;

    constructor(message: string, kind: LookupFailureKind) {
        super(message);
        this.name = 'LookupTransportError';
        this.kind = kind;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
