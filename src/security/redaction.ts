import { hashSensitiveData } from '../validation/inputValidator';

const MAX_RECURSION_DEPTH = 6;
const REDACTED = '[REDACTED]';

const SENSITIVE_KEY_PATTERN = /(token|secret|password|pass|key|cookie|authorization|bearer)/i;
const CONTACT_KEY_PATTERN = /^(phone|email|worker_phone|lead_phone|to)$/i;

const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/-]+=*/g;
const EMAIL_IN_TEXT_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

function maskContact(value: string): string {
    const trimmed = value.trim();
    if (!trimmed) return trimmed;
    return `#${hashSensitiveData(trimmed)}`;
}

function sanitizeString(input: string): string {
    return input
        .replace(BEARER_PATTERN, `Bearer ${REDACTED}`)
        .replace(EMAIL_IN_TEXT_PATTERN, (match) => maskContact(match));
}

function sanitizeArray(input: unknown[], depth: number): unknown[] {
    if (depth > MAX_RECURSION_DEPTH) {
        return ['[MAX_DEPTH_REACHED]'];
    }
    return input.map((item) => sanitizeValue(item, depth + 1));
}

function sanitizeObject(input: object, depth: number): Record<string, unknown> {
    if (depth > MAX_RECURSION_DEPTH) {
        return { note: '[MAX_DEPTH_REACHED]' };
    }

    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (SENSITIVE_KEY_PATTERN.test(key)) {
            output[key] = REDACTED;
            continue;
        }
        if (CONTACT_KEY_PATTERN.test(key) && typeof value === 'string') {
            output[key] = maskContact(value);
            continue;
        }
        output[key] = sanitizeValue(value, depth + 1);
    }
    return output;
}

function sanitizeValue(value: unknown, depth: number): unknown {
    if (value === null || value === undefined) {
        return value;
    }
    if (typeof value === 'string') {
        return sanitizeString(value);
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Error) {
        return sanitizeString(value.message);
    }
    if (Array.isArray(value)) {
        return sanitizeArray(value, depth);
    }
    if (typeof value === 'object') {
        return sanitizeObject(value, depth);
    }
    return String(value);
}

/**
 * Pulisce il payload dei log: segreti oscurati, telefoni ed email sostituiti da un hash breve.
 */
export function sanitizeForLogs(payload: Record<string, unknown>): Record<string, unknown> {
    return sanitizeObject(payload, 0);
}
