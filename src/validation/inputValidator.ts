import crypto from 'crypto';
import { GeoPoint } from '../types/domain';

export const MAX_QUERY_LENGTH = 200;
export const MAX_NAME_LENGTH = 500;
export const MAX_ADDRESS_LENGTH = 500;
export const MAX_PHONE_LENGTH = 20;
export const MAX_EMAIL_LENGTH = 100;
export const MAX_SKILLS_LENGTH = 500;
export const MAX_NOTE_LENGTH = 1000;

const PHONE_PATTERN = /^\+?[\d\s\-()]{6,20}$/;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const CONTROL_CHARS_PATTERN = /[\u0000-\u001f\u007f-\u009f]/g;

export type DowngradeReason = 'truncated' | 'invalid_phone' | 'invalid_email' | 'invalid_coordinates';

export interface DowngradedField {
    field: string;
    reason: DowngradeReason;
}

/**
 * Esito di una sanitizzazione: il valore pulito più l'elenco dei campi
 * che sono stati troncati o azzerati lungo la strada.
 */
export interface ValidationResult<T> {
    value: T;
    downgraded: DowngradedField[];
}

export function sanitizeString(input: unknown, maxLength: number): string {
    if (input === null || input === undefined) {
        return '';
    }
    const sanitized = String(input).replace(CONTROL_CHARS_PATTERN, '');
    return sanitized.slice(0, maxLength).trim();
}

export function isValidPhone(phone: string): boolean {
    if (!phone) return false;
    return PHONE_PATTERN.test(phone.trim());
}

export function isValidEmail(email: string): boolean {
    if (!email) return false;
    return EMAIL_PATTERN.test(email.trim().toLowerCase());
}

function toCoordinateNumber(raw: unknown): number | null {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : null;
    }
    if (typeof raw === 'string' && raw.trim() !== '') {
        const parsed = Number(raw.trim());
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function isValidCoordinatePair(lat: number, lon: number): boolean {
    return lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
}

/**
 * (0, 0) è il vecchio sentinella per "posizione sconosciuta": non è mai un punto reale.
 */
export function isUnknownLocationSentinel(lat: number, lon: number): boolean {
    return lat === 0 && lon === 0;
}

/**
 * Converte una coppia grezza (numeri o stringhe) in un GeoPoint.
 * `missing` = nessun valore fornito; `invalid` = valore presente ma non utilizzabile.
 */
export function parseCoordinates(rawLat: unknown, rawLon: unknown): { point: GeoPoint | null; status: 'ok' | 'missing' | 'invalid' } {
    const bothEmpty = [rawLat, rawLon].every(
        (value) => value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
    );
    if (bothEmpty) {
        return { point: null, status: 'missing' };
    }

    const lat = toCoordinateNumber(rawLat);
    const lon = toCoordinateNumber(rawLon);
    if (lat === null || lon === null || !isValidCoordinatePair(lat, lon)) {
        return { point: null, status: 'invalid' };
    }
    if (isUnknownLocationSentinel(lat, lon)) {
        return { point: null, status: 'missing' };
    }
    return { point: { lat, lon }, status: 'ok' };
}

function sanitizeTracked(
    input: unknown,
    maxLength: number,
    field: string,
    downgraded: DowngradedField[]
): string {
    const stripped = input === null || input === undefined
        ? ''
        : String(input).replace(CONTROL_CHARS_PATTERN, '').trim();
    if (stripped.length > maxLength) {
        downgraded.push({ field, reason: 'truncated' });
    }
    return sanitizeString(input, maxLength);
}

export interface RawContactFields {
    name?: unknown;
    address?: unknown;
    phone?: unknown;
    email?: unknown;
    lat?: unknown;
    lon?: unknown;
    skills?: unknown;
    note?: unknown;
}

export interface CleanContactFields {
    name: string;
    address: string;
    phone: string;
    email: string;
    location: GeoPoint | null;
    skills: string;
    note: string;
}

/**
 * Policy unica per tutte le scritture: i campi non validi vengono azzerati
 * (mai rifiutati) e ogni azzeramento è riportato in `downgraded`.
 */
export function sanitizeContactFields(raw: RawContactFields): ValidationResult<CleanContactFields> {
    const downgraded: DowngradedField[] = [];

    const name = sanitizeTracked(raw.name, MAX_NAME_LENGTH, 'name', downgraded);
    const address = sanitizeTracked(raw.address, MAX_ADDRESS_LENGTH, 'address', downgraded);
    const skills = sanitizeTracked(raw.skills, MAX_SKILLS_LENGTH, 'skills', downgraded).toLowerCase();
    const note = sanitizeTracked(raw.note, MAX_NOTE_LENGTH, 'note', downgraded);

    let phone = sanitizeString(raw.phone, MAX_PHONE_LENGTH);
    if (phone && !isValidPhone(phone)) {
        downgraded.push({ field: 'phone', reason: 'invalid_phone' });
        phone = '';
    }

    let email = sanitizeString(raw.email, MAX_EMAIL_LENGTH);
    if (email && !isValidEmail(email)) {
        downgraded.push({ field: 'email', reason: 'invalid_email' });
        email = '';
    }

    const coordinates = parseCoordinates(raw.lat, raw.lon);
    if (coordinates.status === 'invalid') {
        downgraded.push({ field: 'coordinates', reason: 'invalid_coordinates' });
    }

    return {
        value: { name, address, phone, email, location: coordinates.point, skills, note },
        downgraded,
    };
}

export function normalizeServiceKeyword(service: string): string {
    return sanitizeString(service, MAX_QUERY_LENGTH).toLowerCase();
}

export function hashSensitiveData(data: string): string {
    return crypto.createHash('sha256').update(data).digest('hex').slice(0, 16);
}
