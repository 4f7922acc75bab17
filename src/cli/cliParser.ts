/**
 * cliParser.ts — Utility di parsing degli argomenti CLI
 *
 * Funzioni pure per leggere, validare e normalizzare i parametri
 * passati da riga di comando. Nessuna dipendenza da DB o config.
 */

import { JOB_STATUSES, JobStatus, LEAD_STATUSES, LeadStatus } from '../types/domain';

// ─── Lettura argomenti ────────────────────────────────────────────────────────

export function getOptionValue(args: string[], optionName: string): string | undefined {
    const index = args.findIndex((value) => value === optionName);
    if (index === -1 || index + 1 >= args.length) {
        return undefined;
    }
    return args[index + 1];
}

export function requireOption(args: string[], optionName: string, usage: string): string {
    const value = getOptionValue(args, optionName);
    if (value === undefined || value.startsWith('--') || value.trim() === '') {
        throw new Error(`Manca ${optionName}. Uso: ${usage}`);
    }
    return value;
}

/**
 * Argomenti posizionali: tutto ciò che non è un'opzione né il valore di un'opzione.
 * Le opzioni in `flags` non prendono valore.
 */
export function getPositionalArgs(args: string[], flags: string[] = []): string[] {
    const positional: string[] = [];
    for (let index = 0; index < args.length; index++) {
        const value = args[index];
        if (value === undefined) {
            continue;
        }
        if (value.startsWith('--')) {
            if (!flags.includes(value)) {
                index += 1;
            }
            continue;
        }
        positional.push(value);
    }
    return positional;
}

// ─── Parsing valori ───────────────────────────────────────────────────────────

export function parseIntStrict(raw: string, optionName: string): number {
    const normalized = raw.trim();
    if (!/^-?\d+$/.test(normalized)) {
        throw new Error(`Valore non valido per ${optionName}: ${raw}`);
    }
    return Number.parseInt(normalized, 10);
}

export function parsePositiveInt(raw: string, optionName: string): number {
    const parsed = parseIntStrict(raw, optionName);
    if (parsed < 1) {
        throw new Error(`${optionName} deve essere >= 1.`);
    }
    return parsed;
}

export function parseFloatStrict(raw: string, optionName: string): number {
    const parsed = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(parsed)) {
        throw new Error(`Valore non valido per ${optionName}: ${raw}`);
    }
    return parsed;
}

export function parseJobStatus(raw: string): JobStatus {
    const normalized = raw.trim().toLowerCase();
    const match = JOB_STATUSES.find((status) => status === normalized);
    if (!match) {
        throw new Error(`Stato job non valido: ${raw} (valori: ${JOB_STATUSES.join(', ')}).`);
    }
    return match;
}

export function parseLeadStatus(raw: string): LeadStatus {
    const normalized = raw.trim().toLowerCase();
    const match = LEAD_STATUSES.find((status) => status === normalized);
    if (!match) {
        throw new Error(`Stato lead non valido: ${raw} (valori: ${LEAD_STATUSES.join(', ')}).`);
    }
    return match;
}
