import { DatabaseManager } from '../db';
import { errorMessage } from '../core/errors';
import { recordSystemLog } from '../core/repositories';
import { LogLevel } from '../types/domain';
import { sanitizeForLogs } from '../security/redaction';

let auditDatabase: DatabaseManager | null = null;

/**
 * Collega il sink di audit (tabella system_logs). Senza binding i log vanno solo in console.
 */
export function bindAuditLog(database: DatabaseManager | null): void {
    auditDatabase = database;
}

function componentOf(event: string): string {
    const [head] = event.split('.');
    return head || 'app';
}

async function writeLog(level: LogLevel, event: string, payload: Record<string, unknown>): Promise<void> {
    const safePayload = sanitizeForLogs(payload);
    const line = `[${level}] ${event}`;
    if (level === 'ERROR') {
        console.error(line, safePayload);
    } else if (level === 'WARN') {
        console.warn(line, safePayload);
    } else {
        console.log(line, safePayload);
    }

    if (!auditDatabase) {
        return;
    }
    try {
        await recordSystemLog(auditDatabase, level, componentOf(event), event, safePayload);
    } catch (error) {
        console.warn('[WARN] Scrittura audit log fallita', errorMessage(error));
    }
}

export async function logInfo(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('INFO', event, payload);
}

export async function logWarn(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('WARN', event, payload);
}

export async function logError(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('ERROR', event, payload);
}
