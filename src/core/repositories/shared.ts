import { DatabaseManager } from '../../db';
import { errorMessage } from '../errors';

export type InsertOutcome =
    | { status: 'inserted'; id: number }
    | { status: 'duplicate' };

export async function withTransaction<T>(database: DatabaseManager, callback: () => Promise<T>): Promise<T> {
    await database.exec('BEGIN IMMEDIATE');
    try {
        const result = await callback();
        await database.exec('COMMIT');
        return result;
    } catch (error) {
        await database.exec('ROLLBACK');
        throw error;
    }
}

export function isUniqueConstraintError(error: unknown): boolean {
    return errorMessage(error).includes('UNIQUE constraint failed');
}

export function requireLastId(lastID: number | undefined, table: string): number {
    if (lastID === undefined || lastID <= 0) {
        throw new Error(`INSERT su ${table} senza id restituito.`);
    }
    return lastID;
}

export function parseJsonColumn(raw: string): unknown {
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        return null;
    }
}
