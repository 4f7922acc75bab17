/**
 * repositories/leads.ts
 * Query di dominio sui lead: inserimento deduplicato, selezione per il matching, contatti.
 */

import { DatabaseManager } from '../../db';
import { GeoPoint, LeadRecord, LeadStatus } from '../../types/domain';
import { InsertOutcome, isUniqueConstraintError, requireLastId } from './shared';

export const LEAD_SELECT_COLUMNS = `id, name, category, address, lat, lon, phone, email, source, note, status,
    created_at, updated_at, last_contact, contact_count`;

export interface NewLeadInput {
    name: string;
    category: string;
    address: string;
    location: GeoPoint | null;
    phone: string;
    email: string;
    source?: string;
    note?: string;
}

export async function insertLead(db: DatabaseManager, input: NewLeadInput, now: string): Promise<InsertOutcome> {
    try {
        const result = await db.run(
            `
            INSERT INTO leads (name, category, address, lat, lon, phone, email, source, note, status, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'new', ?)
        `,
            [
                input.name,
                input.category,
                input.address,
                input.location?.lat ?? null,
                input.location?.lon ?? null,
                input.phone,
                input.email,
                input.source ?? 'nominatim',
                input.note || null,
                now,
            ]
        );
        return { status: 'inserted', id: requireLastId(result.lastID, 'leads') };
    } catch (error) {
        if (isUniqueConstraintError(error)) {
            return { status: 'duplicate' };
        }
        throw error;
    }
}

export async function getLeadById(db: DatabaseManager, leadId: number): Promise<LeadRecord | null> {
    const row = await db.get<LeadRecord>(`SELECT ${LEAD_SELECT_COLUMNS} FROM leads WHERE id = ?`, [leadId]);
    return row ?? null;
}

export async function listLeads(db: DatabaseManager, limit: number): Promise<LeadRecord[]> {
    return db.query<LeadRecord>(
        `SELECT ${LEAD_SELECT_COLUMNS} FROM leads ORDER BY id DESC LIMIT ?`,
        [Math.max(1, limit)]
    );
}

export async function listAllLeads(db: DatabaseManager): Promise<LeadRecord[]> {
    return db.query<LeadRecord>(`SELECT ${LEAD_SELECT_COLUMNS} FROM leads ORDER BY id`);
}

/**
 * Lead ancora da contattare la cui categoria contiene `service` (case-insensitive), in ordine di id.
 */
export async function listNewLeadsForService(db: DatabaseManager, service: string, limit: number): Promise<LeadRecord[]> {
    return db.query<LeadRecord>(
        `
        SELECT ${LEAD_SELECT_COLUMNS} FROM leads
        WHERE status = 'new' AND instr(lower(category), lower(?)) > 0
        ORDER BY id ASC
        LIMIT ?
    `,
        [service, Math.max(0, limit)]
    );
}

export async function setLeadStatus(db: DatabaseManager, leadId: number, status: LeadStatus, now: string): Promise<number> {
    const result = await db.run(
        `UPDATE leads SET status = ?, updated_at = ? WHERE id = ?`,
        [status, now, leadId]
    );
    return result.changes ?? 0;
}

export async function recordLeadContact(db: DatabaseManager, leadId: number, now: string): Promise<number> {
    const result = await db.run(
        `
        UPDATE leads
        SET last_contact = ?, contact_count = contact_count + 1, status = 'contacted', updated_at = ?
        WHERE id = ?
    `,
        [now, now, leadId]
    );
    return result.changes ?? 0;
}
