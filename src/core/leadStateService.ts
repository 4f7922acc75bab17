import { DatabaseManager } from '../db';
import { LeadStatus } from '../types/domain';
import { InvalidTransitionError, NotFoundError } from './errors';
import { getLeadById, setLeadStatus } from './repositories';

const allowedTransitions: Record<LeadStatus, LeadStatus[]> = {
    new: ['contacted', 'invalid'],
    // contacted -> contacted: nuovo dispatch o nuovo messaggio sullo stesso lead
    // contacted -> new: reset esplicito, il lead torna nel pool del matching
    contacted: ['contacted', 'converted', 'invalid', 'new'],
    converted: [],
    invalid: ['new'],
};

export function isValidLeadTransition(fromStatus: LeadStatus, toStatus: LeadStatus): boolean {
    return allowedTransitions[fromStatus].includes(toStatus);
}

export function assertLeadTransition(fromStatus: LeadStatus, toStatus: LeadStatus): void {
    if (!isValidLeadTransition(fromStatus, toStatus)) {
        throw new InvalidTransitionError('lead', fromStatus, toStatus);
    }
}

/**
 * Cambia lo stato di un lead rispettando la tabella delle transizioni.
 * Non apre transazioni: chi chiama decide il perimetro.
 */
export async function transitionLead(
    db: DatabaseManager,
    leadId: number,
    toStatus: LeadStatus,
    now: string
): Promise<LeadStatus> {
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        throw new NotFoundError('lead', leadId);
    }
    assertLeadTransition(lead.status, toStatus);
    await setLeadStatus(db, leadId, toStatus, now);
    return lead.status;
}
