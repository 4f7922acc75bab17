import { DatabaseManager } from '../db';
import { Clock, isoAt, systemClock } from '../core/clock';
import { isValidLeadTransition } from '../core/leadStateService';
import { getLeadById, insertMessage, recordLeadContact, withTransaction } from '../core/repositories';
import { errorMessage } from '../core/errors';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { MessageChannel } from '../types/domain';
import { getTemplate, renderTemplate } from './templates';
import { OutreachTransports } from './webhookTransport';

export interface OutreachRequest {
    leadId: number;
    templateKey: string;
    channel: MessageChannel;
    city: string;
    service: string;
    senderName: string;
    senderPhone: string;
}

export type OutreachFailureReason =
    | 'not_found'
    | 'unknown_template'
    | 'missing_contact'
    | 'invalid_transition'
    | 'not_configured'
    | 'delivery_failed'
    | 'record_failed';

export type OutreachResult =
    | { ok: true; messageId: number; channel: MessageChannel; subject: string | null }
    | { ok: false; reason: OutreachFailureReason; message: string; messageId?: number };

/**
 * Invio singolo a un lead. Ogni esito negativo lascia il lead invariato; i tentativi
 * non consegnati restano comunque tracciati in `messages` (pending o failed).
 */
export async function sendOutreach(
    db: DatabaseManager,
    transports: OutreachTransports,
    request: OutreachRequest,
    clock: Clock = systemClock
): Promise<OutreachResult> {
    const { leadId, channel, templateKey } = request;
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        return { ok: false, reason: 'not_found', message: `Lead ${leadId} non trovato.` };
    }

    const template = getTemplate(templateKey);
    if (!template) {
        return { ok: false, reason: 'unknown_template', message: `Template sconosciuto: ${templateKey}.` };
    }

    const recipient = channel === 'whatsapp' ? lead.phone : lead.email;
    if (!recipient) {
        await logWarn('outreach.missing_contact', { leadId, channel });
        return { ok: false, reason: 'missing_contact', message: `Il lead ${leadId} non ha un recapito ${channel}.` };
    }
    if (!isValidLeadTransition(lead.status, 'contacted')) {
        return {
            ok: false,
            reason: 'invalid_transition',
            message: `Lead ${leadId} in stato ${lead.status}: nessun nuovo contatto.`,
        };
    }

    const rendered = renderTemplate(template, channel, {
        businessName: lead.name,
        city: request.city,
        service: request.service,
        sender: request.senderName,
        phone: request.senderPhone,
    });
    const messageInput = { leadId, channel, template: templateKey, content: rendered.content };

    const transport = transports[channel];
    if (!transport) {
        const messageId = await insertMessage(db, { ...messageInput, status: 'pending' }, isoAt(clock));
        await logWarn('outreach.not_configured', { leadId, channel, messageId });
        return {
            ok: false,
            reason: 'not_configured',
            message: `Nessun canale ${channel} configurato: messaggio salvato come pending.`,
            messageId,
        };
    }

    try {
        await transport.deliver({ channel, leadId, to: recipient, subject: rendered.subject, body: rendered.body });
    } catch (error) {
        const detail = errorMessage(error);
        const messageId = await insertMessage(db, { ...messageInput, status: 'failed' }, isoAt(clock));
        await logWarn('outreach.delivery_failed', { leadId, channel, messageId, error: detail });
        return { ok: false, reason: 'delivery_failed', message: detail, messageId };
    }

    // Consegnato ma non registrato: il lead resta invariato e l'esito lo dichiara.
    const now = isoAt(clock);
    let messageId: number;
    try {
        messageId = await withTransaction(db, async () => {
            const insertedId = await insertMessage(db, { ...messageInput, status: 'sent' }, now);
            await recordLeadContact(db, leadId, now);
            return insertedId;
        });
    } catch (error) {
        const detail = errorMessage(error);
        await logError('outreach.record_failed', { leadId, channel, template: templateKey, error: detail });
        return {
            ok: false,
            reason: 'record_failed',
            message: `Messaggio ${channel} consegnato ma non registrato: ${detail}`,
        };
    }
    await logInfo('outreach.sent', { leadId, channel, template: templateKey, messageId, to: recipient });
    return { ok: true, messageId, channel, subject: rendered.subject };
}
