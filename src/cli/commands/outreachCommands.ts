/**
 * outreachCommands.ts — send-whatsapp, send-email
 */

import { config } from '../../config';
import { DatabaseManager } from '../../db';
import { sendOutreach } from '../../outreach/outreachService';
import { listTemplateKeys } from '../../outreach/templates';
import { buildWebhookTransports } from '../../outreach/webhookTransport';
import { MessageChannel } from '../../types/domain';
import { getOptionValue, parseIntStrict, requireOption } from '../cliParser';

const DEFAULT_TEMPLATE: Record<MessageChannel, string> = {
    whatsapp: 'intro_hindi',
    email: 'intro_english',
};

export async function runSendCommand(db: DatabaseManager, channel: MessageChannel, args: string[]): Promise<void> {
    const usage = `send-${channel} --lead-id <id> --city <città> --service <servizio> [--template <${listTemplateKeys().join('|')}>] [--sender <nome>] [--phone <tel>]`;
    const leadId = parseIntStrict(requireOption(args, '--lead-id', usage), '--lead-id');

    const result = await sendOutreach(db, buildWebhookTransports(config), {
        leadId,
        channel,
        templateKey: getOptionValue(args, '--template') ?? DEFAULT_TEMPLATE[channel],
        city: requireOption(args, '--city', usage),
        service: requireOption(args, '--service', usage),
        senderName: getOptionValue(args, '--sender') ?? config.senderName,
        senderPhone: getOptionValue(args, '--phone') ?? config.senderPhone,
    });
    if (!result.ok) {
        console.error(`Invio ${channel} non riuscito (${result.reason}): ${result.message}`);
        process.exitCode = 1;
        return;
    }
    const subject = result.subject ? ` oggetto="${result.subject}"` : '';
    console.log(`Messaggio ${channel} inviato al lead ${leadId} (id=${result.messageId})${subject}`);
}
