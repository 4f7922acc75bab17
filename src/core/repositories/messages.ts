import { DatabaseManager } from '../../db';
import { MessageChannel, MessageRecord, MessageStatus } from '../../types/domain';
import { requireLastId } from './shared';

export interface NewMessageInput {
    leadId: number;
    channel: MessageChannel;
    template: string;
    content: string;
    status: MessageStatus;
}

export async function insertMessage(db: DatabaseManager, input: NewMessageInput, now: string): Promise<number> {
    const result = await db.run(
        `
        INSERT INTO messages (lead_id, channel, template, content, status, sent_at)
        VALUES (?, ?, ?, ?, ?, ?)
    `,
        [input.leadId, input.channel, input.template, input.content, input.status, now]
    );
    return requireLastId(result.lastID, 'messages');
}

export async function listMessagesForLead(db: DatabaseManager, leadId: number): Promise<MessageRecord[]> {
    return db.query<MessageRecord>(
        `SELECT id, lead_id, channel, template, content, status, sent_at FROM messages WHERE lead_id = ? ORDER BY id`,
        [leadId]
    );
}
