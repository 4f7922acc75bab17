import rawTemplates from './templates.json';
import { MessageChannel } from '../types/domain';
import { sanitizeString } from '../validation/inputValidator';

export type TemplateBodies = Record<MessageChannel, string>;

export interface TemplateContext {
    businessName: string;
    city: string;
    service: string;
    sender: string;
    phone: string;
}

export interface RenderedMessage {
    subject: string | null;
    body: string;
    /** testo completo così come viene archiviato in `messages.content` */
    content: string;
}

const FALLBACK_BUSINESS_NAME = 'Sir/Madam';
const SUBJECT_PREFIX = 'Subject:';

function isTemplateBodies(value: unknown): value is TemplateBodies {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return typeof Reflect.get(value, 'whatsapp') === 'string' && typeof Reflect.get(value, 'email') === 'string';
}

function loadTemplates(source: Record<string, unknown>): ReadonlyMap<string, TemplateBodies> {
    const templates = new Map<string, TemplateBodies>();
    for (const [key, value] of Object.entries(source)) {
        if (!isTemplateBodies(value)) {
            throw new Error(`Template ${key} non valido: servono i corpi whatsapp ed email.`);
        }
        templates.set(key, value);
    }
    return templates;
}

const TEMPLATES = loadTemplates(rawTemplates);

export function listTemplateKeys(): string[] {
    return Array.from(TEMPLATES.keys());
}

export function getTemplate(key: string): TemplateBodies | null {
    return TEMPLATES.get(key) ?? null;
}

export function extractUnresolvedPlaceholders(message: string): string[] {
    return message.match(/\{\{[^}]+\}\}/g) ?? [];
}

/**
 * Riempie i placeholder con valori sanitizzati e separa la riga `Subject:` delle email.
 */
export function renderTemplate(bodies: TemplateBodies, channel: MessageChannel, context: TemplateContext): RenderedMessage {
    const values: Record<string, string> = {
        business_name: sanitizeString(context.businessName, 100) || FALLBACK_BUSINESS_NAME,
        city: sanitizeString(context.city, 50),
        service: sanitizeString(context.service, 50),
        sender: sanitizeString(context.sender, 50),
        phone: sanitizeString(context.phone, 20),
    };

    const content = bodies[channel].replace(/\{\{(\w+)\}\}/g, (placeholder: string, name: string) => values[name] ?? placeholder);
    const unresolved = extractUnresolvedPlaceholders(content);
    if (unresolved.length > 0) {
        throw new Error(`Placeholder non risolti: ${unresolved.join(', ')}`);
    }

    const lines = content.split('\n');
    const [firstLine] = lines;
    if (channel === 'email' && firstLine !== undefined && firstLine.startsWith(SUBJECT_PREFIX)) {
        const subject = firstLine.slice(SUBJECT_PREFIX.length).trim();
        const rest = lines.slice(1);
        // la riga vuota dopo l'oggetto non fa parte del corpo
        const body = (rest[0] === '' ? rest.slice(1) : rest).join('\n');
        return { subject, body, content };
    }
    return { subject: null, body: content, content };
}
