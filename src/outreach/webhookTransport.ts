import { fetchWithTimeout } from '../core/integrationPolicy';
import { MessageChannel } from '../types/domain';

export interface OutreachDelivery {
    channel: MessageChannel;
    leadId: number;
    to: string;
    subject: string | null;
    body: string;
}

export interface OutreachTransport {
    deliver(delivery: OutreachDelivery): Promise<void>;
}

export type OutreachTransports = Partial<Record<MessageChannel, OutreachTransport>>;

export interface WebhookTransportOptions {
    url: string;
    token: string;
    timeoutMs: number;
}

/**
 * Consegna tramite webhook (Zapier, Make, un relay SMTP/WhatsApp proprio): POST JSON,
 * bearer token opzionale. Una risposta non 2xx è un fallimento di consegna.
 */
export class WebhookTransport implements OutreachTransport {
    private readonly options: WebhookTransportOptions;

    constructor(options: WebhookTransportOptions) {
        this.options = options;
    }

    async deliver(delivery: OutreachDelivery): Promise<void> {
        const headers: Record<string, string> = {
            'content-type': 'application/json',
        };
        if (this.options.token) {
            headers.authorization = `Bearer ${this.options.token}`;
        }

        await fetchWithTimeout(
            this.options.url,
            {
                method: 'POST',
                headers,
                body: JSON.stringify(delivery),
            },
            { integration: `outreach.${delivery.channel}`, timeoutMs: this.options.timeoutMs },
            async (response) => {
                if (response.ok) {
                    return;
                }
                const responseText = (await response.text()).slice(0, 200);
                throw new Error(`HTTP_${response.status}:${response.statusText}${responseText ? `:${responseText}` : ''}`);
            }
        );
    }
}

export function buildWebhookTransports(settings: {
    whatsappWebhookUrl: string;
    emailWebhookUrl: string;
    outreachWebhookToken: string;
    outreachTimeoutMs: number;
}): OutreachTransports {
    const transports: OutreachTransports = {};
    if (settings.whatsappWebhookUrl) {
        transports.whatsapp = new WebhookTransport({
            url: settings.whatsappWebhookUrl,
            token: settings.outreachWebhookToken,
            timeoutMs: settings.outreachTimeoutMs,
        });
    }
    if (settings.emailWebhookUrl) {
        transports.email = new WebhookTransport({
            url: settings.emailWebhookUrl,
            token: settings.outreachWebhookToken,
            timeoutMs: settings.outreachTimeoutMs,
        });
    }
    return transports;
}
