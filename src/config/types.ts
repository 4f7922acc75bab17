export interface AppConfig {
    dbPath: string;
    lookupBaseUrl: string;
    lookupUserAgent: string;
    lookupTimeoutMs: number;
    lookupMinIntervalMs: number;
    lookupCacheTtlHours: number;
    lookupMaxResults: number;
    whatsappWebhookUrl: string;
    emailWebhookUrl: string;
    outreachWebhookToken: string;
    outreachTimeoutMs: number;
    senderName: string;
    senderPhone: string;
    matchDefaultMax: number;
}
