import { loadDotEnv, parseIntEnv, parseStringEnv, resolvePathFromEnv } from './env';
import { AppConfig } from './types';

loadDotEnv();

export function buildConfigFromEnv(): AppConfig {
    return {
        dbPath: resolvePathFromEnv('DB_PATH', 'data/lead_dispatch.sqlite'),
        lookupBaseUrl: parseStringEnv('LOOKUP_BASE_URL', 'https://nominatim.openstreetmap.org/search'),
        lookupUserAgent: parseStringEnv('LOOKUP_USER_AGENT', 'lead-dispatch/1.0 (business automation; ops@example.com)'),
        lookupTimeoutMs: parseIntEnv('LOOKUP_TIMEOUT_MS', 30_000),
        lookupMinIntervalMs: parseIntEnv('LOOKUP_MIN_INTERVAL_MS', 1_200),
        lookupCacheTtlHours: parseIntEnv('LOOKUP_CACHE_TTL_HOURS', 24),
        lookupMaxResults: parseIntEnv('LOOKUP_MAX_RESULTS', 50),
        whatsappWebhookUrl: parseStringEnv('WHATSAPP_WEBHOOK_URL'),
        emailWebhookUrl: parseStringEnv('EMAIL_WEBHOOK_URL'),
        outreachWebhookToken: parseStringEnv('OUTREACH_WEBHOOK_TOKEN'),
        outreachTimeoutMs: parseIntEnv('OUTREACH_TIMEOUT_MS', 15_000),
        senderName: parseStringEnv('SENDER_NAME', 'Team'),
        senderPhone: parseStringEnv('SENDER_PHONE'),
        matchDefaultMax: parseIntEnv('MATCH_DEFAULT_MAX', 50),
    };
}

export const config: Readonly<AppConfig> = Object.freeze(buildConfigFromEnv());

export { validateConfigSchema } from './validation';
export type { AppConfig } from './types';
