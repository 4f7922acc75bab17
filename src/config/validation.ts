import { AppConfig } from './types';
import { isHttpUrl } from './env';

interface ConfigValidationRule {
    message: string;
    when: (cfg: AppConfig) => boolean;
}

const CONFIG_VALIDATION_RULES: ConfigValidationRule[] = [
    {
        message: '[CONFIG] LOOKUP_BASE_URL non è un URL http(s) valido',
        when: (cfg) => !isHttpUrl(cfg.lookupBaseUrl),
    },
    {
        message: '[CONFIG] LOOKUP_USER_AGENT vuoto: Nominatim rifiuta richieste senza User-Agent identificabile',
        when: (cfg) => !cfg.lookupUserAgent,
    },
    {
        message: '[CONFIG] LOOKUP_MIN_INTERVAL_MS deve essere >= 1000 (policy Nominatim: max 1 richiesta/sec)',
        when: (cfg) => cfg.lookupMinIntervalMs < 1000,
    },
    {
        message: '[CONFIG] LOOKUP_TIMEOUT_MS deve essere >= 1000',
        when: (cfg) => cfg.lookupTimeoutMs < 1000,
    },
    {
        message: '[CONFIG] LOOKUP_CACHE_TTL_HOURS deve essere >= 1',
        when: (cfg) => cfg.lookupCacheTtlHours < 1,
    },
    {
        message: '[CONFIG] LOOKUP_MAX_RESULTS deve essere compreso tra 1 e 50',
        when: (cfg) => cfg.lookupMaxResults < 1 || cfg.lookupMaxResults > 50,
    },
    {
        message: '[CONFIG] WHATSAPP_WEBHOOK_URL non è un URL http(s) valido',
        when: (cfg) => !!cfg.whatsappWebhookUrl && !isHttpUrl(cfg.whatsappWebhookUrl),
    },
    {
        message: '[CONFIG] EMAIL_WEBHOOK_URL non è un URL http(s) valido',
        when: (cfg) => !!cfg.emailWebhookUrl && !isHttpUrl(cfg.emailWebhookUrl),
    },
    {
        message: '[CONFIG] MATCH_DEFAULT_MAX deve essere >= 1',
        when: (cfg) => cfg.matchDefaultMax < 1,
    },
];

export function validateConfigSchema(config: AppConfig): string[] {
    const errors: string[] = [];
    for (const rule of CONFIG_VALIDATION_RULES) {
        if (rule.when(config)) {
            errors.push(rule.message);
        }
    }
    return errors;
}
