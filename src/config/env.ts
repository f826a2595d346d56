import path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';

export const DEFAULT_PAIRS = [
    'EUR_USD', 'GBP_USD', 'USD_JPY', 'USD_CHF', 'AUD_USD', 'NZD_USD', 'USD_CAD',
    'EUR_GBP', 'EUR_JPY', 'GBP_JPY', 'EUR_AUD', 'EUR_CAD', 'EUR_NZD',
    'GBP_AUD', 'GBP_CAD', 'GBP_NZD',
    'AUD_JPY', 'NZD_JPY', 'CAD_JPY', 'CHF_JPY',
    'AUD_NZD', 'AUD_CAD', 'AUD_CHF',
    'NZD_CAD', 'NZD_CHF',
    'CAD_CHF',
    'EUR_CHF', 'GBP_CHF'
];

const toInt = (def: number) =>
    z.preprocess((v) => {
        if (v === undefined || v === null || v === '') return def;
        const n = typeof v === 'number' ? v : Number(String(v).trim());
        return Number.isFinite(n) ? n : v;
    }, z.number().int());

const toBool = (def: boolean) =>
    z.preprocess((v) => {
        if (v === undefined || v === null || v === '') return def;
        if (typeof v === 'boolean') return v;
        const s = String(v).trim().toLowerCase();
        if (['true', '1', 'yes', 'on'].includes(s)) return true;
        if (['false', '0', 'no', 'off'].includes(s)) return false;
        return v;
    }, z.boolean());

const csv = (def: string[]) =>
    z.preprocess((v) => {
        if (v === undefined || v === null) return def;
        const s = String(v).trim();
        if (!s) return def;
        return s.split(',').map((x) => x.trim()).filter(Boolean);
    }, z.array(z.string()));

const optionalString = z.preprocess(
    (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
    z.string().trim().optional()
);

export const envSchema = z.object({
    OANDA_TOKEN: optionalString,
    OANDA_API: z.string().trim().url().default('https://api-fxtrade.oanda.com/v3'),
    TELEGRAM_TOKEN: optionalString,
    TELEGRAM_CHAT_ID: optionalString,
    PAIRS: csv(DEFAULT_PAIRS),
    DATABASE_PATH: z.string().trim().min(1).default(path.join('data', 'signals.db')),
    LOG_LEVEL: z.preprocess(
        (v) => (typeof v === 'string' ? v.trim().toUpperCase() : v),
        z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO')
    ),
    DEBUG_MODE: toBool(false),
    LOOP_INTERVAL_SECONDS: toInt(60).pipe(z.number().int().min(5).max(86_400))
});

export type Env = z.infer<typeof envSchema>;

/**
 * Reads `.env` (if present) into process.env and validates the result.
 * Throws on invalid values; startup treats that as fatal.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env, envFile?: string): Env {
    if (source === process.env) {
        dotenv.config({ path: envFile ?? path.resolve(process.cwd(), '.env') });
    }

    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment: ${details}`);
    }
    return parsed.data;
}
