import { z, ZodError } from 'zod';
import { ConfigError } from '../utils/errors.js';

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const commaList = z
    .string()
    .transform((v) => v.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean));

/** `KEY=` in .env means "use the default", same as leaving the key out. */
function withoutBlanks(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    return Object.fromEntries(
        Object.entries(raw).filter(([, value]) => value === undefined || value.trim() !== '')
    );
}

export const envSchema = z.object({
    GEMINI_API_KEY: z
        .string({ required_error: 'GEMINI_API_KEY is required (set it in .env)' })
        .trim()
        .min(1, 'GEMINI_API_KEY must not be empty'),
    GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
    GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com'),

    AI_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(30_000),
    AI_MAX_ATTEMPTS: numFromEnv.pipe(z.number().int().min(5).max(7)).default(6),
    AI_PACING_MS: numFromEnv.pipe(z.number().min(0)).default(1_000),
    AI_BACKOFF_BASE_MS: numFromEnv.pipe(z.number().min(0)).default(2_000),
    AI_BACKOFF_MAX_MS: numFromEnv.pipe(z.number().min(0)).default(30_000),
    AI_MAX_INPUT_CHARS: numFromEnv.pipe(z.number().int().positive()).default(12_000),

    MAPS_URL: z.string().url().default('https://www.google.com/maps'),
    TARGET_COUNT: numFromEnv.pipe(z.number().int().positive()).default(25),
    MAX_NO_GROWTH_SCROLLS: numFromEnv.pipe(z.number().int().positive()).default(10),
    SCROLL_SETTLE_MS: numFromEnv.pipe(z.number().min(0)).default(300),
    SCROLL_SETTLE_MULTIPLIER: numFromEnv.pipe(z.number().positive()).default(1),
    PAGE_DOWN_PRESSES: numFromEnv.pipe(z.number().int().min(0)).default(3),
    DETAIL_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(10_000),
    DETAIL_SETTLE_MS: numFromEnv.pipe(z.number().min(0)).default(200),

    CONTACT_RESOLUTION_ENABLED: boolUnlessFalse.default(true),
    CONTACT_NAV_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(20_000),
    CONTACT_LOAD_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(10_000),
    CONTACT_EMAIL_DOMAINS: commaList
        .pipe(z.array(z.string()).min(1, 'CONTACT_EMAIL_DOMAINS must name at least one domain'))
        .default('gmail.com'),

    OUTPUT_FILE: z
        .string()
        .regex(/\.(xlsx|csv)$/i, 'OUTPUT_FILE must end in .xlsx or .csv')
        .default('maps_businesses.xlsx'),
    HEADLESS: boolUnlessFalse.default(true),
    LOG_FILE: z.string().default('log.txt'),
    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;

/**
 * Validates a raw environment. Throws ConfigError listing every bad key.
 */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(withoutBlanks(raw));
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(
                err.issues.map((i) => {
                    const key = i.path.join('.') || '(root)';
                    return `- ${key}: ${i.message}`;
                })
            );
        }
        throw err;
    }
}
