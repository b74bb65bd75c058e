import 'dotenv/config';
import type { AiExtractorConfig } from '../services/aiExtractor.js';
import { ConfigError } from '../utils/errors.js';
import { parseEnv, type Env } from './envSchema.js';

let cached: Env | null = null;

/**
 * Validated process environment. A missing GEMINI_API_KEY (or any invalid
 * variable) is fatal: the offending keys are printed and the process exits
 * with code 1 before anything is launched.
 */
export function loadEnv(): Env {
    if (cached) return cached;
    try {
        cached = parseEnv(process.env);
        return cached;
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(err.message);
            process.exit(1);
        }
        throw err;
    }
}

export function aiConfigFromEnv(env: Env): AiExtractorConfig {
    return {
        apiKey: env.GEMINI_API_KEY,
        model: env.GEMINI_MODEL,
        baseUrl: env.GEMINI_BASE_URL,
        timeoutMs: env.AI_TIMEOUT_MS,
        maxAttempts: env.AI_MAX_ATTEMPTS,
        pacingMs: env.AI_PACING_MS,
        backoffBaseMs: env.AI_BACKOFF_BASE_MS,
        backoffMaxMs: env.AI_BACKOFF_MAX_MS,
        maxInputChars: env.AI_MAX_INPUT_CHARS,
    };
}

export type { Env };
