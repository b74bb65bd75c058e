/**
 * src/services/aiExtractor.ts
 *
 * Primary extraction tier: Gemini `generateContent` over the detail pane text.
 *
 * REQUEST
 * ───────
 *   POST {base}/v1beta/models/{model}:generateContent?key={apiKey}
 *   { contents: [{ parts: [{ text: prompt }] }] }
 *
 * The answer lives at candidates[0].content.parts[0].text and is often wrapped
 * in prose or a ```json fence, so the first balanced {...} is cut out of it.
 *
 * FAILURE POLICY
 * ──────────────
 *   timeout / network error / 429 / 5xx → retry with exponential backoff + jitter
 *   any other HTTP status               → null
 *   unparseable or empty answer         → null
 *   attempts exhausted                  → null
 *
 * null means "use the heuristic tier". This module never throws to its caller.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import type { BusinessFields, StructuredExtractor } from '../types.js';
import {
    HttpStatusError,
    errorMessage,
    isNetworkError,
    isTimeoutError,
    parseRetryAfter,
} from '../utils/errors.js';
import { exponentialBackoff, withRetry, type RetryPolicy } from '../utils/retryPolicy.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

// ─── Config ───────────────────────────────────────────────────────────────────

export interface AiExtractorConfig {
    apiKey: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    pacingMs: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    maxInputChars: number;
}

export interface AiExtractorDeps {
    fetch?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

// ─── Prompt ───────────────────────────────────────────────────────────────────

const replyValue = z.unknown().transform((v) => {
    if (typeof v === 'string') return v;
    if (typeof v === 'number' || typeof v === 'boolean') return String(v);
    return '';
});

/** The reply object the model is asked for; its keys are listed in the prompt. */
const ReplySchema = z.object({
    'Business Name': replyValue,
    'Business Type': replyValue,
    'Address': replyValue,
    'Phone Number': replyValue,
    'Email': replyValue,
    'Website': replyValue,
});

export function buildPrompt(text: string): string {
    return `
Extract the following business details from the text below.
Return ONLY a JSON object with exactly these keys: ${Object.keys(ReplySchema.shape).join(', ')}.
Every value must be a string. If a field is missing, use an empty string.
Use the full absolute URL for Website when one is shown.

Text:
${text}
`.trim();
}

// ─── Reply Parsing ────────────────────────────────────────────────────────────

function asRecord(value: unknown): Record<string, unknown> {
    return value && typeof value === 'object' ? (value as Record<string, unknown>) : {};
}

/** candidates[0].content.parts[0].text, or '' when any step is missing. */
export function readReplyText(data: unknown): string {
    const candidates = asRecord(data).candidates;
    const first = asRecord(Array.isArray(candidates) ? candidates[0] : undefined);
    const parts = asRecord(first.content).parts;
    const part = asRecord(Array.isArray(parts) ? parts[0] : undefined);
    return typeof part.text === 'string' ? part.text : '';
}

/**
 * Returns the first balanced `{...}` in `text`, skipping braces inside JSON
 * strings. Anything after the closing brace is ignored. null if no object
 * closes.
 */
export function findFirstJsonObject(text: string): string | null {
    const start = text.indexOf('{');
    if (start === -1) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];

        if (inString) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') inString = false;
            continue;
        }

        if (ch === '"') inString = true;
        else if (ch === '{') depth++;
        else if (ch === '}') {
            depth--;
            if (depth === 0) return text.slice(start, i + 1);
        }
    }

    return null;
}

/**
 * Parses a model reply into record fields. null when no JSON object can be
 * read, or when the object carries no non-empty field.
 */
export function parseReply(text: string): BusinessFields | null {
    const json = findFirstJsonObject(text);
    if (!json) return null;

    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch {
        return null;
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;

    const reply = ReplySchema.parse(parsed);
    const fields: BusinessFields = {
        name: reply['Business Name'].trim(),
        businessType: reply['Business Type'].trim(),
        address: reply['Address'].trim(),
        phone: reply['Phone Number'].trim(),
        email: reply['Email'].trim(),
        website: reply['Website'].trim(),
    };

    return Object.values(fields).some(Boolean) ? fields : null;
}

// ─── Retry Classification ─────────────────────────────────────────────────────

export function isRetryableAiError(err: unknown): boolean {
    if (err instanceof HttpStatusError) {
        return err.status === 429 || err.status >= 500;
    }
    return isTimeoutError(err) || isNetworkError(err);
}

function describeFailure(err: unknown): string {
    if (err instanceof HttpStatusError) return err.message;
    if (isTimeoutError(err)) return 'request timed out';
    return errorMessage(err);
}

// ─── Extractor ────────────────────────────────────────────────────────────────

export class AiExtractor implements StructuredExtractor {
    private readonly fetchImpl: typeof fetch;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly policy: RetryPolicy;

    constructor(private readonly config: AiExtractorConfig, deps: AiExtractorDeps = {}) {
        this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
        this.sleep = deps.sleep ?? defaultSleep;

        const backoff = exponentialBackoff(
            {
                baseMs: config.backoffBaseMs,
                maxMs: config.backoffMaxMs,
                jitterMs: Math.min(1_000, config.backoffBaseMs),
            },
            deps.random
        );

        this.policy = {
            maxAttempts: config.maxAttempts,
            isRetryable: isRetryableAiError,
            backoffMs: (attempt, err) => {
                const computed = backoff(attempt);
                const retryAfter = err instanceof HttpStatusError ? err.retryAfterMs : null;
                return retryAfter !== null
                    ? Math.min(Math.max(computed, retryAfter), config.backoffMaxMs)
                    : computed;
            },
        };
    }

    get endpoint(): string {
        const base = this.config.baseUrl.replace(/\/+$/, '');
        return `${base}/v1beta/models/${encodeURIComponent(this.config.model)}:generateContent` +
            `?key=${encodeURIComponent(this.config.apiKey)}`;
    }

    async extract(text: string): Promise<BusinessFields | null> {
        const input = text.slice(0, this.config.maxInputChars);
        if (!input.trim()) return null;

        const body = JSON.stringify({ contents: [{ parts: [{ text: buildPrompt(input) }] }] });

        let reply: string;
        try {
            reply = await withRetry(
                async () => {
                    await this.sleep(this.config.pacingMs);
                    return this.generate(body);
                },
                this.policy,
                {
                    sleep: this.sleep,
                    onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
                        log.warning(
                            `[AiExtractor] ${describeFailure(error)} on attempt ${attempt}/${maxAttempts}. ` +
                            `Retrying in ${(delayMs / 1000).toFixed(1)}s...`
                        );
                    },
                }
            );
        } catch (err) {
            log.warning(`[AiExtractor] Giving up: ${describeFailure(err)}. Falling back to heuristics.`);
            return null;
        }

        const fields = parseReply(reply);
        if (!fields) {
            log.warning(`[AiExtractor] Reply had no usable JSON object: ${reply.slice(0, 200)}`);
        }
        return fields;
    }

    private async generate(body: string): Promise<string> {
        const res = await this.fetchImpl(this.endpoint, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
            signal: AbortSignal.timeout(this.config.timeoutMs),
        });

        if (!res.ok) {
            throw new HttpStatusError(res.status, res.statusText, parseRetryAfter(res.headers.get('retry-after')));
        }

        const data: unknown = await res.json();
        return readReplyText(data);
    }
}
