import { describe, expect, it, vi } from 'vitest';
import { HttpStatusError } from '../utils/errors.js';
import {
    AiExtractor,
    buildPrompt,
    findFirstJsonObject,
    isRetryableAiError,
    parseReply,
    readReplyText,
    type AiExtractorConfig,
} from './aiExtractor.js';

const ACME_REPLY =
    '{"Business Name":"Acme","Business Type":"Cafe","Address":"123 Main","Phone Number":"555-0100","Email":"","Website":"http://acme.example"}';

const config: AiExtractorConfig = {
    apiKey: 'test-secret',
    model: 'gemini-2.0-flash',
    baseUrl: 'https://ai.test',
    timeoutMs: 5_000,
    maxAttempts: 6,
    pacingMs: 1_000,
    backoffBaseMs: 2_000,
    backoffMaxMs: 30_000,
    maxInputChars: 12_000,
};

function geminiResponse(text: string): Response {
    return new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text }] } }] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
    });
}

function statusResponse(status: number, headers: Record<string, string> = {}): Response {
    return new Response('{}', { status, headers });
}

function makeExtractor(responses: Array<Response | Error>, overrides: Partial<AiExtractorConfig> = {}) {
    const queue = [...responses];
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
        const next = queue.shift();
        if (!next) throw new Error('unexpected extra request');
        if (next instanceof Error) throw next;
        return next;
    });
    const sleeps: number[] = [];
    const extractor = new AiExtractor(
        { ...config, ...overrides },
        {
            fetch: fetchMock,
            sleep: async (ms) => {
                sleeps.push(ms);
            },
            random: () => 0,
        }
    );
    return { extractor, fetchMock, sleeps };
}

describe('findFirstJsonObject', () => {
    it('cuts the object out of prose and code fences', () => {
        const text = 'Sure! Here it is:\n```json\n{"a": "1"}\n```\nLet me know.';
        expect(findFirstJsonObject(text)).toBe('{"a": "1"}');
    });

    it('ignores braces inside strings', () => {
        expect(findFirstJsonObject('{"a": "x } y { z", "b": "\\"}"} trailing }')).toBe('{"a": "x } y { z", "b": "\\"}"}');
    });

    it('handles nested objects and trailing text', () => {
        expect(findFirstJsonObject('{"a": {"b": {}}} and {"c": 1}')).toBe('{"a": {"b": {}}}');
    });

    it('returns null when no object closes', () => {
        expect(findFirstJsonObject('no json here')).toBeNull();
        expect(findFirstJsonObject('{"a": "1"')).toBeNull();
    });
});

describe('parseReply', () => {
    it('maps reply keys onto record fields', () => {
        expect(parseReply(`Result:\n${ACME_REPLY}\nDone.`)).toEqual({
            name: 'Acme',
            businessType: 'Cafe',
            address: '123 Main',
            phone: '555-0100',
            email: '',
            website: 'http://acme.example',
        });
    });

    it('coerces numbers to strings and other values to empty strings', () => {
        expect(parseReply('{"Business Name":"Acme","Phone Number":5550100,"Email":null,"Website":["x"]}')).toEqual({
            name: 'Acme',
            businessType: '',
            address: '',
            phone: '5550100',
            email: '',
            website: '',
        });
    });

    it('returns null for malformed or empty answers', () => {
        expect(parseReply('I could not find anything.')).toBeNull();
        expect(parseReply('{"Business Name": Acme}')).toBeNull();
        expect(parseReply('{"Business Name":"","Address":"  "}')).toBeNull();
    });
});

describe('readReplyText', () => {
    it('reads candidates[0].content.parts[0].text', () => {
        expect(readReplyText({ candidates: [{ content: { parts: [{ text: 'hi' }] } }] })).toBe('hi');
    });

    it('returns empty string for unexpected shapes', () => {
        expect(readReplyText(null)).toBe('');
        expect(readReplyText({ candidates: [] })).toBe('');
        expect(readReplyText({ candidates: [{ content: { parts: [{ text: 3 }] } }] })).toBe('');
    });
});

describe('isRetryableAiError', () => {
    it('retries rate limits, server errors, timeouts and network failures', () => {
        expect(isRetryableAiError(new HttpStatusError(429, 'Too Many Requests'))).toBe(true);
        expect(isRetryableAiError(new HttpStatusError(503, 'Service Unavailable'))).toBe(true);
        expect(isRetryableAiError(new DOMException('The operation timed out.', 'TimeoutError'))).toBe(true);
        expect(isRetryableAiError(new TypeError('fetch failed'))).toBe(true);
    });

    it('does not retry other client errors', () => {
        expect(isRetryableAiError(new HttpStatusError(400, 'Bad Request'))).toBe(false);
        expect(isRetryableAiError(new HttpStatusError(403, 'Forbidden'))).toBe(false);
        expect(isRetryableAiError(new Error('boom'))).toBe(false);
    });
});

describe('buildPrompt', () => {
    it('names all six keys and embeds the text', () => {
        const prompt = buildPrompt('Acme Cafe');
        expect(prompt).toContain('Business Name, Business Type, Address, Phone Number, Email, Website');
        expect(prompt.endsWith('Acme Cafe')).toBe(true);
    });
});

describe('AiExtractor', () => {
    it('retries two 429s and succeeds on the third call', async () => {
        const { extractor, fetchMock, sleeps } = makeExtractor([
            statusResponse(429),
            statusResponse(429),
            geminiResponse(ACME_REPLY),
        ]);

        const fields = await extractor.extract('Acme Cafe 123 Main 555-0100');

        expect(fields).toEqual({
            name: 'Acme',
            businessType: 'Cafe',
            address: '123 Main',
            phone: '555-0100',
            email: '',
            website: 'http://acme.example',
        });
        expect(fetchMock).toHaveBeenCalledTimes(3);
        // pacing, backoff(1), pacing, backoff(2), pacing
        expect(sleeps).toEqual([1_000, 2_000, 1_000, 4_000, 1_000]);
    });

    it('posts the prompt to the generateContent endpoint with the key in the URL', async () => {
        const { extractor, fetchMock } = makeExtractor([geminiResponse(ACME_REPLY)]);
        await extractor.extract('Acme Cafe');

        const [url, init] = fetchMock.mock.calls[0];
        expect(String(url)).toBe('https://ai.test/v1beta/models/gemini-2.0-flash:generateContent?key=test-secret');
        expect(init?.method).toBe('POST');
        const body: unknown = JSON.parse(String(init?.body));
        expect(body).toEqual({ contents: [{ parts: [{ text: buildPrompt('Acme Cafe') }] }] });
    });

    it('waits at least Retry-After, capped at the backoff maximum', async () => {
        const { extractor, sleeps } = makeExtractor(
            [statusResponse(429, { 'Retry-After': '7' }), statusResponse(429, { 'Retry-After': '120' }), geminiResponse(ACME_REPLY)],
            { pacingMs: 0 }
        );
        await extractor.extract('Acme');
        expect(sleeps).toEqual([0, 7_000, 0, 30_000, 0]);
    });

    it('returns null without retrying on another HTTP error', async () => {
        const { extractor, fetchMock } = makeExtractor([statusResponse(400)]);
        await expect(extractor.extract('Acme')).resolves.toBeNull();
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('returns null after the last attempt fails', async () => {
        const { extractor, fetchMock } = makeExtractor(
            [statusResponse(500), new TypeError('fetch failed'), statusResponse(503)],
            { maxAttempts: 3 }
        );
        await expect(extractor.extract('Acme')).resolves.toBeNull();
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('returns null when the reply carries no JSON', async () => {
        const { extractor } = makeExtractor([geminiResponse('Sorry, I cannot help with that.')]);
        await expect(extractor.extract('Acme')).resolves.toBeNull();
    });

    it('skips the request for blank text', async () => {
        const { extractor, fetchMock } = makeExtractor([]);
        await expect(extractor.extract('  \n ')).resolves.toBeNull();
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('truncates long page text to maxInputChars', async () => {
        const { extractor, fetchMock } = makeExtractor([geminiResponse(ACME_REPLY)], { maxInputChars: 5 });
        await extractor.extract('Acme Cafe and a lot more');
        const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
        expect(body).toEqual({ contents: [{ parts: [{ text: buildPrompt('Acme ') }] }] });
    });
});
