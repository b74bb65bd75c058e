/**
 * src/utils/errors.ts
 */

/** Non-2xx answer from an outbound HTTP call. */
export class HttpStatusError extends Error {
    constructor(
        readonly status: number,
        readonly statusText: string,
        readonly retryAfterMs: number | null = null,
    ) {
        super(`HTTP ${status} ${statusText}`.trim());
        this.name = 'HttpStatusError';
    }
}

/** Invalid or missing environment configuration. Fatal at startup. */
export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super('Invalid environment variables:\n' + issues.join('\n'));
        this.name = 'ConfigError';
    }
}

/** AbortSignal.timeout() rejects fetch with a DOMException named TimeoutError. */
export function isTimeoutError(err: unknown): boolean {
    return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/** undici reports connection-level failures as `TypeError: fetch failed`. */
export function isNetworkError(err: unknown): boolean {
    return err instanceof TypeError && /fetch failed|network/i.test(err.message);
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Parses a Retry-After header given in seconds. HTTP-date values are ignored. */
export function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;
    const seconds = Number.parseInt(header, 10);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}
