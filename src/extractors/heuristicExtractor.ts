/**
 * src/extractors/heuristicExtractor.ts
 *
 * Selector- and regex-based extraction from a snapshot of the detail pane.
 * Used whenever the AI tier returns nothing.
 *
 * Never fails: anything not found comes back as ''.
 *
 * FIELD STRATEGY
 * ──────────────
 *   name / type / address → ordered selector candidates, first non-empty text
 *   phone   → selectors, then a digit-run scan of the full page text
 *   website → href (or text) of the website selectors, then the first
 *             absolute link that does not point back at the listing platform
 *   email   → mailto: link, then a generic email-pattern scan of the full text
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { PLATFORM_HOSTS, Selectors } from '../config.js';
import type { BusinessFields } from '../types.js';
import { cleanField } from '../utils/fieldCleaner.js';
import { isAbsoluteHttpUrl } from '../utils/url.js';

// ─── Patterns ─────────────────────────────────────────────────────────────────

/** Digit run with space/dot/dash/paren separators, optional leading + or (. */
const PHONE_CANDIDATE = /\+?\(?\d[\d \t.\-()]*\d/g;
const MIN_PHONE_DIGITS = 8;

const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}/i;

/** google.com, google.de, google.co.uk, maps.google.com.au ... */
const GOOGLE_CCTLD_HOST = /(^|\.)google\.[a-z]{2,3}(\.[a-z]{2})?$/i;

export interface HeuristicOptions {
    platformHosts?: readonly string[];
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function firstText($: CheerioAPI, selectors: readonly string[]): string {
    for (const selector of selectors) {
        for (const el of $(selector).toArray()) {
            const text = $(el).text().trim();
            if (cleanField(text)) return text;
        }
    }
    return '';
}

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

export function isPlatformHost(hostname: string, platformHosts: readonly string[] = PLATFORM_HOSTS): boolean {
    const host = hostname.toLowerCase();
    if (GOOGLE_CCTLD_HOST.test(host)) return true;
    return platformHosts.some((p) => host === p || host.endsWith(`.${p}`));
}

/**
 * First phone-looking run in `text` that carries at least 8 digits.
 * Newlines are not separators, so a postcode on the line above never merges
 * into the number.
 */
export function findPhoneInText(text: string): string {
    for (const match of text.matchAll(PHONE_CANDIDATE)) {
        const candidate = match[0].trim();
        const digits = candidate.replace(/\D/g, '').length;
        if (digits >= MIN_PHONE_DIGITS) return candidate;
    }
    return '';
}

export function findEmailInText(text: string): string {
    return text.match(EMAIL_PATTERN)?.[0] ?? '';
}

function extractWebsite($: CheerioAPI, platformHosts: readonly string[]): string {
    for (const selector of Selectors.mapsDetail.website) {
        for (const el of $(selector).toArray()) {
            const href = ($(el).attr('href') ?? '').trim();
            if (href && isAbsoluteHttpUrl(href) && !isPlatformHost(new URL(href).hostname, platformHosts)) {
                return href;
            }
            const text = $(el).text().trim();
            if (cleanField(text)) return text;
        }
    }

    for (const el of $('a[href^="http"]').toArray()) {
        const href = ($(el).attr('href') ?? '').trim();
        if (!isAbsoluteHttpUrl(href)) continue;
        if (!isPlatformHost(new URL(href).hostname, platformHosts)) return href;
    }

    return '';
}

function extractEmail($: CheerioAPI, fullText: string): string {
    const mailto = $(Selectors.mapsDetail.mailLink).first().attr('href');
    if (mailto) {
        const address = safeDecode(mailto.replace(/^mailto:/i, '').split('?')[0]).trim();
        if (address) return address;
    }
    return findEmailInText(fullText);
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function extractHeuristic(
    detailHtml: string,
    fullText: string,
    options: HeuristicOptions = {}
): BusinessFields {
    const platformHosts = options.platformHosts ?? PLATFORM_HOSTS;
    const $ = cheerio.load(detailHtml);
    const s = Selectors.mapsDetail;

    return {
        name: firstText($, s.name),
        businessType: firstText($, s.businessType),
        address: firstText($, s.address),
        phone: firstText($, s.phone) || findPhoneInText(fullText),
        email: extractEmail($, fullText),
        website: extractWebsite($, platformHosts),
    };
}
