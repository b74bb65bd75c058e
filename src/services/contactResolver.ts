/**
 * src/services/contactResolver.ts
 *
 * Secondary crawl for a missing email: visit the business's own website in a
 * separate browsing context and look for a provider address (gmail.com by
 * default).
 *
 *   1. each contact-labelled element, in selector order → scan its text
 *   2. the whole rendered page text                      → scan
 *
 * Bounded by the opener's navigation/load timeouts. Every failure, including
 * an unreachable site, resolves to ''.
 */

import { log } from 'crawlee';
import { Selectors } from '../config.js';
import type { EmailResolver } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { isAbsoluteHttpUrl } from '../utils/url.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ContactPage {
    /** Text of the first element matching `selector`, null when none. */
    textOf(selector: string): Promise<string | null>;
    bodyText(): Promise<string>;
    close(): Promise<void>;
}

export interface ContactPageOpener {
    open(url: string): Promise<ContactPage>;
}

export interface ContactResolverOptions {
    emailDomains: readonly string[];
    contactSelectors?: readonly string[];
}

// ─── Pattern ──────────────────────────────────────────────────────────────────

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** e.g. ['gmail.com'] → /[\w.+-]+@(?:gmail\.com)(?![\w.-]*\w)/i */
export function buildProviderEmailPattern(domains: readonly string[]): RegExp {
    if (domains.length === 0) {
        throw new Error('At least one email provider domain is required');
    }
    const alternatives = domains.map(escapeRegExp).join('|');
    return new RegExp(`[\\w.+-]+@(?:${alternatives})(?![\\w.-]*\\w)`, 'i');
}

// ─── Resolver ─────────────────────────────────────────────────────────────────

export class ContactResolver implements EmailResolver {
    private readonly pattern: RegExp;
    private readonly contactSelectors: readonly string[];

    constructor(private readonly opener: ContactPageOpener, options: ContactResolverOptions) {
        this.pattern = buildProviderEmailPattern(options.emailDomains);
        this.contactSelectors = options.contactSelectors ?? Selectors.contact;
    }

    findEmail(text: string): string {
        return text.match(this.pattern)?.[0] ?? '';
    }

    async resolveEmail(url: string): Promise<string> {
        if (!isAbsoluteHttpUrl(url)) {
            log.debug(`[ContactResolver] Not an absolute URL, skipping: "${url}"`);
            return '';
        }

        let page: ContactPage;
        try {
            page = await this.opener.open(url);
        } catch (err) {
            log.warning(`[ContactResolver] Could not open ${url}: ${errorMessage(err)}`);
            return '';
        }

        try {
            for (const selector of this.contactSelectors) {
                const sectionText = await page.textOf(selector).catch((err: unknown) => {
                    log.debug(`[ContactResolver] Selector "${selector}" failed on ${url}: ${errorMessage(err)}`);
                    return null;
                });
                const email = sectionText ? this.findEmail(sectionText) : '';
                if (email) {
                    log.info(`[ContactResolver] Found ${email} in contact section of ${url}`);
                    return email;
                }
            }

            const email = this.findEmail(await page.bodyText());
            if (email) log.info(`[ContactResolver] Found ${email} in page text of ${url}`);
            return email;
        } catch (err) {
            log.warning(`[ContactResolver] Error visiting ${url}: ${errorMessage(err)}`);
            return '';
        } finally {
            await page.close().catch((err: unknown) => {
                log.debug(`[ContactResolver] Closing page for ${url} failed: ${errorMessage(err)}`);
            });
        }
    }
}
