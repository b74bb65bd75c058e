/**
 * src/listing/playwrightContactOpener.ts
 *
 * Opens business websites for the Contact Resolver in a browser context of
 * their own, so the listing page's navigation state is never touched.
 *
 * The crawler's browser is reused when its page exposes one. Otherwise (a
 * persistent context has no Browser handle) a headless Chromium is launched
 * on first use and closed by close().
 */

import { log } from 'crawlee';
import { chromium, type Browser } from 'playwright';
import type { ContactPage, ContactPageOpener } from '../services/contactResolver.js';
import { errorMessage } from '../utils/errors.js';

export interface ContactOpenerOptions {
    navigationTimeoutMs: number;
    loadTimeoutMs: number;
    /** Per-selector wait when reading a contact element's text. */
    elementTimeoutMs?: number;
}

export class PlaywrightContactPageOpener implements ContactPageOpener {
    private ownBrowser: Browser | null = null;

    constructor(
        private readonly sharedBrowser: Browser | null,
        private readonly options: ContactOpenerOptions,
    ) {}

    private async browser(): Promise<Browser> {
        if (this.sharedBrowser?.isConnected()) return this.sharedBrowser;
        if (!this.ownBrowser) {
            log.info('[ContactOpener] Launching a separate headless browser for website lookups');
            this.ownBrowser = await chromium.launch({ headless: true, handleSIGINT: false });
        }
        return this.ownBrowser;
    }

    async open(url: string): Promise<ContactPage> {
        const browser = await this.browser();
        const context = await browser.newContext();
        const elementTimeout = this.options.elementTimeoutMs ?? 2_000;

        try {
            const page = await context.newPage();
            await page.goto(url, { timeout: this.options.navigationTimeoutMs, waitUntil: 'domcontentloaded' });
            await page.waitForLoadState('load', { timeout: this.options.loadTimeoutMs }).catch(() => {
                log.debug(`[ContactOpener] ${url} did not reach "load" in time; reading what rendered`);
            });

            return {
                textOf: async (selector) => {
                    const el = page.locator(selector).first();
                    if ((await el.count()) === 0) return null;
                    return el.innerText({ timeout: elementTimeout });
                },
                bodyText: () => page.evaluate(() => (document.body ? document.body.innerText : '')),
                close: () => context.close(),
            };
        } catch (err) {
            await context.close().catch((closeErr: unknown) => {
                log.debug(`[ContactOpener] Closing context after failure: ${errorMessage(closeErr)}`);
            });
            throw err;
        }
    }

    async close(): Promise<void> {
        if (!this.ownBrowser) return;
        const browser = this.ownBrowser;
        this.ownBrowser = null;
        await browser.close();
    }
}
