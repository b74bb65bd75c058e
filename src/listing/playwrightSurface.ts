/**
 * src/listing/playwrightSurface.ts
 *
 * ListingSurface over a live Google Maps page.
 *
 * KEY CHALLENGES ON MAPS
 * ──────────────────────
 * 1. VIRTUALISED FEED: results load as the feed is scrolled. A programmatic
 *    scrollTo on the feed container is sometimes ignored, so scrollToEnd()
 *    also pulls the last card into view, and the driver follows up with
 *    PageDown presses on the focused feed.
 *
 * 2. TWO PANES: the results column and the place panel are both
 *    `div[role="main"]`, and the results column has its own <h1> ("Results").
 *    The place panel is the last main pane that has a heading and no results
 *    feed; when none qualifies, captureDetail() reads the whole body.
 *
 * 3. STALE DETAIL PANE: the previous place's <h1> stays in the DOM while the
 *    next one loads. activateItem() therefore waits until the URL or the
 *    place heading has changed, not merely until a heading exists.
 *
 * 4. CARD IDS: older variants expose `data-result-index`; current ones do not.
 *    Without it the id is a short hash of the card's visible text, and only
 *    an empty card falls back to its position.
 */

import * as crypto from 'crypto';
import { log } from 'crawlee';
import type { ElementHandle, Page } from 'playwright';
import { Selectors } from '../config.js';
import type { DetailSnapshot, ListingHandle, ListingSurface } from '../types.js';
import { errorMessage } from '../utils/errors.js';

const S = Selectors.mapsSearch;

export interface PlaywrightSurfaceOptions {
    mapsUrl: string;
    detailSettleMs: number;
    navigationTimeoutMs?: number;
}

// ─── Handle ───────────────────────────────────────────────────────────────────

export class PlaywrightListingHandle implements ListingHandle {
    constructor(
        readonly cardId: string,
        readonly position: number,
        readonly element: ElementHandle<SVGElement | HTMLElement>,
    ) {}
}

export function deriveCardId(nativeIndex: string | null, visibleText: string, position: number): string {
    if (nativeIndex && nativeIndex.trim()) return `idx:${nativeIndex.trim()}`;

    const text = visibleText.replace(/\s+/g, ' ').trim();
    if (text) {
        return `txt:${crypto.createHash('sha256').update(text).digest('hex').slice(0, 16)}`;
    }
    return `pos:${position}`;
}

// ─── Detail Pane ──────────────────────────────────────────────────────────────

export interface PaneSample {
    heading: string;
    containsFeed: boolean;
    text: string;
    html: string;
}

export interface PaneScan {
    href: string;
    panes: PaneSample[];
}

/** The place panel: last pane with a heading and no results feed. */
export function selectDetailPane(panes: readonly PaneSample[]): PaneSample | null {
    for (let i = panes.length - 1; i >= 0; i--) {
        const pane = panes[i];
        if (pane && pane.heading && !pane.containsFeed) return pane;
    }
    return null;
}

export function detailPaneChanged(before: { href: string; heading: string }, after: PaneScan): boolean {
    const place = selectDetailPane(after.panes);
    if (!place) return false;
    return after.href !== before.href || place.heading !== before.heading;
}

// ─── Surface ──────────────────────────────────────────────────────────────────

export class PlaywrightListingSurface implements ListingSurface {
    constructor(private readonly page: Page, private readonly options: PlaywrightSurfaceOptions) {}

    /** fill-search + submit, then wait for the results pane. */
    async search(query: string): Promise<void> {
        const timeout = this.options.navigationTimeoutMs ?? 15_000;
        const { page } = this;

        if (!page.url().startsWith(this.options.mapsUrl)) {
            await page.goto(this.options.mapsUrl, { waitUntil: 'domcontentloaded', timeout });
        }

        // EU consent interstitial
        const consent = page.locator(S.consentAccept).first();
        if (await consent.isVisible().catch(() => false)) {
            log.info('[MapsSurface] Accepting consent dialog');
            await consent.click({ timeout: 5_000 }).catch((err: unknown) => {
                log.warning(`[MapsSurface] Consent click failed: ${errorMessage(err)}`);
            });
        }

        await page.waitForSelector(S.searchInput, { timeout });
        await page.fill(S.searchInput, query);
        await page.click(S.searchButton);
        await page.waitForSelector(S.main, { timeout });

        const feed = await page.waitForSelector(S.resultCard, { timeout }).catch(() => null);
        if (!feed) {
            log.warning(`[MapsSurface] No result cards after searching "${query}" (single-place answer or empty results)`);
        }
        await page.waitForTimeout(2_000);
    }

    async queryItems(): Promise<ListingHandle[]> {
        const elements = await this.page.$$(S.resultCard);
        const handles: ListingHandle[] = [];

        for (const [position, element] of elements.entries()) {
            const nativeIndex = await element.getAttribute(S.cardIndexAttr).catch(() => null);
            const text = nativeIndex ? '' : await element.innerText().catch(() => '');
            handles.push(new PlaywrightListingHandle(deriveCardId(nativeIndex, text, position), position, element));
        }

        return handles;
    }

    async scrollToEnd(): Promise<void> {
        const scrolled = await this.page.evaluate((feedSelector) => {
            const feed = document.querySelector(feedSelector);
            if (!feed) return false;
            feed.scrollTo(0, feed.scrollHeight);
            return true;
        }, S.resultsFeed);

        const cards = this.page.locator(S.resultCard);
        const count = await cards.count();
        if (count > 0) {
            await cards.nth(count - 1).scrollIntoViewIfNeeded({ timeout: 2_000 }).catch((err: unknown) => {
                log.debug(`[MapsSurface] scrollIntoView on last card failed: ${errorMessage(err)}`);
            });
        }

        if (!scrolled) {
            await this.page.mouse.wheel(0, 5_000);
        }
    }

    async pressPageDown(): Promise<void> {
        await this.page.focus(S.resultsFeed, { timeout: 1_000 }).catch((err: unknown) => {
            log.debug(`[MapsSurface] Could not focus results feed: ${errorMessage(err)}`);
        });
        await this.page.keyboard.press('PageDown');
    }

    async activateItem(handle: ListingHandle, timeoutMs: number): Promise<void> {
        const element = handle instanceof PlaywrightListingHandle
            ? handle.element
            : (await this.page.$$(S.resultCard))[handle.position];
        if (!element) {
            throw new Error(`Listing ${handle.cardId} is no longer attached`);
        }

        const previous = await this.scanPanes(false);
        const before = { href: previous.href, heading: selectDetailPane(previous.panes)?.heading ?? '' };

        const link = await element.$(S.cardLink);
        await (link ?? element).click({ timeout: timeoutMs });

        const deadline = Date.now() + timeoutMs;
        while (!detailPaneChanged(before, await this.scanPanes(false))) {
            if (Date.now() >= deadline) {
                throw new Error(`Detail pane for ${handle.cardId} did not render within ${timeoutMs}ms`);
            }
            await this.page.waitForTimeout(150);
        }
        await this.page.waitForTimeout(this.options.detailSettleMs);
    }

    async captureDetail(): Promise<DetailSnapshot> {
        const place = selectDetailPane((await this.scanPanes(true)).panes);
        if (place) return { text: place.text, html: place.html };

        log.debug('[MapsSurface] No place pane found, reading the whole page');
        return this.page.evaluate(() => ({ text: document.body.innerText, html: document.body.outerHTML }));
    }

    private scanPanes(withContent: boolean): Promise<PaneScan> {
        return this.page.evaluate(([paneSelector, headingSelector, feedSelector, includeContent]) => ({
            href: location.href,
            panes: Array.from(document.querySelectorAll(paneSelector)).map((pane) => {
                return {
                    heading: pane.querySelector(headingSelector)?.textContent?.trim() ?? '',
                    containsFeed: pane.querySelector(feedSelector) !== null,
                    text: includeContent && pane instanceof HTMLElement ? pane.innerText : '',
                    html: includeContent ? pane.outerHTML : '',
                };
            }),
        }), [S.main, S.detailHeading, S.resultsList, withContent] as const);
    }
}
