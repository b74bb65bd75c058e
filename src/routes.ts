/**
 * src/routes.ts
 *
 * Request router for the Crawlee PlaywrightCrawler.
 *
 * ROUTING STRATEGY
 * ─────────────────
 * A run enqueues exactly one request, labelled MAPS_SEARCH, whose handler
 * carries the whole harvest: search → discovery → extraction. Keeping it in
 * one handler keeps the page single-owner; the crawler only supplies the
 * browser, the page and its lifecycle.
 *
 *   MAPS_SEARCH → PlaywrightListingSurface + runHarvest()
 */

import { createPlaywrightRouter } from 'crawlee';
import { PlaywrightContactPageOpener, type ContactOpenerOptions } from './listing/playwrightContactOpener.js';
import { PlaywrightListingSurface, type PlaywrightSurfaceOptions } from './listing/playwrightSurface.js';
import { runHarvest, type HarvestOptions } from './orchestrator.js';
import { ContactResolver } from './services/contactResolver.js';
import type { HarvestResult, StructuredExtractor } from './types.js';
import { errorMessage } from './utils/errors.js';
import type { StopSignal } from './utils/stopSignal.js';

export const MAPS_SEARCH = 'MAPS_SEARCH';

export interface MapsRouteConfig {
    harvest: HarvestOptions;
    surface: PlaywrightSurfaceOptions;
    ai: StructuredExtractor;
    /** null disables the Contact Resolver. */
    contact: (ContactOpenerOptions & { emailDomains: readonly string[]; contactSelectors?: readonly string[] }) | null;
    stop: StopSignal;
    onResult: (result: HarvestResult) => void;
}

export function createMapsRouter(config: MapsRouteConfig) {
    const router = createPlaywrightRouter();

    router.addHandler(MAPS_SEARCH, async ({ page, log }) => {
        log.info(`[Router] MAPS_SEARCH: "${config.harvest.query}"`);

        const surface = new PlaywrightListingSurface(page, config.surface);
        await surface.search(config.harvest.query);

        const opener = config.contact
            ? new PlaywrightContactPageOpener(page.context().browser(), config.contact)
            : null;
        const resolver = opener && config.contact
            ? new ContactResolver(opener, {
                emailDomains: config.contact.emailDomains,
                contactSelectors: config.contact.contactSelectors,
            })
            : null;

        try {
            config.onResult(await runHarvest(surface, { ai: config.ai, resolver }, config.harvest, config.stop));
        } finally {
            await opener?.close().catch((err: unknown) => {
                log.warning(`[Router] Closing contact browser failed: ${errorMessage(err)}`);
            });
        }
    });

    return router;
}
