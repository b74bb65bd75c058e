/**
 * src/harvest.ts
 *
 * Builds the PlaywrightCrawler for one query, runs the single MAPS_SEARCH
 * request and hands back its HarvestResult.
 *
 * The crawler is configured for one exclusive page: concurrency 1, no request
 * retries (a retry would restart the scroll session from zero) and a handler
 * timeout generous enough for a full scroll + per-item AI calls. Storage stays
 * in memory; the only artefact of a run is the output file.
 */

import { Configuration, PlaywrightCrawler, log } from 'crawlee';
import { MAPS_SEARCH, createMapsRouter, type MapsRouteConfig } from './routes.js';
import type { HarvestResult } from './types.js';
import { errorMessage } from './utils/errors.js';

export interface HarvestQueryConfig extends Omit<MapsRouteConfig, 'onResult'> {
    headless: boolean;
    /** Upper bound for the whole harvest handler. */
    handlerTimeoutSecs?: number;
}

export async function harvestQuery(config: HarvestQueryConfig): Promise<HarvestResult> {
    const outcome: { result?: HarvestResult; failure?: string } = {};

    const router = createMapsRouter({ ...config, onResult: (r) => { outcome.result = r; } });

    const crawler = new PlaywrightCrawler(
        {
            requestHandler: router,
            headless: config.headless,
            launchContext: {
                useIncognitoPages: true,
                launchOptions: {
                    // Ctrl+C belongs to the StopSignal, not to the browser
                    handleSIGINT: false,
                    args: ['--disable-dev-shm-usage', '--disable-blink-features=AutomationControlled'],
                },
            },
            maxConcurrency: 1,
            maxRequestRetries: 0,
            navigationTimeoutSecs: Math.ceil((config.surface.navigationTimeoutMs ?? 60_000) / 1000),
            requestHandlerTimeoutSecs: config.handlerTimeoutSecs ?? 60 * 60,

            failedRequestHandler: async ({ request }, error) => {
                outcome.failure = errorMessage(error);
                log.error(`[Harvest] ${request.url} failed: ${outcome.failure}`);
            },
        },
        new Configuration({ persistStorage: false })
    );

    await crawler.run([{ url: config.surface.mapsUrl, label: MAPS_SEARCH, uniqueKey: `${MAPS_SEARCH}:${config.harvest.query}` }]);

    if (!outcome.result) {
        const cause = outcome.failure ? `: ${outcome.failure}` : '';
        throw new Error(`Harvest for "${config.harvest.query}" did not complete${cause}`);
    }
    return outcome.result;
}
