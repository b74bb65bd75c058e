/**
 * src/orchestrator.ts
 *
 * HARVEST ORCHESTRATOR
 *
 * One run = one query against one listing surface, in two sequential phases:
 *
 *   PHASE 1 (DISCOVERY)   → Scroll Driver loads result cards up to targetCount
 *                           or until the feed stops growing
 *   PHASE 2 (EXTRACTION)  → Dataset Builder visits each card through the
 *                           Item Extraction Coordinator
 *
 * The phases never overlap: both drive the same page. A stopAll observed
 * during discovery aborts the run before any item is extracted; stopScrolling
 * just ends phase 1 early.
 */

import { log } from 'crawlee';
import { buildDataset } from './datasetBuilder.js';
import { ItemExtractor } from './extractors/itemExtraction.js';
import type { HeuristicOptions } from './extractors/heuristicExtractor.js';
import { discoverItems, type ScrollOptions } from './listing/scrollDriver.js';
import { emptyStats, type EmailResolver, type HarvestResult, type ListingSurface, type StructuredExtractor } from './types.js';
import { DedupSet } from './utils/dedup.js';
import { createRunContext } from './utils/runContext.js';
import type { StopSignal } from './utils/stopSignal.js';

export interface HarvestDeps {
    ai: StructuredExtractor;
    resolver: EmailResolver | null;
    sleep?: (ms: number) => Promise<void>;
}

export interface HarvestOptions {
    query: string;
    targetCount: number;
    maxNoGrowthAttempts: number;
    settleMs: number;
    settleMultiplier: number;
    pageDownPresses: number;
    detailTimeoutMs: number;
    heuristic?: HeuristicOptions;
}

export async function runHarvest(
    surface: ListingSurface,
    deps: HarvestDeps,
    options: HarvestOptions,
    stop: StopSignal
): Promise<HarvestResult> {
    const ctx = createRunContext(options.query);
    log.info(`[Harvest] Run ${ctx.runId} started for "${ctx.query}" (target ${options.targetCount})`);

    // ── Phase 1: discovery
    const scrollOptions: ScrollOptions = {
        targetCount: options.targetCount,
        maxNoGrowthAttempts: options.maxNoGrowthAttempts,
        settleMs: options.settleMs,
        settleMultiplier: options.settleMultiplier,
        pageDownPresses: options.pageDownPresses,
        sleep: deps.sleep,
    };
    const discovery = await discoverItems(surface, scrollOptions, stop);

    if (discovery.reason === 'aborted') {
        log.warning('[Harvest] Stop requested during discovery — no items extracted');
        return { runId: ctx.runId, query: ctx.query, discovery, records: [], stats: emptyStats(), aborted: true };
    }
    log.info(`[Harvest] Discovered ${discovery.handles.length} listing(s) (${discovery.reason})`);

    // ── Phase 2: extraction
    const dedup = new DedupSet();
    const extractor = new ItemExtractor({
        surface,
        ai: deps.ai,
        resolver: deps.resolver,
        dedup,
        detailTimeoutMs: options.detailTimeoutMs,
        heuristic: options.heuristic,
    });
    const dataset = await buildDataset(discovery.handles, extractor, { maxRecords: options.targetCount, dedup }, stop);

    log.info(`[Harvest] Run ${ctx.runId} finished — ${dataset.records.length} record(s)${dataset.aborted ? ' (aborted)' : ''}`);
    return { runId: ctx.runId, query: ctx.query, discovery, ...dataset };
}
