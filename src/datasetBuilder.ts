/**
 * src/datasetBuilder.ts
 *
 * Walks the discovered listing handles in order and accumulates a bounded,
 * duplicate-free list of business records.
 *
 * - CardIds already processed this session are skipped (the feed re-renders
 *   and re-orders, so the same card can appear in more than one poll).
 * - stopAll is checked before every item. Records emitted before the stop
 *   stay in the result; nothing after it is extracted.
 * - Extraction stops once `maxRecords` records have been emitted.
 */

import { log } from 'crawlee';
import type { ItemExtractor } from './extractors/itemExtraction.js';
import { emptyStats, type BusinessRecord, type DatasetResult, type ListingHandle } from './types.js';
import type { DedupSet } from './utils/dedup.js';
import type { StopSignal } from './utils/stopSignal.js';

export interface DatasetOptions {
    maxRecords: number;
    /** Logged at the end of the build; the extractor shares the same instance. */
    dedup?: DedupSet;
}

export async function buildDataset(
    handles: readonly ListingHandle[],
    extractor: Pick<ItemExtractor, 'extractOne'>,
    options: DatasetOptions,
    stop: StopSignal
): Promise<DatasetResult> {
    const records: BusinessRecord[] = [];
    const stats = emptyStats();
    const seen = new Set<string>();
    let aborted = false;

    for (const handle of handles) {
        if (stop.stopAll) {
            log.warning(`[DatasetBuilder] Stop requested — keeping ${records.length} records, skipping the rest`);
            aborted = true;
            break;
        }
        if (records.length >= options.maxRecords) break;

        if (seen.has(handle.cardId)) {
            stats.alreadySeen++;
            continue;
        }
        seen.add(handle.cardId);

        stats.processed++;
        log.info(`[DatasetBuilder] Item ${stats.processed}/${handles.length} (${handle.cardId})`);
        const outcome = await extractor.extractOne(handle);

        switch (outcome.kind) {
            case 'record':
                records.push(Object.isFrozen(outcome.record) ? outcome.record : Object.freeze({ ...outcome.record }));
                stats.emitted++;
                if (outcome.source === 'ai') stats.aiExtracted++;
                else stats.heuristicExtracted++;
                if (outcome.emailResolved) stats.emailsResolved++;
                break;
            case 'duplicate':
                stats.duplicates++;
                break;
            case 'skipped':
                stats.skipped++;
                break;
        }
    }

    log.info(
        `[DatasetBuilder] Done — ${stats.emitted} records | ` +
        `${stats.duplicates} duplicates | ${stats.skipped} skipped | ${stats.alreadySeen} already seen` +
        (aborted ? ' | ABORTED' : '')
    );
    options.dedup?.logSummary();

    return { records, stats, aborted };
}
