/**
 * src/extractors/itemExtraction.ts
 *
 * Per-listing orchestration: one result card in, one ItemOutcome out.
 *
 *   activate card → capture detail pane → AI tier ─┬─ fields ──────────────┐
 *                                                  └─ null → heuristic tier ┤
 *                                                                           ▼
 *                        clean → resolve missing email → dedup → record | duplicate
 *
 * extractOne() never throws. A detail view that fails to render, a selector
 * miss or an extractor error all end as { kind: 'skipped' }; the run goes on.
 */

import { log } from 'crawlee';
import type {
    BusinessFields,
    DetailSnapshot,
    EmailResolver,
    ExtractionResult,
    ItemOutcome,
    ListingHandle,
    ListingSurface,
    StructuredExtractor,
} from '../types.js';
import { dedupKey, type DedupSet } from '../utils/dedup.js';
import { errorMessage } from '../utils/errors.js';
import { cleanFields } from '../utils/fieldCleaner.js';
import { isAbsoluteHttpUrl } from '../utils/url.js';
import { extractHeuristic, type HeuristicOptions } from './heuristicExtractor.js';

export interface ItemExtractorDeps {
    surface: ListingSurface;
    ai: StructuredExtractor;
    /** null disables the secondary website crawl. */
    resolver: EmailResolver | null;
    dedup: DedupSet;
    detailTimeoutMs: number;
    heuristic?: HeuristicOptions;
}

export class ItemExtractor {
    constructor(private readonly deps: ItemExtractorDeps) {}

    async extractOne(handle: ListingHandle): Promise<ItemOutcome> {
        try {
            return await this.process(handle);
        } catch (err) {
            const reason = errorMessage(err);
            log.warning(`[ItemExtraction] Skipping ${handle.cardId}: ${reason}`);
            return { kind: 'skipped', reason };
        }
    }

    private async process(handle: ListingHandle): Promise<ItemOutcome> {
        const { surface, dedup } = this.deps;

        // 1–2. Detail view
        let detail: DetailSnapshot;
        try {
            await surface.activateItem(handle, this.deps.detailTimeoutMs);
            detail = await surface.captureDetail();
        } catch (err) {
            const reason = `detail view did not render: ${errorMessage(err)}`;
            log.warning(`[ItemExtraction] Skipping ${handle.cardId}: ${reason}`);
            return { kind: 'skipped', reason };
        }

        // 3–4. Two-tier extraction
        const extraction = await this.extract(detail);
        if (extraction.kind === 'failed') {
            log.warning(`[ItemExtraction] Skipping ${handle.cardId}: ${extraction.reason}`);
            return { kind: 'skipped', reason: extraction.reason };
        }

        // 5. Clean
        const fields = cleanFields(extraction.fields);

        // 6. Missing email
        const emailResolved = await this.resolveMissingEmail(fields);

        // 7. Dedup
        const key = dedupKey(fields);
        if (!dedup.add(key)) {
            log.debug(`[ItemExtraction] Duplicate of an earlier record: ${fields.name || handle.cardId}`);
            return { kind: 'duplicate', key };
        }

        log.info(`[ItemExtraction] ✓ ${fields.name || '(unnamed)'} [${extraction.source}]`);
        return { kind: 'record', record: Object.freeze(fields), source: extraction.source, emailResolved };
    }

    private async extract(detail: DetailSnapshot): Promise<ExtractionResult> {
        const aiFields = await this.deps.ai.extract(detail.text).catch((err: unknown) => {
            log.warning(`[ItemExtraction] AI extractor threw, using heuristics: ${errorMessage(err)}`);
            return null;
        });
        if (aiFields) return { kind: 'extracted', fields: aiFields, source: 'ai' };

        try {
            const fields = extractHeuristic(detail.html, detail.text, this.deps.heuristic);
            return { kind: 'extracted', fields, source: 'heuristic' };
        } catch (err) {
            return { kind: 'failed', reason: `heuristic extraction failed: ${errorMessage(err)}` };
        }
    }

    /** Mutates `fields.email` when the business's website yields one. */
    private async resolveMissingEmail(fields: BusinessFields): Promise<boolean> {
        const { resolver } = this.deps;
        if (!resolver || fields.email.includes('@') || !isAbsoluteHttpUrl(fields.website)) {
            return false;
        }

        const email = await resolver.resolveEmail(fields.website).catch((err: unknown) => {
            log.warning(`[ItemExtraction] Contact lookup failed for ${fields.website}: ${errorMessage(err)}`);
            return '';
        });
        if (!email) return false;

        fields.email = email;
        return true;
    }
}
