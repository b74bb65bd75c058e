/**
 * src/types.ts
 *
 * Shared types for the harvest pipeline.
 *
 * Every component speaks in these shapes. The Playwright adapters in
 * src/listing/ translate the live page into them; tests build them by hand.
 */

// ─── Business Record ──────────────────────────────────────────────────────────

export const BUSINESS_FIELDS = [
    'name',
    'businessType',
    'address',
    'phone',
    'email',
    'website',
] as const;

export type BusinessField = (typeof BUSINESS_FIELDS)[number];

/** Six string fields; '' means unknown, never null/absent. */
export type BusinessFields = Record<BusinessField, string>;

/** A record once accumulated by the Dataset Builder. Frozen on append. */
export type BusinessRecord = Readonly<BusinessFields>;

export function emptyFields(): BusinessFields {
    return { name: '', businessType: '', address: '', phone: '', email: '', website: '' };
}

// ─── Extraction ───────────────────────────────────────────────────────────────

export type ExtractionSource = 'ai' | 'heuristic';

export type ExtractionResult =
    | { kind: 'extracted'; fields: BusinessFields; source: ExtractionSource }
    | { kind: 'failed'; reason: string };

export type ItemOutcome =
    | { kind: 'record'; record: BusinessRecord; source: ExtractionSource; emailResolved: boolean }
    | { kind: 'duplicate'; key: string }
    | { kind: 'skipped'; reason: string };

/** Anything that turns rendered page text into the six fields, or gives up. */
export interface StructuredExtractor {
    extract(text: string): Promise<BusinessFields | null>;
}

/** Secondary lookup for a contact email on a business's own website. */
export interface EmailResolver {
    resolveEmail(url: string): Promise<string>;
}

// ─── Listing Surface ──────────────────────────────────────────────────────────

/**
 * One candidate item on the results list.
 *
 * `cardId` is only stable within one scroll session: it keys the seen-set,
 * it is not a durable identifier.
 */
export interface ListingHandle {
    readonly cardId: string;
    readonly position: number;
}

/** What the detail view looked like right after activation. */
export interface DetailSnapshot {
    text: string;
    html: string;
}

/**
 * The listing page as the pipeline sees it: query-items, activate-item,
 * read-rendered-text and scroll-container.
 */
export interface ListingSurface {
    queryItems(): Promise<ListingHandle[]>;
    scrollToEnd(): Promise<void>;
    pressPageDown(): Promise<void>;
    activateItem(handle: ListingHandle, timeoutMs: number): Promise<void>;
    captureDetail(): Promise<DetailSnapshot>;
}

// ─── Discovery ────────────────────────────────────────────────────────────────

export interface ScrollState {
    loadedCount: number;
    consecutiveNoGrowthScrolls: number;
}

export type DiscoveryStopReason = 'target' | 'converged' | 'stop-scrolling' | 'aborted';

export interface DiscoveryResult {
    handles: ListingHandle[];
    state: ScrollState;
    polls: number;
    reason: DiscoveryStopReason;
}

// ─── Run Result ───────────────────────────────────────────────────────────────

export interface HarvestStats {
    processed: number;
    emitted: number;
    duplicates: number;
    skipped: number;
    alreadySeen: number;
    aiExtracted: number;
    heuristicExtracted: number;
    emailsResolved: number;
}

export function emptyStats(): HarvestStats {
    return {
        processed: 0,
        emitted: 0,
        duplicates: 0,
        skipped: 0,
        alreadySeen: 0,
        aiExtracted: 0,
        heuristicExtracted: 0,
        emailsResolved: 0,
    };
}

export interface DatasetResult {
    records: BusinessRecord[];
    stats: HarvestStats;
    aborted: boolean;
}

export interface HarvestResult extends DatasetResult {
    runId: string;
    query: string;
    discovery: DiscoveryResult;
}
