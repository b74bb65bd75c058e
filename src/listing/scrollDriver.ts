/**
 * src/listing/scrollDriver.ts
 *
 * Drives the infinite-scroll results feed until enough cards have rendered.
 *
 * LOOP
 * ────
 *   poll → update ScrollState → terminal? → scroll to end + PageDown × N → settle → poll …
 *
 * Discovery ends when ANY of these holds:
 *   loadedCount ≥ targetCount                         → 'target'
 *   consecutiveNoGrowthScrolls ≥ maxNoGrowthAttempts   → 'converged'
 *   stopSignal.stopScrolling                          → 'stop-scrolling'
 *   stopSignal.stopAll                                → 'aborted' (caller must not extract)
 *
 * stopScrolling is only honoured after a poll, so the cards already rendered
 * are always handed on; stopAll ends discovery before the next poll.
 *
 * "No growth for N scrolls" is a heuristic: a virtualised list may simply be
 * slow. settleMultiplier stretches every settle wait for slow connections.
 *
 * Handles come back in feed order and are NOT de-duplicated here; the Dataset
 * Builder filters by CardId.
 */

import { log } from 'crawlee';
import type { DiscoveryResult, DiscoveryStopReason, ListingHandle, ListingSurface, ScrollState } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import type { StopSignal } from '../utils/stopSignal.js';

export interface ScrollOptions {
    targetCount: number;
    maxNoGrowthAttempts: number;
    settleMs: number;
    settleMultiplier?: number;
    pageDownPresses?: number;
    sleep?: (ms: number) => Promise<void>;
}

// ─── State ────────────────────────────────────────────────────────────────────

/**
 * Folds one poll into the state. loadedCount never decreases; the no-growth
 * counter increments iff loadedCount is unchanged and resets on any growth.
 */
export function nextScrollState(state: ScrollState, polledCount: number): ScrollState {
    if (polledCount > state.loadedCount) {
        return { loadedCount: polledCount, consecutiveNoGrowthScrolls: 0 };
    }
    return {
        loadedCount: state.loadedCount,
        consecutiveNoGrowthScrolls: state.consecutiveNoGrowthScrolls + 1,
    };
}

function stopReason(stop: StopSignal): DiscoveryStopReason | null {
    if (stop.stopAll) return 'aborted';
    if (stop.stopScrolling) return 'stop-scrolling';
    return null;
}

// ─── Scroll Action ────────────────────────────────────────────────────────────

/**
 * Both mechanisms, every time: a virtualised list may ignore either one alone.
 * Failures are logged and do not end discovery.
 */
async function scrollOnce(surface: ListingSurface, pageDownPresses: number, stop: StopSignal): Promise<void> {
    try {
        await surface.scrollToEnd();
    } catch (err) {
        log.warning(`[ScrollDriver] Scroll-to-end failed: ${errorMessage(err)}`);
    }

    for (let i = 0; i < pageDownPresses; i++) {
        if (stopReason(stop)) return;
        try {
            await surface.pressPageDown();
        } catch (err) {
            log.warning(`[ScrollDriver] PageDown failed: ${errorMessage(err)}`);
            return;
        }
    }
}

// ─── Public API ───────────────────────────────────────────────────────────────

export async function discoverItems(
    surface: ListingSurface,
    options: ScrollOptions,
    stop: StopSignal
): Promise<DiscoveryResult> {
    const sleep = options.sleep ?? defaultSleep;
    const settleMs = Math.round(options.settleMs * (options.settleMultiplier ?? 1));
    const pageDownPresses = options.pageDownPresses ?? 3;
    const targetCount = Math.max(1, options.targetCount);

    let state: ScrollState = { loadedCount: 0, consecutiveNoGrowthScrolls: 0 };
    let handles: ListingHandle[] = [];
    let polls = 0;

    const finish = (reason: DiscoveryStopReason): DiscoveryResult => {
        log.info(
            `[ScrollDriver] Discovery ended (${reason}) after ${polls} polls — ` +
            `${state.loadedCount} loaded, ${state.consecutiveNoGrowthScrolls} scrolls without growth`
        );
        return { handles: handles.slice(0, targetCount), state, polls, reason };
    };

    for (;;) {
        if (stop.stopAll) return finish('aborted');

        try {
            handles = await surface.queryItems();
        } catch (err) {
            log.warning(`[ScrollDriver] Querying items failed: ${errorMessage(err)}`);
        }
        polls++;
        state = nextScrollState(state, handles.length);
        log.debug(
            `[ScrollDriver] Poll ${polls}: ${handles.length} rendered ` +
            `(no growth ×${state.consecutiveNoGrowthScrolls})`
        );

        if (state.loadedCount >= targetCount) return finish('target');
        if (state.consecutiveNoGrowthScrolls >= options.maxNoGrowthAttempts) return finish('converged');

        const stopped = stopReason(stop);
        if (stopped) return finish(stopped);

        await scrollOnce(surface, pageDownPresses, stop);
        await sleep(settleMs);
    }
}
