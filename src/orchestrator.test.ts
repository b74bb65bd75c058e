import { describe, expect, it, vi } from 'vitest';
import { runHarvest, type HarvestOptions } from './orchestrator.js';
import { FakeListingSurface, detailHtml, type FakeCard } from './testUtils/fakeListingSurface.js';
import type { StructuredExtractor } from './types.js';
import { StopSignal } from './utils/stopSignal.js';

const nullAi: StructuredExtractor = { extract: async () => null };
const noSleep = async () => {};

const options: HarvestOptions = {
    query: 'cafes in springfield',
    targetCount: 10,
    maxNoGrowthAttempts: 2,
    settleMs: 0,
    settleMultiplier: 1,
    pageDownPresses: 1,
    detailTimeoutMs: 1_000,
};

function cafe(cardId: string, name: string, phone: string): FakeCard {
    return {
        cardId,
        detail: {
            html: detailHtml({ name, address: '123 Main St', phone }),
            text: `${name}, 123 Main St, ${phone}`,
        },
    };
}

describe('runHarvest', () => {
    it('discovers, extracts and collapses identical listings', async () => {
        const surface = new FakeListingSurface(
            [cafe('idx:0', 'Acme Cafe', '555-0100'), cafe('idx:1', 'Acme Cafe', '555-0100'), cafe('idx:2', 'Beta Deli', '555-0199')],
            [2, 3]
        );

        const result = await runHarvest(surface, { ai: nullAi, resolver: null, sleep: noSleep }, options, new StopSignal());

        expect(result.query).toBe('cafes in springfield');
        expect(result.discovery.reason).toBe('converged');
        expect(result.records).toEqual([
            { name: 'Acme Cafe', businessType: '', address: '123 Main St', phone: '555-0100', email: '', website: '' },
            { name: 'Beta Deli', businessType: '', address: '123 Main St', phone: '555-0199', email: '', website: '' },
        ]);
        expect(result.stats).toMatchObject({ processed: 3, emitted: 2, duplicates: 1 });
        expect(result.aborted).toBe(false);
        expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('extracts nothing when stopAll arrives during discovery', async () => {
        const stop = new StopSignal();
        const ai = { extract: vi.fn(async () => null) };
        const surface = new FakeListingSurface([cafe('idx:0', 'Acme Cafe', '555-0100')], [1], (poll) => {
            if (poll === 1) stop.requestStopAll();
        });

        const result = await runHarvest(surface, { ai, resolver: null, sleep: noSleep }, options, stop);

        expect(result.aborted).toBe(true);
        expect(result.discovery.reason).toBe('aborted');
        expect(result.records).toEqual([]);
        expect(surface.activated).toEqual([]);
        expect(ai.extract).not.toHaveBeenCalled();
    });

    it('goes on to extraction after stopScrolling', async () => {
        const stop = new StopSignal();
        const surface = new FakeListingSurface(
            [cafe('idx:0', 'Acme Cafe', '555-0100'), cafe('idx:1', 'Beta Deli', '555-0199')],
            [1, 2],
            (poll) => {
                if (poll === 1) stop.requestStopScrolling();
            }
        );

        const result = await runHarvest(surface, { ai: nullAi, resolver: null, sleep: noSleep }, options, stop);

        expect(result.discovery.reason).toBe('stop-scrolling');
        expect(result.records.map((r) => r.name)).toEqual(['Acme Cafe']);
    });

    it('caps the dataset at targetCount', async () => {
        const surface = new FakeListingSurface([
            cafe('idx:0', 'A', '555-0101'),
            cafe('idx:1', 'B', '555-0102'),
            cafe('idx:2', 'C', '555-0103'),
        ]);

        const result = await runHarvest(
            surface,
            { ai: nullAi, resolver: null, sleep: noSleep },
            { ...options, targetCount: 2 },
            new StopSignal()
        );

        expect(result.discovery.reason).toBe('target');
        expect(result.records.map((r) => r.name)).toEqual(['A', 'B']);
    });
});
