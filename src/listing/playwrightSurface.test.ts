import { describe, expect, it } from 'vitest';
import { deriveCardId, detailPaneChanged, selectDetailPane, type PaneSample } from './playwrightSurface.js';

describe('deriveCardId', () => {
    it('prefers the native index attribute', () => {
        expect(deriveCardId(' 7 ', 'Acme Cafe', 3)).toBe('idx:7');
    });

    it('hashes the visible text when there is no index', () => {
        const id = deriveCardId(null, 'Acme Cafe\n4.5 stars', 3);
        expect(id).toMatch(/^txt:[0-9a-f]{16}$/);
        expect(deriveCardId('', '  Acme Cafe   4.5 stars ', 9)).toBe(id);
    });

    it('gives different cards different ids', () => {
        expect(deriveCardId(null, 'Acme Cafe', 0)).not.toBe(deriveCardId(null, 'Beta Deli', 0));
    });

    it('falls back to the position for an empty card', () => {
        expect(deriveCardId(null, '  ', 4)).toBe('pos:4');
    });
});

function pane(heading: string, containsFeed = false): PaneSample {
    return { heading, containsFeed, text: `${heading} text`, html: `<div>${heading}</div>` };
}

describe('selectDetailPane', () => {
    it('skips the results column even though it comes first with its own heading', () => {
        const results = pane('Results', true);
        const place = pane('Acme Cafe');

        expect(selectDetailPane([results, place])).toBe(place);
    });

    it('returns null while only the results column is rendered', () => {
        expect(selectDetailPane([pane('Results', true)])).toBeNull();
    });

    it('ignores panes without a heading', () => {
        expect(selectDetailPane([pane('Acme Cafe'), pane('')])?.heading).toBe('Acme Cafe');
    });
});

describe('detailPaneChanged', () => {
    const before = { href: 'https://maps.test/place/acme', heading: 'Acme Cafe' };

    it('is false while the results heading is the only one that changed', () => {
        expect(detailPaneChanged(before, {
            href: before.href,
            panes: [pane('Results', true), pane('Acme Cafe')],
        })).toBe(false);
    });

    it('is true once the place heading changes', () => {
        expect(detailPaneChanged(before, {
            href: before.href,
            panes: [pane('Results', true), pane('Beta Deli')],
        })).toBe(true);
    });

    it('is false until a place pane exists, whatever the URL', () => {
        expect(detailPaneChanged({ href: 'https://maps.test/search', heading: '' }, {
            href: 'https://maps.test/place/beta',
            panes: [pane('Results', true)],
        })).toBe(false);
    });

    it('accepts a URL change for a place with the same name', () => {
        expect(detailPaneChanged(before, {
            href: 'https://maps.test/place/acme-2',
            panes: [pane('Results', true), pane('Acme Cafe')],
        })).toBe(true);
    });
});
