import type { DetailSnapshot, ListingHandle, ListingSurface } from '../types.js';

export interface FakeCard {
    cardId: string;
    detail: DetailSnapshot;
    /** activateItem() rejects, as a detail pane that never renders would. */
    failActivation?: boolean;
}

/**
 * In-memory ListingSurface. `growth[i]` is how many cards are rendered at
 * poll i; the last entry repeats once the list is exhausted.
 */
export class FakeListingSurface implements ListingSurface {
    polls = 0;
    scrolls = 0;
    pageDowns = 0;
    readonly activated: string[] = [];
    private current: FakeCard | null = null;

    constructor(
        private readonly cards: FakeCard[],
        private readonly growth: number[] = [cards.length],
        private readonly onPoll?: (poll: number) => void,
    ) {}

    async queryItems(): Promise<ListingHandle[]> {
        const idx = Math.min(this.polls, this.growth.length - 1);
        const visible = Math.min(this.growth[idx] ?? 0, this.cards.length);
        this.polls++;
        this.onPoll?.(this.polls);
        return this.cards.slice(0, visible).map((card, position) => ({ cardId: card.cardId, position }));
    }

    async scrollToEnd(): Promise<void> {
        this.scrolls++;
    }

    async pressPageDown(): Promise<void> {
        this.pageDowns++;
    }

    async activateItem(handle: ListingHandle): Promise<void> {
        const card = this.cards.find((c) => c.cardId === handle.cardId);
        if (!card) throw new Error(`unknown card ${handle.cardId}`);
        this.activated.push(card.cardId);
        if (card.failActivation) {
            throw new Error('Timeout 10000ms exceeded waiting for detail heading');
        }
        this.current = card;
    }

    async captureDetail(): Promise<DetailSnapshot> {
        if (!this.current) throw new Error('no item activated');
        return this.current.detail;
    }
}

/** Detail-pane HTML shaped like the Maps place panel. */
export function detailHtml(parts: {
    name?: string;
    category?: string;
    address?: string;
    phone?: string;
    website?: string;
    extra?: string;
}): string {
    return [
        '<div role="main">',
        parts.name ? `<h1 class="DUwDvf">${parts.name}</h1>` : '',
        parts.category ? `<button jsaction="pane.rating.category">${parts.category}</button>` : '',
        parts.address ? `<button data-item-id="address"><div class="Io6YTe">${parts.address}</div></button>` : '',
        parts.phone ? `<button data-item-id="phone:tel:0"><div class="Io6YTe">${parts.phone}</div></button>` : '',
        parts.website ? `<a data-item-id="authority" href="${parts.website}">${parts.website}</a>` : '',
        parts.extra ?? '',
        '</div>',
    ].join('');
}
