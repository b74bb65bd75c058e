/**
 * src/config.ts
 *
 * CSS selector map for the Google Maps search UI.
 *
 * Maps ships obfuscated, frequently-rotated class names. Every field therefore
 * has an ORDERED list of candidates: stable data attributes first, class names
 * last. The first candidate yielding non-empty trimmed text wins.
 *
 * The detail-pane selectors are evaluated by cheerio against an HTML snapshot
 * (see src/extractors/heuristicExtractor.ts), so they must stay plain CSS.
 * Playwright-only syntax (text=, :has-text) is allowed in `contact` only.
 */

export const Selectors = {
    mapsSearch: {
        searchInput: 'input#searchboxinput, input[name="q"]',
        searchButton: 'button#searchbox-searchbutton, button[aria-label="Search"]',
        main: 'div[role="main"]',
        resultsFeed: 'div[role="feed"], div[role="main"] div[aria-label][tabindex="0"]',
        /** Only the results column carries this; the place pane never does. */
        resultsList: 'div[role="feed"]',
        resultCard: '.Nv2PK, div[role="feed"] div[role="article"]',
        /** Click target inside a card; the card itself when absent. */
        cardLink: 'a.hfpxzc',
        /** Native per-card index attribute. Absent on some A/B variants. */
        cardIndexAttr: 'data-result-index',
        detailHeading: 'h1, .fontHeadlineLarge, .DUwDvf',
        consentAccept: 'form[action*="consent"] button, button[aria-label*="Accept all"]',
    },

    mapsDetail: {
        name: ['h1.DUwDvf', 'h1', '.fontHeadlineLarge', '[data-item-id="title"]'],
        businessType: [
            'button[jsaction*="pane.rating.category"]',
            'button[jsaction*="category"]',
            '.DkEaL',
            '.skqShb',
        ],
        address: [
            'button[data-item-id="address"] .Io6YTe',
            '[data-item-id="address"]',
            '.rogA2c',
            '.LrzXr',
        ],
        phone: [
            'button[data-item-id^="phone"] .Io6YTe',
            '[data-item-id^="phone"]',
            '.UsdlK',
        ],
        website: [
            'a[data-item-id="authority"]',
            'a[aria-label*="Website"]',
            '.rogA2c a',
            '.Io6YTe a',
        ],
        mailLink: 'a[href^="mailto:"]',
    },

    /** Contact-labelled elements on a business's own site (Playwright selectors). */
    contact: [
        'text=/contact us/i',
        'text=/contact/i',
        'a:has-text("Contact Us")',
        'a:has-text("Contact")',
        'footer',
    ],
};

/**
 * Hosts that belong to the listing platform itself. A link to any of these
 * (or a subdomain) is never a business's own website.
 */
export const PLATFORM_HOSTS = [
    'google.com',
    'google.co.in',
    'google.co.uk',
    'gstatic.com',
    'googleusercontent.com',
    'googleapis.com',
    'goo.gl',
    'g.page',
    'youtube.com',
];
