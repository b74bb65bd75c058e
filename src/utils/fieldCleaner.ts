/**
 * src/utils/fieldCleaner.ts
 *
 * Normalises raw extracted text into a canonical single-line field value.
 *
 *   1. drop zero-width / invisible characters and private-use icon glyphs
 *   2. split on line breaks, trim each line, drop empty lines
 *   3. drop repeated lines, keeping the first occurrence
 *   4. join with single spaces
 *
 * Pure and total: cleanField(cleanField(x)) === cleanField(x).
 */

import type { BusinessFields } from '../types.js';

// U+E000–U+F8FF covers the icon-font glyphs map UIs put in front of detail rows.
const INVISIBLE_CHARS = /[\u00AD\u200B-\u200F\u2060\uFEFF\uE000-\uF8FF]/g;
const LINE_BREAK = /\r\n|\r|\n/;

export function cleanField(value: string | null | undefined): string {
    if (!value) return '';

    const lines = value
        .replace(INVISIBLE_CHARS, '')
        .split(LINE_BREAK)
        .map((line) => line.trim())
        .filter(Boolean);

    return [...new Set(lines)].join(' ').trim();
}

export function cleanFields(fields: Partial<BusinessFields>): BusinessFields {
    return {
        name: cleanField(fields.name),
        businessType: cleanField(fields.businessType),
        address: cleanField(fields.address),
        phone: cleanField(fields.phone),
        email: cleanField(fields.email),
        website: cleanField(fields.website),
    };
}
