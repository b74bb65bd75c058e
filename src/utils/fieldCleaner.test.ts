import { describe, expect, it } from 'vitest';
import { cleanField, cleanFields } from './fieldCleaner.js';

const ZWSP = String.fromCharCode(0x200b);
const BOM = String.fromCharCode(0xfeff);
const SOFT_HYPHEN = String.fromCharCode(0x00ad);
const ICON_GLYPH = String.fromCharCode(0xe0c8);

describe('cleanField', () => {
    it('returns empty string for absent input', () => {
        expect(cleanField(undefined)).toBe('');
        expect(cleanField(null)).toBe('');
        expect(cleanField('')).toBe('');
        expect(cleanField(' \n\t\r\n ')).toBe('');
    });

    it('strips zero-width characters and icon glyphs', () => {
        expect(cleanField(`${ICON_GLYPH}${ZWSP}123 Main St${BOM}`)).toBe('123 Main St');
        expect(cleanField(`Caf${SOFT_HYPHEN}e`)).toBe('Cafe');
    });

    it('joins trimmed lines with single spaces', () => {
        expect(cleanField('  123 Main St \r\n  Springfield\rIL 62701\n')).toBe('123 Main St Springfield IL 62701');
    });

    it('drops repeated lines keeping the first occurrence order', () => {
        expect(cleanField('Cafe\nBakery\nCafe\nBakery\nDeli')).toBe('Cafe Bakery Deli');
    });

    it('treats lines that differ only in surrounding whitespace as repeats', () => {
        expect(cleanField('Acme\n  Acme  \nAcme Cafe')).toBe('Acme Acme Cafe');
    });

    it('is idempotent', () => {
        const samples = [
            '',
            'plain',
            ` a \n\nb\n a\n${ZWSP}c `,
            'x  y\r\nx  y\r\nz',
            `${ICON_GLYPH}\n${ICON_GLYPH} 555-0100 \n555-0100`,
        ];
        for (const sample of samples) {
            const once = cleanField(sample);
            expect(cleanField(once)).toBe(once);
        }
    });
});

describe('cleanFields', () => {
    it('cleans every field and fills missing ones with empty strings', () => {
        expect(cleanFields({ name: ' Acme\nAcme ', phone: `${ICON_GLYPH} 555-0100` })).toEqual({
            name: 'Acme',
            businessType: '',
            address: '',
            phone: '555-0100',
            email: '',
            website: '',
        });
    });
});
