import { describe, expect, it } from 'vitest';
import { isAbsoluteHttpUrl } from './url.js';

describe('isAbsoluteHttpUrl', () => {
    it('accepts http and https URLs', () => {
        expect(isAbsoluteHttpUrl('http://acme.example')).toBe(true);
        expect(isAbsoluteHttpUrl('https://acme.example/contact')).toBe(true);
    });

    it('rejects relative paths, bare hosts and other schemes', () => {
        expect(isAbsoluteHttpUrl('/contact')).toBe(false);
        expect(isAbsoluteHttpUrl('acme.example')).toBe(false);
        expect(isAbsoluteHttpUrl('mailto:owner@gmail.com')).toBe(false);
        expect(isAbsoluteHttpUrl('')).toBe(false);
    });
});
