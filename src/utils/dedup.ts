/**
 * src/utils/dedup.ts
 *
 * Run-scoped duplicate suppression for business records.
 *
 * Two records are the same business when the lower-cased tuple of all six
 * fields is equal. The set lives for one run only: every run replaces the
 * output file, so nothing is carried across runs.
 */

import { log } from 'crawlee';
import { BUSINESS_FIELDS, type BusinessFields } from '../types.js';

// ─── Key ──────────────────────────────────────────────────────────────────────

/**
 * Lower-cased six-tuple, serialised as a JSON array so that field boundaries
 * can never collide ("a b" + "c" vs "a" + "b c").
 */
export function dedupKey(fields: BusinessFields): string {
    return JSON.stringify(BUSINESS_FIELDS.map((field) => fields[field].toLowerCase()));
}

// ─── Set ──────────────────────────────────────────────────────────────────────

interface DedupStats {
    checked: number;
    duplicates: number;
}

export class DedupSet {
    private readonly keys = new Set<string>();
    private readonly stats: DedupStats = { checked: 0, duplicates: 0 };

    /**
     * Records the key if unseen. Returns false when the key was already present.
     */
    add(key: string): boolean {
        this.stats.checked++;
        if (this.keys.has(key)) {
            this.stats.duplicates++;
            return false;
        }
        this.keys.add(key);
        return true;
    }

    has(key: string): boolean {
        return this.keys.has(key);
    }

    get size(): number {
        return this.keys.size;
    }

    getStats(): Readonly<DedupStats> & { unique: number } {
        return { ...this.stats, unique: this.keys.size };
    }

    logSummary(): void {
        const s = this.getStats();
        const dupRate = s.checked > 0 ? Math.round((s.duplicates / s.checked) * 100) : 0;
        log.info(
            `[Dedup] Run summary — ` +
            `Checked: ${s.checked} | ` +
            `Unique: ${s.unique} | ` +
            `Duplicates: ${s.duplicates} (${dupRate}%)`
        );
    }
}
