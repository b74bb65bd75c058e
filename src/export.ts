/**
 * src/export.ts
 *
 * Result sink. Every run FULLY REPLACES the output file with that run's
 * de-duplicated records; nothing is merged across runs.
 *
 *   *.xlsx → one "Businesses" sheet
 *   *.csv  → the same sheet rendered as CSV
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import * as XLSX from 'xlsx';
import type { BusinessField, BusinessRecord } from './types.js';

export interface RecordSink {
    write(records: readonly BusinessRecord[]): Promise<void>;
}

export const COLUMNS: ReadonlyArray<readonly [BusinessField, string]> = [
    ['name', 'Business Name'],
    ['businessType', 'Business Type'],
    ['address', 'Address'],
    ['phone', 'Phone Number'],
    ['email', 'Email'],
    ['website', 'Website'],
];

const SHEET_NAME = 'Businesses';

export function recordsToSheet(records: readonly BusinessRecord[]): XLSX.WorkSheet {
    const rows: string[][] = [
        COLUMNS.map(([, header]) => header),
        ...records.map((record) => COLUMNS.map(([field]) => record[field])),
    ];
    const ws = XLSX.utils.aoa_to_sheet(rows);

    ws['!cols'] = COLUMNS.map(([field, header]) => {
        const longest = records.reduce((max, record) => Math.max(max, record[field].length), header.length);
        return { wch: Math.min(longest + 2, 60) };
    });
    return ws;
}

export class TabularFileSink implements RecordSink {
    readonly format: 'xlsx' | 'csv';

    constructor(readonly filePath: string) {
        const ext = path.extname(filePath).toLowerCase();
        if (ext !== '.xlsx' && ext !== '.csv') {
            throw new Error(`Unsupported output format "${ext || filePath}" (expected .xlsx or .csv)`);
        }
        this.format = ext === '.xlsx' ? 'xlsx' : 'csv';
    }

    async write(records: readonly BusinessRecord[]): Promise<void> {
        const ws = recordsToSheet(records);
        await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });

        if (this.format === 'csv') {
            await fs.promises.writeFile(this.filePath, XLSX.utils.sheet_to_csv(ws) + '\n', 'utf-8');
        } else {
            const wb = XLSX.utils.book_new();
            XLSX.utils.book_append_sheet(wb, ws, SHEET_NAME);
            const data: unknown = XLSX.write(wb, { bookType: 'xlsx', type: 'buffer' });
            if (!Buffer.isBuffer(data)) {
                throw new Error('xlsx did not return a Buffer');
            }
            await fs.promises.writeFile(this.filePath, data);
        }

        log.info(`[Export] Wrote ${records.length} record(s) to ${this.filePath}`);
    }
}
