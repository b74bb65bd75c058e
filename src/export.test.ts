import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { TabularFileSink } from './export.js';
import type { BusinessRecord } from './types.js';

const HEADER = 'Business Name,Business Type,Address,Phone Number,Email,Website';

const acme: BusinessRecord = {
    name: 'Acme Cafe',
    businessType: 'Cafe',
    address: '123 Main St, Springfield',
    phone: '555-0100',
    email: '',
    website: 'http://acme.example',
};

const beta: BusinessRecord = {
    name: 'Beta "The Deli"',
    businessType: 'Deli',
    address: '9 Elm Rd',
    phone: '555-0199',
    email: 'beta@gmail.com',
    website: '',
};

let dir: string;

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'maps-harvest-'));
});

afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
});

describe('TabularFileSink', () => {
    it('writes a CSV with the header row', async () => {
        const file = path.join(dir, 'out.csv');
        await new TabularFileSink(file).write([acme, beta]);

        expect(fs.readFileSync(file, 'utf-8').trimEnd().split('\n')).toEqual([
            HEADER,
            'Acme Cafe,Cafe,"123 Main St, Springfield",555-0100,,http://acme.example',
            '"Beta ""The Deli""",Deli,9 Elm Rd,555-0199,beta@gmail.com,',
        ]);
    });

    it('replaces the previous CSV content on every run', async () => {
        const file = path.join(dir, 'out.csv');
        const sink = new TabularFileSink(file);
        await sink.write([acme, beta]);
        await sink.write([beta]);

        const lines = fs.readFileSync(file, 'utf-8').trimEnd().split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[1]).toBe('"Beta ""The Deli""",Deli,9 Elm Rd,555-0199,beta@gmail.com,');
    });

    it('writes an XLSX workbook and replaces it on the next run', async () => {
        const file = path.join(dir, 'nested', 'out.xlsx');
        const sink = new TabularFileSink(file);
        await sink.write([acme, beta]);
        await sink.write([acme]);

        const wb = XLSX.read(fs.readFileSync(file), { type: 'buffer' });
        expect(wb.SheetNames).toEqual(['Businesses']);
        const ws = wb.Sheets['Businesses'];
        expect(ws['!ref']).toBe('A1:F2');
        expect(ws['A1'].v).toBe('Business Name');
        expect(ws['F1'].v).toBe('Website');
        expect(ws['A2'].v).toBe('Acme Cafe');
        expect(ws['D2'].v).toBe('555-0100');
    });

    it('writes only the header for an empty run', async () => {
        const file = path.join(dir, 'empty.csv');
        await new TabularFileSink(file).write([]);
        expect(fs.readFileSync(file, 'utf-8').trimEnd()).toBe(HEADER);
    });

    it('rejects other file extensions', () => {
        expect(() => new TabularFileSink(path.join(dir, 'out.json'))).toThrow(/expected \.xlsx or \.csv/);
    });
});
