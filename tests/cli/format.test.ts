import { describe, it, expect } from 'vitest';

import { formatCsv, formatJson, formatResults, normalizeValue } from '../../src/cli/format.js';

describe('cli: format', () => {

    describe('normalizeValue', () => {

        it('should make driver values printable', () => {

            expect(normalizeValue(new Date('2026-03-01T10:00:00.000Z'))).toBe('2026-03-01T10:00:00.000Z');
            expect(normalizeValue(Buffer.from([0xde, 0xad]))).toBe('0xdead');
            expect(normalizeValue(12345678901234567890n)).toBe('12345678901234567890');
            expect(normalizeValue(7)).toBe(7);
            expect(normalizeValue(null)).toBeNull();

        });

    });

    describe('formatCsv', () => {

        it('should print a header and rows per result set', () => {

            expect(formatCsv([
                { statement: 'SELECT 1 AS one', columns: ['one'], rows: [{ one: 1 }] },
                { statement: 'DELETE FROM t', columns: [], rows: [], rowsAffected: 3 },
                { statement: 'SELECT 2 AS two', columns: ['two'], rows: [{ two: 2 }] },
            ])).toBe('one\n1\n\ntwo\n2\n');

        });

        it('should quote separators and print booleans and nulls', () => {

            expect(formatCsv([{
                statement: 'SELECT ...',
                columns: ['name', 'active', 'note'],
                rows: [{ name: 'Smith, J', active: true, note: null }],
            }])).toBe('name,active,note\n"Smith, J",true,\n');

        });

        it('should keep the column order of the result set', () => {

            expect(formatCsv([{
                statement: 'SELECT b, a',
                columns: ['b', 'a'],
                rows: [{ a: 1, b: 2 }],
            }])).toBe('b,a\n2,1\n');

        });

        it('should print nothing without result sets', () => {

            expect(formatCsv([])).toBe('');

        });

    });

    describe('formatJson', () => {

        it('should print one entry per statement', () => {

            const output = formatJson([
                { statement: 'SELECT 1 AS one', columns: ['one'], rows: [{ one: 1 }] },
                { statement: 'DELETE FROM t', columns: [], rows: [], rowsAffected: 3 },
            ]);

            expect(output.endsWith('\n')).toBe(true);
            expect(JSON.parse(output)).toEqual([
                { statement: 'SELECT 1 AS one', columns: ['one'], rows: [{ one: 1 }], rowsAffected: null },
                { statement: 'DELETE FROM t', columns: [], rows: [], rowsAffected: 3 },
            ]);

        });

    });

    it('should pick the formatter by name', () => {

        expect(formatResults([], 'json')).toBe('[]\n');
        expect(formatResults([], 'csv')).toBe('');

    });

});
