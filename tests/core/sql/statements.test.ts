import { describe, it, expect } from 'vitest';

import {
    classifyStatement,
    lexicalStateAt,
    maskLiterals,
    parseUseStatement,
    splitStatements,
    statementAt,
} from '../../../src/core/sql/statements.js';

describe('sql: statements', () => {

    describe('splitStatements', () => {

        it('should split on semicolons outside strings', () => {

            expect(splitStatements("SELECT 1; SELECT ';'")).toEqual([
                { text: 'SELECT 1', start: 0, end: 8 },
                { text: "SELECT ';'", start: 10, end: 20 },
            ]);

        });

        it('should ignore semicolons in comments and quoted identifiers', () => {

            const script = 'SELECT [a;b] -- x;y\nFROM t; /* ; */ SELECT 2';

            expect(splitStatements(script).map((s) => s.text)).toEqual([
                'SELECT [a;b] -- x;y\nFROM t',
                '/* ; */ SELECT 2',
            ]);

        });

        it('should treat doubled quotes as escapes', () => {

            expect(splitStatements("SELECT 'it''s; fine'; SELECT 2").map((s) => s.text)).toEqual([
                "SELECT 'it''s; fine'",
                'SELECT 2',
            ]);

        });

        it('should fall back to blank lines without semicolons', () => {

            expect(splitStatements('SELECT 1\n\nSELECT 2\n  \nSELECT 3').map((s) => s.text)).toEqual([
                'SELECT 1',
                'SELECT 2',
                'SELECT 3',
            ]);

        });

        it('should drop empty statements', () => {

            expect(splitStatements(';;  ;')).toEqual([]);
            expect(splitStatements('')).toEqual([]);

        });

    });

    describe('statementAt', () => {

        it('should return the statement containing the offset', () => {

            const script = 'SELECT 1; SELECT 2';

            expect(statementAt(script, 3).text).toBe('SELECT 1');
            expect(statementAt(script, 12).text).toBe('SELECT 2');

        });

        it('should give a cursor right after a semicolon to the next statement', () => {

            expect(statementAt('SELECT 1;', 9)).toEqual({ text: '', start: 9, end: 9 });

        });

    });

    describe('classifyStatement', () => {

        it('should classify by the leading keyword', () => {

            expect(classifyStatement('select 1')).toBe('rows');
            expect(classifyStatement('WITH x AS (SELECT 1) SELECT * FROM x')).toBe('rows');
            expect(classifyStatement('create table t (id int)')).toBe('ddl');
            expect(classifyStatement('DROP VIEW v')).toBe('ddl');
            expect(classifyStatement('INSERT INTO t VALUES (1)')).toBe('dml');
            expect(classifyStatement('EXEC sp_who')).toBe('other');

        });

        it('should skip leading comments', () => {

            expect(classifyStatement('-- note\nALTER TABLE t ADD c int')).toBe('ddl');
            expect(classifyStatement('/* x */ (SELECT 1)')).toBe('rows');

        });

    });

    describe('parseUseStatement', () => {

        it('should read the database name', () => {

            expect(parseUseStatement('USE Sales')).toBe('Sales');
            expect(parseUseStatement('use [Sales Archive];')).toBe('Sales Archive');
            expect(parseUseStatement('USE "reports"')).toBe('reports');

        });

        it('should return null for anything else', () => {

            expect(parseUseStatement('SELECT 1')).toBeNull();
            expect(parseUseStatement('USE a; SELECT 1')).toBeNull();

        });

    });

    describe('lexical helpers', () => {

        it('should report the state at an offset', () => {

            const sql = "SELECT 'abc' -- note";

            expect(lexicalStateAt(sql, 3)).toBe('code');
            expect(lexicalStateAt(sql, 9)).toBe('string');
            expect(lexicalStateAt(sql, 12)).toBe('code');
            expect(lexicalStateAt(sql, 18)).toBe('comment');

        });

        it('should mask literals and comments keeping offsets', () => {

            const sql = "SELECT 'a;b' /* c */ x";
            const masked = maskLiterals(sql);

            expect(masked).toBe("SELECT '   '" + ' '.repeat(9) + 'x');
            expect(masked.length).toBe(sql.length);

        });

    });

});
