/**
 * KyselyDriver against an in-memory SQLite database.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { KyselyDriver, getInstallCommand, type DriverHandle } from '../../../src/core/connection/driver.js';
import type { ConnectionConfig } from '../../../src/core/connection/types.js';

const SCRATCH: ConnectionConfig = { name: 'scratch', dialect: 'sqlite', filename: ':memory:' };

describe('connection: KyselyDriver', () => {

    const driver = new KyselyDriver();
    const signal = new AbortController().signal;
    let handle: DriverHandle;

    beforeEach(async () => {

        handle = await driver.openConnection(SCRATCH, {}, signal);

        await driver.runQuery(handle, 'CREATE TABLE orders (order_id INTEGER NOT NULL, total REAL)', signal);
        await driver.runQuery(handle, 'CREATE VIEW big_orders AS SELECT order_id FROM orders WHERE total > 100', signal);

    });

    afterEach(async () => {

        await driver.closeConnection(handle);

    });

    describe('runQuery', () => {

        it('should report affected rows for DML', async () => {

            const result = await driver.runQuery(handle, 'INSERT INTO orders VALUES (1, 50), (2, 150)', signal);

            expect(result).toEqual({ columns: [], rows: [], rowsAffected: 2 });

        });

        it('should return columns in select order', async () => {

            await driver.runQuery(handle, 'INSERT INTO orders VALUES (1, 50), (2, 150)', signal);

            const result = await driver.runQuery(handle, 'SELECT total, order_id FROM orders ORDER BY order_id', signal);

            expect(result.columns).toEqual(['total', 'order_id']);
            expect(result.rows).toEqual([{ total: 50, order_id: 1 }, { total: 150, order_id: 2 }]);

        });

        it('should name the columns of a query without rows', async () => {

            const result = await driver.runQuery(handle, 'SELECT order_id AS id, total FROM orders WHERE 1 = 0', signal);

            expect(result).toEqual({ columns: ['id', 'total'], rows: [] });

        });

        it('should pass the server error through', async () => {

            await expect(driver.runQuery(handle, 'SELECT * FROM nope', signal)).rejects.toThrow('no such table: nope');

        });

        it('should refuse an aborted signal', async () => {

            const controller = new AbortController();

            controller.abort(new Error('stop'));

            await expect(driver.runQuery(handle, 'SELECT 1', controller.signal)).rejects.toThrow('stop');

        });

    });

    describe('fetchMetadata', () => {

        it('should list the main database', async () => {

            expect(await driver.fetchMetadata(handle, { kind: 'databases' }, signal)).toEqual([
                { kind: 'database', name: 'main' },
            ]);

        });

        it('should list tables and views', async () => {

            expect(await driver.fetchMetadata(handle, { kind: 'objects', database: 'main' }, signal)).toEqual([
                { kind: 'view', name: 'big_orders' },
                { kind: 'table', name: 'orders' },
            ]);

        });

        it('should list columns with types and nullability', async () => {

            const columns = await driver.fetchMetadata(handle, { kind: 'columns', database: 'main', table: 'orders' }, signal);

            expect(columns).toEqual([
                { kind: 'column', name: 'order_id', dataType: 'INTEGER', nullable: false },
                { kind: 'column', name: 'total', dataType: 'REAL', nullable: true },
            ]);

        });

    });

    it('should name the install command per dialect', () => {

        expect(getInstallCommand('mssql')).toBe('npm install tedious tarn');
        expect(getInstallCommand('sqlite')).toBe('npm install better-sqlite3');

    });

});
