import { describe, it, expect } from 'vitest';

import { createObserver } from '../../../src/core/observer.js';
import { SchemaCache, nodeKey } from '../../../src/core/schema/cache.js';
import { SchemaFetchError } from '../../../src/core/schema/errors.js';
import type { MetadataFetcher, MetadataScope, SchemaNodeInput } from '../../../src/core/schema/types.js';
import { deferred } from '../../utils/deferred.js';
import { SHOP_CATALOG, createFakeFetcher } from '../../utils/fake-metadata.js';

describe('schema: SchemaCache', () => {

    describe('listChildren', () => {

        it('should list databases and fetch them once', async () => {

            const { fetch, calls } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            const first = await cache.listChildren();
            const second = await cache.listChildren();

            expect(first.map((node) => node.name)).toEqual(['shop', 'archive']);
            expect(second).toEqual(first);
            expect(calls).toEqual([{ kind: 'databases' }]);
            expect(cache.status()).toBe('loaded');

        });

        it('should fetch each level lazily with its parent database', async () => {

            const { fetch, calls } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            const [shop] = await cache.listChildren();

            expect(shop).toBeDefined();
            if (!shop) return;

            const objects = await cache.listChildren(shop);
            const orders = objects.find((node) => node.name === 'Orders');

            expect(orders).toBeDefined();
            if (!orders) return;

            const columns = await cache.listChildren(orders);

            expect(columns.map((node) => node.name)).toEqual(['OrderId', 'CustomerId', 'Total', 'createdAt']);
            expect(calls[2]).toEqual({ kind: 'columns', database: 'shop', schema: 'dbo', table: 'Orders' });
            expect(cache.getParent(orders)?.name).toBe('shop');

        });

        it('should share one fetch between concurrent requests for the same node', async () => {

            const { fetch, calls } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            const [shop] = await cache.listChildren();

            if (!shop) throw new Error('no database');

            const [a, b] = await Promise.all([cache.listChildren(shop), cache.listChildren(shop)]);

            expect(a).toBe(b);
            expect(calls.filter((scope) => scope.kind === 'objects')).toHaveLength(1);

        });

        it('should tell fetched-and-empty apart from never fetched', async () => {

            const { fetch } = createFakeFetcher([{ name: 'empty', objects: [] }]);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            const [empty] = await cache.listChildren();

            if (!empty) throw new Error('no database');

            expect(cache.status(empty)).toBe('unloaded');
            expect(await cache.listChildren(empty)).toEqual([]);
            expect(cache.status(empty)).toBe('loaded');

        });

        it('should return no children for columns', async () => {

            const { fetch, calls } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            const column = { kind: 'column', name: 'OrderId', key: 'x', parentKey: null } as const;

            expect(await cache.listChildren(column)).toEqual([]);
            expect(calls).toEqual([]);

        });

    });

    describe('failures', () => {

        it('should remember a failure until its retry deadline, doubling the delay', async () => {

            let clock = 1_000;
            let calls = 0;

            const fetch: MetadataFetcher = async () => {

                calls++;
                throw new Error('Login timeout');

            };

            const cache = new SchemaCache({
                connection: 'local',
                fetch,
                retryAfterMs: 5_000,
                now: () => clock,
                observer: createObserver(),
            });

            const first = await cache.listChildren().catch((error: unknown) => error);

            expect(first).toBeInstanceOf(SchemaFetchError);
            expect(first instanceof SchemaFetchError && first.retryAt).toBe(6_000);
            expect(first instanceof SchemaFetchError && first.message).toBe('Failed to load databases: Login timeout');

            clock = 5_999;
            const again = await cache.listChildren().catch((error: unknown) => error);

            expect(again).toBe(first);
            expect(calls).toBe(1);

            clock = 6_000;
            const retried = await cache.listChildren().catch((error: unknown) => error);

            expect(calls).toBe(2);
            expect(retried instanceof SchemaFetchError && retried.retryAt).toBe(16_000);
            expect(cache.status()).toBe('failed');

        });

        it('should cap the retry delay', async () => {

            let clock = 0;

            const cache = new SchemaCache({
                connection: 'local',
                fetch: async () => {

                    throw new Error('down');

                },
                retryAfterMs: 5_000,
                maxRetryAfterMs: 8_000,
                now: () => clock,
                observer: createObserver(),
            });

            await cache.listChildren().catch(() => undefined);
            clock = 5_000;

            const error = await cache.listChildren().catch((e: unknown) => e);

            expect(error instanceof SchemaFetchError && error.retryAt).toBe(13_000);

        });

        it('should fetch at once after refresh clears a failure', async () => {

            let fail = true;

            const cache = new SchemaCache({
                connection: 'local',
                fetch: async (): Promise<SchemaNodeInput[]> => {

                    if (fail) throw new Error('down');

                    return [{ kind: 'database', name: 'shop' }];

                },
                observer: createObserver(),
            });

            await expect(cache.listChildren()).rejects.toBeInstanceOf(SchemaFetchError);

            fail = false;
            cache.invalidate();
            await expect(cache.listChildren()).rejects.toBeInstanceOf(SchemaFetchError);

            cache.refresh();
            const databases = await cache.listChildren();

            expect(databases.map((node) => node.name)).toEqual(['shop']);

        });

    });

    describe('invalidation', () => {

        it('should drop the subtree and refetch on next access', async () => {

            const { fetch, calls } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            const [shop] = await cache.listChildren();

            if (!shop) throw new Error('no database');

            await cache.listChildren(shop);
            expect(cache.nodesOfKind('table')).toHaveLength(3);

            cache.invalidate(shop);

            expect(cache.nodesOfKind('table')).toHaveLength(0);
            expect(cache.status(shop)).toBe('unloaded');
            expect(cache.getNode(shop.key)).toBe(shop);

            await cache.listChildren(shop);

            expect(calls.filter((scope) => scope.kind === 'objects')).toHaveLength(2);

        });

        it('should discard a fetch that completes after invalidation', async () => {

            const pending = deferred<SchemaNodeInput[]>();
            const scopes: MetadataScope[] = [];

            const cache = new SchemaCache({
                connection: 'local',
                fetch: (scope) => {

                    scopes.push(scope);

                    return pending.promise;

                },
                observer: createObserver(),
            });

            const request = cache.listChildren();

            cache.invalidate();
            pending.resolve([{ kind: 'database', name: 'shop' }]);

            const result = await request;

            expect(result.map((node) => node.name)).toEqual(['shop']);
            expect(cache.size).toBe(0);
            expect(cache.status()).toBe('unloaded');

        });

        it('should emit schema events', async () => {

            const observer = createObserver();
            const { fetch } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer, now: () => 0 });
            const events: string[] = [];

            observer.on(/^schema:/, ({ event }) => {

                events.push(String(event));

            });

            await cache.listChildren();
            cache.invalidate();

            expect(events).toEqual(['schema:fetch', 'schema:fetched', 'schema:invalidated']);

        });

    });

    describe('findByPrefix', () => {

        it('should rank loaded nodes by prefix', async () => {

            const fetch: MetadataFetcher = async (scope) => (
                scope.kind === 'databases'
                    ? [{ kind: 'database', name: 'shop' }]
                    : [
                        { kind: 'table', name: 'Orders' },
                        { kind: 'table', name: 'order_items' },
                        { kind: 'table', name: 'ORD' },
                        { kind: 'table', name: 'Customers' },
                    ]
            );

            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });
            const [shop] = await cache.listChildren();

            if (!shop) throw new Error('no database');

            await cache.listChildren(shop);

            expect(cache.findByPrefix('table', 'ord').map((node) => node.name)).toEqual(['ORD', 'order_items', 'Orders']);
            expect(cache.findByPrefix('table', '').map((node) => node.name)).toEqual(['Customers', 'ORD', 'order_items', 'Orders']);

        });

        it('should filter by schema and parent', async () => {

            const { fetch } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });
            const databases = await cache.listChildren();

            for (const database of databases) {

                await cache.listChildren(database);

            }

            const archive = databases.find((node) => node.name === 'archive');

            expect(cache.findByPrefix('view', '', { schema: 'SALES' }).map((node) => node.name)).toEqual(['ActiveOrders']);
            expect(cache.findByPrefix('table', 'Ord').map((node) => node.key)).toEqual([
                nodeKey('/database:shop', { kind: 'table', name: 'Orders', schema: 'dbo' }),
                nodeKey('/database:archive', { kind: 'table', name: 'Orders', schema: 'dbo' }),
                nodeKey('/database:shop', { kind: 'table', name: 'order_items', schema: 'dbo' }),
            ]);
            expect(archive && cache.findByPrefix('table', '', { parent: archive }).map((node) => node.name)).toEqual(['Orders']);

        });

        it('should never fetch', () => {

            const { fetch, calls } = createFakeFetcher(SHOP_CATALOG);
            const cache = new SchemaCache({ connection: 'local', fetch, observer: createObserver() });

            expect(cache.findByPrefix('table', 'O')).toEqual([]);
            expect(calls).toEqual([]);

        });

    });

});
