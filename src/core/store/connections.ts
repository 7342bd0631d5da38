/**
 * Saved connections.
 *
 * Connection configs live in `~/.sqlmode/connections.yml`. Credentials
 * never do: every config passes through the schema on the way in and out,
 * which drops any `password` or token a hand-edited file might carry.
 *
 * @example
 * ```yaml
 * connections:
 *     - name: local
 *       dialect: mssql
 *       host: localhost
 *       auth:
 *           method: password
 *           user: sa
 * ```
 */
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { attempt, attemptSync } from '@logosdx/utils';
import { z } from 'zod';

import { ConfigValidationError, parseConnectionConfig } from '../config/schema.js';
import type { ConnectionConfig } from '../connection/types.js';
import { getHomeDir } from '../environment.js';
import { observer as defaultObserver, type CoreObserver } from '../observer.js';

const StoreFileSchema = z.object({
    connections: z.array(z.unknown()).default([]),
});

/**
 * Lookup of saved connections by name.
 */
export interface ConnectionLookup {
    get(name: string): Promise<ConnectionConfig | null>;
}

export interface FileConnectionStoreOptions {

    /** Store file (default: ~/.sqlmode/connections.yml) */
    path?: string;

    observer?: CoreObserver;
}

export class FileConnectionStore implements ConnectionLookup {

    readonly #path: string;
    readonly #observer: CoreObserver;

    constructor(options: FileConnectionStoreOptions = {}) {

        this.#path = options.path ?? join(getHomeDir(), 'connections.yml');
        this.#observer = options.observer ?? defaultObserver;

    }

    get path(): string {

        return this.#path;

    }

    /**
     * All saved connections, in file order.
     *
     * @throws ConfigValidationError naming the entry and field that is invalid
     */
    async list(): Promise<ConnectionConfig[]> {

        const [content, err] = await attempt(() => readFile(this.#path, 'utf-8'));

        if (err || typeof content !== 'string') {

            return [];

        }

        const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content));

        if (yamlErr) {

            throw new Error(`Invalid YAML in ${this.#path}: ${yamlErr.message}`, { cause: yamlErr });

        }

        const file = StoreFileSchema.safeParse(parsed ?? {});

        if (!file.success) {

            throw new ConfigValidationError('Expected a `connections` list', 'connections', file.error.issues);

        }

        return file.data.connections.map((entry, index) => {

            const [config, configErr] = attemptSync(() => parseConnectionConfig(entry));

            if (configErr instanceof ConfigValidationError) {

                throw new ConfigValidationError(
                    configErr.message,
                    `connections.${index}.${configErr.field}`,
                    configErr.issues,
                );

            }

            if (configErr || !config) {

                throw configErr ?? new Error(`Invalid connection at index ${index}`);

            }

            return config;

        });

    }

    async get(name: string): Promise<ConnectionConfig | null> {

        const configs = await this.list();

        return configs.find((config) => config.name === name) ?? null;

    }

    /**
     * Add or replace a connection by name.
     *
     * @throws ConfigValidationError if the config is invalid
     */
    async save(input: unknown): Promise<ConnectionConfig> {

        const config = parseConnectionConfig(input);
        const configs = await this.list();
        const index = configs.findIndex((existing) => existing.name === config.name);

        if (index === -1) {

            configs.push(config);

        }
        else {

            configs[index] = config;

        }

        await this.#write(configs);

        this.#observer.emit('store:saved', { name: config.name, path: this.#path });

        return config;

    }

    /**
     * Remove a connection. Returns false when it did not exist.
     */
    async remove(name: string): Promise<boolean> {

        const configs = await this.list();
        const remaining = configs.filter((config) => config.name !== name);

        if (remaining.length === configs.length) {

            return false;

        }

        await this.#write(remaining);

        this.#observer.emit('store:removed', { name, path: this.#path });

        return true;

    }

    async #write(configs: ConnectionConfig[]): Promise<void> {

        await mkdir(dirname(this.#path), { recursive: true });

        const yaml = stringifyYaml({ connections: configs }, {
            indent: 4,
            lineWidth: 120,
        });

        await writeFile(this.#path, yaml, 'utf-8');

    }

}
