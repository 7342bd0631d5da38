/**
 * In-memory credential vault.
 *
 * Holds passwords and access tokens for the life of the process. Nothing
 * here is written to disk or emitted on the observer; serializing the
 * vault yields connection names only.
 *
 * @example
 * ```typescript
 * const vault = new CredentialVault()
 * vault.set('local', { password: 'test-secret' })
 *
 * vault.resolve('local')   // { password: 'test-secret' }
 * JSON.stringify(vault)    // '{"connections":["local"]}'
 * ```
 */
import type { Credentials } from './types.js';

export class CredentialVault {

    #secrets = new Map<string, Credentials>();
    readonly #env: NodeJS.ProcessEnv;

    constructor(env: NodeJS.ProcessEnv = process.env) {

        this.#env = env;

    }

    set(name: string, credentials: Credentials): void {

        this.#secrets.set(name, { ...credentials });

    }

    has(name: string): boolean {

        return this.#secrets.has(name);

    }

    delete(name: string): void {

        this.#secrets.delete(name);

    }

    clear(): void {

        this.#secrets.clear();

    }

    /**
     * Credentials for a connection: stored ones, else `SQLMODE_PASSWORD`
     * and `SQLMODE_ACCESS_TOKEN` from the environment.
     */
    resolve(name: string): Credentials {

        const stored = this.#secrets.get(name);

        if (stored) {

            return { ...stored };

        }

        const credentials: Credentials = {};
        const password = this.#env['SQLMODE_PASSWORD'];
        const accessToken = this.#env['SQLMODE_ACCESS_TOKEN'];

        if (password) credentials.password = password;
        if (accessToken) credentials.accessToken = accessToken;

        return credentials;

    }

    toJSON(): { connections: string[] } {

        return { connections: [...this.#secrets.keys()] };

    }

}
