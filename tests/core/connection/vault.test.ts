import { describe, it, expect } from 'vitest';

import { CredentialVault } from '../../../src/core/connection/vault.js';

describe('connection: CredentialVault', () => {

    it('should return a copy of stored credentials', () => {

        const vault = new CredentialVault({});

        vault.set('local', { password: 'test-secret' });

        const first = vault.resolve('local');

        first.password = 'changed';

        expect(vault.resolve('local')).toEqual({ password: 'test-secret' });

    });

    it('should fall back to the environment', () => {

        const vault = new CredentialVault({ SQLMODE_PASSWORD: 'test-secret', SQLMODE_ACCESS_TOKEN: 'test-token' });

        expect(vault.resolve('local')).toEqual({ password: 'test-secret', accessToken: 'test-token' });

    });

    it('should resolve nothing without stored or environment credentials', () => {

        expect(new CredentialVault({}).resolve('local')).toEqual({});

    });

    it('should serialize connection names only', () => {

        const vault = new CredentialVault({});

        vault.set('local', { password: 'test-secret' });

        expect(JSON.stringify(vault)).toBe('{"connections":["local"]}');

    });

    it('should forget credentials', () => {

        const vault = new CredentialVault({});

        vault.set('local', { password: 'test-secret' });
        vault.delete('local');

        expect(vault.has('local')).toBe(false);

    });

});
