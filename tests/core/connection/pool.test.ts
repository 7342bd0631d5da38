import { describe, it, expect } from 'vitest';

import { isSingleConnection, poolLimits } from '../../../src/core/connection/dialects/pool.js';
import { LOCAL } from '../../utils/fake-driver.js';

describe('connection: pool limits', () => {

    it('should default to a single server connection', () => {

        expect(poolLimits(LOCAL)).toEqual({ min: 0, max: 1 });
        expect(isSingleConnection(LOCAL)).toBe(true);

    });

    it('should take configured sizes', () => {

        const config = { ...LOCAL, pool: { min: 1, max: 4 } };

        expect(poolLimits(config)).toEqual({ min: 1, max: 4 });
        expect(isSingleConnection(config)).toBe(false);

    });

    it('should treat sqlite as one connection whatever the pool says', () => {

        expect(isSingleConnection({ name: 'scratch', dialect: 'sqlite', filename: ':memory:', pool: { max: 4 } })).toBe(true);

    });

});
