import type { Kysely } from 'kysely';

/**
 * What a dialect factory opens.
 */
export interface DialectConnection {
    db: Kysely<unknown>;

    /** Column names of a query, for results without rows. Dialects that cannot tell leave it out */
    describe?: (query: string) => string[];
}
