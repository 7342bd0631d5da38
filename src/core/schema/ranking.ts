/**
 * Prefix ranking shared by the schema cache and completion.
 *
 * With a non-empty prefix a name is ranked by tier:
 *
 * - 0: equals the prefix, ignoring case
 * - 1: starts with the prefix, same case
 * - 2: starts with the prefix, ignoring case
 *
 * then shorter names first, then alphabetical. With an empty prefix every
 * name matches and the order is purely alphabetical.
 *
 * @example
 * ```typescript
 * rankByPrefix(['Orders', 'order_items', 'ORD'], 'ord', (n) => n)
 * // [{ item: 'ORD', tier: 0 }, { item: 'order_items', tier: 1 }, { item: 'Orders', tier: 2 }]
 * ```
 */

export interface Ranked<T> {
    item: T;
    tier: number;
}

/**
 * Match tier of a name, or null when it does not match.
 */
export function matchTier(name: string, prefix: string): number | null {

    if (prefix === '') {

        return 0;

    }

    const lowerName = name.toLowerCase();
    const lowerPrefix = prefix.toLowerCase();

    if (lowerName === lowerPrefix) {

        return 0;

    }

    if (name.startsWith(prefix)) {

        return 1;

    }

    if (lowerName.startsWith(lowerPrefix)) {

        return 2;

    }

    return null;

}

/**
 * Alphabetical order: case-insensitive first, code units to break ties.
 */
export function compareNames(a: string, b: string): number {

    const lowerA = a.toLowerCase();
    const lowerB = b.toLowerCase();

    if (lowerA !== lowerB) {

        return lowerA < lowerB ? -1 : 1;

    }

    if (a === b) {

        return 0;

    }

    return a < b ? -1 : 1;

}

/**
 * Filter and order items by how well their name matches a prefix.
 */
export function rankByPrefix<T>(
    items: Iterable<T>,
    prefix: string,
    nameOf: (item: T) => string,
): Ranked<T>[] {

    const ranked: Ranked<T>[] = [];

    for (const item of items) {

        const tier = matchTier(nameOf(item), prefix);

        if (tier !== null) {

            ranked.push({ item, tier });

        }

    }

    ranked.sort((a, b) => {

        const nameA = nameOf(a.item);
        const nameB = nameOf(b.item);

        if (prefix === '') {

            return compareNames(nameA, nameB);

        }

        return a.tier - b.tier
            || nameA.length - nameB.length
            || compareNames(nameA, nameB);

    });

    return ranked;

}
