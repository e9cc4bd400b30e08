/**
 * Grouping helpers over in-memory tables.
 *
 * Every helper walks its input once, in order, and returns Maps, whose
 * iteration order is insertion order. Tie-breaks that depend on "first seen"
 * therefore follow the caller's row order.
 */

/** Stable composite key for a tuple of column values */
export function compositeKey(values: ReadonlyArray<string | number | null | undefined>): string {
    return JSON.stringify(values.map(v => (v === undefined ? null : v)));
}

export function groupBy<T, K>(rows: readonly T[], keyOf: (row: T) => K): Map<K, T[]> {
    const groups = new Map<K, T[]>();
    for (const row of rows) {
        const key = keyOf(row);
        const group = groups.get(key);
        if (group) {
            group.push(row);
        } else {
            groups.set(key, [row]);
        }
    }
    return groups;
}

/** Index rows by key, keeping the first row seen for each key */
export function indexFirst<T, K>(rows: readonly T[], keyOf: (row: T) => K): Map<K, T> {
    const index = new Map<K, T>();
    for (const row of rows) {
        const key = keyOf(row);
        if (!index.has(key)) index.set(key, row);
    }
    return index;
}

/** Keep the first row for each key, preserving input order */
export function distinctBy<T, K>(rows: readonly T[], keyOf: (row: T) => K): T[] {
    return Array.from(indexFirst(rows, keyOf).values());
}

/**
 * Most frequent value. Ties go to the value that appeared first.
 * Returns undefined for an empty list.
 */
export function mode<T>(values: readonly T[]): T | undefined {
    const counts = new Map<T, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }

    let best: T | undefined;
    let bestCount = 0;
    for (const [value, count] of counts) {
        if (count > bestCount) {
            best = value;
            bestCount = count;
        }
    }
    return best;
}

export function sumBy<T>(rows: readonly T[], valueOf: (row: T) => number): number {
    return rows.reduce((sum, row) => sum + valueOf(row), 0);
}
