// ============================================================================
// Compare — Deterministic orderings shared by the policies
// ============================================================================

const collator = new Intl.Collator("en", { numeric: true });

/**
 * Natural ascending order for process ids ("P2" before "P10").
 * Falls back to code-unit order when the collator sees two distinct ids
 * as equal, so the result is a total order.
 */
export function compareIds(a: string, b: string): number {
    const byCollator = collator.compare(a, b);
    if (byCollator !== 0 || a === b) return byCollator;
    return a < b ? -1 : 1;
}

/** Chain comparators: the first non-zero result wins. */
export function chain<T>(...comparators: Array<(a: T, b: T) => number>): (a: T, b: T) => number {
    return (a, b) => {
        for (const cmp of comparators) {
            const result = cmp(a, b);
            if (result !== 0) return result;
        }
        return 0;
    };
}

/** Ascending comparator over a numeric key. */
export function by<T>(key: (item: T) => number): (a: T, b: T) => number {
    return (a, b) => key(a) - key(b);
}
