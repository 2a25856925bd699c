/**
 * @module compare
 * Ordering strategies for tree keys.
 *
 * The tree never assumes a key carries its own order: every operation takes a
 * `Comparator` and trusts it to be a total order. An inconsistent comparator
 * leaves the tree silently corrupt (no defensive checks).
 */

/**
 * Total order over `K`.
 * @returns Negative if a < b, Positive if a > b, 0 if equal.
 */
export type Comparator<K> = (a: K, b: K) => number;

export type Primitive = number | string;

/**
 * Natural order for primitive keys.
 * Numbers sort before strings; numbers by value, strings by UTF-16 code unit.
 * Contract: no NaN (it breaks the order).
 */
export function defaultCompare(a: Primitive, b: Primitive): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;

    // Type segregation
    return typeof a === 'number' ? -1 : 1;
}

/** Flips any order, e.g. for a descending tree. */
export function reverseOrder<K>(cmp: Comparator<K>): Comparator<K> {
    return (a, b) => cmp(b, a);
}
