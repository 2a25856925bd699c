/**
 * Creates a deterministic pseudo-random number generator (Mulberry32).
 * Keeps the randomized checks reproducible.
 * @returns A function returning a number in [0, 1).
 */
export function createRNG(seed: number): () => number {
    let state = seed;
    return function() {
        let t = state += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export const byNumber = (a: number, b: number): number => a - b;

/** Worst-case AVL height for `n` keys. */
export function heightBound(n: number): number {
    return Math.ceil(1.44 * Math.log2(n + 2));
}
