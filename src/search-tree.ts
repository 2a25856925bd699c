/**
 * @module search-tree
 * Holder of the current version of a persistent AVL tree.
 */

import {
    type AVLNode,
    type Tree,
    at,
    contains,
    first,
    fromSorted,
    height,
    insert,
    last,
    range,
    rank,
    remove,
    size,
    traverse,
} from './avl-node';
import { type Comparator, type Primitive, defaultCompare } from './compare';

/**
 * A sorted set of unique keys backed by a persistent AVL tree.
 *
 * The holder owns exactly one mutable thing: the reference to the current
 * root. Every update forwards to the node algorithms and swaps that reference
 * for the returned root. Roots handed out earlier (`root`, `snapshot()`) are
 * never touched again.
 *
 * Features:
 * - O(log N) Add/Remove/Has/Range, O(log N) Rank/Select via subtree sizes.
 * - O(1) snapshots (structural sharing).
 * - "Frozen" state: rejects further updates once `freeze()` was called.
 */
export class SearchTree<K> {
    #root: Tree<K> = null;
    #isFrozen: boolean = false;
    readonly #compare: Comparator<K>;

    /**
     * @param compare - Total order for the keys.
     * @param keys - Initial keys. Complexity O(N log N).
     */
    constructor(compare: Comparator<K>, keys?: Iterable<K>) {
        this.#compare = compare;
        if (keys) {
            for (const key of keys) this.#root = insert(this.#root, key, compare);
        }
    }

    /** Tree over number/string keys in their natural order. */
    static of(...keys: number[]): SearchTree<number>;
    static of(...keys: string[]): SearchTree<string>;
    static of<U extends Primitive>(...keys: U[]): SearchTree<U>;
    static of<U extends Primitive>(...keys: U[]): SearchTree<U> {
        return new SearchTree<U>(defaultCompare, keys);
    }

    /**
     * Optimized construction from an ALREADY SORTED array of unique keys.
     * Complexity: O(N) (Linear time).
     */
    static fromSorted<U>(compare: Comparator<U>, sorted: readonly U[]): SearchTree<U> {
        const t = new SearchTree<U>(compare);
        t.#root = fromSorted(sorted);
        return t;
    }

    #checkFrozen(op: string) {
        if (this.#isFrozen) throw new Error(`InvalidOperation: Cannot ${op} a frozen SearchTree.`);
    }

    /** The current version. `null` when empty. */
    get root(): Tree<K> { return this.#root; }
    get comparator(): Comparator<K> { return this.#compare; }
    get size(): number { return size(this.#root); }
    get height(): number { return height(this.#root); }
    get isFrozen(): boolean { return this.#isFrozen; }
    isEmpty(): boolean { return this.#root === null; }

    /** Insert key. Replaces an equal key. Throws if frozen. */
    add(key: K): this {
        this.#checkFrozen('add to');
        this.#root = insert(this.#root, key, this.#compare);
        return this;
    }

    /** Remove key (no-op when absent). Throws if frozen. */
    remove(key: K): this {
        this.#checkFrozen('remove from');
        this.#root = remove(this.#root, key, this.#compare);
        return this;
    }

    clear(): this {
        this.#checkFrozen('clear');
        this.#root = null;
        return this;
    }

    freeze(): this {
        this.#isFrozen = true;
        return this;
    }

    has(key: K): boolean { return contains(this.#root, key, this.#compare); }

    /** Keys in `[start, end]`, ascending. */
    range(start: K, end: K): K[] { return range(this.#root, start, end, this.#compare); }

    first(): K | undefined { return first(this.#root); }
    last(): K | undefined { return last(this.#root); }
    at(index: number): K { return at(this.#root, index); }
    rank(key: K): number { return rank(this.#root, key, this.#compare); }

    /**
     * New, unfrozen holder sharing the current version.
     * Complexity: O(1); later updates on either side copy only their own paths.
     */
    snapshot(): SearchTree<K> {
        const t = new SearchTree<K>(this.#compare);
        t.#root = this.#root;
        return t;
    }

    /** Keys as a sorted array. */
    get raw(): K[] { return traverse(this.#root); }
    toArray(): K[] { return this.raw; }

    *[Symbol.iterator](): Iterator<K> {
        const stack: AVLNode<K>[] = [];
        let curr = this.#root;
        while (curr || stack.length) {
            while (curr) { stack.push(curr); curr = curr.left; }
            const top = stack.pop();
            if (!top) return;
            yield top.key;
            curr = top.right;
        }
    }

    toString(): string { return `{${this.raw.join(', ')}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
