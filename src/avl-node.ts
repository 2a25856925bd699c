/**
 * @module avl-node
 * @description
 * Persistent AVL tree engine.
 *
 * Nodes are immutable once constructed. Every mutation copies the path from
 * the touched node back to the root and shares every other subtree, so a
 * "version" of a tree is nothing more than a reference to its root node.
 * Old roots stay valid (and unchanged) for as long as someone holds them.
 *
 * Contracts (performance-first):
 * - The comparator must be a total order. Invalid orders => undefined behavior
 *   (no defensive checks on the mutation paths; see `checkInvariants`).
 * - Keys must not be mutated after insertion in a way that changes their order.
 */

import type { Comparator } from './compare';

// ============================================================================
// 1. NODE
// ============================================================================

/**
 * Immutable node of an augmented AVL tree.
 *
 * Apart from its key and children it carries:
 * - `height`: For the Balance Factor ($O(1)$). Leaf = 1, absent child = 0.
 * - `size`: Number of keys in this subtree, for Rank/Select in $O(log N)$.
 *
 * Both are derived from the children handed to the constructor and can never
 * be passed in, so they are never stale.
 */
export class AVLNode<K> {
    readonly key: K;
    readonly left: AVLNode<K> | null;
    readonly right: AVLNode<K> | null;
    readonly height: number;
    readonly size: number;

    constructor(key: K, left: AVLNode<K> | null, right: AVLNode<K> | null) {
        this.key = key;
        this.left = left;
        this.right = right;
        const lh = left ? left.height : 0;
        const rh = right ? right.height : 0;
        this.height = (lh > rh ? lh : rh) + 1;
        this.size = 1 + (left ? left.size : 0) + (right ? right.size : 0);
    }

    /** Node without children (height 1, size 1). */
    static leaf<K>(key: K): AVLNode<K> {
        return new AVLNode(key, null, null);
    }
}

/** A tree is its root node; `null` is the empty tree. */
export type Tree<K> = AVLNode<K> | null;

export function height<K>(tree: Tree<K>): number { return tree ? tree.height : 0; }
export function size<K>(tree: Tree<K>): number { return tree ? tree.size : 0; }

/**
 * Relative height of the two subtrees.
 * Formula: $BF = Height(Right) - Height(Left)$.
 *
 * @returns
 * - $> 0$: Right Heavy
 * - $< 0$: Left Heavy
 * - $-1, 0, 1$: Balanced
 */
export function balanceFactor<K>(node: AVLNode<K>): number {
    return height(node.right) - height(node.left);
}

// ============================================================================
// 2. ROTATIONS (Path-Copying)
// ============================================================================

/**
 * Left Rotation. The right child P becomes the root of this subtree.
 *
 * Transformation:
 *     N                P
 *    / \              / \
 *   A   P    -->     N   C
 *      / \          / \
 *     B   C        A   B
 */
function rotateLeft<K>(node: AVLNode<K>): AVLNode<K> {
    const pivot = node.right;
    if (pivot === null) return node;
    const lowered = new AVLNode(node.key, node.left, pivot.left);
    return new AVLNode(pivot.key, lowered, pivot.right);
}

/**
 * Right Rotation. The left child P becomes the root of this subtree.
 *
 * Transformation:
 *       N            P
 *      / \          / \
 *     P   C  -->   A   N
 *    / \              / \
 *   A   B            B   C
 */
function rotateRight<K>(node: AVLNode<K>): AVLNode<K> {
    const pivot = node.left;
    if (pivot === null) return node;
    const lowered = new AVLNode(node.key, pivot.right, node.right);
    return new AVLNode(pivot.key, pivot.left, lowered);
}

/**
 * Restores balance of a left-heavy node ($BF < -1$).
 * Left-Right case: the left child leans right, so it is rotated left first.
 */
function rotateRightIfUnbalanced<K>(node: AVLNode<K>): AVLNode<K> {
    const left = node.left;
    if (balanceFactor(node) >= -1 || left === null) return node;

    const root = balanceFactor(left) > 0
        ? new AVLNode(node.key, rotateLeft(left), node.right)
        : node;
    return rotateRight(root);
}

/**
 * Restores balance of a right-heavy node ($BF > 1$).
 * Right-Left case: the right child leans left, so it is rotated right first.
 */
function rotateLeftIfUnbalanced<K>(node: AVLNode<K>): AVLNode<K> {
    const right = node.right;
    if (balanceFactor(node) <= 1 || right === null) return node;

    const root = balanceFactor(right) < 0
        ? new AVLNode(node.key, node.left, rotateRight(right))
        : node;
    return rotateLeft(root);
}

// ============================================================================
// 3. MUTATIONS
// ============================================================================

/**
 * Inserts a key and returns the root of the new version.
 * An equal key (per `cmp`) is replaced by the inserted one; children and size
 * stay the same.
 * Complexity: O(log N) time, O(log N) new nodes.
 */
export function insert<K>(tree: Tree<K>, key: K, cmp: Comparator<K>): AVLNode<K> {
    if (tree === null) return AVLNode.leaf(key);
    return insertNode(tree, key, cmp);
}

function insertNode<K>(node: AVLNode<K>, key: K, cmp: Comparator<K>): AVLNode<K> {
    const comparison = cmp(key, node.key);

    if (comparison < 0) {
        // A fresh leaf grows the height by at most 1: no rotation needed
        if (node.left === null) return new AVLNode(node.key, AVLNode.leaf(key), node.right);
        const newLeft = insertNode(node.left, key, cmp);
        return rotateRightIfUnbalanced(new AVLNode(node.key, newLeft, node.right));
    }

    if (comparison > 0) {
        if (node.right === null) return new AVLNode(node.key, node.left, AVLNode.leaf(key));
        const newRight = insertNode(node.right, key, cmp);
        return rotateLeftIfUnbalanced(new AVLNode(node.key, node.left, newRight));
    }

    return new AVLNode(key, node.left, node.right);
}

/**
 * Removes a key and returns the root of the new version (`null` once empty).
 * Removing an absent key returns `tree` itself and allocates nothing.
 * Complexity: O(log N).
 */
export function remove<K>(tree: Tree<K>, key: K, cmp: Comparator<K>): Tree<K> {
    if (tree === null) return null;

    const comparison = cmp(key, tree.key);
    if (comparison !== 0) return removeBelow(tree, key, comparison, cmp);

    const { left, right } = tree;
    if (left !== null && right !== null) {
        // Promote a key from the taller side; its removal then needs no rotation here
        const replacement = replacementKey(tree, left, right);
        const reduced = removeBelow(tree, replacement, cmp(replacement, tree.key), cmp);
        return new AVLNode(replacement, reduced.left, reduced.right);
    }

    return left ?? right;
}

/**
 * Removes `key` from one subtree of `node` (chosen by `comparison`).
 * The node itself survives; it is only rebuilt when that subtree changed.
 */
function removeBelow<K>(node: AVLNode<K>, key: K, comparison: number, cmp: Comparator<K>): AVLNode<K> {
    if (comparison < 0) {
        if (node.left === null) return node;
        const newLeft = remove(node.left, key, cmp);
        // Left side shrank: the node may now lean right
        return newLeft === node.left ? node : rotateLeftIfUnbalanced(new AVLNode(node.key, newLeft, node.right));
    }

    if (node.right === null) return node;
    const newRight = remove(node.right, key, cmp);
    return newRight === node.right ? node : rotateRightIfUnbalanced(new AVLNode(node.key, node.left, newRight));
}

/**
 * Key that takes over a two-child node in a delete: the smallest key on the
 * right when the right side is at least as tall, the largest on the left
 * otherwise.
 */
function replacementKey<K>(node: AVLNode<K>, left: AVLNode<K>, right: AVLNode<K>): K {
    if (balanceFactor(node) > -1) return leftmost(right).key;
    return rightmost(left).key;
}

function leftmost<K>(node: AVLNode<K>): AVLNode<K> {
    let current = node;
    while (current.left) current = current.left;
    return current;
}

function rightmost<K>(node: AVLNode<K>): AVLNode<K> {
    let current = node;
    while (current.right) current = current.right;
    return current;
}

/**
 * Builds a balanced tree from an ALREADY SORTED array of unique keys.
 * Order is not checked.
 * Complexity: O(N) (Linear time).
 */
export function fromSorted<K>(sorted: readonly K[]): Tree<K> {
    function build(start: number, end: number): Tree<K> {
        if (start > end) return null;
        const mid = (start + end) >>> 1;
        return new AVLNode(sorted[mid], build(start, mid - 1), build(mid + 1, end));
    }
    return build(0, sorted.length - 1);
}

// ============================================================================
// 4. QUERIES (Read-Only)
// ============================================================================

/** Membership test by iterative descent. Complexity: O(log N), no allocation. */
export function contains<K>(tree: Tree<K>, key: K, cmp: Comparator<K>): boolean {
    let current = tree;
    while (current !== null) {
        const comparison = cmp(key, current.key);
        if (comparison === 0) return true;
        current = comparison < 0 ? current.left : current.right;
    }
    return false;
}

/**
 * Keys `k` with `start <= k <= end`, ascending.
 * Subtrees that cannot hold such keys are never visited.
 * Complexity: O(log N + M) for M results.
 */
export function range<K>(tree: Tree<K>, start: K, end: K, cmp: Comparator<K>): K[] {
    const result: K[] = [];
    if (tree !== null) collectRange(tree, start, end, cmp, result);
    return result;
}

function collectRange<K>(node: AVLNode<K>, start: K, end: K, cmp: Comparator<K>, acc: K[]) {
    const fromStart = cmp(start, node.key) <= 0;
    const toEnd = cmp(end, node.key) >= 0;
    if (fromStart && node.left !== null) collectRange(node.left, start, end, cmp, acc);
    if (fromStart && toEnd) acc.push(node.key);
    if (toEnd && node.right !== null) collectRange(node.right, start, end, cmp, acc);
}

/** All keys in ascending order (In-Order Traversal). Complexity: O(N). */
export function traverse<K>(tree: Tree<K>): K[] {
    const result: K[] = [];
    if (tree !== null) collectAll(tree, result);
    return result;
}

function collectAll<K>(node: AVLNode<K>, acc: K[]) {
    if (node.left !== null) collectAll(node.left, acc);
    acc.push(node.key);
    if (node.right !== null) collectAll(node.right, acc);
}

export function first<K>(tree: Tree<K>): K | undefined {
    return tree ? leftmost(tree).key : undefined;
}

export function last<K>(tree: Tree<K>): K | undefined {
    return tree ? rightmost(tree).key : undefined;
}

function outOfBounds(index: number, length: number): RangeError {
    return new RangeError(`IndexOutOfBounds: ${index} is outside [0, ${length}).`);
}

/**
 * Select: the key at position `index` of the ascending order.
 * Uses the subtree sizes. Throws a RangeError outside `[0, size)`.
 * Complexity: O(log N).
 */
export function at<K>(tree: Tree<K>, index: number): K {
    const length = size(tree);
    if (!Number.isInteger(index) || index < 0 || index >= length) throw outOfBounds(index, length);

    let idx = index;
    let current = tree;
    while (current) {
        const leftSize = size(current.left);
        if (idx === leftSize) return current.key;
        if (idx < leftSize) {
            current = current.left;
        } else {
            idx -= leftSize + 1;
            current = current.right;
        }
    }
    throw outOfBounds(index, length);
}

/** Rank: number of keys ordering strictly before `key`. Complexity: O(log N). */
export function rank<K>(tree: Tree<K>, key: K, cmp: Comparator<K>): number {
    let count = 0;
    let current = tree;
    while (current) {
        const comparison = cmp(key, current.key);
        if (comparison === 0) return count + size(current.left);
        if (comparison < 0) {
            current = current.left;
        } else {
            count += size(current.left) + 1;
            current = current.right;
        }
    }
    return count;
}
