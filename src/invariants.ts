import type { AVLNode, Tree } from './avl-node';
import type { Comparator } from './compare';

/**
 * Walks the whole tree and verifies, for every node:
 * - BST ordering: left keys strictly before, right keys strictly after.
 * - AVL balance: $-1 \le BF \le 1$.
 * - Stored `height` and `size` match the children.
 *
 * The mutation paths never check these themselves; this is the debugging aid.
 * Complexity: O(N).
 * @throws Error `InvariantViolation: ...` naming the first offending key.
 */
export function checkInvariants<K>(tree: Tree<K>, cmp: Comparator<K>): void {
    if (tree !== null) checkNode(tree, cmp, undefined, undefined);
}

interface Bound<K> { readonly key: K }

function violation<K>(node: AVLNode<K>, rule: string): Error {
    return new Error(`InvariantViolation: ${rule} at key ${String(node.key)}.`);
}

function checkNode<K>(node: AVLNode<K>, cmp: Comparator<K>, lower: Bound<K> | undefined, upper: Bound<K> | undefined): void {
    if (lower && cmp(node.key, lower.key) <= 0) throw violation(node, 'key does not order after its lower bound');
    if (upper && cmp(node.key, upper.key) >= 0) throw violation(node, 'key does not order before its upper bound');

    if (node.left !== null) checkNode(node.left, cmp, lower, node);
    if (node.right !== null) checkNode(node.right, cmp, node, upper);

    const lh = node.left ? node.left.height : 0;
    const rh = node.right ? node.right.height : 0;
    if (node.height !== Math.max(lh, rh) + 1) throw violation(node, `stale height ${node.height}`);

    const expectedSize = 1 + (node.left ? node.left.size : 0) + (node.right ? node.right.size : 0);
    if (node.size !== expectedSize) throw violation(node, `stale size ${node.size}`);

    const bf = rh - lh;
    if (bf < -1 || bf > 1) throw violation(node, `balance factor ${bf}`);
}
