/**
 * @module persistent-avl-set
 * Persistent (immutable, structurally shared) AVL search tree over an ordered
 * set of unique keys.
 *
 * Two layers:
 * - Free functions over `Tree<K>` (a root node or `null`). Each update returns
 *   a new root and leaves the old one intact.
 * - `SearchTree<K>`, a holder that keeps the current root and a comparator.
 */

export { AVLNode, at, balanceFactor, contains, first, fromSorted, height, insert, last, range, rank, remove, size, traverse } from './avl-node';
export type { Tree } from './avl-node';
export { defaultCompare, reverseOrder } from './compare';
export type { Comparator, Primitive } from './compare';
export { checkInvariants } from './invariants';
export { SearchTree } from './search-tree';
