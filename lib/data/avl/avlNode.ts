/**
 *
 * https://en.wikipedia.org/wiki/AVL_tree
 *
 * A persistent Adelson-Velsky and Landis (AVL) tree.
 * - `key`: The BST key
 * - `value`: The value associated with that key
 * - `height`: For balancing
 * - `size`: Number of nodes in this subtree
 * - `left` & `right`: Pointers to subtrees
 *
 * Every operation returns a new tree and shares untouched subtrees with the
 * old one, so old versions remain valid.
 */
export interface AVLNode<TKey, TValue> {
  readonly key: TKey;
  readonly value: TValue;
  readonly height: number;
  readonly size: number;
  readonly left: AVLNode<TKey, TValue> | null;
  readonly right: AVLNode<TKey, TValue> | null;
}

/**
 * An AVL tree is just a reference to the root node (or null if empty).
 */
export interface AVLTree<TKey, TValue> {
  readonly root: AVLNode<TKey, TValue> | null;
}

export type Comparator<TKey> = (a: TKey, b: TKey) => number;

const EMPTY: AVLTree<never, never> = { root: null };

/**
 * Create an empty AVL tree.
 */
export function createEmptyAVL<TKey, TValue>(): AVLTree<TKey, TValue> {
  return EMPTY;
}

/** Get a node's height safely. */
function nodeHeight<TKey, TValue>(node: AVLNode<TKey, TValue> | null): number {
  return node ? node.height : 0;
}

function nodeSize<TKey, TValue>(node: AVLNode<TKey, TValue> | null): number {
  return node ? node.size : 0;
}

/** Build a node, computing height and size from its children. */
function createAVLNode<TKey, TValue>(
  key: TKey,
  value: TValue,
  left: AVLNode<TKey, TValue> | null,
  right: AVLNode<TKey, TValue> | null,
): AVLNode<TKey, TValue> {
  return {
    key,
    value,
    height: 1 + Math.max(nodeHeight(left), nodeHeight(right)),
    size: 1 + nodeSize(left) + nodeSize(right),
    left,
    right,
  };
}

/** Balance factor: height(left) - height(right). */
function balanceFactor<TKey, TValue>(node: AVLNode<TKey, TValue>): number {
  return nodeHeight(node.left) - nodeHeight(node.right);
}

/** Right rotation. */
function rotateRight<TKey, TValue>(
  y: AVLNode<TKey, TValue>,
): AVLNode<TKey, TValue> {
  const x = y.left;
  if (!x) return y; // no rotation possible if no left child
  return createAVLNode(
    x.key,
    x.value,
    x.left,
    createAVLNode(y.key, y.value, x.right, y.right),
  );
}

/** Left rotation. */
function rotateLeft<TKey, TValue>(
  x: AVLNode<TKey, TValue>,
): AVLNode<TKey, TValue> {
  const y = x.right;
  if (!y) return x;
  return createAVLNode(
    y.key,
    y.value,
    createAVLNode(x.key, x.value, x.left, y.left),
    y.right,
  );
}

/**
 * Restore the AVL invariant at `node`, assuming both children are balanced
 * and their heights differ by at most two.
 */
function rebalance<TKey, TValue>(
  node: AVLNode<TKey, TValue>,
): AVLNode<TKey, TValue> {
  const bf = balanceFactor(node);
  if (bf > 1 && node.left) {
    // left-heavy; Left-Right first straightens the left child
    const left = balanceFactor(node.left) < 0
      ? rotateLeft(node.left)
      : node.left;
    return rotateRight(createAVLNode(node.key, node.value, left, node.right));
  }
  if (bf < -1 && node.right) {
    const right = balanceFactor(node.right) > 0
      ? rotateRight(node.right)
      : node.right;
    return rotateLeft(createAVLNode(node.key, node.value, node.left, right));
  }
  return node;
}

function insertNode<TKey, TValue>(
  node: AVLNode<TKey, TValue> | null,
  key: TKey,
  value: TValue,
  compareKeys: Comparator<TKey>,
): AVLNode<TKey, TValue> {
  if (!node) {
    return createAVLNode(key, value, null, null);
  }
  const cmp = compareKeys(key, node.key);
  if (cmp === 0) {
    // Overwrite
    return createAVLNode(node.key, value, node.left, node.right);
  }
  if (cmp < 0) {
    return rebalance(
      createAVLNode(
        node.key,
        node.value,
        insertNode(node.left, key, value, compareKeys),
        node.right,
      ),
    );
  }
  return rebalance(
    createAVLNode(
      node.key,
      node.value,
      node.left,
      insertNode(node.right, key, value, compareKeys),
    ),
  );
}

/**
 * Insert `(key, value)` into the AVL tree (persistent, immutable).
 *
 * If `key` already exists in the tree, we overwrite its value.
 *
 * @param compareKeys  A comparator for TKey. Return <0 if a<b, 0 if a==b, >0 if a>b.
 * @returns A **new** AVL tree (the old one is not mutated).
 */
export function insertAVL<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
  key: TKey,
  value: TValue,
  compareKeys: Comparator<TKey>,
): AVLTree<TKey, TValue> {
  return { root: insertNode(tree.root, key, value, compareKeys) };
}

/** Detach the minimum node of a non-empty subtree. */
function removeMin<TKey, TValue>(
  node: AVLNode<TKey, TValue>,
): { min: AVLNode<TKey, TValue>; rest: AVLNode<TKey, TValue> | null } {
  if (!node.left) {
    return { min: node, rest: node.right };
  }
  const { min, rest } = removeMin(node.left);
  return {
    min,
    rest: rebalance(createAVLNode(node.key, node.value, rest, node.right)),
  };
}

function removeNode<TKey, TValue>(
  node: AVLNode<TKey, TValue> | null,
  key: TKey,
  compareKeys: Comparator<TKey>,
): AVLNode<TKey, TValue> | null {
  if (!node) {
    return null;
  }
  const cmp = compareKeys(key, node.key);
  if (cmp < 0) {
    const left = removeNode(node.left, key, compareKeys);
    return left === node.left
      ? node
      : rebalance(createAVLNode(node.key, node.value, left, node.right));
  }
  if (cmp > 0) {
    const right = removeNode(node.right, key, compareKeys);
    return right === node.right
      ? node
      : rebalance(createAVLNode(node.key, node.value, node.left, right));
  }
  if (!node.left) return node.right;
  if (!node.right) return node.left;
  const { min, rest } = removeMin(node.right);
  return rebalance(createAVLNode(min.key, min.value, node.left, rest));
}

/**
 * Remove `key` from the tree. Returns the original tree when the key is
 * absent.
 */
export function removeAVL<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
  key: TKey,
  compareKeys: Comparator<TKey>,
): AVLTree<TKey, TValue> {
  const root = removeNode(tree.root, key, compareKeys);
  return root === tree.root ? tree : { root };
}

/**
 * Look up a key in the AVL tree. Returns the associated value or undefined if not found.
 */
export function searchAVL<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
  key: TKey,
  compareKeys: Comparator<TKey>,
): TValue | undefined {
  let current = tree.root;
  while (current) {
    const cmp = compareKeys(key, current.key);
    if (cmp === 0) {
      return current.value;
    } else if (cmp < 0) {
      current = current.left;
    } else {
      current = current.right;
    }
  }
  return undefined;
}

/** The largest key in the tree, or undefined if empty. */
export function maxKeyAVL<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
): TKey | undefined {
  let current = tree.root;
  if (!current) return undefined;
  while (current.right) {
    current = current.right;
  }
  return current.key;
}

export function sizeAVL<TKey, TValue>(tree: AVLTree<TKey, TValue>): number {
  return nodeSize(tree.root);
}

/**
 * Return an array of all key-value pairs in ascending key order (in-order traversal).
 */
export function keyValuePairs<TKey, TValue>(
  tree: AVLTree<TKey, TValue>,
): [TKey, TValue][] {
  const result: [TKey, TValue][] = [];
  const stack: AVLNode<TKey, TValue>[] = [];

  let current: AVLNode<TKey, TValue> | null = tree.root;

  while (stack.length > 0 || current !== null) {
    if (current !== null) {
      stack.push(current);
      current = current.left;
    } else {
      const node = stack.pop();
      if (node) {
        result.push([node.key, node.value]);
        current = node.right;
      }
    }
  }

  return result;
}
