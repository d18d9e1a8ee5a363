import {
  type AVLTree,
  type Comparator,
  createEmptyAVL,
  insertAVL,
  keyValuePairs,
  maxKeyAVL,
  searchAVL,
  sizeAVL,
} from "../avl/avlNode.ts";

/**
 * A generic set implemented on top of an AVL tree.
 *
 * The set is parameterized by the type T and stores unique values of type T.
 * The caller must supply a comparator function for T.
 */
export interface Set<T> {
  readonly tree: AVLTree<T, T>;
  readonly compare: Comparator<T>;
}

/**
 * Creates an empty AVLSet given a comparator function.
 *
 * @param compare A comparator for values of type T.
 * @returns An empty AVLSet.
 */
export function createSet<T>(compare: Comparator<T>): Set<T> {
  const tree = createEmptyAVL<T, T>();
  return { tree, compare };
}

/**
 * Inserts a value into the set.
 * Returns a new set instance that contains the given value.
 *
 * @param set The original set.
 * @param value The value to insert.
 * @returns A new AVLSet containing the value.
 */
export function insertSet<T>(set: Set<T>, value: T): Set<T> {
  return { ...set, tree: insertAVL(set.tree, value, value, set.compare) };
}

/**
 * Checks whether the set contains a given value.
 *
 * @param set The set to query.
 * @param value The value to look up.
 * @returns true if the value is present, false otherwise.
 */
export function memberSet<T>(set: Set<T>, value: T): boolean {
  return searchAVL(set.tree, value, set.compare) !== undefined;
}

/** The greatest element under the set's comparator. */
export function maxSet<T>(set: Set<T>): T | undefined {
  return maxKeyAVL(set.tree);
}

export function sizeSet<T>(set: Set<T>): number {
  return sizeAVL(set.tree);
}

/**
 * Union of two sets sharing a comparator. The larger set is kept as the
 * base and the smaller one is inserted into it.
 */
export function unionSet<T>(a: Set<T>, b: Set<T>): Set<T> {
  const [base, extra] = sizeSet(a) >= sizeSet(b) ? [a, b] : [b, a];
  return setToArray(extra).reduce(insertSet, base);
}

export function setFromArray<T>(
  compare: Comparator<T>,
  values: Iterable<T>,
): Set<T> {
  let set = createSet(compare);
  for (const value of values) {
    set = insertSet(set, value);
  }
  return set;
}

/**
 * Returns an array of all elements in the set in ascending order.
 *
 * @param set The set to convert.
 * @returns An array of set elements.
 */
export function setToArray<T>(set: Set<T>): T[] {
  return keyValuePairs(set.tree).map(([, value]) => value);
}
