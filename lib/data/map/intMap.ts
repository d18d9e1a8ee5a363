/**
 * Persistent integer-keyed map.
 *
 * Thin wrapper over the AVL tree with the numeric comparator fixed, used for
 * substitutions and name maps.
 *
 * @module
 */
import {
  type AVLTree,
  createEmptyAVL,
  insertAVL,
  keyValuePairs,
  removeAVL,
  searchAVL,
  sizeAVL,
} from "../avl/avlNode.ts";

export type IntMap<V> = AVLTree<number, V>;

export const compareInts = (a: number, b: number): number => a - b;

export function createIntMap<V>(): IntMap<V> {
  return createEmptyAVL<number, V>();
}

/** Immutable insert; overwrites an existing entry. */
export function insertIntMap<V>(map: IntMap<V>, key: number, value: V): IntMap<V> {
  return insertAVL(map, key, value, compareInts);
}

export function removeIntMap<V>(map: IntMap<V>, key: number): IntMap<V> {
  return removeAVL(map, key, compareInts);
}

export function searchIntMap<V>(map: IntMap<V>, key: number): V | undefined {
  return searchAVL(map, key, compareInts);
}

export function sizeIntMap<V>(map: IntMap<V>): number {
  return sizeAVL(map);
}

export function intMapEntries<V>(map: IntMap<V>): [number, V][] {
  return keyValuePairs(map);
}
