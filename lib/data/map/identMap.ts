/**
 * Identifier map implementation using JavaScript Map.
 *
 * Maps raw identifiers of a client syntax to values (typically scoped names)
 * during import. Updates copy the map so earlier versions stay valid for
 * sibling branches of a traversal.
 *
 * @module
 */

export type IdentMap<K, V> = ReadonlyMap<K, V>;

/** Create an empty identifier map. */
export function createIdentMap<K, V>(): IdentMap<K, V> {
  return new Map<K, V>();
}

/** Immutable insert into an identifier map. */
export function insertIdentMap<K, V>(
  map: IdentMap<K, V>,
  key: K,
  value: V,
): IdentMap<K, V> {
  const newMap = new Map(map);
  newMap.set(key, value);
  return newMap;
}

/** Immutable search for an identifier map. */
export function searchIdentMap<K, V>(
  map: IdentMap<K, V>,
  key: K,
): V | undefined {
  return map.get(key);
}
