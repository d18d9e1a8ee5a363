/**
 * Scopes and names.
 *
 * A scope is an immutable set of raw integer names. A name is a raw integer
 * that is valid in the scope it was introduced in and in every extension of
 * that scope. Neither can be built without the construction key, which is
 * not part of the package's public exports: scopes and names only come from
 * the allocator and the pattern traversal.
 *
 * @module
 */
import {
  createSet,
  insertSet,
  maxSet,
  memberSet,
  type Set,
  setToArray,
  sizeSet,
} from "../data/set/set.ts";
import { compareInts } from "../data/map/intMap.ts";

export type RawName = number;
export type RawScope = Set<RawName>;

/** Construction key for scope-level handles. */
export const internalKey: unique symbol = Symbol("scoped-terms.internal");
export type InternalKey = typeof internalKey;

export class Name {
  constructor(_key: InternalKey, public readonly id: RawName) {}

  toString(): string {
    return `Name(${this.id})`;
  }
}

export class Scope {
  constructor(_key: InternalKey, public readonly raw: RawScope) {}
}

/** Anything that introduces exactly one name, i.e. a name binder. */
export interface BindsName {
  readonly name: Name;
}

const EMPTY_RAW_SCOPE: RawScope = createSet(compareInts);
const EMPTY_SCOPE = new Scope(internalKey, EMPTY_RAW_SCOPE);

export function emptyScope(): Scope {
  return EMPTY_SCOPE;
}

export function nameId(name: Name): RawName {
  return name.id;
}

export function rawMember(name: RawName, scope: RawScope): boolean {
  return memberSet(scope, name);
}

/** O(log n) membership of a name in a scope. */
export function member(name: Name, scope: Scope): boolean {
  return rawMember(name.id, scope.raw);
}

/** `scope ∪ {binder}`. */
export function extendScope(binder: BindsName, scope: Scope): Scope {
  return new Scope(internalKey, insertSet(scope.raw, binder.name.id));
}

/** Extend a scope by raw names already known to be fresh for it. */
export function extendScopeRaw(
  scope: Scope,
  names: Iterable<RawName>,
): Scope {
  let raw = scope.raw;
  for (const name of names) {
    raw = insertSet(raw, name);
  }
  return new Scope(internalKey, raw);
}

/**
 * Identifiers grow monotonically: the fresh name is one past the largest
 * name in scope, never a reclaimed gap.
 */
export function rawFreshName(scope: RawScope): RawName {
  const max = maxSet(scope);
  return max === undefined ? 0 : max + 1;
}

export function scopeSize(scope: Scope): number {
  return sizeSet(scope.raw);
}

/** Raw names of a scope in ascending order. */
export function scopeNames(scope: Scope): RawName[] {
  return setToArray(scope.raw);
}

/**
 * Reinterpret a value valid in some scope as valid in an extension of that
 * scope. Names never change representation when a scope grows, so this is
 * the identity.
 */
export function sink<T>(value: T): T {
  return value;
}
