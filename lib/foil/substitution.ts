/**
 * Substitutions and name maps.
 *
 * A substitution maps names of an input scope to terms of an output scope.
 * Names outside its domain are injected unchanged as free variables, so the
 * empty substitution is the identity. Substitutions are persistent: adding an
 * entry returns a new substitution and leaves the old one valid.
 *
 * @module
 */
import {
  createIntMap,
  insertIntMap,
  type IntMap,
  intMapEntries,
  removeIntMap,
  searchIntMap,
  sizeIntMap,
} from "../data/map/intMap.ts";
import {
  type NameBinder,
  type NameBinderList,
  namesOfPattern,
} from "./binders.ts";
import { ScopeInvariantError } from "./errors.ts";
import type { Pattern } from "./pattern.ts";
import { type InternalKey, internalKey, type Name, type RawName } from "./scope.ts";

export class Substitution<E> {
  constructor(
    _key: InternalKey,
    public readonly inject: (name: Name) => E,
    public readonly env: IntMap<E>,
  ) {}
}

/** The empty substitution; `inject` builds the term for a free variable. */
export function identitySubst<E>(inject: (name: Name) => E): Substitution<E> {
  return new Substitution(internalKey, inject, createIntMap<E>());
}

export function lookupSubst<E>(subst: Substitution<E>, name: Name): E {
  const found = searchIntMap(subst.env, name.id);
  return found === undefined ? subst.inject(name) : found;
}

/** Map the name `binder` introduces to `term`. */
export function addSubst<E>(
  subst: Substitution<E>,
  binder: NameBinder,
  term: E,
): Substitution<E> {
  return new Substitution(
    internalKey,
    subst.inject,
    insertIntMap(subst.env, binder.id, term),
  );
}

/**
 * Map the name `binder` introduces to the free name `name`. Renaming a name
 * to itself drops the entry instead of storing an identity mapping.
 */
export function addRename<E>(
  subst: Substitution<E>,
  binder: NameBinder,
  name: Name,
): Substitution<E> {
  if (binder.id === name.id) {
    const env = removeIntMap(subst.env, binder.id);
    return env === subst.env
      ? subst
      : new Substitution(internalKey, subst.inject, env);
  }
  return addSubst(subst, binder, subst.inject(name));
}

/** Bind every name of `pattern`, in traversal order, to `terms`. */
export function addSubstPattern<E>(
  subst: Substitution<E>,
  pattern: Pattern<unknown>,
  terms: readonly E[],
): Substitution<E> {
  const names = namesOfPattern(pattern);
  if (names.length !== terms.length) {
    throw new ScopeInvariantError(
      `pattern binds ${names.length} names but ${terms.length} terms were given`,
    );
  }
  let env = subst.env;
  names.forEach((name, i) => {
    env = insertIntMap(env, name.id, terms[i]);
  });
  return new Substitution(internalKey, subst.inject, env);
}

export function addSubstList<E>(
  subst: Substitution<E>,
  binders: NameBinderList,
  terms: readonly E[],
): Substitution<E> {
  return addSubstPattern(subst, binders, terms);
}

/**
 * Reinterpret a substitution producing terms of scope O as one producing
 * terms of an extension of O. Terms of O stay valid in the extension, so
 * nothing is copied.
 */
export function sinkSubst<E>(subst: Substitution<E>): Substitution<E> {
  return subst;
}

/** Number of non-identity entries. */
export function substSize<E>(subst: Substitution<E>): number {
  return sizeIntMap(subst.env);
}

export function substEntries<E>(subst: Substitution<E>): [RawName, E][] {
  return intMapEntries(subst.env);
}

/** A total map from the names of a scope to values. */
export class NameMap<A> {
  constructor(_key: InternalKey, public readonly entries: IntMap<A>) {}
}

export function emptyNameMap<A>(): NameMap<A> {
  return new NameMap(internalKey, createIntMap<A>());
}

export function addNameBinder<A>(
  binder: NameBinder,
  value: A,
  map: NameMap<A>,
): NameMap<A> {
  return new NameMap(internalKey, insertIntMap(map.entries, binder.id, value));
}

/** Add one value per binder of `pattern`, in traversal order. */
export function addNameBinders<A>(
  pattern: Pattern<unknown>,
  values: readonly A[],
  map: NameMap<A>,
): NameMap<A> {
  const names = namesOfPattern(pattern);
  if (names.length !== values.length) {
    throw new ScopeInvariantError(
      `pattern binds ${names.length} names but ${values.length} values were given`,
    );
  }
  let entries = map.entries;
  names.forEach((name, i) => {
    entries = insertIntMap(entries, name.id, values[i]);
  });
  return new NameMap(internalKey, entries);
}

export function lookupName<A>(name: Name, map: NameMap<A>): A {
  const found = searchIntMap(map.entries, name.id);
  if (found === undefined) {
    throw new ScopeInvariantError(`unknown name ${name.id} in a NameMap`);
  }
  return found;
}
