/**
 * Name binders, binder groups and binder unification.
 *
 * `withFreshBinder` is the only place a new identifier is minted; every
 * other binder either reuses an identifier known to be free in the ambient
 * scope (`withRefreshed`) or is a canonical target picked by unification
 * outside the outer scope.
 *
 * @module
 */
import {
  compareInts,
  createIntMap,
  insertIntMap,
  type IntMap,
  intMapEntries,
  searchIntMap,
  sizeIntMap,
} from "../data/map/intMap.ts";
import {
  insertSet,
  type Set,
  setFromArray,
  setToArray,
  sizeSet,
  unionSet,
} from "../data/set/set.ts";
import type {
  CoSunk,
  Pattern,
  PatternFold,
  PatternTraversal,
  Renaming,
} from "./pattern.ts";
import {
  emptyScope,
  extendScope,
  extendScopeRaw,
  type InternalKey,
  internalKey,
  Name,
  type RawName,
  rawFreshName,
  rawMember,
  type Scope,
} from "./scope.ts";

/** The one name introduced by a binding site. */
export class NameBinder implements Pattern<NameBinder> {
  readonly kind = "name-binder";

  constructor(_key: InternalKey, public readonly name: Name) {}

  get id(): RawName {
    return this.name.id;
  }

  withPattern<F>(
    fold: PatternFold<F>,
    scope: Scope,
  ): PatternTraversal<F, NameBinder> {
    const { value, binder } = fold.withBinder(scope, this);
    return { value, pattern: binder, scope: extendScope(binder, scope) };
  }

  coSink(rename: Renaming): CoSunk<NameBinder> {
    const id = this.name.id;
    return {
      rename: (name) => (name.id === id ? name : rename(name)),
      pattern: this,
    };
  }

  unifyPatterns(other: Pattern<unknown>, scope: Scope): UnifyNameBinders {
    return other instanceof NameBinder
      ? unifyNameBinders(this, other, scope)
      : notUnifiable();
  }

  toString(): string {
    return `NameBinder(${this.name.id})`;
  }
}

function mkBinder(id: RawName): NameBinder {
  return new NameBinder(internalKey, new Name(internalKey, id));
}

export function nameOf(binder: NameBinder): Name {
  return binder.name;
}

/** Allocate a binder whose name is not in `scope` and hand it to `cont`. */
export function withFreshBinder<R>(
  scope: Scope,
  cont: (binder: NameBinder) => R,
): R {
  return cont(mkBinder(rawFreshName(scope.raw)));
}

/** {@link withFreshBinder} under the name used for distinct scopes. */
export const withFresh = withFreshBinder;

/**
 * Bind `name` again over `scope`: the same identifier when it is not in
 * `scope`, a fresh one otherwise.
 */
export function withRefreshed<R>(
  scope: Scope,
  name: Name,
  cont: (binder: NameBinder) => R,
): R {
  if (rawMember(name.id, scope.raw)) {
    return withFresh(scope, cont);
  }
  return cont(new NameBinder(internalKey, name));
}

/**
 * The name as seen from the scope the binder extends, or `undefined` when it
 * is the bound name itself.
 */
export function unsinkName(binder: NameBinder, name: Name): Name | undefined {
  return binder.name.id === name.id ? undefined : name;
}

const namesFold: PatternFold<Name[]> = {
  withBinder: (_scope, binder) => ({ value: [binder.name], binder }),
  unit: () => [],
  combine: (first, second) => [...first, ...second],
};

/** Names a pattern introduces, in traversal order. */
export function namesOfPattern(pattern: Pattern<unknown>): Name[] {
  return pattern.withPattern(namesFold, emptyScope()).value;
}

/** An ordered list of binders, each extending the scope of the previous one. */
export class NameBinderList implements Pattern<NameBinderList> {
  readonly kind = "name-binder-list";

  constructor(_key: InternalKey, public readonly binders: readonly NameBinder[]) {}

  get length(): number {
    return this.binders.length;
  }

  withPattern<F>(
    fold: PatternFold<F>,
    scope: Scope,
  ): PatternTraversal<F, NameBinderList> {
    let value = fold.unit();
    let current = scope;
    const binders: NameBinder[] = [];
    for (const binder of this.binders) {
      const step = binder.withPattern(fold, current);
      value = fold.combine(value, step.value);
      binders.push(step.pattern);
      current = step.scope;
    }
    return {
      value,
      pattern: new NameBinderList(internalKey, binders),
      scope: current,
    };
  }

  coSink(rename: Renaming): CoSunk<NameBinderList> {
    let current = rename;
    for (const binder of this.binders) {
      current = binder.coSink(current).rename;
    }
    return { rename: current, pattern: this };
  }

  unifyPatterns(other: Pattern<unknown>, scope: Scope): UnifyNameBinders {
    if (
      !(other instanceof NameBinderList) || other.length !== this.length
    ) {
      return notUnifiable();
    }
    return this.binders.reduce<UnifyNameBinders>(
      (u, binder, i) =>
        andThenUnifyNameBinders(u, binder, other.binders[i], scope),
      sameNameBinders(emptyNameBinders()),
    );
  }
}

export function emptyNameBinderList(): NameBinderList {
  return new NameBinderList(internalKey, []);
}

/**
 * Prepend `binder` to `rest`. `rest` must extend the scope `binder`
 * introduces.
 */
export function consNameBinderList(
  binder: NameBinder,
  rest: NameBinderList,
): NameBinderList {
  return new NameBinderList(internalKey, [binder, ...rest.binders]);
}

/** Allocate `count` fresh binders over `scope`, in order. */
export function withFreshNameBinderList<R>(
  scope: Scope,
  count: number,
  cont: (binders: NameBinderList, scope: Scope) => R,
): R {
  const binders: NameBinder[] = [];
  let current = scope;
  for (let i = 0; i < count; i++) {
    const binder = withFreshBinder(current, (b) => b);
    binders.push(binder);
    current = extendScope(binder, current);
  }
  return cont(new NameBinderList(internalKey, binders), current);
}

/** An unordered set of binders introduced together. */
export class NameBinders implements Pattern<NameBinders> {
  readonly kind = "name-binders";

  constructor(_key: InternalKey, public readonly raw: Set<RawName>) {}

  get size(): number {
    return sizeSet(this.raw);
  }

  ids(): RawName[] {
    return setToArray(this.raw);
  }

  withPattern<F>(
    fold: PatternFold<F>,
    scope: Scope,
  ): PatternTraversal<F, NameBinders> {
    const { value, pattern, scope: extended } = nameBindersList(this)
      .withPattern(fold, scope);
    return { value, pattern: fromNameBindersList(pattern), scope: extended };
  }

  coSink(rename: Renaming): CoSunk<NameBinders> {
    return { rename: nameBindersList(this).coSink(rename).rename, pattern: this };
  }

  unifyPatterns(other: Pattern<unknown>, scope: Scope): UnifyNameBinders {
    return other instanceof NameBinders
      ? nameBindersList(this).unifyPatterns(nameBindersList(other), scope)
      : notUnifiable();
  }
}

function rawNameBinders(ids: Iterable<RawName>): NameBinders {
  return new NameBinders(internalKey, setFromArray(compareInts, ids));
}

export function emptyNameBinders(): NameBinders {
  return rawNameBinders([]);
}

export function nameBindersSingleton(binder: NameBinder): NameBinders {
  return rawNameBinders([binder.id]);
}

export function mergeNameBinders(
  first: NameBinders,
  second: NameBinders,
): NameBinders {
  return new NameBinders(internalKey, unionSet(first.raw, second.raw));
}

/** The binders as a list, in ascending identifier order. */
export function nameBindersList(binders: NameBinders): NameBinderList {
  return new NameBinderList(internalKey, binders.ids().map(mkBinder));
}

export function fromNameBindersList(
  list: NameBinderList | readonly NameBinder[],
): NameBinders {
  const binders = list instanceof NameBinderList ? list.binders : list;
  return rawNameBinders(binders.map((binder) => binder.id));
}

export function extendScopeNameBinders(
  binders: NameBinders,
  scope: Scope,
): Scope {
  return extendScopeRaw(scope, binders.ids());
}

/**
 * A simultaneous renaming of binder identifiers. Identifiers outside its
 * domain are left alone.
 */
export class BinderRenaming {
  constructor(_key: InternalKey, public readonly raw: IntMap<RawName>) {}

  get size(): number {
    return sizeIntMap(this.raw);
  }

  apply(binder: NameBinder): NameBinder {
    const target = searchIntMap(this.raw, binder.id);
    return target === undefined ? binder : mkBinder(target);
  }

  applyName(name: Name): Name {
    const target = searchIntMap(this.raw, name.id);
    return target === undefined ? name : new Name(internalKey, target);
  }

  entries(): [RawName, RawName][] {
    return intMapEntries(this.raw);
  }
}

export function fromNameBinderRenaming(renaming: BinderRenaming): Renaming {
  return (name) => renaming.applyName(name);
}

function singletonRenaming(from: RawName, to: RawName): BinderRenaming {
  return new BinderRenaming(
    internalKey,
    insertIntMap(createIntMap<RawName>(), from, to),
  );
}

function mergeRenamings(
  first: BinderRenaming | undefined,
  second: BinderRenaming | undefined,
): BinderRenaming | undefined {
  if (!first) return second;
  if (!second) return first;
  const raw = second.entries().reduce(
    (acc, [from, to]) => insertIntMap(acc, from, to),
    first.raw,
  );
  return new BinderRenaming(internalKey, raw);
}

/**
 * How two patterns over a common outer scope line up. `binders` is the
 * unordered set of canonical binders of the unified pattern; the renamings
 * send the left and/or right binders onto them.
 */
export type UnifyNameBinders =
  | { kind: "same"; binders: NameBinders }
  | { kind: "rename-left"; binders: NameBinders; renameLeft: BinderRenaming }
  | {
    kind: "rename-right";
    binders: NameBinders;
    renameRight: BinderRenaming;
  }
  | {
    kind: "rename-both";
    binders: NameBinders;
    renameLeft: BinderRenaming;
    renameRight: BinderRenaming;
  }
  | { kind: "not-unifiable" };

type Unified = Exclude<UnifyNameBinders, { kind: "not-unifiable" }>;

const NOT_UNIFIABLE: UnifyNameBinders = { kind: "not-unifiable" };

export function notUnifiable(): UnifyNameBinders {
  return NOT_UNIFIABLE;
}

export function sameNameBinders(binders: NameBinders): UnifyNameBinders {
  return { kind: "same", binders };
}

function unified(
  binders: NameBinders,
  renameLeft: BinderRenaming | undefined,
  renameRight: BinderRenaming | undefined,
): Unified {
  if (renameLeft && renameRight) {
    return { kind: "rename-both", binders, renameLeft, renameRight };
  }
  if (renameLeft) return { kind: "rename-left", binders, renameLeft };
  if (renameRight) return { kind: "rename-right", binders, renameRight };
  return { kind: "same", binders };
}

export function leftRenaming(u: UnifyNameBinders): BinderRenaming | undefined {
  return u.kind === "rename-left" || u.kind === "rename-both"
    ? u.renameLeft
    : undefined;
}

export function rightRenaming(u: UnifyNameBinders): BinderRenaming | undefined {
  return u.kind === "rename-right" || u.kind === "rename-both"
    ? u.renameRight
    : undefined;
}

/**
 * Unify two single binders over `scope`. Equal identifiers are kept.
 * Otherwise the smaller identifier is canonical and the other side is
 * renamed onto it. When the preferred identifier is already in `scope` the
 * larger one is tried, then a fresh one, which renames both sides.
 */
export function unifyNameBinders(
  left: NameBinder,
  right: NameBinder,
  scope: Scope = emptyScope(),
): UnifyNameBinders {
  const i1 = left.id;
  const i2 = right.id;
  const taken = (id: RawName) => rawMember(id, scope.raw);

  if (i1 === i2 && !taken(i1)) {
    return sameNameBinders(nameBindersSingleton(left));
  }

  const lo = Math.min(i1, i2);
  const hi = Math.max(i1, i2);
  const target = !taken(lo)
    ? lo
    : !taken(hi)
    ? hi
    : rawFreshName(insertSet(insertSet(scope.raw, i1), i2));
  const renameTo = (from: RawName) =>
    from === target ? undefined : singletonRenaming(from, target);

  return unified(rawNameBinders([target]), renameTo(i1), renameTo(i2));
}

/**
 * Combine the unification of an outer part with that of the part nested
 * inside it:
 *
 * | first \ second | same   | left   | right  | both |
 * |----------------|--------|--------|--------|------|
 * | same           | same   | left   | right  | both |
 * | left           | left   | left   | both   | both |
 * | right          | right  | both   | right  | both |
 * | both           | both   | both   | both   | both |
 *
 * and `not-unifiable` on either side gives `not-unifiable`.
 */
export function mergeUnifyNameBinders(
  first: UnifyNameBinders,
  second: UnifyNameBinders,
): UnifyNameBinders {
  if (first.kind === "not-unifiable" || second.kind === "not-unifiable") {
    return NOT_UNIFIABLE;
  }
  return unified(
    mergeNameBinders(first.binders, second.binders),
    mergeRenamings(leftRenaming(first), leftRenaming(second)),
    mergeRenamings(rightRenaming(first), rightRenaming(second)),
  );
}

/**
 * Continue a unification with the next pair of nested patterns. The nested
 * pair is unified over `scope` extended with the canonical binders chosen so
 * far, so canonical identifiers stay pairwise distinct.
 */
export function andThenUnifyPatterns(
  u: UnifyNameBinders,
  left: Pattern<unknown>,
  right: Pattern<unknown>,
  scope: Scope,
): UnifyNameBinders {
  if (u.kind === "not-unifiable") return u;
  return mergeUnifyNameBinders(
    u,
    left.unifyPatterns(right, extendScopeNameBinders(u.binders, scope)),
  );
}

export function andThenUnifyNameBinders(
  u: UnifyNameBinders,
  left: NameBinder,
  right: NameBinder,
  scope: Scope,
): UnifyNameBinders {
  return andThenUnifyPatterns(u, left, right, scope);
}

export function unifyPatterns(
  left: Pattern<unknown>,
  right: Pattern<unknown>,
  scope: Scope = emptyScope(),
): UnifyNameBinders {
  return left.unifyPatterns(right, scope);
}

/** Patterns of the same shape binding the same identifiers. */
export function eqPattern(
  left: Pattern<unknown>,
  right: Pattern<unknown>,
): boolean {
  return unifyPatterns(left, right).kind === "same";
}
