/**
 * The pattern abstraction.
 *
 * A pattern is any group of binders introduced at one binding site: nothing,
 * a single name, a list of names, a pair of nested patterns, and so on.
 * Every pattern supports a left-to-right fold over its atomic binders that
 * threads the scope, a renaming propagation, and unification against another
 * pattern of the same family. All derived operations below are written once
 * against that interface.
 *
 * @module
 */
import {
  fromNameBindersList,
  type NameBinder,
  namesOfPattern,
  type NameBinders,
  type UnifyNameBinders,
  withFresh,
  withRefreshed,
} from "./binders.ts";
import { ScopeInvariantError } from "./errors.ts";
import { emptyScope, type Name, type Scope, sink } from "./scope.ts";
import { addRename, type Substitution } from "./substitution.ts";

/** A function from names of one scope to names of another. */
export type Renaming = (name: Name) => Name;

export interface BinderStep<F> {
  value: F;
  binder: NameBinder;
}

/**
 * A monoid over binder positions. `withBinder` is called once per atomic
 * binder, left to right, with the scope just before that binder; it may
 * replace the binder (e.g. with a refreshed one). `unit` and `combine` form
 * the identity and the associative composition.
 */
export interface PatternFold<F> {
  withBinder(scope: Scope, binder: NameBinder): BinderStep<F>;
  unit(): F;
  combine(first: F, second: F): F;
}

export interface PatternTraversal<F, P> {
  value: F;
  /** The pattern rebuilt from the binders `withBinder` returned. */
  pattern: P;
  /** The outer scope extended by every binder of `pattern`. */
  scope: Scope;
}

export interface CoSunk<P> {
  rename: Renaming;
  pattern: P;
}

export interface Pattern<P> {
  withPattern<F>(fold: PatternFold<F>, scope: Scope): PatternTraversal<F, P>;

  /**
   * Given a renaming of the outer scope, produce the renaming of the inner
   * scope together with the pattern over the renamed outer scope. The
   * renaming must not map a free name onto one of the pattern's binders.
   */
  coSink(rename: Renaming): CoSunk<P>;

  /**
   * Align this pattern with `other`, both extending `scope`. Canonical
   * binders of the result are never members of `scope`.
   */
  unifyPatterns(other: Pattern<unknown>, scope: Scope): UnifyNameBinders;
}

const extendFold: PatternFold<undefined> = {
  withBinder: (_scope, binder) => ({ value: undefined, binder }),
  unit: () => undefined,
  combine: () => undefined,
};

export function extendScopePattern(
  pattern: Pattern<unknown>,
  scope: Scope,
): Scope {
  return pattern.withPattern(extendFold, scope).scope;
}

export function nameBindersOfPattern(pattern: Pattern<unknown>): NameBinders {
  const binders: NameBinder[] = [];
  pattern.withPattern({
    withBinder: (_scope, binder) => {
      binders.push(binder);
      return { value: undefined, binder };
    },
    unit: () => undefined,
    combine: () => undefined,
  }, emptyScope());
  return fromNameBindersList(binders);
}

/**
 * Check that the binders of `pattern` are pairwise distinct, as every
 * pattern built by the allocator is.
 *
 * @throws ScopeInvariantError naming the first repeated identifier.
 */
export function assertPatternDistinct(pattern: Pattern<unknown>): void {
  const seen = new Set<number>();
  for (const name of namesOfPattern(pattern)) {
    if (seen.has(name.id)) {
      throw new ScopeInvariantError(`pattern binds ${name.id} more than once`);
    }
    seen.add(name.id);
  }
}

/**
 * The name as seen from outside the pattern, or `undefined` when the
 * pattern binds it.
 */
export function unsinkNamePattern(
  pattern: Pattern<unknown>,
  name: Name,
): Name | undefined {
  return namesOfPattern(pattern).some((bound) => bound.id === name.id)
    ? undefined
    : name;
}

/**
 * Extend a sinking renaming under a pattern. Sinking renamings keep raw
 * names intact, so both the renaming and the pattern are reused as they
 * are, whatever the pattern's size.
 */
export function extendRenaming<P>(rename: Renaming, pattern: P): CoSunk<P> {
  return { rename, pattern };
}

/** Lifts a substitution from the outer scopes to the inner ones. */
export type SubstExtender = <E>(subst: Substitution<E>) => Substitution<E>;

export interface RefreshedPattern<P> {
  extendSubst: SubstExtender;
  pattern: P;
  /** The ambient scope extended by the refreshed pattern. */
  scope: Scope;
}

const idExtender: SubstExtender = (subst) => sink(subst);

function composeExtenders(f: SubstExtender, g: SubstExtender): SubstExtender {
  return (subst) => g(f(subst));
}

function refreshFold(
  refresh: (
    scope: Scope,
    name: Name,
    cont: (binder: NameBinder) => BinderStep<SubstExtender>,
  ) => BinderStep<SubstExtender>,
): PatternFold<SubstExtender> {
  return {
    withBinder: (scope, binder) =>
      refresh(scope, binder.name, (refreshed) => ({
        value: (subst) => addRename(sink(subst), binder, refreshed.name),
        binder: refreshed,
      })),
    unit: () => idExtender,
    combine: composeExtenders,
  };
}

/**
 * Rebind `pattern` over the ambient `scope`, renaming only the binders that
 * clash with it. The returned extender maps a substitution for the
 * pattern's outer scope to one for its inner scope.
 */
export function withRefreshedPattern<P extends Pattern<P>>(
  scope: Scope,
  pattern: P,
): RefreshedPattern<P> {
  const traversal = pattern.withPattern(refreshFold(withRefreshed), scope);
  return {
    extendSubst: traversal.value,
    pattern: traversal.pattern,
    scope: traversal.scope,
  };
}

/** Like {@link withRefreshedPattern}, but renames every binder. */
export function withFreshPattern<P extends Pattern<P>>(
  scope: Scope,
  pattern: P,
): RefreshedPattern<P> {
  const traversal = pattern.withPattern(
    refreshFold((s, _name, cont) => withFresh(s, cont)),
    scope,
  );
  return {
    extendSubst: traversal.value,
    pattern: traversal.pattern,
    scope: traversal.scope,
  };
}

export type NameEnv<E> = (name: Name) => E;

export interface RefreshedPatternFn<E, P> {
  extendEnv: (env: NameEnv<E>) => NameEnv<E>;
  pattern: P;
  scope: Scope;
}

/**
 * Function-valued variant of {@link withRefreshedPattern}: extends an
 * environment `name => E` under the pattern, sending each bound name to the
 * injection of its refreshed binder.
 */
export function withRefreshedPatternFn<E, P extends Pattern<P>>(
  scope: Scope,
  pattern: P,
  inject: (name: Name) => E,
): RefreshedPatternFn<E, P> {
  type Extend = (env: NameEnv<E>) => NameEnv<E>;
  const fold: PatternFold<Extend> = {
    withBinder: (s, binder) =>
      withRefreshed(s, binder.name, (refreshed): BinderStep<Extend> => ({
        value: (env) => (name) =>
          name.id === binder.name.id ? inject(refreshed.name) : sink(env(name)),
        binder: refreshed,
      })),
    unit: () => (env) => env,
    combine: (f, g) => (env) => g(f(env)),
  };
  const traversal = pattern.withPattern(fold, scope);
  return {
    extendEnv: traversal.value,
    pattern: traversal.pattern,
    scope: traversal.scope,
  };
}
