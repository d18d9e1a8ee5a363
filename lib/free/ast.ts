/**
 * Generic scope-safe syntax trees.
 *
 * A term is either a variable or a node of a client-supplied signature. A
 * node's children are terms in the same scope and scoped terms, i.e. a
 * pattern together with a body living in the scope that pattern extends.
 * Substitution, renaming and alpha-equivalence are written once here and
 * work for any signature through {@link Signature}.
 *
 * @module
 */
import {
  type BinderRenaming,
  eqPattern,
  extendScopeNameBinders,
  fromNameBinderRenaming,
  leftRenaming,
  namesOfPattern,
  rightRenaming,
  unifyPatterns,
} from "../foil/binders.ts";
import {
  type NameEnv,
  type Pattern,
  type Renaming,
  withFreshPattern,
  withRefreshedPattern,
  withRefreshedPatternFn,
} from "../foil/pattern.ts";
import type { Name, Scope } from "../foil/scope.ts";
import {
  addSubstPattern,
  identitySubst,
  lookupSubst,
  sinkSubst,
  type Substitution,
} from "../foil/substitution.ts";

export interface VarAST {
  kind: "var";
  name: Name;
}

export interface NodeAST<N> {
  kind: "node";
  node: N;
}

export type AST<N> = VarAST | NodeAST<N>;

/** A pattern and the body that lives in the scope the pattern extends. */
export interface ScopedAST<P, N> {
  binder: P;
  body: AST<N>;
}

export interface ZippedNode<P, N> {
  scoped: [ScopedAST<P, N>, ScopedAST<P, N>][];
  terms: [AST<N>, AST<N>][];
}

/**
 * A client syntax signature: how to rebuild a node with new children, and
 * how to pair up the children of two nodes built by the same constructor.
 */
export interface Signature<P extends Pattern<P>, N> {
  mapNode(
    node: N,
    onScoped: (scoped: ScopedAST<P, N>) => ScopedAST<P, N>,
    onTerm: (term: AST<N>) => AST<N>,
  ): N;

  /**
   * Children of `left` and `right` paired position by position, or
   * `undefined` when the constructors (or any non-term data) differ.
   */
  zipMatch(left: N, right: N): ZippedNode<P, N> | undefined;
}

export const mkVar = <N>(name: Name): AST<N> => ({ kind: "var", name });

export const mkNode = <N>(node: N): AST<N> => ({ kind: "node", node });

export const mkScoped = <P, N>(binder: P, body: AST<N>): ScopedAST<P, N> => ({
  binder,
  body,
});

/**
 * Capture-avoiding substitution. `scope` is the scope of the result; a
 * binder is renamed only when it clashes with it.
 */
export function substitute<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  subst: Substitution<AST<N>>,
  term: AST<N>,
): AST<N> {
  switch (term.kind) {
    case "var":
      return lookupSubst(subst, term.name);
    case "node":
      return mkNode(
        sig.mapNode(
          term.node,
          ({ binder, body }) => {
            const refreshed = withRefreshedPattern(scope, binder);
            return mkScoped(
              refreshed.pattern,
              substitute(
                sig,
                refreshed.scope,
                refreshed.extendSubst(sinkSubst(subst)),
                body,
              ),
            );
          },
          (child) => substitute(sig, scope, subst, child),
        ),
      );
  }
}

/** {@link substitute}, renaming every binder it passes. */
export function substituteRefreshed<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  subst: Substitution<AST<N>>,
  term: AST<N>,
): AST<N> {
  switch (term.kind) {
    case "var":
      return lookupSubst(subst, term.name);
    case "node":
      return mkNode(
        sig.mapNode(
          term.node,
          ({ binder, body }) => {
            const refreshed = withFreshPattern(scope, binder);
            return mkScoped(
              refreshed.pattern,
              substituteRefreshed(
                sig,
                refreshed.scope,
                refreshed.extendSubst(sinkSubst(subst)),
                body,
              ),
            );
          },
          (child) => substituteRefreshed(sig, scope, subst, child),
        ),
      );
  }
}

/**
 * Instantiate the names bound by `pattern` with `args` (in traversal order)
 * inside `body`.
 */
export function substitutePattern<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  subst: Substitution<AST<N>>,
  pattern: Pattern<unknown>,
  args: readonly AST<N>[],
  body: AST<N>,
): AST<N> {
  return substitute(sig, scope, addSubstPattern(subst, pattern, args), body);
}

/** Rename every binder to the smallest identifier fresh for its scope. */
export function refreshAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  term: AST<N>,
): AST<N> {
  switch (term.kind) {
    case "var":
      return term;
    case "node":
      return mkNode(
        sig.mapNode(
          term.node,
          (scoped) => refreshScopedAST(sig, scope, scoped),
          (child) => refreshAST(sig, scope, child),
        ),
      );
  }
}

export function refreshScopedAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  scoped: ScopedAST<P, N>,
): ScopedAST<P, N> {
  const refreshed = withFreshPattern(scope, scoped.binder);
  const subst = refreshed.extendSubst(sinkSubst(identitySubst(mkVar<N>)));
  return mkScoped(
    refreshed.pattern,
    substituteRefreshed(sig, refreshed.scope, subst, scoped.body),
  );
}

/**
 * Substitute through an environment function instead of a substitution map.
 * Binders are refreshed against `scope` as in {@link substitute}.
 */
export function bindAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  term: AST<N>,
  env: NameEnv<AST<N>>,
): AST<N> {
  switch (term.kind) {
    case "var":
      return env(term.name);
    case "node":
      return mkNode(
        sig.mapNode(
          term.node,
          ({ binder, body }) => {
            const refreshed = withRefreshedPatternFn(scope, binder, mkVar<N>);
            return mkScoped(
              refreshed.pattern,
              bindAST(sig, refreshed.scope, body, refreshed.extendEnv(env)),
            );
          },
          (child) => bindAST(sig, scope, child, env),
        ),
      );
  }
}

/** Apply a renaming of free names, landing in `scope`. */
export function renameAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  rename: Renaming,
  term: AST<N>,
): AST<N> {
  return bindAST(sig, scope, term, (name) => mkVar<N>(rename(name)));
}

/**
 * Apply an injective renaming of free names through each pattern's
 * {@link Pattern.coSink}. Binders are kept; the renaming must not hit them.
 */
export function sinkAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  rename: Renaming,
  term: AST<N>,
): AST<N> {
  switch (term.kind) {
    case "var":
      return mkVar<N>(rename(term.name));
    case "node":
      return mkNode(
        sig.mapNode(
          term.node,
          ({ binder, body }) => {
            const sunk = binder.coSink(rename);
            return mkScoped(sunk.pattern, sinkAST(sig, sunk.rename, body));
          },
          (child) => sinkAST(sig, rename, child),
        ),
      );
  }
}

/** Free names of a term, ordered by identifier. */
export function freeVarsAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  term: AST<N>,
): Name[] {
  const free = new Map<number, Name>();

  function collect(t: AST<N>, bound: ReadonlySet<number>) {
    if (t.kind === "var") {
      if (!bound.has(t.name.id)) {
        free.set(t.name.id, t.name);
      }
      return;
    }
    sig.mapNode(
      t.node,
      (scoped) => {
        const inner = new Set(bound);
        for (const name of namesOfPattern(scoped.binder)) {
          inner.add(name.id);
        }
        collect(scoped.body, inner);
        return scoped;
      },
      (child) => {
        collect(child, bound);
        return child;
      },
    );
  }

  collect(term, new Set());
  return [...free.values()].sort((a, b) => a.id - b.id);
}

/**
 * Alpha-equivalence. Binders are unified pairwise and only the bodies whose
 * binders had to change are renamed.
 */
export function alphaEquiv<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  left: AST<N>,
  right: AST<N>,
): boolean {
  if (left.kind === "var" && right.kind === "var") {
    return left.name.id === right.name.id;
  }
  if (left.kind === "node" && right.kind === "node") {
    const zipped = sig.zipMatch(left.node, right.node);
    if (!zipped) return false;
    return zipped.terms.every(([l, r]) => alphaEquiv(sig, scope, l, r)) &&
      zipped.scoped.every(([l, r]) => alphaEquivScoped(sig, scope, l, r));
  }
  return false;
}

export function alphaEquivScoped<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  left: ScopedAST<P, N>,
  right: ScopedAST<P, N>,
): boolean {
  const u = unifyPatterns(left.binder, right.binder, scope);
  if (u.kind === "not-unifiable") return false;

  const unifiedScope = extendScopeNameBinders(u.binders, scope);
  const renameBody = (
    renaming: BinderRenaming | undefined,
    body: AST<N>,
  ): AST<N> =>
    renaming
      ? renameAST(sig, unifiedScope, fromNameBinderRenaming(renaming), body)
      : body;

  return alphaEquiv(
    sig,
    unifiedScope,
    renameBody(leftRenaming(u), left.body),
    renameBody(rightRenaming(u), right.body),
  );
}

/** Alpha-equivalence by refreshing both terms and comparing them raw. */
export function alphaEquivRefreshed<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  scope: Scope,
  left: AST<N>,
  right: AST<N>,
): boolean {
  return eqAST(sig, refreshAST(sig, scope, left), refreshAST(sig, scope, right));
}

/** Raw structural equality: same shapes, same identifiers everywhere. */
export function eqAST<P extends Pattern<P>, N>(
  sig: Signature<P, N>,
  left: AST<N>,
  right: AST<N>,
): boolean {
  if (left.kind === "var" && right.kind === "var") {
    return left.name.id === right.name.id;
  }
  if (left.kind === "node" && right.kind === "node") {
    const zipped = sig.zipMatch(left.node, right.node);
    if (!zipped) return false;
    return zipped.terms.every(([l, r]) => eqAST(sig, l, r)) &&
      zipped.scoped.every(([l, r]) =>
        eqPattern(l.binder, r.binder) && eqAST(sig, l.body, r.body)
      );
  }
  return false;
}
