/**
 * Conversion between raw syntax and scoped terms.
 *
 * A client describes its raw syntax with an {@link ImportSyntax} (raw to
 * scoped) and an {@link ExportSyntax} (scoped to raw). Raw identifiers are
 * resolved through an identifier map that grows by one fresh name per bound
 * identifier, in source order.
 *
 * @module
 */
import {
  createIdentMap,
  type IdentMap,
  insertIdentMap,
  searchIdentMap,
} from "../data/map/identMap.ts";
import {
  type NameBinder,
  type NameBinderList,
  withFreshBinder,
  withFreshNameBinderList,
} from "../foil/binders.ts";
import { UnboundIdentifierError } from "../foil/errors.ts";
import { extendScopePattern, type Pattern } from "../foil/pattern.ts";
import type { Name, RawName, Scope } from "../foil/scope.ts";
import { type AST, mkNode, mkScoped, mkVar, type ScopedAST } from "./ast.ts";

export type NameTable<RawIdent> = IdentMap<RawIdent, Name>;

export interface ImportedPattern<RawIdent, P> {
  binder: P;
  /** The table extended with every identifier the pattern binds. */
  names: NameTable<RawIdent>;
}

export interface NodeImporter<RawTerm, RawPattern, RawScoped, P, N> {
  term(raw: RawTerm): AST<N>;
  scoped(pattern: RawPattern, body: RawScoped): ScopedAST<P, N>;
}

export interface ImportSyntax<RawTerm, RawIdent, RawPattern, RawScoped, P, N> {
  /** The identifier of a raw variable; `undefined` for every other term. */
  identOf(raw: RawTerm): RawIdent | undefined;
  toNode(
    raw: RawTerm,
    convert: NodeImporter<RawTerm, RawPattern, RawScoped, P, N>,
  ): N;
  /** Allocate one fresh binder per identifier of `pattern`, in source order. */
  fromRawPattern(
    scope: Scope,
    names: NameTable<RawIdent>,
    pattern: RawPattern,
  ): ImportedPattern<RawIdent, P>;
  scopedTerm(raw: RawScoped): RawTerm;
}

export function emptyNameTable<RawIdent>(): NameTable<RawIdent> {
  return createIdentMap<RawIdent, Name>();
}

/**
 * Convert a raw term whose free identifiers are all in `names`.
 *
 * @throws UnboundIdentifierError for a variable missing from the table.
 */
export function convertToAST<
  RawTerm,
  RawIdent,
  RawPattern,
  RawScoped,
  P extends Pattern<P>,
  N,
>(
  syntax: ImportSyntax<RawTerm, RawIdent, RawPattern, RawScoped, P, N>,
  scope: Scope,
  names: NameTable<RawIdent>,
  raw: RawTerm,
): AST<N> {
  const ident = syntax.identOf(raw);
  if (ident !== undefined) {
    const name = searchIdentMap(names, ident);
    if (name === undefined) {
      throw new UnboundIdentifierError(ident);
    }
    return mkVar<N>(name);
  }
  return mkNode(
    syntax.toNode(raw, {
      term: (child) => convertToAST(syntax, scope, names, child),
      scoped: (pattern, body) =>
        convertToScopedAST(syntax, scope, names, pattern, body),
    }),
  );
}

export function convertToScopedAST<
  RawTerm,
  RawIdent,
  RawPattern,
  RawScoped,
  P extends Pattern<P>,
  N,
>(
  syntax: ImportSyntax<RawTerm, RawIdent, RawPattern, RawScoped, P, N>,
  scope: Scope,
  names: NameTable<RawIdent>,
  pattern: RawPattern,
  body: RawScoped,
): ScopedAST<P, N> {
  const imported = syntax.fromRawPattern(scope, names, pattern);
  const inner = extendScopePattern(imported.binder, scope);
  return mkScoped(
    imported.binder,
    convertToAST(syntax, inner, imported.names, syntax.scopedTerm(body)),
  );
}

export interface BoundIdentifier<RawIdent> {
  binder: NameBinder;
  names: NameTable<RawIdent>;
}

/** Bind one identifier to a fresh name over `scope`. */
export function bindIdentifier<RawIdent>(
  scope: Scope,
  names: NameTable<RawIdent>,
  ident: RawIdent,
): BoundIdentifier<RawIdent> {
  return withFreshBinder(scope, (binder) => ({
    binder,
    names: insertIdentMap(names, ident, binder.name),
  }));
}

export interface BoundIdentifiers<RawIdent> {
  binders: NameBinderList;
  names: NameTable<RawIdent>;
  /** `scope` extended by all of `binders`. */
  scope: Scope;
}

/**
 * Bind identifiers left to right, one fresh name each. A repeated
 * identifier shadows the earlier one in the table.
 */
export function bindIdentifiers<RawIdent>(
  scope: Scope,
  names: NameTable<RawIdent>,
  idents: readonly RawIdent[],
): BoundIdentifiers<RawIdent> {
  return withFreshNameBinderList(scope, idents.length, (binders, inner) => ({
    binders,
    names: idents.reduce(
      (table, ident, i) =>
        insertIdentMap(table, ident, binders.binders[i].name),
      names,
    ),
    scope: inner,
  }));
}

export interface NodeExporter<RawTerm, RawPattern, RawScoped, P, N> {
  term(term: AST<N>): RawTerm;
  scoped(scoped: ScopedAST<P, N>): [RawPattern, RawScoped];
}

export interface ExportSyntax<RawTerm, RawIdent, RawPattern, RawScoped, P, N> {
  fromVar(ident: RawIdent): RawTerm;
  fromNode(
    node: N,
    convert: NodeExporter<RawTerm, RawPattern, RawScoped, P, N>,
  ): RawTerm;
  makePattern(binder: P, ident: (id: RawName) => RawIdent): RawPattern;
  makeScoped(raw: RawTerm): RawScoped;
}

/**
 * Convert a scoped term back to raw syntax. `ident` turns each raw name into
 * a display identifier and must be injective for the result to keep its
 * meaning.
 */
export function convertFromAST<RawTerm, RawIdent, RawPattern, RawScoped, P, N>(
  syntax: ExportSyntax<RawTerm, RawIdent, RawPattern, RawScoped, P, N>,
  ident: (id: RawName) => RawIdent,
  term: AST<N>,
): RawTerm {
  switch (term.kind) {
    case "var":
      return syntax.fromVar(ident(term.name.id));
    case "node":
      return syntax.fromNode(term.node, {
        term: (child) => convertFromAST(syntax, ident, child),
        scoped: (scoped) => convertFromScopedAST(syntax, ident, scoped),
      });
  }
}

export function convertFromScopedAST<
  RawTerm,
  RawIdent,
  RawPattern,
  RawScoped,
  P,
  N,
>(
  syntax: ExportSyntax<RawTerm, RawIdent, RawPattern, RawScoped, P, N>,
  ident: (id: RawName) => RawIdent,
  scoped: ScopedAST<P, N>,
): [RawPattern, RawScoped] {
  return [
    syntax.makePattern(scoped.binder, ident),
    syntax.makeScoped(convertFromAST(syntax, ident, scoped.body)),
  ];
}

/** Display identifiers `x0`, `x1`, ... */
export const defaultIdent = (id: RawName): string => `x${id}`;
