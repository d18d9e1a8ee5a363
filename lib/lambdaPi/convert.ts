/**
 * Conversion between raw λΠ syntax and scope-safe terms.
 *
 * @module
 */
import { ScopeInvariantError } from "../foil/errors.ts";
import { extendScopePattern } from "../foil/pattern.ts";
import { wildcard } from "../foil/patterns.ts";
import { emptyScope, type RawName, type Scope } from "../foil/scope.ts";
import {
  addNameBinder,
  emptyNameMap,
  lookupName,
  type NameMap,
} from "../foil/substitution.ts";
import {
  bindIdentifier,
  convertFromAST,
  convertToAST,
  defaultIdent,
  emptyNameTable,
  type ExportSyntax,
  type ImportedPattern,
  type ImportSyntax,
  type NameTable,
} from "../free/conversion.ts";
import { mkPatternPair, type LambdaPiPattern } from "./pattern.ts";
import {
  type RawPattern,
  type RawScopedTerm,
  type RawTerm,
  rawScoped,
  rawVar,
} from "./syntax.ts";
import type { LambdaPiNode, LambdaPiScoped, LambdaPiTerm } from "./term.ts";

function importPattern(
  scope: Scope,
  names: NameTable<string>,
  pattern: RawPattern,
): ImportedPattern<string, LambdaPiPattern> {
  switch (pattern.kind) {
    case "pattern-wildcard":
      return { binder: wildcard, names };
    case "pattern-var":
      return bindIdentifier(scope, names, pattern.name);
    case "pattern-pair": {
      const left = importPattern(scope, names, pattern.left);
      const right = importPattern(
        extendScopePattern(left.binder, scope),
        left.names,
        pattern.right,
      );
      return {
        binder: mkPatternPair(left.binder, right.binder),
        names: right.names,
      };
    }
  }
}

export const lambdaPiImport: ImportSyntax<
  RawTerm,
  string,
  RawPattern,
  RawScopedTerm,
  LambdaPiPattern,
  LambdaPiNode
> = {
  identOf: (raw) => (raw.kind === "var" ? raw.name : undefined),

  toNode(raw, convert) {
    switch (raw.kind) {
      case "var":
        throw new ScopeInvariantError(
          `variable ${raw.name} reached node conversion`,
        );
      case "app":
        return {
          kind: "app",
          fn: convert.term(raw.fn),
          arg: convert.term(raw.arg),
        };
      case "lam":
        return { kind: "lam", scoped: convert.scoped(raw.pattern, raw.body) };
      case "pi":
        return {
          kind: "pi",
          domain: convert.term(raw.domain),
          scoped: convert.scoped(raw.pattern, raw.codomain),
        };
      case "pair":
        return {
          kind: "pair",
          first: convert.term(raw.first),
          second: convert.term(raw.second),
        };
      case "first":
        return { kind: "first", term: convert.term(raw.term) };
      case "second":
        return { kind: "second", term: convert.term(raw.term) };
      case "product":
        return {
          kind: "product",
          left: convert.term(raw.left),
          right: convert.term(raw.right),
        };
      case "universe":
        return { kind: "universe" };
    }
  },

  fromRawPattern: importPattern,
  scopedTerm: (raw) => raw.term,
};

/**
 * Convert a raw term. Free identifiers must be in `names`, whose names must
 * be in `scope`.
 *
 * @throws UnboundIdentifierError
 */
export function toTerm(
  raw: RawTerm,
  scope: Scope = emptyScope(),
  names: NameTable<string> = emptyNameTable(),
): LambdaPiTerm {
  return convertToAST(lambdaPiImport, scope, names, raw);
}

function exportPattern(
  pattern: LambdaPiPattern,
  ident: (id: RawName) => string,
): RawPattern {
  switch (pattern.kind) {
    case "wildcard":
      return { kind: "pattern-wildcard" };
    case "name-binder":
      return { kind: "pattern-var", name: ident(pattern.id) };
    case "pattern-pair":
      return {
        kind: "pattern-pair",
        left: exportPattern(pattern.left, ident),
        right: exportPattern(pattern.right, ident),
      };
  }
}

export const lambdaPiExport: ExportSyntax<
  RawTerm,
  string,
  RawPattern,
  RawScopedTerm,
  LambdaPiPattern,
  LambdaPiNode
> = {
  fromVar: rawVar,

  fromNode(node, convert) {
    switch (node.kind) {
      case "app":
        return {
          kind: "app",
          fn: convert.term(node.fn),
          arg: convert.term(node.arg),
        };
      case "lam": {
        const [pattern, body] = convert.scoped(node.scoped);
        return { kind: "lam", pattern, body };
      }
      case "pi": {
        const [pattern, codomain] = convert.scoped(node.scoped);
        return {
          kind: "pi",
          pattern,
          domain: convert.term(node.domain),
          codomain,
        };
      }
      case "pair":
        return {
          kind: "pair",
          first: convert.term(node.first),
          second: convert.term(node.second),
        };
      case "first":
        return { kind: "first", term: convert.term(node.term) };
      case "second":
        return { kind: "second", term: convert.term(node.term) };
      case "product":
        return {
          kind: "product",
          left: convert.term(node.left),
          right: convert.term(node.right),
        };
      case "universe":
        return { kind: "universe" };
    }
  },

  makePattern: exportPattern,
  makeScoped: rawScoped,
};

/** Convert back to raw syntax, naming every identifier `n` as `ident(n)`. */
export function fromTerm(
  term: LambdaPiTerm,
  ident: (id: RawName) => string = defaultIdent,
): RawTerm {
  return convertFromAST(lambdaPiExport, ident, term);
}

/**
 * Convert a closed term back to raw syntax, naming binders in the order they
 * are met with identifiers drawn from `freshIdents`.
 *
 * @throws ScopeInvariantError when the term has a free variable or the
 * identifiers run out.
 */
export function fromTermClosed(
  term: LambdaPiTerm,
  freshIdents: Iterable<string>,
): RawTerm {
  const idents = freshIdents[Symbol.iterator]();

  const nextIdent = (): string => {
    const next = idents.next();
    if (next.done) {
      throw new ScopeInvariantError("ran out of fresh identifiers");
    }
    return next.value;
  };

  const goPattern = (
    pattern: LambdaPiPattern,
    names: NameMap<string>,
  ): [RawPattern, NameMap<string>] => {
    switch (pattern.kind) {
      case "wildcard":
        return [{ kind: "pattern-wildcard" }, names];
      case "name-binder": {
        const name = nextIdent();
        return [
          { kind: "pattern-var", name },
          addNameBinder(pattern, name, names),
        ];
      }
      case "pattern-pair": {
        const [left, leftNames] = goPattern(pattern.left, names);
        const [right, rightNames] = goPattern(pattern.right, leftNames);
        return [{ kind: "pattern-pair", left, right }, rightNames];
      }
    }
  };

  const goScoped = (
    scoped: LambdaPiScoped,
    names: NameMap<string>,
  ): [RawPattern, RawScopedTerm] => {
    const [pattern, inner] = goPattern(scoped.binder, names);
    return [pattern, rawScoped(go(scoped.body, inner))];
  };

  const go = (t: LambdaPiTerm, names: NameMap<string>): RawTerm => {
    if (t.kind === "var") {
      return rawVar(lookupName(t.name, names));
    }
    const node = t.node;
    switch (node.kind) {
      case "app":
        return { kind: "app", fn: go(node.fn, names), arg: go(node.arg, names) };
      case "lam": {
        const [pattern, body] = goScoped(node.scoped, names);
        return { kind: "lam", pattern, body };
      }
      case "pi": {
        const domain = go(node.domain, names);
        const [pattern, codomain] = goScoped(node.scoped, names);
        return { kind: "pi", pattern, domain, codomain };
      }
      case "pair":
        return {
          kind: "pair",
          first: go(node.first, names),
          second: go(node.second, names),
        };
      case "first":
        return { kind: "first", term: go(node.term, names) };
      case "second":
        return { kind: "second", term: go(node.term, names) };
      case "product":
        return {
          kind: "product",
          left: go(node.left, names),
          right: go(node.right, names),
        };
      case "universe":
        return { kind: "universe" };
    }
  };

  return go(term, emptyNameMap());
}

/** `x`, `y`, `z`, `x1`, `y1`, `z1`, `x2`, ... */
export function* freshIdentifiers(): Generator<string, never> {
  for (let round = 0;; round++) {
    const suffix = round === 0 ? "" : String(round);
    for (const base of ["x", "y", "z"]) {
      yield base + suffix;
    }
  }
}
