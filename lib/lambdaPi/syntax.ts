/**
 * Raw λΠ-calculus syntax with pairs and pair patterns.
 *
 * Identifiers are plain strings. Raw terms are what a parser would produce
 * and what the exporter hands back; they carry no scope information.
 *
 * @module
 */

export interface RawVar {
  kind: "var";
  name: string;
}

export interface RawApp {
  kind: "app";
  fn: RawTerm;
  arg: RawTerm;
}

// λpattern.<body>
export interface RawLam {
  kind: "lam";
  pattern: RawPattern;
  body: RawScopedTerm;
}

// Π(pattern : domain), <codomain>
export interface RawPi {
  kind: "pi";
  pattern: RawPattern;
  domain: RawTerm;
  codomain: RawScopedTerm;
}

export interface RawPair {
  kind: "pair";
  first: RawTerm;
  second: RawTerm;
}

export interface RawFirst {
  kind: "first";
  term: RawTerm;
}

export interface RawSecond {
  kind: "second";
  term: RawTerm;
}

export interface RawProduct {
  kind: "product";
  left: RawTerm;
  right: RawTerm;
}

export interface RawUniverse {
  kind: "universe";
}

/**
 * e ::= x | e e | λp.e | Π(p : e), e | (e, e) | π₁(e) | π₂(e) | e × e | 𝕌
 */
export type RawTerm =
  | RawVar
  | RawApp
  | RawLam
  | RawPi
  | RawPair
  | RawFirst
  | RawSecond
  | RawProduct
  | RawUniverse;

/** A term under a binder. */
export interface RawScopedTerm {
  kind: "scoped";
  term: RawTerm;
}

/** p ::= _ | x | (p, p) */
export type RawPattern =
  | { kind: "pattern-wildcard" }
  | { kind: "pattern-var"; name: string }
  | { kind: "pattern-pair"; left: RawPattern; right: RawPattern };

export const rawVar = (name: string): RawTerm => ({ kind: "var", name });

export const rawApp = (fn: RawTerm, arg: RawTerm): RawTerm => ({
  kind: "app",
  fn,
  arg,
});

export const rawScoped = (term: RawTerm): RawScopedTerm => ({
  kind: "scoped",
  term,
});

export const rawLam = (pattern: RawPattern, body: RawTerm): RawTerm => ({
  kind: "lam",
  pattern,
  body: rawScoped(body),
});

export const rawPi = (
  pattern: RawPattern,
  domain: RawTerm,
  codomain: RawTerm,
): RawTerm => ({
  kind: "pi",
  pattern,
  domain,
  codomain: rawScoped(codomain),
});

export const rawPair = (first: RawTerm, second: RawTerm): RawTerm => ({
  kind: "pair",
  first,
  second,
});

export const rawFirst = (term: RawTerm): RawTerm => ({ kind: "first", term });

export const rawSecond = (term: RawTerm): RawTerm => ({ kind: "second", term });

export const rawProduct = (left: RawTerm, right: RawTerm): RawTerm => ({
  kind: "product",
  left,
  right,
});

export const rawUniverse: RawTerm = { kind: "universe" };

export const patternWildcard: RawPattern = { kind: "pattern-wildcard" };

export const patternVar = (name: string): RawPattern => ({
  kind: "pattern-var",
  name,
});

export const patternPair = (
  left: RawPattern,
  right: RawPattern,
): RawPattern => ({ kind: "pattern-pair", left, right });

export const prettyPrintPattern = (pattern: RawPattern): string => {
  switch (pattern.kind) {
    case "pattern-wildcard":
      return "_";
    case "pattern-var":
      return pattern.name;
    case "pattern-pair":
      return `(${prettyPrintPattern(pattern.left)}, ${
        prettyPrintPattern(pattern.right)
      })`;
  }
};

/**
 * Pretty-prints a raw λΠ term, parenthesising every application and binder.
 */
export const prettyPrintLambdaPi = (term: RawTerm): string => {
  switch (term.kind) {
    case "var":
      return term.name;
    case "app":
      return `(${prettyPrintLambdaPi(term.fn)} ${prettyPrintLambdaPi(term.arg)})`;
    case "lam":
      return `(λ${prettyPrintPattern(term.pattern)}.${
        prettyPrintLambdaPi(term.body.term)
      })`;
    case "pi":
      return `(Π(${prettyPrintPattern(term.pattern)} : ${
        prettyPrintLambdaPi(term.domain)
      }), ${prettyPrintLambdaPi(term.codomain.term)})`;
    case "pair":
      return `(${prettyPrintLambdaPi(term.first)}, ${
        prettyPrintLambdaPi(term.second)
      })`;
    case "first":
      return `π₁(${prettyPrintLambdaPi(term.term)})`;
    case "second":
      return `π₂(${prettyPrintLambdaPi(term.term)})`;
    case "product":
      return `(${prettyPrintLambdaPi(term.left)} × ${
        prettyPrintLambdaPi(term.right)
      })`;
    case "universe":
      return "𝕌";
  }
};
