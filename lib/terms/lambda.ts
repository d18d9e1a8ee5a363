/**
 * Raw untyped lambda calculus terms with multi-argument abstractions.
 *
 * This module defines the AST for raw untyped lambda terms, where a single
 * abstraction may bind several names at once (`λx y z.<body>`), and
 * pretty-printing for it.
 *
 * @module
 */

/**
 * This is a single term variable with a name.
 *
 * For instance, in the expression "λx y.y", this is just "y".
 */
export interface LambdaVar {
  kind: "lambda-var";
  name: string;
}

export const mkVar = (name: string): LambdaVar => ({
  kind: "lambda-var",
  name,
});

// λx y ....<body>, where x, y, ... are names bound left to right
export interface UntypedLambdaAbs {
  kind: "lambda-abs";
  names: string[];
  body: UntypedLambda;
}

export const mkUntypedAbs = (
  names: string[],
  body: UntypedLambda,
): UntypedLambda => ({
  kind: "lambda-abs",
  names,
  body,
});

/**
 * An application in the untyped lambda calculus
 */
export interface UntypedApplication {
  kind: "lambda-app";
  lft: UntypedLambda;
  rgt: UntypedLambda;
}

/**
 * The legal terms of the untyped lambda calculus.
 * e ::= x | λx₁ … xₙ.e | e e
 */
export type UntypedLambda =
  | LambdaVar
  | UntypedLambdaAbs
  | UntypedApplication;

/**
 * Creates an application of one untyped lambda term to another.
 * @param left the function term
 * @param right the argument term
 * @returns a new application node
 */
export const createApplication = (
  left: UntypedLambda,
  right: UntypedLambda,
): UntypedLambda => ({
  kind: "lambda-app",
  lft: left,
  rgt: right,
});

export const typelessApp = (...uts: UntypedLambda[]) =>
  uts.reduce(createApplication);

/**
 * Pretty-prints an untyped lambda expression using λ and parentheses.
 * @param ut the untyped lambda term
 * @returns a human-readable string representation
 */
export const prettyPrintUntypedLambda = (ut: UntypedLambda): string => {
  switch (ut.kind) {
    case "lambda-var":
      return ut.name;
    case "lambda-abs":
      return `λ${ut.names.join(" ")}.${prettyPrintUntypedLambda(ut.body)}`;
    case "lambda-app":
      return `(${prettyPrintUntypedLambda(ut.lft)}` +
        ` ${prettyPrintUntypedLambda(ut.rgt)})`;
  }
};

/**
 * Counts the nodes of a term: one per variable, abstraction and application.
 */
export const lambdaSize = (ut: UntypedLambda): number => {
  switch (ut.kind) {
    case "lambda-var":
      return 1;
    case "lambda-abs":
      return 1 + lambdaSize(ut.body);
    case "lambda-app":
      return 1 + lambdaSize(ut.lft) + lambdaSize(ut.rgt);
  }
};

/** Identifiers that occur free, in order of first occurrence. */
export const freeIdentifiers = (ut: UntypedLambda): string[] => {
  const free: string[] = [];
  const go = (t: UntypedLambda, bound: ReadonlySet<string>) => {
    switch (t.kind) {
      case "lambda-var":
        if (!bound.has(t.name) && !free.includes(t.name)) free.push(t.name);
        return;
      case "lambda-abs":
        go(t.body, new Set([...bound, ...t.names]));
        return;
      case "lambda-app":
        go(t.lft, bound);
        go(t.rgt, bound);
        return;
    }
  };
  go(ut, new Set());
  return free;
};
