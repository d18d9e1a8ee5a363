/**
 * Random closed lambda term generation.
 *
 * Names are drawn from a small pool so that generated terms rebind and
 * shadow names often, which is what exercises capture avoidance.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedLambda,
} from "../terms/lambda.ts";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

export const DEFAULT_NAMES: readonly string[] = ["a", "b", "c"];

/** Abstractions bind between one and this many names. */
export const MAX_ARITY = 3;

const pick = <T>(rs: RandomSource, items: readonly T[]): T =>
  items[rs.intBetween(0, items.length - 1)];

/**
 * @param rs the random source to use.
 * @param n the number of nodes (variables, abstractions and applications).
 * @param names the pool bound names are drawn from.
 * @returns a closed term of exactly `n` nodes.
 */
export const randLambda = (
  rs: RandomSource,
  n: number,
  names: readonly string[] = DEFAULT_NAMES,
): UntypedLambda => {
  if (n < 2) {
    throw new Error("A closed term must contain at least two nodes.");
  }
  if (names.length === 0) {
    throw new Error("At least one name is needed to bind.");
  }
  return randTerm(rs, n, [], names);
};

const randTerm = (
  rs: RandomSource,
  n: number,
  bound: readonly string[],
  names: readonly string[],
): UntypedLambda => {
  if (n === 1) {
    return mkVar(pick(rs, bound));
  }

  if (bound.length === 0 || n === 2 || rs.intBetween(0, 1) === 0) {
    const arity = rs.intBetween(1, MAX_ARITY);
    const binders = Array.from({ length: arity }, () => pick(rs, names));
    return mkUntypedAbs(
      binders,
      randTerm(rs, n - 1, [...bound, ...binders], names),
    );
  }

  const leftSize = rs.intBetween(1, n - 2);
  return createApplication(
    randTerm(rs, leftSize, bound, names),
    randTerm(rs, n - 1 - leftSize, bound, names),
  );
};
