/**
 * Weak head normal form for λΠ terms.
 *
 * Reduces β-redexes with pattern-binding λs and projections of pairs at the
 * head of a term. Arguments, bodies and pair components are left alone.
 *
 * @module
 */
import { EvaluationLimitError } from "../foil/errors.ts";
import type { Scope } from "../foil/scope.ts";
import {
  addSubst,
  identitySubst,
  type Substitution,
} from "../foil/substitution.ts";
import { mkVar, substitute } from "../free/ast.ts";
import { fromTerm } from "./convert.ts";
import type { LambdaPiPattern } from "./pattern.ts";
import { prettyPrintLambdaPi } from "./syntax.ts";
import {
  lambdaPiSignature,
  type LambdaPiNode,
  type LambdaPiTerm,
  mkApp,
  mkFirst,
  mkSecond,
} from "./term.ts";

export interface WhnfConfig {
  /** Reductions allowed before giving up. */
  maxSteps: number;
  /** Log every reduction to stderr. */
  verbose: boolean;
}

export const defaultWhnfConfig: WhnfConfig = {
  maxSteps: 10_000,
  verbose: false,
};

/**
 * The substitution binding each name of `pattern` to the matching part of
 * `term`. A pair pattern destructures through projections, so `term` need
 * not be a pair yet.
 */
export function matchPattern(
  pattern: LambdaPiPattern,
  term: LambdaPiTerm,
  subst: Substitution<LambdaPiTerm> = identitySubst(mkVar<LambdaPiNode>),
): Substitution<LambdaPiTerm> {
  switch (pattern.kind) {
    case "wildcard":
      return subst;
    case "name-binder":
      return addSubst(subst, pattern, term);
    case "pattern-pair":
      return matchPattern(
        pattern.right,
        mkSecond(term),
        matchPattern(pattern.left, mkFirst(term), subst),
      );
  }
}

/**
 * Reduce `term`, whose free names are all in `scope`, to weak head normal
 * form.
 *
 * @throws EvaluationLimitError after `config.maxSteps` reductions.
 */
export function whnf(
  scope: Scope,
  term: LambdaPiTerm,
  config: Partial<WhnfConfig> = {},
): LambdaPiTerm {
  const { maxSteps, verbose } = { ...defaultWhnfConfig, ...config };
  let steps = 0;

  const reduced = (rule: string, result: LambdaPiTerm): LambdaPiTerm => {
    steps++;
    if (steps > maxSteps) {
      throw new EvaluationLimitError(maxSteps);
    }
    if (verbose) {
      console.error(
        `[DEBUG] whnf step ${steps} (${rule}): ${
          prettyPrintLambdaPi(fromTerm(result))
        }`,
      );
    }
    return go(result);
  };

  const go = (t: LambdaPiTerm): LambdaPiTerm => {
    if (t.kind === "var") return t;
    const node = t.node;
    switch (node.kind) {
      case "app": {
        const fn = go(node.fn);
        if (fn.kind === "node" && fn.node.kind === "lam") {
          const { binder, body } = fn.node.scoped;
          return reduced(
            "beta",
            substitute(
              lambdaPiSignature,
              scope,
              matchPattern(binder, node.arg),
              body,
            ),
          );
        }
        return fn === node.fn ? t : mkApp(fn, node.arg);
      }
      case "first": {
        const inner = go(node.term);
        if (inner.kind === "node" && inner.node.kind === "pair") {
          return reduced("first", inner.node.first);
        }
        return inner === node.term ? t : mkFirst(inner);
      }
      case "second": {
        const inner = go(node.term);
        if (inner.kind === "node" && inner.node.kind === "pair") {
          return reduced("second", inner.node.second);
        }
        return inner === node.term ? t : mkSecond(inner);
      }
      default:
        return t;
    }
  };

  return go(term);
}
