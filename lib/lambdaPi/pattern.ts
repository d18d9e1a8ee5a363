/**
 * λΠ binding patterns: `_`, a single name, or a pair of nested patterns.
 *
 * @module
 */
import {
  andThenUnifyPatterns,
  type NameBinder,
  notUnifiable,
  type UnifyNameBinders,
  unifyPatterns,
} from "../foil/binders.ts";
import {
  assertPatternDistinct,
  type CoSunk,
  type Pattern,
  type PatternFold,
  type PatternTraversal,
  type Renaming,
} from "../foil/pattern.ts";
import type { Wildcard } from "../foil/patterns.ts";
import { type InternalKey, internalKey, type Scope } from "../foil/scope.ts";

export type LambdaPiPattern = Wildcard | NameBinder | PatternPair;

const asPattern = (pattern: LambdaPiPattern): Pattern<LambdaPiPattern> =>
  pattern;

/** `(left, right)`: `right` extends the scope `left` introduces. */
export class PatternPair implements Pattern<PatternPair> {
  readonly kind = "pattern-pair";

  constructor(
    _key: InternalKey,
    public readonly left: LambdaPiPattern,
    public readonly right: LambdaPiPattern,
  ) {}

  withPattern<F>(
    fold: PatternFold<F>,
    scope: Scope,
  ): PatternTraversal<F, PatternPair> {
    const left = asPattern(this.left).withPattern(fold, scope);
    const right = asPattern(this.right).withPattern(fold, left.scope);
    return {
      value: fold.combine(left.value, right.value),
      pattern: new PatternPair(internalKey, left.pattern, right.pattern),
      scope: right.scope,
    };
  }

  coSink(rename: Renaming): CoSunk<PatternPair> {
    const left = asPattern(this.left).coSink(rename);
    const right = asPattern(this.right).coSink(left.rename);
    return { rename: right.rename, pattern: this };
  }

  unifyPatterns(other: Pattern<unknown>, scope: Scope): UnifyNameBinders {
    if (!(other instanceof PatternPair)) {
      return notUnifiable();
    }
    return andThenUnifyPatterns(
      unifyPatterns(this.left, other.left, scope),
      this.right,
      other.right,
      scope,
    );
  }
}

/**
 * Pair two patterns.
 *
 * @throws ScopeInvariantError when both halves bind the same identifier.
 */
export function mkPatternPair(
  left: LambdaPiPattern,
  right: LambdaPiPattern,
): PatternPair {
  const pair = new PatternPair(internalKey, left, right);
  assertPatternDistinct(pair);
  return pair;
}
