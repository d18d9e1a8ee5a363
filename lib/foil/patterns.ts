/**
 * Patterns that bind nothing.
 *
 * @module
 */
import {
  emptyNameBinders,
  notUnifiable,
  sameNameBinders,
  type UnifyNameBinders,
} from "./binders.ts";
import { ScopeInvariantError } from "./errors.ts";
import type {
  CoSunk,
  Pattern,
  PatternFold,
  PatternTraversal,
  Renaming,
} from "./pattern.ts";
import type { Scope } from "./scope.ts";

/** `_`: matches anything and leaves the scope as it is. */
export class Wildcard implements Pattern<Wildcard> {
  readonly kind = "wildcard";

  withPattern<F>(
    fold: PatternFold<F>,
    scope: Scope,
  ): PatternTraversal<F, Wildcard> {
    return { value: fold.unit(), pattern: this, scope };
  }

  coSink(rename: Renaming): CoSunk<Wildcard> {
    return { rename, pattern: this };
  }

  unifyPatterns(other: Pattern<unknown>, _scope: Scope): UnifyNameBinders {
    return other instanceof Wildcard
      ? sameNameBinders(emptyNameBinders())
      : notUnifiable();
  }
}

export const wildcard = new Wildcard();

/**
 * The pattern with no values, for signatures whose nodes have no binding
 * positions.
 */
export type EmptyPattern = never;

export function absurdPattern(pattern: EmptyPattern): never {
  throw new ScopeInvariantError(
    `reached an uninhabited pattern: ${String(pattern)}`,
  );
}
