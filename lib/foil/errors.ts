/**
 * Error definitions for scoped terms.
 *
 * Import errors surface to the caller. Invariant violations mean a scope
 * extension was produced outside the allocator and pattern APIs; they abort
 * the operation instead of producing a wrong term.
 *
 * @module
 */

/** A raw variable whose identifier is absent from the current name mapping. */
export class UnboundIdentifierError extends Error {
  constructor(public readonly identifier: unknown) {
    super(`unbound identifier: ${String(identifier)}`);
    this.name = "UnboundIdentifierError";
  }
}

export class ScopeInvariantError extends Error {
  constructor(message: string) {
    super(`scope invariant violated: ${message}`);
    this.name = "ScopeInvariantError";
  }
}

export class EvaluationLimitError extends Error {
  constructor(public readonly maxSteps: number) {
    super(`evaluation exceeded maximum steps (${maxSteps})`);
    this.name = "EvaluationLimitError";
  }
}
