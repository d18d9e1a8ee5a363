/**
 * Scoped terms: scope-safe name binding for abstract syntax trees.
 *
 * This module re-exports the public API:
 * - scopes, names and the fresh-name allocator
 * - binders, binder lists and sets, and binder unification
 * - the pattern abstraction and its derived operations
 * - substitutions and name maps
 * - generic terms over a client signature: substitution, refreshing,
 *   renaming and alpha-equivalence
 * - conversion between raw syntax and scoped terms
 * - two example clients: λΠ with pair patterns, and a multi-argument
 *   untyped lambda calculus
 *
 * Scopes, names and binders have no public constructors; they only come
 * from the functions exported here.
 *
 * @example
 * ```ts
 * import { lambdaPi, alphaEquiv, emptyScope } from "scoped-terms";
 * const { toTerm, lambdaPiSignature } = lambdaPi;
 * ```
 *
 * @module
 */

// Scopes and names
export {
  emptyScope,
  extendScope,
  member,
  nameId,
  scopeNames,
  scopeSize,
  sink,
} from "./foil/scope.ts";
export type { BindsName, Name, RawName, Scope } from "./foil/scope.ts";

// Binders and unification
export {
  andThenUnifyNameBinders,
  andThenUnifyPatterns,
  consNameBinderList,
  emptyNameBinderList,
  emptyNameBinders,
  eqPattern,
  extendScopeNameBinders,
  fromNameBinderRenaming,
  fromNameBindersList,
  leftRenaming,
  mergeNameBinders,
  mergeUnifyNameBinders,
  nameBindersList,
  nameBindersSingleton,
  nameOf,
  namesOfPattern,
  notUnifiable,
  rightRenaming,
  sameNameBinders,
  unifyNameBinders,
  unifyPatterns,
  unsinkName,
  withFresh,
  withFreshBinder,
  withFreshNameBinderList,
  withRefreshed,
} from "./foil/binders.ts";
export type {
  BinderRenaming,
  NameBinder,
  NameBinderList,
  NameBinders,
  UnifyNameBinders,
} from "./foil/binders.ts";

// Patterns
export {
  assertPatternDistinct,
  extendRenaming,
  extendScopePattern,
  nameBindersOfPattern,
  unsinkNamePattern,
  withFreshPattern,
  withRefreshedPattern,
  withRefreshedPatternFn,
} from "./foil/pattern.ts";
export type {
  BinderStep,
  CoSunk,
  NameEnv,
  Pattern,
  PatternFold,
  PatternTraversal,
  RefreshedPattern,
  RefreshedPatternFn,
  Renaming,
  SubstExtender,
} from "./foil/pattern.ts";
export { absurdPattern, Wildcard, wildcard } from "./foil/patterns.ts";
export type { EmptyPattern } from "./foil/patterns.ts";

// Substitutions
export {
  addNameBinder,
  addNameBinders,
  addRename,
  addSubst,
  addSubstList,
  addSubstPattern,
  emptyNameMap,
  identitySubst,
  lookupName,
  lookupSubst,
  sinkSubst,
  substEntries,
  substSize,
} from "./foil/substitution.ts";
export type { NameMap, Substitution } from "./foil/substitution.ts";

// Errors
export {
  EvaluationLimitError,
  ScopeInvariantError,
  UnboundIdentifierError,
} from "./foil/errors.ts";

// Generic terms
export {
  alphaEquiv,
  alphaEquivRefreshed,
  alphaEquivScoped,
  bindAST,
  eqAST,
  freeVarsAST,
  mkNode,
  mkScoped,
  mkVar,
  refreshAST,
  refreshScopedAST,
  renameAST,
  sinkAST,
  substitute,
  substitutePattern,
  substituteRefreshed,
} from "./free/ast.ts";
export type {
  AST,
  NodeAST,
  ScopedAST,
  Signature,
  VarAST,
  ZippedNode,
} from "./free/ast.ts";

// Raw syntax conversion
export {
  bindIdentifier,
  bindIdentifiers,
  convertFromAST,
  convertFromScopedAST,
  convertToAST,
  convertToScopedAST,
  defaultIdent,
  emptyNameTable,
} from "./free/conversion.ts";
export type {
  BoundIdentifier,
  BoundIdentifiers,
  ExportSyntax,
  ImportedPattern,
  ImportSyntax,
  NameTable,
  NodeExporter,
  NodeImporter,
} from "./free/conversion.ts";

// Clients
export * as lambdaPi from "./lambdaPi/index.ts";
export * as lambda from "./lambda/index.ts";
