/**
 * Scope-safe untyped lambda terms whose abstractions bind a list of names.
 *
 * @module
 */
import type { NameBinderList } from "../foil/binders.ts";
import { ScopeInvariantError } from "../foil/errors.ts";
import { emptyScope, type RawName, type Scope } from "../foil/scope.ts";
import { identitySubst } from "../foil/substitution.ts";
import {
  type AST,
  mkNode,
  mkScoped,
  mkVar,
  type ScopedAST,
  type Signature,
  substitutePattern,
} from "../free/ast.ts";
import {
  bindIdentifiers,
  convertFromAST,
  convertToAST,
  defaultIdent,
  emptyNameTable,
  type ExportSyntax,
  type ImportSyntax,
  type NameTable,
} from "../free/conversion.ts";
import {
  createApplication,
  mkVar as mkRawVar,
  mkUntypedAbs,
  type UntypedLambda,
} from "../terms/lambda.ts";

export type LambdaTerm = AST<LambdaNode>;
export type LambdaScoped = ScopedAST<NameBinderList, LambdaNode>;

export interface AbsNode {
  kind: "abs";
  scoped: LambdaScoped;
}

export interface AppNode {
  kind: "app";
  lft: LambdaTerm;
  rgt: LambdaTerm;
}

export type LambdaNode = AbsNode | AppNode;

export const mkAbs = (
  binders: NameBinderList,
  body: LambdaTerm,
): LambdaTerm => mkNode({ kind: "abs", scoped: mkScoped(binders, body) });

export const mkApp = (lft: LambdaTerm, rgt: LambdaTerm): LambdaTerm =>
  mkNode({ kind: "app", lft, rgt });

export const lambdaSignature: Signature<NameBinderList, LambdaNode> = {
  mapNode(node, onScoped, onTerm) {
    switch (node.kind) {
      case "abs":
        return { kind: "abs", scoped: onScoped(node.scoped) };
      case "app":
        return { kind: "app", lft: onTerm(node.lft), rgt: onTerm(node.rgt) };
    }
  },

  zipMatch(left, right) {
    if (left.kind === "abs" && right.kind === "abs") {
      return { scoped: [[left.scoped, right.scoped]], terms: [] };
    }
    if (left.kind === "app" && right.kind === "app") {
      return {
        scoped: [],
        terms: [[left.lft, right.lft], [left.rgt, right.rgt]],
      };
    }
    return undefined;
  },
};

/** The body of a raw abstraction. */
type RawScoped = UntypedLambda;

export const lambdaImport: ImportSyntax<
  UntypedLambda,
  string,
  string[],
  RawScoped,
  NameBinderList,
  LambdaNode
> = {
  identOf: (raw) => (raw.kind === "lambda-var" ? raw.name : undefined),

  toNode(raw, convert) {
    switch (raw.kind) {
      case "lambda-var":
        throw new ScopeInvariantError(
          `variable ${raw.name} reached node conversion`,
        );
      case "lambda-abs":
        return { kind: "abs", scoped: convert.scoped(raw.names, raw.body) };
      case "lambda-app":
        return {
          kind: "app",
          lft: convert.term(raw.lft),
          rgt: convert.term(raw.rgt),
        };
    }
  },

  fromRawPattern(scope, names, idents) {
    const bound = bindIdentifiers(scope, names, idents);
    return { binder: bound.binders, names: bound.names };
  },

  scopedTerm: (raw) => raw,
};

export const lambdaExport: ExportSyntax<
  UntypedLambda,
  string,
  string[],
  RawScoped,
  NameBinderList,
  LambdaNode
> = {
  fromVar: mkRawVar,

  fromNode(node, convert) {
    switch (node.kind) {
      case "abs": {
        const [names, body] = convert.scoped(node.scoped);
        return mkUntypedAbs(names, body);
      }
      case "app":
        return createApplication(convert.term(node.lft), convert.term(node.rgt));
    }
  },

  makePattern: (binders, ident) =>
    binders.binders.map((binder) => ident(binder.id)),
  makeScoped: (raw) => raw,
};

/**
 * @throws UnboundIdentifierError when a variable is neither bound nor in
 * `names`.
 */
export function toLambdaTerm(
  raw: UntypedLambda,
  scope: Scope = emptyScope(),
  names: NameTable<string> = emptyNameTable(),
): LambdaTerm {
  return convertToAST(lambdaImport, scope, names, raw);
}

export function fromLambdaTerm(
  term: LambdaTerm,
  ident: (id: RawName) => string = defaultIdent,
): UntypedLambda {
  return convertFromAST(lambdaExport, ident, term);
}

/**
 * Apply an abstraction to exactly as many arguments as it binds.
 *
 * @throws ScopeInvariantError on an arity mismatch.
 */
export function instantiate(
  scope: Scope,
  scoped: LambdaScoped,
  args: readonly LambdaTerm[],
): LambdaTerm {
  return substitutePattern(
    lambdaSignature,
    scope,
    identitySubst(mkVar<LambdaNode>),
    scoped.binder,
    args,
    scoped.body,
  );
}
