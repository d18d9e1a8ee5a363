/**
 * Scope-safe λΠ terms over the generic {@link AST}.
 *
 * @module
 */
import {
  type AST,
  mkNode,
  mkScoped,
  type ScopedAST,
  type Signature,
  type ZippedNode,
} from "../free/ast.ts";
import type { LambdaPiPattern } from "./pattern.ts";

export type LambdaPiTerm = AST<LambdaPiNode>;
export type LambdaPiScoped = ScopedAST<LambdaPiPattern, LambdaPiNode>;

export interface AppNode {
  kind: "app";
  fn: LambdaPiTerm;
  arg: LambdaPiTerm;
}

export interface LamNode {
  kind: "lam";
  scoped: LambdaPiScoped;
}

export interface PiNode {
  kind: "pi";
  domain: LambdaPiTerm;
  scoped: LambdaPiScoped;
}

export interface PairNode {
  kind: "pair";
  first: LambdaPiTerm;
  second: LambdaPiTerm;
}

export interface FirstNode {
  kind: "first";
  term: LambdaPiTerm;
}

export interface SecondNode {
  kind: "second";
  term: LambdaPiTerm;
}

export interface ProductNode {
  kind: "product";
  left: LambdaPiTerm;
  right: LambdaPiTerm;
}

export interface UniverseNode {
  kind: "universe";
}

export type LambdaPiNode =
  | AppNode
  | LamNode
  | PiNode
  | PairNode
  | FirstNode
  | SecondNode
  | ProductNode
  | UniverseNode;

export const mkApp = (fn: LambdaPiTerm, arg: LambdaPiTerm): LambdaPiTerm =>
  mkNode({ kind: "app", fn, arg });

export const mkLam = (
  binder: LambdaPiPattern,
  body: LambdaPiTerm,
): LambdaPiTerm => mkNode({ kind: "lam", scoped: mkScoped(binder, body) });

export const mkPi = (
  binder: LambdaPiPattern,
  domain: LambdaPiTerm,
  codomain: LambdaPiTerm,
): LambdaPiTerm =>
  mkNode({ kind: "pi", domain, scoped: mkScoped(binder, codomain) });

export const mkPair = (
  first: LambdaPiTerm,
  second: LambdaPiTerm,
): LambdaPiTerm => mkNode({ kind: "pair", first, second });

export const mkFirst = (term: LambdaPiTerm): LambdaPiTerm =>
  mkNode({ kind: "first", term });

export const mkSecond = (term: LambdaPiTerm): LambdaPiTerm =>
  mkNode({ kind: "second", term });

export const mkProduct = (
  left: LambdaPiTerm,
  right: LambdaPiTerm,
): LambdaPiTerm => mkNode({ kind: "product", left, right });

export const universe: LambdaPiTerm = mkNode({ kind: "universe" });

type Zipped = ZippedNode<LambdaPiPattern, LambdaPiNode>;

const zipped = (
  terms: Zipped["terms"],
  scoped: Zipped["scoped"] = [],
): Zipped => ({ terms, scoped });

export const lambdaPiSignature: Signature<LambdaPiPattern, LambdaPiNode> = {
  mapNode(node, onScoped, onTerm) {
    switch (node.kind) {
      case "app":
        return { kind: "app", fn: onTerm(node.fn), arg: onTerm(node.arg) };
      case "lam":
        return { kind: "lam", scoped: onScoped(node.scoped) };
      case "pi":
        return {
          kind: "pi",
          domain: onTerm(node.domain),
          scoped: onScoped(node.scoped),
        };
      case "pair":
        return {
          kind: "pair",
          first: onTerm(node.first),
          second: onTerm(node.second),
        };
      case "first":
        return { kind: "first", term: onTerm(node.term) };
      case "second":
        return { kind: "second", term: onTerm(node.term) };
      case "product":
        return {
          kind: "product",
          left: onTerm(node.left),
          right: onTerm(node.right),
        };
      case "universe":
        return node;
    }
  },

  zipMatch(left, right) {
    switch (left.kind) {
      case "app":
        return right.kind === "app"
          ? zipped([[left.fn, right.fn], [left.arg, right.arg]])
          : undefined;
      case "lam":
        return right.kind === "lam"
          ? zipped([], [[left.scoped, right.scoped]])
          : undefined;
      case "pi":
        return right.kind === "pi"
          ? zipped([[left.domain, right.domain]], [[left.scoped, right.scoped]])
          : undefined;
      case "pair":
        return right.kind === "pair"
          ? zipped([[left.first, right.first], [left.second, right.second]])
          : undefined;
      case "first":
        return right.kind === "first"
          ? zipped([[left.term, right.term]])
          : undefined;
      case "second":
        return right.kind === "second"
          ? zipped([[left.term, right.term]])
          : undefined;
      case "product":
        return right.kind === "product"
          ? zipped([[left.left, right.left], [left.right, right.right]])
          : undefined;
      case "universe":
        return right.kind === "universe" ? zipped([]) : undefined;
    }
  },
};
