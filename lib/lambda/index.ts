/**
 * Untyped lambda calculus with multi-argument abstractions.
 *
 * @module
 */
export * from "../terms/lambda.ts";
export * from "./generator.ts";
export {
  type AbsNode,
  type AppNode,
  fromLambdaTerm,
  instantiate,
  lambdaExport,
  lambdaImport,
  type LambdaNode,
  type LambdaScoped,
  lambdaSignature,
  type LambdaTerm,
  mkAbs,
  mkApp,
  toLambdaTerm,
} from "./term.ts";
