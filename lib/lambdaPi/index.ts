/**
 * λΠ-calculus with pairs and pair patterns.
 *
 * @module
 */
export * from "./convert.ts";
export * from "./pattern.ts";
export * from "./syntax.ts";
export * from "./term.ts";
export * from "./whnf.ts";
