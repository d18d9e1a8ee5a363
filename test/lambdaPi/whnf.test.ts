import { expect } from "chai";
import { afterEach, beforeEach, describe, it } from "mocha";

import { type NameBinder, withFreshBinder } from "../../lib/foil/binders.ts";
import { EvaluationLimitError } from "../../lib/foil/errors.ts";
import { emptyScope, extendScope, extendScopeRaw } from "../../lib/foil/scope.ts";
import { lookupSubst, substSize } from "../../lib/foil/substitution.ts";
import { mkVar } from "../../lib/free/ast.ts";
import { bindIdentifier, emptyNameTable } from "../../lib/free/conversion.ts";
import { fromTerm, toTerm } from "../../lib/lambdaPi/convert.ts";
import { mkPatternPair } from "../../lib/lambdaPi/pattern.ts";
import {
  patternPair,
  patternVar,
  prettyPrintLambdaPi,
  type RawTerm,
  rawApp,
  rawFirst,
  rawLam,
  rawPair,
  rawProduct,
  rawSecond,
  rawUniverse,
  rawVar,
} from "../../lib/lambdaPi/syntax.ts";
import {
  type LambdaPiNode,
  mkApp,
  mkLam,
  universe,
} from "../../lib/lambdaPi/term.ts";
import { matchPattern, whnf } from "../../lib/lambdaPi/whnf.ts";

const binderAt = (id: number): NameBinder =>
  withFreshBinder(
    id === 0 ? emptyScope() : extendScopeRaw(emptyScope(), [id - 1]),
    (b) => b,
  );

const evalClosed = (raw: RawTerm): RawTerm =>
  fromTerm(whnf(emptyScope(), toTerm(raw)));

const identity = rawLam(patternVar("x"), rawVar("x"));
const selfApply = rawLam(patternVar("x"), rawApp(rawVar("x"), rawVar("x")));

describe("λΠ weak head normal form", () => {
  it("reduces a β-redex", () => {
    expect(evalClosed(rawApp(identity, rawUniverse))).to.deep.equal(
      rawUniverse,
    );
  });

  it("destructures a pair pattern through projections", () => {
    const swapSecond = rawLam(
      patternPair(patternVar("x"), patternVar("y")),
      rawVar("y"),
    );
    const arg = rawPair(rawUniverse, rawProduct(rawUniverse, rawUniverse));
    expect(evalClosed(rawApp(swapSecond, arg))).to.deep.equal(
      rawProduct(rawUniverse, rawUniverse),
    );
  });

  it("reduces projections of pairs", () => {
    expect(evalClosed(rawFirst(rawPair(rawUniverse, identity)))).to.deep.equal(
      rawUniverse,
    );
    expect(
      prettyPrintLambdaPi(evalClosed(rawSecond(rawPair(rawUniverse, identity)))),
    ).to.equal("(λx0.x0)");
  });

  it("does not reduce under a binder", () => {
    const raw = rawLam(patternVar("y"), rawApp(identity, rawVar("y")));
    expect(prettyPrintLambdaPi(evalClosed(raw))).to.equal(
      "(λx0.((λx1.x1) x0))",
    );
  });

  it("returns a stuck application unchanged", () => {
    const free = bindIdentifier(emptyScope(), emptyNameTable<string>(), "f");
    const scope = extendScope(free.binder, emptyScope());
    const term = toTerm(rawApp(rawVar("f"), rawUniverse), scope, free.names);
    expect(whnf(scope, term)).to.equal(term);
  });

  it("avoids capturing a free variable of the argument", () => {
    // (λ1. λ0. 1) 0, where 0 is free in the ambient scope
    const scope = extendScopeRaw(emptyScope(), [0]);
    const term = mkApp(
      mkLam(
        binderAt(1),
        mkLam(binderAt(0), mkVar<LambdaPiNode>(binderAt(1).name)),
      ),
      mkVar<LambdaPiNode>(binderAt(0).name),
    );
    expect(fromTerm(whnf(scope, term))).to.deep.equal(
      rawLam(patternVar("x1"), rawVar("x0")),
    );
  });

  it("gives up after the step limit", () => {
    const omega = rawApp(selfApply, selfApply);
    expect(() => whnf(emptyScope(), toTerm(omega), { maxSteps: 5 })).to.throw(
      EvaluationLimitError,
      "evaluation exceeded maximum steps (5)",
    );
  });

  describe("verbose logging", () => {
    const original = console.error;
    let lines: string[] = [];

    beforeEach(() => {
      lines = [];
      console.error = (...args: unknown[]) => {
        lines.push(args.map(String).join(" "));
      };
    });

    afterEach(() => {
      console.error = original;
    });

    it("logs each reduction", () => {
      whnf(emptyScope(), toTerm(rawApp(identity, rawUniverse)), {
        verbose: true,
      });
      expect(lines).to.deep.equal(["[DEBUG] whnf step 1 (beta): 𝕌"]);
    });

    it("stays quiet by default", () => {
      whnf(emptyScope(), toTerm(rawApp(identity, rawUniverse)));
      expect(lines).to.deep.equal([]);
    });
  });
});

describe("pattern matching", () => {
  it("binds nothing for a wildcard and projections for a pair", () => {
    withFreshBinder(emptyScope(), (x) =>
      withFreshBinder(extendScope(x, emptyScope()), (y) => {
        const subst = matchPattern(mkPatternPair(x, y), universe);
        expect(substSize(subst)).to.equal(2);
        expect(fromTerm(lookupSubst(subst, x.name))).to.deep.equal(
          rawFirst(rawUniverse),
        );
        expect(fromTerm(lookupSubst(subst, y.name))).to.deep.equal(
          rawSecond(rawUniverse),
        );
      }));
  });
});
