import { expect } from "chai";
import { describe, it } from "mocha";
import rsexport, { type RandomSeed } from "random-seed";

import {
  type NameBinderList,
  unifyPatterns,
  withFreshBinder,
} from "../../lib/foil/binders.ts";
import { emptyScope, extendScopeRaw, type Name } from "../../lib/foil/scope.ts";
import {
  addSubst,
  identitySubst,
  type Substitution,
} from "../../lib/foil/substitution.ts";
import {
  alphaEquiv,
  alphaEquivRefreshed,
  mkVar,
  refreshAST,
  substitute,
  substituteRefreshed,
} from "../../lib/free/ast.ts";
import { bindIdentifiers, emptyNameTable } from "../../lib/free/conversion.ts";
import { randLambda } from "../../lib/lambda/generator.ts";
import {
  type LambdaNode,
  lambdaSignature as sig,
  mkApp,
  type LambdaTerm,
  toLambdaTerm,
} from "../../lib/lambda/term.ts";
const { create } = rsexport;

const ROUNDS = 60;

const randomTerms = (seed: string, size: number): LambdaTerm[] => {
  const rs: RandomSeed = create(seed);
  return Array.from(
    { length: ROUNDS },
    () => toLambdaTerm(randLambda(rs, rs.intBetween(2, size))),
  );
};

const identity = () => identitySubst(mkVar<LambdaNode>);

const nameAt = (id: number): Name =>
  withFreshBinder(
    id === 0 ? emptyScope() : extendScopeRaw(emptyScope(), [id - 1]),
    (b) => b.name,
  );

interface OpenTerm {
  free: NameBinderList;
  term: LambdaTerm;
}

// The body of a random abstraction, with the abstraction's names left free.
const randomOpenTerms = (seed: string, size: number): OpenTerm[] => {
  const rs: RandomSeed = create(seed);
  return Array.from({ length: ROUNDS }, () => {
    const raw = randLambda(rs, rs.intBetween(2, size));
    if (raw.kind !== "lambda-abs") {
      throw new Error("expected an abstraction at the root");
    }
    const bound = bindIdentifiers(
      emptyScope(),
      emptyNameTable<string>(),
      raw.names,
    );
    return {
      free: bound.binders,
      term: toLambdaTerm(raw.body, bound.scope, bound.names),
    };
  });
};

describe("properties over random terms", () => {
  const terms = randomTerms("scoped-terms-properties", 12);
  const busyScope = extendScopeRaw(emptyScope(), [0, 1, 2, 3, 4, 5]);

  it("substituting the identity gives an alpha-equivalent term", () => {
    for (const term of terms) {
      const result = substitute(sig, busyScope, identity(), term);
      expect(alphaEquiv(sig, emptyScope(), result, term)).to.equal(true);
    }
  });

  it("substitute and substituteRefreshed agree up to alpha-equivalence", () => {
    for (const term of terms) {
      const cheap = substitute(sig, busyScope, identity(), term);
      const full = substituteRefreshed(sig, busyScope, identity(), term);
      expect(alphaEquiv(sig, busyScope, cheap, full)).to.equal(true);
    }
  });

  it("substitute and substituteRefreshed agree on random substitutions", () => {
    const rs: RandomSeed = create("scoped-terms-substitutions");
    const target = (): LambdaTerm => {
      const variable = () => mkVar<LambdaNode>(nameAt(rs.intBetween(0, 5)));
      switch (rs.intBetween(0, 2)) {
        case 0:
          return variable();
        case 1:
          return mkApp(variable(), variable());
        default:
          return toLambdaTerm(randLambda(rs, rs.intBetween(2, 6)), busyScope);
      }
    };
    for (const { free, term } of randomOpenTerms("scoped-terms-open", 12)) {
      const subst = free.binders.reduce(
        (acc: Substitution<LambdaTerm>, binder) =>
          addSubst(acc, binder, target()),
        identity(),
      );
      const cheap = substitute(sig, busyScope, subst, term);
      const full = substituteRefreshed(sig, busyScope, subst, term);
      expect(alphaEquiv(sig, busyScope, cheap, full)).to.equal(true);
    }
  });

  it("alpha-equivalence is reflexive and symmetric", () => {
    for (const term of terms) {
      const refreshed = refreshAST(sig, busyScope, term);
      expect(alphaEquiv(sig, emptyScope(), term, term)).to.equal(true);
      expect(alphaEquiv(sig, emptyScope(), term, refreshed)).to.equal(true);
      expect(alphaEquiv(sig, emptyScope(), refreshed, term)).to.equal(true);
    }
  });

  it("alpha-equivalence is transitive", () => {
    for (const term of terms) {
      const a = refreshAST(sig, busyScope, term);
      const b = substituteRefreshed(sig, emptyScope(), identity(), a);
      expect(alphaEquiv(sig, emptyScope(), term, a)).to.equal(true);
      expect(alphaEquiv(sig, emptyScope(), a, b)).to.equal(true);
      expect(alphaEquiv(sig, emptyScope(), term, b)).to.equal(true);
    }
  });

  it("unifying a pattern with itself needs no renaming", () => {
    for (const term of terms) {
      if (term.kind === "node" && term.node.kind === "abs") {
        const binder = term.node.scoped.binder;
        expect(unifyPatterns(binder, binder).kind).to.equal("same");
      }
    }
  });

  it("both alpha-equivalence checks agree on random pairs", () => {
    const left = randomTerms("scoped-terms-left", 5);
    const right = randomTerms("scoped-terms-right", 5);
    left.forEach((l, i) => {
      const r = right[i];
      expect(alphaEquiv(sig, emptyScope(), l, r)).to.equal(
        alphaEquivRefreshed(sig, emptyScope(), l, r),
      );
    });
  });
});
