import { expect } from "chai";
import { describe, it } from "mocha";

import { namesOfPattern, withFreshBinder } from "../../lib/foil/binders.ts";
import {
  ScopeInvariantError,
  UnboundIdentifierError,
} from "../../lib/foil/errors.ts";
import { withRefreshedPattern } from "../../lib/foil/pattern.ts";
import {
  emptyScope,
  extendScope,
  extendScopeRaw,
} from "../../lib/foil/scope.ts";
import { alphaEquiv } from "../../lib/free/ast.ts";
import { bindIdentifier, emptyNameTable } from "../../lib/free/conversion.ts";
import {
  freshIdentifiers,
  fromTerm,
  fromTermClosed,
  toTerm,
} from "../../lib/lambdaPi/convert.ts";
import { mkPatternPair } from "../../lib/lambdaPi/pattern.ts";
import {
  patternPair,
  patternVar,
  patternWildcard,
  prettyPrintLambdaPi,
  rawApp,
  rawFirst,
  rawLam,
  rawPair,
  rawPi,
  rawProduct,
  rawUniverse,
  rawVar,
} from "../../lib/lambdaPi/syntax.ts";
import { lambdaPiSignature } from "../../lib/lambdaPi/term.ts";

describe("λΠ conversion", () => {
  it("round-trips a lambda with default identifiers", () => {
    const term = toTerm(rawLam(patternVar("x"), rawVar("x")));
    expect(fromTerm(term)).to.deep.equal(
      rawLam(patternVar("x0"), rawVar("x0")),
    );
  });

  it("binds pair patterns left to right", () => {
    const raw = rawLam(
      patternPair(patternVar("a"), patternVar("b")),
      rawPair(rawVar("b"), rawVar("a")),
    );
    expect(fromTerm(toTerm(raw))).to.deep.equal(
      rawLam(
        patternPair(patternVar("x0"), patternVar("x1")),
        rawPair(rawVar("x1"), rawVar("x0")),
      ),
    );
  });

  it("resolves shadowed names to the innermost binder", () => {
    const raw = rawLam(patternVar("x"), rawLam(patternVar("x"), rawVar("x")));
    expect(prettyPrintLambdaPi(fromTerm(toTerm(raw)))).to.equal(
      "(λx0.(λx1.x1))",
    );
  });

  it("converts Π-types, products, projections and wildcards", () => {
    const raw = rawPi(
      patternVar("A"),
      rawUniverse,
      rawLam(patternWildcard, rawFirst(rawProduct(rawVar("A"), rawVar("A")))),
    );
    expect(prettyPrintLambdaPi(fromTerm(toTerm(raw)))).to.equal(
      "(Π(x0 : 𝕌), (λ_.π₁((x0 × x0))))",
    );
  });

  it("keeps free variables from the name table", () => {
    const free = bindIdentifier(emptyScope(), emptyNameTable<string>(), "f");
    const scope = extendScope(free.binder, emptyScope());
    const term = toTerm(rawApp(rawVar("f"), rawUniverse), scope, free.names);
    expect(fromTerm(term, (id) => `v${id}`)).to.deep.equal(
      rawApp(rawVar("v0"), rawUniverse),
    );
  });

  it("rejects unbound identifiers", () => {
    expect(() => toTerm(rawLam(patternVar("x"), rawVar("y")))).to.throw(
      UnboundIdentifierError,
      "unbound identifier: y",
    );
  });

  it("names a closed term from a stream of identifiers", () => {
    const raw = rawLam(
      patternPair(patternVar("a"), patternVar("b")),
      rawLam(patternVar("c"), rawApp(rawVar("a"), rawVar("c"))),
    );
    expect(fromTermClosed(toTerm(raw), freshIdentifiers())).to.deep.equal(
      rawLam(
        patternPair(patternVar("x"), patternVar("y")),
        rawLam(patternVar("z"), rawApp(rawVar("x"), rawVar("z"))),
      ),
    );
  });

  it("continues the identifier stream with numbered names", () => {
    const stream = freshIdentifiers();
    const names = Array.from({ length: 5 }, () => stream.next().value);
    expect(names).to.deep.equal(["x", "y", "z", "x1", "y1"]);
  });

  it("refuses to name a term with free variables", () => {
    const free = bindIdentifier(emptyScope(), emptyNameTable<string>(), "f");
    const scope = extendScope(free.binder, emptyScope());
    const term = toTerm(rawVar("f"), scope, free.names);
    expect(() => fromTermClosed(term, freshIdentifiers())).to.throw(
      ScopeInvariantError,
      "unknown name 0 in a NameMap",
    );
  });

  it("fails when the identifiers run out", () => {
    const term = toTerm(
      rawLam(patternVar("a"), rawLam(patternVar("b"), rawVar("a"))),
    );
    expect(() => fromTermClosed(term, ["p"])).to.throw(
      ScopeInvariantError,
      "ran out of fresh identifiers",
    );
  });

  it("treats differently named closed terms as alpha-equivalent", () => {
    const left = toTerm(
      rawLam(patternPair(patternVar("a"), patternVar("b")), rawVar("a")),
    );
    const right = toTerm(
      rawLam(
        patternPair(patternVar("p"), patternVar("q")),
        rawLam(patternVar("r"), rawVar("r")),
      ),
    );
    expect(alphaEquiv(lambdaPiSignature, emptyScope(), left, left)).to.equal(
      true,
    );
    expect(alphaEquiv(lambdaPiSignature, emptyScope(), left, right)).to.equal(
      false,
    );
  });

  it("rejects a pair pattern that binds a name twice", () => {
    withFreshBinder(emptyScope(), (x) => {
      expect(() => mkPatternPair(x, x)).to.throw(ScopeInvariantError);
    });
  });

  it("keeps pair binders distinct when refreshing over a clashing scope", () => {
    withFreshBinder(emptyScope(), (x) =>
      withFreshBinder(extendScope(x, emptyScope()), (y) => {
        const pair = mkPatternPair(x, y);
        const refreshed = withRefreshedPattern(
          extendScopeRaw(emptyScope(), [0, 1]),
          pair,
        );
        expect(refreshed.pattern.kind).to.equal("pattern-pair");
        expect(namesOfPattern(refreshed.pattern).map((n) => n.id)).to.deep
          .equal([2, 3]);
        expect(namesOfPattern(pair).map((n) => n.id)).to.deep.equal([0, 1]);
      }));
  });
});
