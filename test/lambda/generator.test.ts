import { assert } from "chai";
import { describe, it } from "mocha";
import rsexport, { type RandomSeed } from "random-seed";
import { randLambda } from "../../lib/lambda/generator.ts";
import { freeIdentifiers, lambdaSize } from "../../lib/terms/lambda.ts";
const { create } = rsexport;

describe("randLambda", () => {
  const testSeed = "18477814418";

  it("generates a term with the specified number of nodes", () => {
    const rs: RandomSeed = create(testSeed);
    for (let n = 2; n <= 16; n++) {
      assert.strictEqual(lambdaSize(randLambda(rs, n)), n);
    }
  });

  it("generates closed terms", () => {
    const rs: RandomSeed = create(testSeed);
    for (let i = 0; i < 40; i++) {
      assert.deepStrictEqual(freeIdentifiers(randLambda(rs, 10)), []);
    }
  });

  it("is deterministic for a seed", () => {
    const first = randLambda(create(testSeed), 12);
    const second = randLambda(create(testSeed), 12);
    assert.deepStrictEqual(first, second);
  });

  it("only binds names from the pool", () => {
    const rs: RandomSeed = create(testSeed);
    const term = randLambda(rs, 2, ["q"]);
    assert.strictEqual(term.kind, "lambda-abs");
    if (term.kind === "lambda-abs") {
      assert.isTrue(term.names.every((name) => name === "q"));
      assert.deepStrictEqual(term.body, { kind: "lambda-var", name: "q" });
    }
  });

  it("rejects sizes that cannot be closed", () => {
    assert.throws(
      () => randLambda(create(testSeed), 1),
      "A closed term must contain at least two nodes.",
    );
  });

  it("rejects an empty name pool", () => {
    assert.throws(
      () => randLambda(create(testSeed), 4, []),
      "At least one name is needed to bind.",
    );
  });
});
