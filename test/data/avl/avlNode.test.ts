import { expect } from "chai";
import { describe, it } from "mocha";

import {
  createEmptyAVL,
  insertAVL,
  keyValuePairs,
  maxKeyAVL,
  removeAVL,
  searchAVL,
  sizeAVL,
} from "../../../lib/data/avl/avlNode.ts";

const compareNumbers = (a: number, b: number) => a - b;

const fromKeys = (keys: number[]) =>
  keys.reduce(
    (tree, key) => insertAVL(tree, key, `v${key}`, compareNumbers),
    createEmptyAVL<number, string>(),
  );

describe("AVL tree", () => {
  it("starts empty", () => {
    const tree = createEmptyAVL<number, string>();
    expect(tree.root).to.equal(null);
    expect(sizeAVL(tree)).to.equal(0);
    expect(tree.root?.height).to.equal(undefined);
    expect(maxKeyAVL(tree)).to.equal(undefined);
  });

  it("keeps ascending inserts balanced", () => {
    const tree = fromKeys([1, 2, 3, 4, 5, 6, 7]);
    expect(sizeAVL(tree)).to.equal(7);
    expect(tree.root?.height).to.equal(3);
    expect(tree.root?.key).to.equal(4);
  });

  it("rebalances a left-right insertion", () => {
    const tree = fromKeys([3, 1, 2]);
    expect(tree.root?.key).to.equal(2);
    expect(tree.root?.height).to.equal(2);
  });

  it("overwrites the value of an existing key", () => {
    const tree = insertAVL(fromKeys([1, 2]), 2, "two", compareNumbers);
    expect(searchAVL(tree, 2, compareNumbers)).to.equal("two");
    expect(sizeAVL(tree)).to.equal(2);
  });

  it("leaves older versions untouched", () => {
    const before = fromKeys([1, 2, 3]);
    const after = insertAVL(before, 4, "v4", compareNumbers);
    expect(searchAVL(before, 4, compareNumbers)).to.equal(undefined);
    expect(searchAVL(after, 4, compareNumbers)).to.equal("v4");
  });

  it("removes keys and rebalances", () => {
    let tree = fromKeys([1, 2, 3, 4, 5, 6, 7]);
    tree = removeAVL(tree, 4, compareNumbers);
    tree = removeAVL(tree, 1, compareNumbers);
    tree = removeAVL(tree, 2, compareNumbers);
    expect(keyValuePairs(tree).map(([key]) => key)).to.deep.equal([3, 5, 6, 7]);
    expect(tree.root?.height).to.equal(3);
    expect(searchAVL(tree, 4, compareNumbers)).to.equal(undefined);
  });

  it("returns the same tree when removing an absent key", () => {
    const tree = fromKeys([1, 2, 3]);
    expect(removeAVL(tree, 9, compareNumbers)).to.equal(tree);
  });

  it("reports the largest key", () => {
    expect(maxKeyAVL(fromKeys([5, 9, 2, 7]))).to.equal(9);
  });

  it("lists pairs in key order", () => {
    expect(keyValuePairs(fromKeys([3, 1, 2]))).to.deep.equal([
      [1, "v1"],
      [2, "v2"],
      [3, "v3"],
    ]);
  });
});
