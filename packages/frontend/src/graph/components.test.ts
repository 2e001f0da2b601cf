/**
 * Tests for strongly connected components
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  findStronglyConnectedComponents,
  isCyclicComponent,
} from "./components.js";

describe("findStronglyConnectedComponents", () => {
  it("should list acyclic nodes dependencies-first", () => {
    const edges = new Map([
      ["a", ["b"]],
      ["b", ["c"]],
      ["c", []],
    ]);
    const components = findStronglyConnectedComponents(["a", "b", "c"], edges);
    expect(components).to.deep.equal([["c"], ["b"], ["a"]]);
  });

  it("should group a mutual cycle into one sorted component", () => {
    const edges = new Map([
      ["b", ["a"]],
      ["a", ["b", "c"]],
      ["c", []],
    ]);
    const components = findStronglyConnectedComponents(["b", "a", "c"], edges);
    expect(components).to.deep.equal([["c"], ["a", "b"]]);
    expect(isCyclicComponent(["a", "b"], edges)).to.equal(true);
    expect(isCyclicComponent(["c"], edges)).to.equal(false);
  });

  it("should treat a self edge as a cycle", () => {
    const edges = new Map([["a", ["a"]]]);
    const components = findStronglyConnectedComponents(["a"], edges);
    expect(components).to.deep.equal([["a"]]);
    expect(isCyclicComponent(["a"], edges)).to.equal(true);
  });

  it("should ignore edges to unknown nodes", () => {
    const edges = new Map([["a", ["zzz"]]]);
    expect(findStronglyConnectedComponents(["a"], edges)).to.deep.equal([
      ["a"],
    ]);
  });
});
