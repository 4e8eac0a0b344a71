// test/core/locate/itervars.spec.ts
// Iteration targets rendered as assignment targets

import { describe, it, expect } from "vitest";
import { SyntaxKind } from "ts-morph";
import { formatIterationTarget, iterationNames, iterationTarget } from "../../../src/core/locate/itervars";
import { parseSource } from "../../../src/core/source/tree";

function target(header: string) {
  const loop = parseSource({ path: "/virtual/loop.ts", text: `${header} {}\n` }).file.getFirstDescendantByKindOrThrow(
    SyntaxKind.ForOfStatement
  );
  const node = iterationTarget(loop);
  return { text: formatIterationTarget(node), names: iterationNames(node) };
}

describe("iteration targets", () => {
  it("renders a plain name", () => {
    expect(target("for (const i of reloading(xs))")).toEqual({ text: "i", names: ["i"] });
  });

  it("renders nested array patterns", () => {
    expect(target("for (const [a, [b, c]] of reloading(xs))")).toEqual({
      text: "[a, [b, c]]",
      names: ["a", "b", "c"],
    });
  });

  it("renders object patterns with renamed and nested properties", () => {
    expect(target("for (const { id, pos: [x, y] } of reloading(xs))")).toEqual({
      text: "{ id, pos: [x, y] }",
      names: ["id", "x", "y"],
    });
  });

  it("keeps defaults and rest elements", () => {
    expect(target("for (let [first = 0, ...others] of reloading(xs))")).toEqual({
      text: "[first = 0, ...others]",
      names: ["first", "others"],
    });
  });

  it("renders holes in assignment patterns", () => {
    expect(target("for ([first, , third] of reloading(xs))")).toEqual({
      text: "[first, , third]",
      names: ["first", "third"],
    });
  });

  it("binds no new names for member targets", () => {
    expect(target("for (box.value of reloading(xs))")).toEqual({ text: "box.value", names: [] });
  });
});
