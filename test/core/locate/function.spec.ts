// test/core/locate/function.spec.ts
// Locating reloading functions by name or by the line of the marker call

import { describe, it, expect } from "vitest";
import { isolateFunction } from "../../../src/core/locate/function";
import { parseSource } from "../../../src/core/source/tree";
import { FragmentNotFound } from "../../../src/outcome/errors";

const SOURCE = [
  "const step = reloading(function step(x: number) {",
  "  return x * 2;",
  "});",
  "const inc = reloading((x: number) => x + 1);",
  "const logged = trace(reloading(memo(function cached() { return 1; })));",
  "const slow = reloading({ every: 2 })((n: number) => n);",
  "handlers.onTick = reloading(() => tick());",
  "for (const i of reloading([step])) {}",
].join("\n");

const tree = parseSource({ path: "/virtual/fns.ts", text: SOURCE });

function notFound(run: () => unknown): FragmentNotFound {
  try {
    run();
  } catch (e) {
    if (e instanceof FragmentNotFound) return e;
    throw e;
  }
  throw new Error("expected FragmentNotFound");
}

describe("isolateFunction", () => {
  it("finds a named function expression", () => {
    const fragment = isolateFunction(tree, { name: "step", marker: "reloading" });
    expect(fragment).toEqual({
      unit: {
        path: "/virtual/fns.ts",
        kind: "function",
        code: "function step(x: number) {\n  return x * 2;\n}",
        line: 1,
        typescript: true,
      },
      name: "step",
    });
  });

  it("names arrows after the binding they are stored in", () => {
    expect(isolateFunction(tree, { name: "inc", marker: "reloading" }).unit.code).toBe("(x: number) => x + 1");
    expect(isolateFunction(tree, { name: "onTick", marker: "reloading" }).unit.code).toBe("() => tick()");
  });

  it("strips wrappers outside the marker and keeps those inside", () => {
    const fragment = isolateFunction(tree, { name: "cached", marker: "reloading" });
    expect(fragment.unit.code).toBe("memo(function cached() { return 1; })");
    expect(fragment.unit.line).toBe(5);
  });

  it("finds a curried marker call by line", () => {
    const fragment = isolateFunction(tree, { line: 6, marker: "reloading" });
    expect(fragment.name).toBe("slow");
    expect(fragment.unit.code).toBe("(n: number) => n");
  });

  it("finds a function by any line of its marker call", () => {
    expect(isolateFunction(tree, { line: 2, marker: "reloading" }).name).toBe("step");
  });

  it("does not take the iterable of a reloading loop", () => {
    const err = notFound(() => isolateFunction(tree, { line: 8, marker: "reloading" }));
    expect(err.reason).toBe("missing");
    expect(err.message).toBe(
      "/virtual/fns.ts - Could not locate reloading function `<anonymous>`; keeping the previous version."
    );
  });

  it("reports a name that is not defined", () => {
    const err = notFound(() => isolateFunction(tree, { name: "nothing", marker: "reloading" }));
    expect(err.code).toBe("R0102");
  });

  it("reports a name defined twice", () => {
    const twice = parseSource({
      path: "/virtual/twice.ts",
      text: "const a = reloading(function twice() {});\nconst b = reloading(function twice() {});\n",
    });
    const err = notFound(() => isolateFunction(twice, { name: "twice", marker: "reloading" }));
    expect(err.reason).toBe("ambiguous");
    expect(err.code).toBe("R0103");
  });

  it("prefers the innermost marker call on a line", () => {
    const nested = parseSource({
      path: "/virtual/nested.ts",
      text: "const outer = reloading(wrap(reloading(function inner() {}), () => 0));\n",
    });
    expect(isolateFunction(nested, { line: 1, marker: "reloading" }).unit.code).toBe("function inner() {}");
  });
});
