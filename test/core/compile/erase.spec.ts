// test/core/compile/erase.spec.ts
// Type erasure keeps every remaining character in place

import { describe, it, expect } from "vitest";
import { eraseTypes } from "../../../src/core/compile/erase";

describe("eraseTypes", () => {
  it("blanks annotations", () => {
    expect(eraseTypes("const n: number = 1;")).toBe("const n" + " ".repeat(8) + " = 1;");
  });

  it("blanks optional markers, parameter and return types", () => {
    expect(eraseTypes("function f(a?: string): void {}")).toBe("function f(a" + " ".repeat(9) + ")" + " ".repeat(7) + "{}");
  });

  it("replaces type-only statements with an empty statement and keeps the line breaks", () => {
    expect(eraseTypes("type T = number;\nlet x = 1 as T;")).toBe(";" + " ".repeat(15) + "\nlet x = 1" + " ".repeat(5) + ";");
  });

  it("blanks type arguments and non-null assertions", () => {
    expect(eraseTypes("const m = new Map<string, number>();\nm.get('a')!;")).toBe(
      "const m = new Map" + " ".repeat(16) + "();\nm.get('a') ;"
    );
  });

  it("keeps the line count of multi-line interfaces", () => {
    const code = "interface Row {\n  n: number;\n}\nconst r = 1;";
    const erased = eraseTypes(code);
    expect(erased?.split("\n")).toHaveLength(4);
    expect(erased?.split("\n")[3]).toBe("const r = 1;");
  });

  it("gives up on syntax that needs emitted code", () => {
    expect(eraseTypes("enum Color { Red }")).toBeUndefined();
    expect(eraseTypes("class A { constructor(private x: number) {} }")).toBeUndefined();
    expect(eraseTypes("const n = <number>value;")).toBeUndefined();
  });
});
