// test/core/locate/identity.spec.ts
// Structural identity of reloading loops

import { describe, it, expect } from "vitest";
import { SyntaxKind } from "ts-morph";
import { loopIdentity, structuralDump } from "../../../src/core/locate/identity";
import { parseSource } from "../../../src/core/source/tree";

function firstLoop(text: string) {
  return parseSource({ path: "/virtual/loop.ts", text }).file.getFirstDescendantByKindOrThrow(SyntaxKind.ForOfStatement);
}

function firstExpression(text: string) {
  return parseSource({ path: "/virtual/expr.ts", text })
    .file.getFirstDescendantByKindOrThrow(SyntaxKind.ExpressionStatement)
    .getExpression();
}

describe("structuralDump", () => {
  it("renders leaves with their text", () => {
    expect(structuralDump(firstExpression("count;"))).toBe("Identifier(count)");
  });

  it("ignores quote style", () => {
    expect(structuralDump(firstExpression("'a';"))).toBe('StringLiteral("a")');
    expect(structuralDump(firstExpression('"a";'))).toBe('StringLiteral("a")');
    expect(structuralDump(firstExpression("`a`;"))).toBe('NoSubstitutionTemplateLiteral("a")');
  });

  it("ignores whitespace and comments", () => {
    expect(structuralDump(firstExpression("f( a,b );"))).toBe(structuralDump(firstExpression("f(a, /* b */ b);")));
  });
});

describe("loopIdentity", () => {
  const base = "for (const row of reloading(rows)) {\n  total += row;\n}\n";

  it("stays the same when only the body changes", () => {
    const edited = "for (const row of reloading(rows)) {\n  total -= row * 2;\n  log(row);\n}\n";
    expect(loopIdentity(firstLoop(edited))).toBe(loopIdentity(firstLoop(base)));
  });

  it("stays the same when the loop moves", () => {
    const moved = "// header\n\n\nfor (const row   of reloading( rows )) { total += row; }\n";
    expect(loopIdentity(firstLoop(moved))).toBe(loopIdentity(firstLoop(base)));
  });

  it("changes with the iteration target", () => {
    const renamed = "for (const item of reloading(rows)) {\n  total += item;\n}\n";
    expect(loopIdentity(firstLoop(renamed))).not.toBe(loopIdentity(firstLoop(base)));
  });

  it("changes with the declaration kind", () => {
    const withLet = "for (let row of reloading(rows)) {\n  total += row;\n}\n";
    expect(loopIdentity(firstLoop(withLet))).not.toBe(loopIdentity(firstLoop(base)));
  });

  it("changes with the iterable", () => {
    const other = "for (const row of reloading(rows, { every: 2 })) {\n  total += row;\n}\n";
    expect(loopIdentity(firstLoop(other))).not.toBe(loopIdentity(firstLoop(base)));
  });
});
