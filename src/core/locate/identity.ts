// src/core/locate/identity.ts
// Content-derived fingerprint of a reloading loop.

import { Node, type ForOfStatement } from "ts-morph";

/**
 * Canonical structural form of a node: kind names, names and literal values.
 * Whitespace, comments, quotes and position do not take part.
 */
export function structuralDump(node: Node): string {
  const kind = node.getKindName();

  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return `${kind}(${JSON.stringify(node.getLiteralText())})`;
  }

  const children = node.forEachChildAsArray();
  if (children.length === 0) {
    return `${kind}(${node.getText()})`;
  }

  const head = Node.isVariableDeclarationList(node) ? `${kind}[${node.getDeclarationKind()}]` : kind;
  return `${head}(${children.map(structuralDump).join(",")})`;
}

/**
 * Identity of a `for...of` loop: its iteration target and its iterable.
 * Edits confined to the loop body leave it unchanged.
 */
export function loopIdentity(loop: ForOfStatement): string {
  return `${structuralDump(loop.getInitializer())}__${structuralDump(loop.getExpression())}`;
}
