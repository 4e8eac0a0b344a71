// src/core/locate/itervars.ts
// Iteration targets of a reloading loop, rendered as assignment targets.

import { Node, type ForOfStatement } from "ts-morph";

/**
 * The node that receives each iteration value: the binding name of
 * `for (const <target> of ...)` or the expression of `for (<target> of ...)`.
 */
export function iterationTarget(loop: ForOfStatement): Node {
  const initializer = loop.getInitializer();
  if (Node.isVariableDeclarationList(initializer)) {
    const [declaration] = initializer.getDeclarations();
    if (declaration) return declaration.getNameNode();
  }
  return initializer;
}

/**
 * Render an iteration target so that `(<result> = value)` assigns every name it binds.
 *
 *   x                 -> "x"
 *   [a, [b, c]]       -> "[a, [b, c]]"
 *   { id, pos: [x] }  -> "{ id, pos: [x] }"
 */
export function formatIterationTarget(node: Node): string {
  if (Node.isIdentifier(node)) {
    return node.getText();
  }

  if (Node.isArrayBindingPattern(node)) {
    const parts = node.getElements().map((el) => (Node.isOmittedExpression(el) ? "" : formatIterationTarget(el)));
    return `[${parts.join(", ")}]`;
  }

  if (Node.isObjectBindingPattern(node)) {
    const parts = node.getElements().map(formatIterationTarget);
    return parts.length ? `{ ${parts.join(", ")} }` : "{}";
  }

  if (Node.isBindingElement(node)) {
    const rest = node.getDotDotDotToken() ? "..." : "";
    const property = node.getPropertyNameNode();
    const name = formatIterationTarget(node.getNameNode());
    const initializer = node.getInitializer();
    const core = property ? `${property.getText()}: ${name}` : name;
    return `${rest}${core}${initializer ? ` = ${initializer.getText()}` : ""}`;
  }

  // Destructuring assignment targets: for ([a, b] of ...)
  if (Node.isArrayLiteralExpression(node)) {
    const parts = node.getElements().map((el) => (Node.isOmittedExpression(el) ? "" : formatIterationTarget(el)));
    return `[${parts.join(", ")}]`;
  }

  if (Node.isObjectLiteralExpression(node)) {
    const parts = node.getProperties().map(formatIterationTarget);
    return parts.length ? `{ ${parts.join(", ")} }` : "{}";
  }

  if (Node.isShorthandPropertyAssignment(node)) {
    const initializer = node.getObjectAssignmentInitializer();
    return `${node.getName()}${initializer ? ` = ${initializer.getText()}` : ""}`;
  }

  if (Node.isPropertyAssignment(node)) {
    const initializer = node.getInitializer();
    const value = initializer ? formatIterationTarget(initializer) : node.getName();
    return `${node.getNameNode().getText()}: ${value}`;
  }

  if (Node.isSpreadElement(node) || Node.isSpreadAssignment(node)) {
    return `...${formatIterationTarget(node.getExpression())}`;
  }

  if (Node.isBinaryExpression(node) && node.getOperatorToken().getText() === "=") {
    return `${formatIterationTarget(node.getLeft())} = ${node.getRight().getText()}`;
  }

  if (Node.isParenthesizedExpression(node)) {
    return formatIterationTarget(node.getExpression());
  }

  // obj.prop, arr[i]
  return node.getText();
}

/**
 * Plain identifiers the target assigns to. Member targets (`obj.x`) bind nothing new.
 */
export function iterationNames(node: Node): string[] {
  if (Node.isIdentifier(node)) return [node.getText()];

  if (Node.isArrayBindingPattern(node)) {
    return node.getElements().flatMap(iterationNames);
  }
  if (Node.isArrayLiteralExpression(node)) {
    return node.getElements().flatMap(iterationNames);
  }
  if (Node.isObjectBindingPattern(node)) {
    return node.getElements().flatMap(iterationNames);
  }
  if (Node.isObjectLiteralExpression(node)) {
    return node.getProperties().flatMap(iterationNames);
  }
  if (Node.isBindingElement(node)) return iterationNames(node.getNameNode());
  if (Node.isShorthandPropertyAssignment(node)) return [node.getName()];
  if (Node.isPropertyAssignment(node)) {
    const initializer = node.getInitializer();
    return initializer ? iterationNames(initializer) : [];
  }
  if (Node.isSpreadElement(node) || Node.isSpreadAssignment(node)) return iterationNames(node.getExpression());
  if (Node.isBinaryExpression(node)) return iterationNames(node.getLeft());
  if (Node.isParenthesizedExpression(node)) return iterationNames(node.getExpression());

  return [];
}
