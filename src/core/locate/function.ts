// src/core/locate/function.ts
// Fragment Locator, function case.
//
// In source a reloading function is a marker call around a function expression:
//
//   const step = outer(reloading(inner(function step(x) { ... })));
//   const step = reloading({ every: 2 })((x) => ...);
//
// Wrappers outside the marker were meant for the reloading wrapper and are
// stripped together with the marker. Wrappers inside it stay.

import { Node, SyntaxKind, type ArrowFunction, type CallExpression, type FunctionExpression } from "ts-morph";
import { FragmentNotFound } from "../../outcome/errors";
import type { SyntaxTree } from "../source/tree";
import { isMarkerCall, isolate, type IsolatedUnit } from "./marker";

export type FunctionQuery = {
  /** Name of the function; when absent the marker call on `line` is used */
  name?: string;
  line?: number;
  marker: string;
};

export type FunctionFragment = {
  unit: IsolatedUnit;
  name?: string;
};

type Candidate = {
  call: CallExpression;
  fragment: Node;
  name?: string;
};

function functionLike(expr: Node): FunctionExpression | ArrowFunction | undefined {
  if (Node.isFunctionExpression(expr) || Node.isArrowFunction(expr)) return expr;
  if (Node.isParenthesizedExpression(expr) || Node.isAsExpression(expr) || Node.isSatisfiesExpression(expr)) {
    return functionLike(expr.getExpression());
  }
  if (Node.isCallExpression(expr)) {
    for (const arg of expr.getArguments()) {
      const fn = functionLike(arg);
      if (fn) return fn;
    }
  }
  return undefined;
}

/**
 * Name the wrapped expression is stored under: `const name = ...`,
 * `{ name: ... }` or `target.name = ...`.
 */
function assignedName(call: CallExpression): string | undefined {
  let node: Node = call;
  let parent = node.getParentOrThrow();
  while (
    Node.isCallExpression(parent) ||
    Node.isParenthesizedExpression(parent) ||
    Node.isAsExpression(parent) ||
    Node.isSatisfiesExpression(parent)
  ) {
    node = parent;
    parent = node.getParentOrThrow();
  }

  if (Node.isVariableDeclaration(parent)) {
    const nameNode = parent.getNameNode();
    return Node.isIdentifier(nameNode) ? nameNode.getText() : undefined;
  }
  if (Node.isPropertyAssignment(parent)) {
    return parent.getName();
  }
  if (Node.isBinaryExpression(parent) && parent.getOperatorToken().getKind() === SyntaxKind.EqualsToken) {
    const left = parent.getLeft();
    if (Node.isIdentifier(left)) return left.getText();
    if (Node.isPropertyAccessExpression(left)) return left.getName();
  }
  return undefined;
}

function fragmentOf(call: CallExpression, marker: string): Node | undefined {
  const parent = call.getParent();
  if (Node.isForOfStatement(parent) && parent.getExpression() === call) return undefined;

  if (isMarkerCall(call, marker) || isMarkerCall(call.getExpression(), marker)) {
    const [first] = call.getArguments();
    if (first && functionLike(first)) return first;
  }
  return undefined;
}

export function findFunctionCandidates(tree: SyntaxTree, query: FunctionQuery): Candidate[] {
  const candidates: Candidate[] = [];

  for (const call of tree.file.getDescendantsOfKind(SyntaxKind.CallExpression)) {
    const fragment = fragmentOf(call, query.marker);
    if (!fragment) continue;

    const fn = functionLike(fragment);
    const ownName = fn && Node.isFunctionExpression(fn) ? fn.getName() : undefined;
    const name = ownName ?? assignedName(call);

    if (query.name !== undefined) {
      if (name === query.name) candidates.push({ call, fragment, name });
    } else if (
      query.line !== undefined &&
      call.getStartLineNumber() <= query.line &&
      query.line <= call.getEndLineNumber()
    ) {
      candidates.push({ call, fragment, name });
    }
  }

  // A marker call nested in another candidate's span matches the same line too;
  // prefer the innermost one.
  if (query.name === undefined && candidates.length > 1) {
    return candidates.filter(
      (outer) => !candidates.some((inner) => inner !== outer && inner.call.getStart() > outer.call.getStart() && inner.call.getEnd() <= outer.call.getEnd())
    );
  }
  return candidates;
}

/**
 * Find the reloading function named `query.name` and isolate it without the
 * marker and the wrappers preceding it.
 * @throws FragmentNotFound when nothing or more than one definition matches
 */
export function isolateFunction(tree: SyntaxTree, query: FunctionQuery): FunctionFragment {
  const candidates = findFunctionCandidates(tree, query);
  const params = { file: tree.path, marker: query.marker, name: query.name ?? "<anonymous>" };

  if (candidates.length > 1) {
    throw new FragmentNotFound("ambiguous", "function", params);
  }
  const [match] = candidates;
  if (!match) {
    throw new FragmentNotFound("missing", "function", params);
  }

  return { unit: isolate(tree.path, "function", match.fragment), name: match.name };
}
