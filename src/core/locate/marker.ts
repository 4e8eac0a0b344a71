// src/core/locate/marker.ts
// Recognizing the reload marker and isolated fragment units.

import { Node } from "ts-morph";
import type { FragmentKind } from "../../outcome/errors";

/**
 * One fragment's source, cut out of the real file together with its position.
 */
export type IsolatedUnit = {
  path: string;
  kind: FragmentKind;
  /** Fragment source text, exactly as it appears in the file */
  code: string;
  /** 1-based line of the first character of `code` */
  line: number;
  typescript: boolean;
};

const TYPESCRIPT_FILE = /\.(c|m)?tsx?$/i;

export function isTypeScriptPath(path: string): boolean {
  return TYPESCRIPT_FILE.test(path);
}

/**
 * `reloading(...)` or `anything.reloading(...)`.
 */
export function isMarkerCall(node: Node, marker: string): boolean {
  if (!Node.isCallExpression(node)) return false;
  const callee = node.getExpression();
  if (Node.isIdentifier(callee)) return callee.getText() === marker;
  if (Node.isPropertyAccessExpression(callee)) return callee.getName() === marker;
  return false;
}

export function isolate(path: string, kind: FragmentKind, node: Node): IsolatedUnit {
  return {
    path,
    kind,
    code: node.getText(),
    line: node.getStartLineNumber(),
    typescript: isTypeScriptPath(path),
  };
}
