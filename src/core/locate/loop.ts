// src/core/locate/loop.ts
// Fragment Locator, loop case.

import { SyntaxKind, type ForOfStatement } from "ts-morph";
import { FragmentNotFound } from "../../outcome/errors";
import type { SyntaxTree } from "../source/tree";
import { loopIdentity } from "./identity";
import { formatIterationTarget, iterationNames, iterationTarget } from "./itervars";
import { isMarkerCall, isolate, type IsolatedUnit } from "./marker";

export type LoopQuery = {
  /** Identity established by a previous lookup */
  identity?: string;
  /** Line of the marker call, consulted only while no identity exists */
  line: number;
  marker: string;
};

export type LoopFragment = {
  unit: IsolatedUnit;
  /** Iteration target rendered as an assignment target */
  target: string;
  /** Names the target binds */
  names: string[];
  identity: string;
};

function headerSpansLine(loop: ForOfStatement, line: number): boolean {
  return loop.getStartLineNumber() <= line && line <= loop.getExpression().getEndLineNumber();
}

export function findLoopCandidates(tree: SyntaxTree, query: LoopQuery): ForOfStatement[] {
  return tree.file.getDescendantsOfKind(SyntaxKind.ForOfStatement).filter((loop) => {
    if (!isMarkerCall(loop.getExpression(), query.marker)) return false;
    if (query.identity !== undefined) return loopIdentity(loop) === query.identity;
    return headerSpansLine(loop, query.line);
  });
}

/**
 * Find the one reloading loop matching `query` and isolate its body.
 * @throws FragmentNotFound when no loop or more than one loop matches
 */
export function isolateLoop(tree: SyntaxTree, query: LoopQuery): LoopFragment {
  const candidates = findLoopCandidates(tree, query);

  if (candidates.length > 1) {
    throw new FragmentNotFound("ambiguous", "loop", { file: tree.path, marker: query.marker });
  }
  const [loop] = candidates;
  if (!loop) {
    throw new FragmentNotFound("missing", "loop", { file: tree.path, marker: query.marker });
  }

  const target = iterationTarget(loop);
  return {
    unit: isolate(tree.path, "loop", loop.getStatement()),
    target: formatIterationTarget(target),
    names: iterationNames(target),
    identity: loopIdentity(loop),
  };
}
