// src/core/callsite.ts
// Where the entry point was called from, read off the V8 stack.

import { fileURLToPath } from "url";

export type CallSiteLocation = {
  file: string;
  line: number;
  column: number;
};

const FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

export function parseStackFrame(frame: string): CallSiteLocation | undefined {
  const match = FRAME.exec(frame);
  if (!match) return undefined;
  const [, location, line, column] = match;
  if (location === undefined || line === undefined || column === undefined) return undefined;

  const file = location.startsWith("file://") ? fileURLToPath(location) : location;
  return { file, line: Number(line), column: Number(column) };
}

/**
 * Location of the call `depth` frames above the function calling this one.
 */
export function callerLocation(depth = 1): CallSiteLocation | undefined {
  const frames = (new Error().stack ?? "").split("\n").slice(1);
  // frames[0] is this function, frames[1] the function asking
  const frame = frames[depth + 1];
  return frame === undefined ? undefined : parseStackFrame(frame);
}
