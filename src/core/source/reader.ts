// src/core/source/reader.ts
// Source Reader: current text of a file, tolerant of saves in progress.

import * as fs from "fs";
import { SourceReadError, TransientReadError } from "../../outcome/errors";
import type { TraceSink } from "../../ports/types";

export type SourceFile = {
  path: string;
  text: string;
};

/**
 * Read a file once. An empty result means an editor is mid-save.
 */
export function readOnce(path: string): SourceFile {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (e) {
    throw new SourceReadError(path, e);
  }
  if (text === "") {
    throw new TransientReadError(path);
  }
  return { path, text: text + "\n" };
}

/**
 * Read a file, busy-polling while it comes back empty. Never cached.
 */
export function readSource(path: string, trace?: TraceSink): SourceFile {
  for (;;) {
    try {
      return readOnce(path);
    } catch (e) {
      if (!(e instanceof TransientReadError)) throw e;
      trace?.emit({ tag: "E_TransientRead", file: path });
    }
  }
}
