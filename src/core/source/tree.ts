// src/core/source/tree.ts
// Tree Builder: structural parse of the current source, retried until it parses.

import { Project, ts, type SourceFile as MorphSourceFile } from "ts-morph";
import { SourceReadError, StructuralParseError } from "../../outcome/errors";
import type { TraceSink } from "../../ports/types";
import { readSource, type SourceFile } from "./reader";

export type SyntaxTree = {
  path: string;
  text: string;
  file: MorphSourceFile;
};

/**
 * Anything that can take an error off the retry loop's hands:
 * report it and return once it is worth trying again.
 */
export interface RecoveryHandler {
  handle(error: unknown, file: string): void;
}

function createProject(): Project {
  return new Project({
    useInMemoryFileSystem: true,
    skipLoadingLibFiles: true,
    compilerOptions: {
      allowJs: true,
      noLib: true,
      noResolve: true,
      types: [],
    },
  });
}

/**
 * Parse source text into a syntax tree. Every tree gets its own project so that
 * nothing survives the reload cycle that produced it.
 */
export function parseSource(source: SourceFile): SyntaxTree {
  const project = createProject();
  const file = project.createSourceFile(source.path, source.text, { overwrite: true });
  const diagnostics = project.getProgram().getSyntacticDiagnostics(file);

  const first = diagnostics[0];
  if (first) {
    const reason = ts.flattenDiagnosticMessageText(first.compilerObject.messageText, "\n");
    const start = first.getStart();
    if (start === undefined) {
      throw new StructuralParseError(source.path, reason);
    }
    const { line, column } = file.getLineAndColumnAtPos(start);
    throw new StructuralParseError(source.path, reason, line, column);
  }

  return { path: source.path, text: source.text, file };
}

/**
 * Read and parse `path`, handing read and syntax errors to `recovery` and
 * retrying after each acknowledgment. Unbounded.
 */
export function parseUntilSuccessful(path: string, recovery: RecoveryHandler, trace?: TraceSink): SyntaxTree {
  for (;;) {
    try {
      return parseSource(readSource(path, trace));
    } catch (e) {
      if (!(e instanceof StructuralParseError) && !(e instanceof SourceReadError)) throw e;
      recovery.handle(e, path);
    }
  }
}
