// src/core/compile/unit.ts
// Unit Compiler: isolated fragment -> no-arg function bound to a set of scopes.

import * as vm from "vm";
import { ts } from "ts-morph";
import { StructuralParseError } from "../../outcome/errors";
import type { IsolatedUnit } from "../locate/marker";
import { eraseTypes } from "./erase";

/** File name compiled units run under; rewritten to the real path when reported. */
export const TRANSIENT_UNIT = "<reloaded>";

export type CompiledUnit = () => unknown;

export type CompileOptions = {
  /** Turn the fragment into the statement(s) to compile; must not add lines in front */
  wrap?: (code: string) => string;
};

const TRANSPILE_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleDetection: ts.ModuleDetectionKind.Legacy,
  jsx: ts.JsxEmit.React,
  sourceMap: false,
};

/**
 * Erase TypeScript syntax from a fragment. Plain JavaScript passes through.
 * Lines stay where they are unless the fragment needs a full transpile
 * (enums, namespaces, JSX, ...); errors in those may be reported off by a few lines.
 */
export function toJavaScript(code: string, typescript: boolean): string {
  if (!typescript) return code;
  return eraseTypes(code) ?? ts.transpileModule(code, { compilerOptions: TRANSPILE_OPTIONS }).outputText;
}

/**
 * Compile `unit` in strict mode. Free names resolve through `scopes`, last one
 * first, then the global object; assignments to names a scope holds land in it.
 */
export function compileUnit(unit: IsolatedUnit, scopes: object[], options: CompileOptions = {}): CompiledUnit {
  const source = options.wrap ? options.wrap(unit.code) : unit.code;
  const body = `"use strict"; ${toJavaScript(source, unit.typescript)}`;

  try {
    const fn = vm.compileFunction(body, [], {
      filename: TRANSIENT_UNIT,
      lineOffset: unit.line - 1,
      contextExtensions: scopes,
    });
    return () => Reflect.apply(fn, undefined, []);
  } catch (e) {
    if (e instanceof SyntaxError) {
      throw new StructuralParseError(unit.path, e.message, unit.line);
    }
    throw e;
  }
}
