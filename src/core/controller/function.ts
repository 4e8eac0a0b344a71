// src/core/controller/function.ts
// Reload Function Controller: re-isolates a function before its invocations.

import { describeThrown, ExecutionError, FragmentNotFound } from "../../outcome/errors";
import type { TraceSink } from "../../ports/types";
import type { Callable, ExecutionEnvironment } from "../eval/env";
import { isolateFunction } from "../locate/function";
import type { RecoveryPrompt } from "../recovery/prompt";
import { parseUntilSuccessful } from "../source/tree";

export type FunctionControllerOptions = {
  file: string;
  /** Line of the marker call; the first reload finds the function there and takes its name from the source */
  line?: number;
  name?: string;
  every: number;
  maxAttempts: number;
  marker: string;
  env: ExecutionEnvironment;
  prompt: RecoveryPrompt;
  trace: TraceSink;
};

export class ReloadFunctionController {
  private calls = 0;
  private active: Callable;
  private name: string | undefined;

  constructor(
    original: Callable,
    private readonly options: FunctionControllerOptions
  ) {
    this.active = original;
    // Bundlers rename function expressions (`step` -> `step2`), so the runtime
    // name is trusted only when there is no line to look at.
    this.name = options.name || (options.line === undefined ? original.name || undefined : undefined);
  }

  get invocations(): number {
    return this.calls;
  }

  invoke(thisArg: unknown, args: unknown[]): unknown {
    const { every, file, maxAttempts, prompt, trace } = this.options;

    if (this.calls % every === 0) {
      this.active = this.reload() ?? this.active;
    }
    this.calls++;

    let failures = 0;
    for (;;) {
      try {
        return Reflect.apply(this.active, thisArg, args);
      } catch (e) {
        failures++;
        trace.emit({ tag: "E_ExecutionError", kind: "function", file, attempt: failures });
        prompt.report(new ExecutionError("function", e), file);
        this.active = this.reload() ?? this.active;
        if (failures >= maxAttempts) throw e;
      }
    }
  }

  /**
   * Re-isolate and recompile. `undefined` means keep the current version.
   */
  reload(): Callable | undefined {
    const { env, file, line, marker, prompt, trace } = this.options;
    const started = performance.now();
    const tree = parseUntilSuccessful(file, prompt, trace);

    let defined: Callable | undefined;
    try {
      const fragment = isolateFunction(tree, { name: this.name, line, marker });
      this.name = fragment.name ?? this.name;
      defined = env.defineFunction(fragment.unit, fragment.name);
    } catch (e) {
      const code = e instanceof FragmentNotFound ? e.code : "R0200";
      prompt.notice(e instanceof FragmentNotFound ? e.message : `${file} - Could not redefine ${this.label()}: ${describeThrown(e)}`);
      trace.emit({ tag: "E_KeepPrevious", file, name: this.label(), code });
      return undefined;
    }

    if (defined === undefined) {
      prompt.notice(`${file} - ${this.label()} no longer evaluates to a function; keeping the previous version.`);
      trace.emit({ tag: "E_KeepPrevious", file, name: this.label(), code: "R0200" });
      return undefined;
    }

    prompt.settle();
    trace.emit({ tag: "E_Reload", kind: "function", file, durationMs: performance.now() - started });
    return defined;
  }

  private label(): string {
    return this.name ?? "<anonymous>";
  }
}
