// src/core/controller/loop.ts
// Reload Loop Controller: drives the iterable, re-running the loop body from source.

import { ExecutionError, FragmentNotFound, StructuralParseError } from "../../outcome/errors";
import type { TraceSink } from "../../ports/types";
import type { CompiledUnit } from "../compile/unit";
import type { ExecutionEnvironment } from "../eval/env";
import { isolateLoop } from "../locate/loop";
import type { RecoveryPrompt } from "../recovery/prompt";
import { parseUntilSuccessful } from "../source/tree";

export type LoopControllerOptions = {
  file: string;
  /** Line of the marker call; used until the loop's identity is known */
  line: number;
  every: number;
  marker: string;
  env: ExecutionEnvironment;
  prompt: RecoveryPrompt;
  trace: TraceSink;
};

type LoadedLoop = {
  body: CompiledUnit;
  binder: CompiledUnit;
};

/**
 * Iterating the controller runs the whole loop and yields nothing, so the
 * literal loop body in the caller never executes.
 */
export class ReloadLoopController<T> implements Iterable<T> {
  private identityKey: string | undefined;

  constructor(
    private readonly source: Iterable<T>,
    private readonly options: LoopControllerOptions
  ) {}

  get identity(): string | undefined {
    return this.identityKey;
  }

  [Symbol.iterator](): Iterator<T> {
    this.run();
    const nothing: T[] = [];
    return nothing[Symbol.iterator]();
  }

  run(): void {
    const { env, every, file, prompt, trace } = this.options;
    let loaded: LoadedLoop | undefined;
    let index = 0;

    for (const value of this.source) {
      if (loaded === undefined || index % every === 0) {
        loaded = this.load();
      }
      try {
        env.bind(loaded.binder, value);
        env.run(loaded.body);
      } catch (e) {
        trace.emit({ tag: "E_ExecutionError", kind: "loop", file, attempt: 1 });
        prompt.report(new ExecutionError("loop", e), file);
      }
      index++;
    }
  }

  /**
   * One reload cycle: parse, isolate, compile. Retries through the prompt
   * until the loop can be found again.
   */
  load(): LoadedLoop {
    const { env, file, line, marker, prompt, trace } = this.options;

    for (;;) {
      const started = performance.now();
      const tree = parseUntilSuccessful(file, prompt, trace);
      try {
        const fragment = isolateLoop(tree, { identity: this.identityKey, line, marker });
        const loaded: LoadedLoop = {
          body: env.compile(fragment.unit),
          binder: env.prepareBinding(fragment.unit, fragment.target, fragment.names),
        };
        this.identityKey = fragment.identity;
        prompt.settle();
        trace.emit({
          tag: "E_Reload",
          kind: "loop",
          file,
          identity: fragment.identity,
          durationMs: performance.now() - started,
        });
        return loaded;
      } catch (e) {
        if (!(e instanceof FragmentNotFound) && !(e instanceof StructuralParseError)) throw e;
        prompt.handle(e, file);
      }
    }
  }
}
