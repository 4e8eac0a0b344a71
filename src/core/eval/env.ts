// src/core/eval/env.ts
// Context Binder: the caller's live bindings, shared by every reload cycle.

import { compileUnit, type CompiledUnit } from "../compile/unit";
import type { IsolatedUnit } from "../locate/marker";

export type Scope = Record<string, unknown>;

/** Any function value; the wrapped function's real signature lives in the entry point's overloads. */
export type Callable = (...args: never[]) => unknown;

export function isCallable(value: unknown): value is Callable {
  return typeof value === "function";
}

const ANONYMOUS = "__reloading_anonymous";

let slotCounter = 0;

/**
 * A name no caller binding uses, taken from a namespace only this module writes.
 */
export function freshSlotName(...scopes: Scope[]): string {
  for (;;) {
    const candidate = `__reloading_slot_${++slotCounter}`;
    if (!scopes.some((scope) => candidate in scope)) return candidate;
  }
}

/**
 * Locals and globals captured once when reloading is attached. Never replaced,
 * so state written by one version of a fragment is seen by the next.
 */
export class ExecutionEnvironment {
  /** Hidden binding carrying the current iteration value into the binder */
  readonly slot: string;
  private readonly slots: Scope = {};

  constructor(
    readonly locals: Scope = {},
    readonly globals: Scope = {}
  ) {
    this.slot = freshSlotName(locals, globals);
  }

  /** Scope chain for loop fragments, innermost last */
  get scopes(): object[] {
    return [this.globals, this.locals];
  }

  compile(unit: IsolatedUnit): CompiledUnit {
    return compileUnit(unit, this.scopes);
  }

  /**
   * Compile `(<target> = <slot>)` for the loop header. Names the target binds
   * are created in locals so the assignment lands there.
   */
  prepareBinding(unit: IsolatedUnit, target: string, names: string[]): CompiledUnit {
    for (const name of names) {
      if (!Object.prototype.hasOwnProperty.call(this.locals, name)) {
        this.locals[name] = undefined;
      }
    }
    const header: IsolatedUnit = { ...unit, code: `(${target} = ${this.slot});`, typescript: false };
    return compileUnit(header, [...this.scopes, this.slots]);
  }

  bind(binder: CompiledUnit, value: unknown): void {
    this.slots[this.slot] = value;
    try {
      binder();
    } finally {
      delete this.slots[this.slot];
    }
  }

  run(unit: CompiledUnit): void {
    unit();
  }

  /**
   * Evaluate a function fragment as `<name> = (<fragment>)` against an overlay
   * holding only `name`, over the live locals and globals. The overlay keeps the
   * caller's own binding of `name` (the reloading wrapper) from being replaced
   * and is dropped once the new callable has been taken out of it.
   */
  defineFunction(unit: IsolatedUnit, name: string | undefined): Callable | undefined {
    const binding = name ?? ANONYMOUS;
    const overlay: Scope = { [binding]: undefined };
    const define = compileUnit(unit, [...this.scopes, overlay], {
      wrap: (code) => `${binding} = (${code}\n);`,
    });
    define();
    const defined = overlay[binding];
    return isCallable(defined) ? defined : undefined;
  }
}
