// src/reloading.ts
// Entry point: reload a loop body or a function from source while the program runs.
//
// Usage:
//   import { reloading } from "live-reloading";
//
//   const state = { total: 0 };
//   for (const i of reloading([1, 2, 3, 4, 5], { scope: { state } })) {
//     state.total += i; // edit me while the loop runs
//   }
//
//   const step = reloading(function step(x: number) {
//     return x * 2; // edit me between calls
//   });

import * as path from "path";
import { loadConfig, validateConfig, type ReloadingConfig } from "./core/config";
import { callerLocation, type CallSiteLocation } from "./core/callsite";
import { ReloadFunctionController } from "./core/controller/function";
import { ReloadLoopController } from "./core/controller/loop";
import { ExecutionEnvironment, isCallable, type Callable, type Scope } from "./core/eval/env";
import { RecoveryPrompt } from "./core/recovery/prompt";
import { ReloadConfigError } from "./outcome/errors";
import { createPortSet, type PortSet } from "./ports";

export type ReloadingOptions = {
  /** Reload every n-th iteration/invocation (default 1) */
  every?: number;
  /** Caller bindings the fragment reads and writes */
  scope?: Scope;
  /** Bindings looked up after `scope`, before the global object */
  globals?: Scope;
  /** Source file of the fragment; read from the call stack when omitted */
  file?: string;
  /** Line of the `reloading(...)` call; read from the call stack when omitted */
  line?: number;
  /** Name of a reloading function, for anonymous functions and arrows */
  name?: string;
  marker?: string;
  /** Attempts of one function call before its error reaches the caller (default 3) */
  maxAttempts?: number;
  ports?: Partial<PortSet>;
  /** Base configuration; loaded from environment and config file when omitted */
  config?: ReloadingConfig;
};

export type ForeverOptions = ReloadingOptions & { forever: true };

export type ReloadingDecorator = (<A extends unknown[], R>(fn: (...args: A) => R) => (...args: A) => R) &
  Iterable<never>;

type ResolvedOptions = {
  config: ReloadingConfig;
  file: string;
  line: number | undefined;
  env: ExecutionEnvironment;
  ports: PortSet;
  prompt: RecoveryPrompt;
};

let defaultConfig: ReloadingConfig | undefined;

function baseConfig(): ReloadingConfig {
  defaultConfig ??= loadConfig();
  return defaultConfig;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") return true;
  return (
    typeof value === "object" && value !== null && Symbol.iterator in value && typeof value[Symbol.iterator] === "function"
  );
}

function isOptions(value: unknown): value is ReloadingOptions & { forever?: boolean } {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !isIterable(value);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : `a ${typeof value}`;
}

function* count(): Generator<number> {
  for (let i = 0; ; i++) yield i;
}

function resolve(options: ReloadingOptions, location: CallSiteLocation | undefined): ResolvedOptions {
  const base = options.config ?? baseConfig();
  const config: ReloadingConfig = {
    every: options.every ?? base.every,
    maxAttempts: options.maxAttempts ?? base.maxAttempts,
    marker: options.marker ?? base.marker,
    trace: base.trace,
  };

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ReloadConfigError("R0303", { reason: validation.errors.join("; ") });
  }

  const file = options.file ?? location?.file;
  if (file === undefined) {
    throw new ReloadConfigError("R0304");
  }

  const ports = createPortSet(options.ports, { trace: config.trace });
  const prompt = new RecoveryPrompt(ports);
  for (const warning of validation.warnings) {
    prompt.notice(`Warning: ${warning}`);
  }

  // The stack line only points into `file` when the caller is that file.
  const resolved = path.resolve(file);
  const callerLine = location && path.resolve(location.file) === resolved ? location.line : undefined;

  return {
    config,
    file: resolved,
    line: options.line ?? callerLine,
    env: new ExecutionEnvironment(options.scope, options.globals),
    ports,
    prompt,
  };
}

function createLoop<T>(
  source: Iterable<T>,
  options: ReloadingOptions,
  location: CallSiteLocation | undefined
): ReloadLoopController<T> {
  const { config, file, line, env, ports, prompt } = resolve(options, location);
  if (line === undefined) {
    throw new ReloadConfigError("R0303", { reason: "`line` is required together with `file` for loops" });
  }
  return new ReloadLoopController(source, {
    file,
    line,
    every: config.every,
    marker: config.marker,
    env,
    prompt,
    trace: ports.trace,
  });
}

function wrapFunction(fn: Callable, options: ReloadingOptions, location: CallSiteLocation | undefined): Callable {
  const { config, file, line, env, ports, prompt } = resolve(options, location);
  const controller = new ReloadFunctionController(fn, {
    file,
    line,
    name: options.name,
    every: config.every,
    maxAttempts: config.maxAttempts,
    marker: config.marker,
    env,
    prompt,
    trace: ports.trace,
  });

  const wrapped = function (this: unknown, ...args: unknown[]): unknown {
    return controller.invoke(this, args);
  };
  Object.defineProperty(wrapped, "name", { value: fn.name });
  Object.defineProperty(wrapped, "length", { value: fn.length });
  return wrapped;
}

function createDecorator(options: ReloadingOptions): ReloadingDecorator {
  const marker = options.marker ?? options.config?.marker ?? baseConfig().marker;

  function decorate<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R;
  function decorate(fn: unknown): unknown {
    const location = callerLocation();
    if (!isCallable(fn)) {
      throw new ReloadConfigError("R0301", { marker, actual: describeType(fn) });
    }
    return wrapFunction(fn, options, location);
  }

  return Object.assign(decorate, {
    [Symbol.iterator](): never {
      throw new ReloadConfigError("R0300", { marker });
    },
  });
}

/**
 * Reload a function from source before each invocation (or every n-th).
 */
export function reloading<A extends unknown[], R>(fn: (...args: A) => R, options?: ReloadingOptions): (...args: A) => R;
/**
 * Reload the body of `for (... of reloading(iterable))` from source before each
 * iteration (or every n-th), keeping the state held in `scope`.
 */
export function reloading<T>(iterable: Iterable<T>, options?: ReloadingOptions): Iterable<T>;
/**
 * Endless reloading loop over 0, 1, 2, ...
 */
export function reloading(options: ForeverOptions): Iterable<number>;
/**
 * Options only: a decorator, `reloading({ every: 2 })(function step() {})`.
 */
export function reloading(options?: ReloadingOptions): ReloadingDecorator;
export function reloading(first?: unknown, options: ReloadingOptions = {}): unknown {
  const location = callerLocation();

  if (isCallable(first)) {
    return wrapFunction(first, options, location);
  }
  if (isIterable(first)) {
    return createLoop(first, options, location);
  }
  if (first === undefined || isOptions(first)) {
    const own = first ?? {};
    if (own.forever) {
      return createLoop(count(), own, location);
    }
    return createDecorator(own);
  }

  const marker = options.marker ?? options.config?.marker ?? baseConfig().marker;
  throw new ReloadConfigError("R0302", { marker, actual: describeType(first) });
}
