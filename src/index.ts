// src/index.ts
// live-reloading - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

export {
  reloading,
  type ForeverOptions,
  type ReloadingDecorator,
  type ReloadingOptions,
} from "./reloading";

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export { ReloadLoopController, type LoopControllerOptions } from "./core/controller/loop";
export { ReloadFunctionController, type FunctionControllerOptions } from "./core/controller/function";
export { ExecutionEnvironment, type Scope } from "./core/eval/env";
export { compileUnit, TRANSIENT_UNIT, type CompiledUnit } from "./core/compile/unit";
export { eraseTypes } from "./core/compile/erase";
export { isolateLoop, type LoopFragment, type LoopQuery } from "./core/locate/loop";
export { isolateFunction, type FunctionFragment, type FunctionQuery } from "./core/locate/function";
export { loopIdentity, structuralDump } from "./core/locate/identity";
export { formatIterationTarget, iterationNames, iterationTarget } from "./core/locate/itervars";
export type { IsolatedUnit } from "./core/locate/marker";
export { readSource, type SourceFile } from "./core/source/reader";
export { parseSource, parseUntilSuccessful, type SyntaxTree, type RecoveryHandler } from "./core/source/tree";
export { RecoveryPrompt, formatError, type RecoveryState, type RecoveryPorts } from "./core/recovery/prompt";
export { callerLocation, parseStackFrame, type CallSiteLocation } from "./core/callsite";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ReloadingError,
  TransientReadError,
  SourceReadError,
  StructuralParseError,
  FragmentNotFound,
  ExecutionError,
  ReloadConfigError,
  RecoveryUnavailableError,
  type FragmentKind,
  type NotFoundReason,
} from "./outcome/errors";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export type { Diagnostic, DiagnosticSeverity, Span } from "./outcome/diagnostic";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";
