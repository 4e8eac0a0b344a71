import { makeDiagnostic, type DiagnosticCode } from "./codes";
import { formatSpan, type Diagnostic } from "./diagnostic";

// ─────────────────────────────────────────────────────────────────
// Error taxonomy
// ─────────────────────────────────────────────────────────────────

export class ReloadingError extends Error {
  readonly code: string;

  constructor(public readonly diagnostic: Diagnostic, options?: { cause?: unknown }) {
    super(diagnostic.span ? `${formatSpan(diagnostic.span)} - ${diagnostic.message}` : diagnostic.message, options);
    this.name = "ReloadingError";
    this.code = diagnostic.code;
  }
}

/** The file was read while being saved and came back empty. Retried silently. */
export class TransientReadError extends ReloadingError {
  constructor(public readonly file: string) {
    super(makeDiagnostic("R0001", { file }));
    this.name = "TransientReadError";
  }
}

export class SourceReadError extends ReloadingError {
  constructor(public readonly file: string, cause: unknown) {
    super(makeDiagnostic("R0002", { file, reason: describeThrown(cause) }), { cause });
    this.name = "SourceReadError";
  }
}

export class StructuralParseError extends ReloadingError {
  constructor(public readonly file: string, reason: string, line?: number, column?: number) {
    super(makeDiagnostic("R0003", { reason }, { file, startLine: line, startCol: column }));
    this.name = "StructuralParseError";
  }
}

export type NotFoundReason = "ambiguous" | "missing";
export type FragmentKind = "loop" | "function";

export class FragmentNotFound extends ReloadingError {
  constructor(
    public readonly reason: NotFoundReason,
    public readonly fragment: FragmentKind,
    params: { file: string; marker: string; name?: string }
  ) {
    super(
      makeDiagnostic(
        notFoundCode(reason, fragment),
        { marker: params.marker, name: params.name ?? "" },
        { file: params.file }
      )
    );
    this.name = "FragmentNotFound";
  }
}

function notFoundCode(reason: NotFoundReason, fragment: FragmentKind): DiagnosticCode {
  if (fragment === "loop") return reason === "ambiguous" ? "R0100" : "R0101";
  return reason === "ambiguous" ? "R0103" : "R0102";
}

export class ExecutionError extends ReloadingError {
  constructor(public readonly fragment: FragmentKind, cause: unknown) {
    super(makeDiagnostic("R0200", { kind: fragment, reason: describeThrown(cause) }), { cause });
    this.name = "ExecutionError";
  }
}

export class ReloadConfigError extends ReloadingError {
  constructor(code: DiagnosticCode, params?: Record<string, string | number>) {
    super(makeDiagnostic(code, params));
    this.name = "ReloadConfigError";
  }
}

export class RecoveryUnavailableError extends ReloadingError {
  constructor(public readonly file: string) {
    super(makeDiagnostic("R0400", { file }));
    this.name = "RecoveryUnavailableError";
  }
}

export function describeThrown(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}
