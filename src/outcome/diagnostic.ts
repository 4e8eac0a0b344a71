export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, string | number>;
}

/**
 * Render a span as `file:line:col`, omitting the parts that are unknown.
 */
export function formatSpan(span: Span): string {
  const parts: Array<string | number> = [span.file ?? "<unknown>"];
  if (span.startLine !== undefined) {
    parts.push(span.startLine);
    if (span.startCol !== undefined) parts.push(span.startCol);
  }
  return parts.join(":");
}
