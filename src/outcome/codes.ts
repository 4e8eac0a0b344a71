import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  R0001: { code: "R0001", severity: "error", category: "Source", template: "Source file is empty: {file}" },
  R0002: { code: "R0002", severity: "error", category: "Source", template: "Cannot read source file {file}: {reason}" },
  R0003: { code: "R0003", severity: "error", category: "Syntax", template: "{reason}" },

  R0100: {
    code: "R0100",
    severity: "error",
    category: "Locate",
    template:
      "The reloading loop is ambiguous. Use `{marker}` only once per line and make sure that the code in that line is unique within the source file.",
  },
  R0101: {
    code: "R0101",
    severity: "error",
    category: "Locate",
    template:
      "Could not locate reloading loop. Please make sure the code in the line that uses `{marker}` doesn't change between reloads.",
  },
  R0102: {
    code: "R0102",
    severity: "warning",
    category: "Locate",
    template: "Could not locate reloading function `{name}`; keeping the previous version.",
  },
  R0103: {
    code: "R0103",
    severity: "warning",
    category: "Locate",
    template: "The reloading function `{name}` is defined more than once; keeping the previous version.",
  },

  R0200: { code: "R0200", severity: "error", category: "Runtime", template: "Reloaded {kind} raised: {reason}" },

  R0300: { code: "R0300", severity: "error", category: "Config", template: "Nothing to iterate over. Please pass an iterable to {marker}." },
  R0301: {
    code: "R0301",
    severity: "error",
    category: "Config",
    template: "{marker} was used as a decorator but received {actual} instead of a function.",
  },
  R0302: {
    code: "R0302",
    severity: "error",
    category: "Config",
    template: "{marker} expects an iterable, a function or an options object, got {actual}.",
  },
  R0303: { code: "R0303", severity: "error", category: "Config", template: "Invalid reloading options: {reason}" },
  R0304: {
    code: "R0304",
    severity: "error",
    category: "Config",
    template: "Could not determine the calling source file; pass the `file` option.",
  },

  R0400: {
    code: "R0400",
    severity: "error",
    category: "Recovery",
    template: "Standard input is closed; cannot wait for a fix to {file}.",
  },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, () => String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
