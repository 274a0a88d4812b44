import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "No name specified for definition" },

  E0101: { code: "E0101", severity: "error", category: "Resolve", template: "Undefined word: {word}" },

  E0200: { code: "E0200", severity: "error", category: "Runtime", template: "Division by zero in {word}" },
  E0201: { code: "E0201", severity: "error", category: "Runtime", template: "Stack underflow in {word}" },
  E0202: { code: "E0202", severity: "error", category: "Runtime", template: "Invalid code point: {value}" },

  E0300: { code: "E0300", severity: "error", category: "Limit", template: "Limit exceeded: {limit} ({max})" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}
