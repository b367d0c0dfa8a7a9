import type { Span } from "../core/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "{detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Expected end of input, found {found}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Duplicate parameter '{name}' in function '{fn}'" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Integer literal out of range: {literal}" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "Nesting too deep" },
  E0006: { code: "E0006", severity: "error", category: "Syntax", template: "Keyword '{keyword}' cannot be assigned" },

  E0101: { code: "E0101", severity: "error", category: "Name", template: "Undefined variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Call", template: "Wrong number of arguments to {name}: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Name", template: "Undefined function: {name}" },
  E0104: { code: "E0104", severity: "error", category: "Call", template: "Invalid callee: {callee}" },

  E0200: { code: "E0200", severity: "error", category: "Runtime", template: "Division by zero" },
  E0203: { code: "E0203", severity: "error", category: "Runtime", template: "Unknown operator: {operator}" },
  E0204: { code: "E0204", severity: "error", category: "Runtime", template: "Integer overflow: {expression}" },
  E0205: { code: "E0205", severity: "error", category: "Runtime", template: "Call depth exceeded: {depth}" },
  E0206: { code: "E0206", severity: "error", category: "Runtime", template: "Expected an integer, but {what} produced no value" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_CODES, code);
}

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Readonly<Record<string, string | number>>,
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
