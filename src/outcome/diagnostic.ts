import type { Span } from "../core/span";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

/** One-line rendering used by the CLI: `E0101 (3:7): Undefined variable: x`. */
export function formatDiagnostic(diag: Diagnostic): string {
  const where = diag.span?.startLine !== undefined
    ? ` (${diag.span.startLine}:${diag.span.startCol ?? 0})`
    : "";
  return `${diag.code}${where}: ${diag.message}`;
}
