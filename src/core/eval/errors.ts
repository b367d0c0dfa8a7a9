// src/core/eval/errors.ts
// Fatal evaluation errors. Any of them aborts the whole run; the interpreted
// language has no way to catch one. Early return is not an error (see completion.ts).

import type { Diagnostic } from "../../outcome/diagnostic";
import type { Failure, FailureReason } from "../../outcome/failure";
import { failure } from "../../outcome/failure";
import type { DiagnosticCode } from "../../outcome/codes";
import { makeDiagnostic } from "../../outcome/codes";

export class EvaluationError extends Error {
  constructor(
    public readonly reason: FailureReason,
    public readonly diagnostic: Diagnostic
  ) {
    super(diagnostic.message);
    this.name = "EvaluationError";
  }

  toFailure(): Failure {
    return failure(this.reason, this.message, {
      diagnostics: [this.diagnostic],
      context: this.diagnostic.data,
    });
  }
}

function fault(reason: FailureReason, code: DiagnosticCode, params?: Record<string, string | number>): EvaluationError {
  return new EvaluationError(reason, makeDiagnostic(code, params));
}

export const undefinedVariable = (name: string) => fault("undefined-variable", "E0101", { name });

export const undefinedFunction = (name: string) => fault("undefined-function", "E0103", { name });

export const invalidCallee = (callee: string) => fault("invalid-callee", "E0104", { callee });

export const unknownOperator = (operator: string) => fault("unknown-operator", "E0203", { operator });

export const divisionByZero = () => fault("division-by-zero", "E0200");

export const arityMismatch = (name: string, expected: number, actual: number) =>
  fault("arity-mismatch", "E0102", { name, expected, actual });

export const noValue = (what: string) => fault("no-value", "E0206", { what });

export const integerOverflow = (expression: string) => fault("integer-overflow", "E0204", { expression });

export const callDepthExceeded = (depth: number) => fault("call-depth-exceeded", "E0205", { depth });
