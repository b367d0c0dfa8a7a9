// src/outcome/index.ts
// Outcome ADT exports

export { type Outcome, type Done, type Fail, type Ok, type Err, type OutcomeMeta, isDone, isFail } from "./outcome";
export { type Failure, type FailureReason, failure, wrapFailure, isFailureReason, allDiagnostics } from "./failure";
export { type Diagnostic, type DiagnosticSeverity, errorDiag, formatDiagnostic } from "./diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode, makeDiagnostic } from "./codes";
export { done, ok, fail, err } from "./constructors";
export { match, mapOutcome, flatMapOutcome, mapFailure, unwrap, unwrapOr } from "./matchers";
