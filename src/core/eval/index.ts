// src/core/eval/index.ts

export { Interpreter, PRINT_BUILTIN, type InterpreterOptions } from "./interpreter";
export { Scope, type ScopeKind } from "./env";
export { type Completion, NORMAL, returning } from "./completion";
export { type FunctionTable, buildFunctionTable } from "./functions";
export { applyBinary } from "./operators";
export { type Value, requireInt } from "./values";
export {
  EvaluationError,
  undefinedVariable,
  undefinedFunction,
  invalidCallee,
  unknownOperator,
  divisionByZero,
  arityMismatch,
  noValue,
  integerOverflow,
  callDepthExceeded,
} from "./errors";
export {
  runProgram,
  evaluateExpression,
  DEFAULT_ENTRY,
  DEFAULT_MAX_CALL_DEPTH,
  type RunOptions,
  type RunResult,
} from "./run";
