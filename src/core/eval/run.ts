// src/core/eval/run.ts
// Run boundary: registers functions, calls the entry function, and turns a
// fatal EvaluationError into a failed Outcome.

import type { Expression, Program } from "../ast";
import type { Outcome } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";
import type { OutputPort } from "../../ports/output";
import { MemoryOutput, teeOutput } from "../../ports/output";
import { call, identifier, program } from "../ast";
import { Scope } from "./env";
import { EvaluationError, callDepthExceeded } from "./errors";
import { buildFunctionTable } from "./functions";
import { Interpreter } from "./interpreter";
import type { Value } from "./values";

export const DEFAULT_ENTRY = "main";
export const DEFAULT_MAX_CALL_DEPTH = 400;

export type RunOptions = {
  /** Also receives every printed line as it is written. */
  output?: OutputPort;
  /** Zero-argument function to start from (default: main). */
  entry?: string;
  maxCallDepth?: number;
};

export type RunResult = {
  /** Return value of the entry function, if it returned one. */
  value: Value;
  /** Lines written by `print`, in order. */
  output: string[];
};

/**
 * Running out of host stack before `maxCallDepth` is reached is reported as
 * call-depth-exceeded, at the depth the interpreter got to.
 */
function runCaught<A>(interpreter: Interpreter, body: () => A): Outcome<A> {
  const start = Date.now();
  try {
    const value = body();
    return done(value, { durationMs: Date.now() - start });
  } catch (error) {
    if (error instanceof EvaluationError) {
      return fail(error.toFailure(), { durationMs: Date.now() - start });
    }
    if (error instanceof RangeError) {
      return fail(callDepthExceeded(interpreter.deepestCall).toFailure(), { durationMs: Date.now() - start });
    }
    throw error;
  }
}

export function runProgram(prog: Program, options: RunOptions = {}): Outcome<RunResult> {
  const collected = new MemoryOutput();
  const interpreter = new Interpreter({
    functions: buildFunctionTable(prog),
    output: options.output ? teeOutput(collected, options.output) : collected,
    maxCallDepth: options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
  });
  const entry = call(identifier(options.entry ?? DEFAULT_ENTRY), []);
  return runCaught(interpreter, () => ({
    value: interpreter.evaluate(entry, Scope.global()),
    output: collected.lines,
  }));
}

/**
 * Evaluate a single expression with no variables in scope. `functions`
 * optionally supplies declarations the expression may call.
 */
export function evaluateExpression(
  expr: Expression,
  options: RunOptions & { functions?: Program } = {}
): Outcome<RunResult> {
  const collected = new MemoryOutput();
  const interpreter = new Interpreter({
    functions: buildFunctionTable(options.functions ?? program([])),
    output: options.output ? teeOutput(collected, options.output) : collected,
    maxCallDepth: options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
  });
  return runCaught(interpreter, () => ({
    value: interpreter.evaluate(expr, Scope.global()),
    output: collected.lines,
  }));
}
