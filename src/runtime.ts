// src/runtime.ts
// KnotRuntime - Clean API for embedding the toolchain
//
// Usage:
//   import { KnotRuntime } from "knot-lang";
//
//   const knot = new KnotRuntime();
//   const result = knot.runSource("fn main() { return 1 + 2; }");
//   if (result.tag === "Done") console.log(result.value.value); // 3

import type { Expression, Program } from "./core/ast";
import type { Outcome } from "./outcome/outcome";
import type { OutputPort } from "./ports/output";
import type { TraceSink } from "./ports/trace";
import type { KnotConfig, PartialKnotConfig } from "./core/config/config";
import type { RunResult } from "./core/eval/run";

import { mergeConfigs } from "./core/config/config";
import { parseExpression, parseProgram } from "./core/grammar/program";
import { evaluateExpression, runProgram } from "./core/eval/run";
import { disableTrace, enableTrace } from "./core/combinator/trace";
import { flatMapOutcome } from "./outcome/matchers";

/**
 * Options for KnotRuntime
 */
export type KnotRuntimeOptions = {
  /** Overrides applied on top of the defaults */
  config?: PartialKnotConfig;

  /** Receives printed lines as they are written (they are also collected in RunResult.output) */
  output?: OutputPort;

  /** Destination of the parser trace when `config.parser.trace` is on (default: console) */
  trace?: TraceSink;

  /** File name recorded in parse diagnostics */
  file?: string;
};

export class KnotRuntime {
  readonly config: KnotConfig;
  private readonly output?: OutputPort;
  private readonly traceSink?: TraceSink;
  private readonly file?: string;

  constructor(options: KnotRuntimeOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    this.output = options.output;
    this.traceSink = options.trace;
    this.file = options.file;
  }

  parse(source: string): Outcome<Program> {
    return this.traced(() => parseProgram(source, { file: this.file }));
  }

  parseExpression(source: string): Outcome<Expression> {
    return this.traced(() => parseExpression(source, { file: this.file }));
  }

  run(program: Program): Outcome<RunResult> {
    return runProgram(program, {
      output: this.output,
      entry: this.config.runtime.entry,
      maxCallDepth: this.config.runtime.maxCallDepth,
    });
  }

  /** Parse and run a whole program. */
  runSource(source: string): Outcome<RunResult> {
    return flatMapOutcome(this.parse(source), (program) => this.run(program));
  }

  /**
   * Evaluate one expression, optionally against the functions declared in `prelude`.
   */
  evalExpression(source: string, prelude?: string): Outcome<RunResult> {
    const functions = prelude === undefined ? undefined : this.parse(prelude);
    if (functions?.tag === "Fail") return functions;
    return flatMapOutcome(this.parseExpression(source), (expr) =>
      evaluateExpression(expr, {
        output: this.output,
        maxCallDepth: this.config.runtime.maxCallDepth,
        functions: functions?.value,
      })
    );
  }

  private traced<A>(body: () => A): A {
    if (!this.config.parser.trace) return body();
    enableTrace(this.traceSink);
    try {
      return body();
    } finally {
      disableTrace();
    }
  }
}

/**
 * Convenience: parse and run `source` with a one-off runtime.
 */
export function runSource(source: string, options: KnotRuntimeOptions = {}): Outcome<RunResult> {
  return new KnotRuntime(options).runSource(source);
}

/**
 * Convenience: evaluate a single expression with a one-off runtime.
 */
export function evalExpression(source: string, options: KnotRuntimeOptions = {}): Outcome<RunResult> {
  return new KnotRuntime(options).evalExpression(source);
}
