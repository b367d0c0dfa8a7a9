// src/index.ts
// Knot - Public API
//
// Parser combinators, the Knot grammar and evaluator, and the runtime facade
// used by the CLI and by embedders.

// ═══════════════════════════════════════════════════════════════════════════════
// CORE RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { KnotRuntime, runSource, evalExpression, type KnotRuntimeOptions } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOME
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// PARSER COMBINATORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/combinator";

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTAX
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/ast";
export { formatExpression, formatStatement, formatFunction, formatProgram } from "./core/printer";
export { type Span, lineColAt, spanAt } from "./core/span";
export * from "./core/grammar";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/eval";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export { type OutputPort, consoleOutput, MemoryOutput, teeOutput } from "./ports/output";
export { type TraceSink, consoleTraceSink, MemoryTraceSink } from "./ports/trace";
