// src/core/eval/interpreter.ts
// Tree-walking evaluator.
//
// Expressions evaluate to a Value; statements finish with a Completion.
// Fatal problems are thrown as EvaluationError and caught once, in run.ts.

import type { Block, CallExpression, Expression, FunctionDeclaration, Identifier, Statement } from "../ast";
import { isBinaryOperator } from "../ast";
import { formatExpression } from "../printer";
import type { OutputPort } from "../../ports/output";
import type { Completion } from "./completion";
import { NORMAL, returning } from "./completion";
import type { Scope } from "./env";
import type { FunctionTable } from "./functions";
import type { Value } from "./values";
import { requireInt } from "./values";
import { applyBinary } from "./operators";
import {
  arityMismatch,
  callDepthExceeded,
  invalidCallee,
  undefinedFunction,
  undefinedVariable,
  unknownOperator,
} from "./errors";

export const PRINT_BUILTIN = "print";

export type InterpreterOptions = {
  functions: FunctionTable;
  output: OutputPort;
  /** Maximum number of nested function activations. */
  maxCallDepth: number;
};

export class Interpreter {
  private depth = 0;
  private deepest = 0;

  constructor(private readonly options: InterpreterOptions) {}

  /** Deepest call nesting reached so far. */
  get deepestCall(): number {
    return this.deepest;
  }

  // ───────────────────────────────────────────────────────────────
  // Expressions
  // ───────────────────────────────────────────────────────────────

  evaluate(expr: Expression, scope: Scope): Value {
    switch (expr.tag) {
      case "NumberLiteral":
        return expr.value;

      case "Identifier": {
        const value = scope.lookup(expr.name);
        if (value === undefined) throw undefinedVariable(expr.name);
        return value;
      }

      case "BinaryExpression": {
        const op = expr.operator;
        if (!isBinaryOperator(op)) throw unknownOperator(op);
        const left = requireInt(this.evaluate(expr.left, scope), expr.left);
        const right = requireInt(this.evaluate(expr.right, scope), expr.right);
        return applyBinary(op, left, right);
      }

      case "CallExpression":
        return this.evaluateCall(expr, scope);
    }
  }

  private evaluateCall(expr: CallExpression, scope: Scope): Value {
    if (expr.callee.tag !== "Identifier") {
      throw invalidCallee(formatExpression(expr.callee));
    }
    const name = expr.callee.name;

    if (name === PRINT_BUILTIN) {
      if (expr.arguments.length !== 1) throw arityMismatch(PRINT_BUILTIN, 1, expr.arguments.length);
      const [arg] = expr.arguments;
      this.options.output.write(String(requireInt(this.evaluate(arg, scope), arg)));
      return undefined;
    }

    const fn = this.options.functions.get(name);
    if (!fn) throw undefinedFunction(name);
    if (fn.parameters.length !== expr.arguments.length) {
      throw arityMismatch(name, fn.parameters.length, expr.arguments.length);
    }

    const args = expr.arguments.map((arg) => requireInt(this.evaluate(arg, scope), arg));
    return this.invoke(fn, args, scope);
  }

  /**
   * Run `fn` with its parameters bound in a fresh call scope chained to the
   * caller's current scope. A `Return` completion becomes the call's value;
   * falling off the end of the body yields no value.
   */
  invoke(fn: FunctionDeclaration, args: readonly number[], callerScope: Scope): Value {
    if (this.depth >= this.options.maxCallDepth) {
      throw callDepthExceeded(this.options.maxCallDepth);
    }
    const frame = callerScope.enterCall(
      fn.parameters.map((param: Identifier, i) => [param.name, args[i]] as const)
    );
    this.depth++;
    if (this.depth > this.deepest) this.deepest = this.depth;
    try {
      const completion = this.executeBlock(fn.body, frame);
      return completion.tag === "Return" ? completion.value : undefined;
    } finally {
      this.depth--;
    }
  }

  // ───────────────────────────────────────────────────────────────
  // Statements
  // ───────────────────────────────────────────────────────────────

  executeBlock(block: Block, scope: Scope): Completion {
    const inner = scope.enterBlock();
    for (const stmt of block.statements) {
      const completion = this.execute(stmt, inner);
      if (completion.tag === "Return") return completion;
    }
    return NORMAL;
  }

  execute(stmt: Statement, scope: Scope): Completion {
    switch (stmt.tag) {
      case "VarSet":
        scope.assign(stmt.name.name, requireInt(this.evaluate(stmt.rhs, scope), stmt.rhs));
        return NORMAL;

      case "Return":
        return returning(this.evaluate(stmt.expr, scope));

      case "ExpressionStmt":
        this.evaluate(stmt.expr, scope);
        return NORMAL;

      case "Block":
        return this.executeBlock(stmt, scope);

      case "If": {
        const condition = requireInt(this.evaluate(stmt.condition, scope), stmt.condition);
        return this.executeBlock(condition !== 0 ? stmt.thenBlock : stmt.elseBlock, scope);
      }

      case "While":
        // The condition sees the enclosing scope, so writes made by the body persist across iterations.
        while (requireInt(this.evaluate(stmt.condition, scope), stmt.condition) !== 0) {
          const completion = this.executeBlock(stmt.block, scope);
          if (completion.tag === "Return") return completion;
        }
        return NORMAL;
    }
  }
}
