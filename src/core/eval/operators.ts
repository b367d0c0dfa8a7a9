// src/core/eval/operators.ts
// Integer arithmetic and comparisons.

import type { BinaryOperator } from "../ast";
import { divisionByZero, integerOverflow } from "./errors";

function checked(result: number, left: number, op: BinaryOperator, right: number): number {
  if (!Number.isSafeInteger(result)) {
    throw integerOverflow(`${left} ${op} ${right}`);
  }
  // no -0
  return result === 0 ? 0 : result;
}

/** Quotient truncated toward zero, computed without rounding the dividend. */
function divide(left: number, right: number): number {
  if (right === 0) throw divisionByZero();
  return (left - (left % right)) / right;
}

export function applyBinary(op: BinaryOperator, left: number, right: number): number {
  switch (op) {
    case "+":
      return checked(left + right, left, op, right);
    case "-":
      return checked(left - right, left, op, right);
    case "*":
      return checked(left * right, left, op, right);
    case "/":
      return checked(divide(left, right), left, op, right);
    case "==":
      return left === right ? 1 : 0;
    case "!=":
      return left !== right ? 1 : 0;
    case "<":
      return left < right ? 1 : 0;
    case ">":
      return left > right ? 1 : 0;
    case "<=":
      return left <= right ? 1 : 0;
    case ">=":
      return left >= right ? 1 : 0;
  }
}
