// src/core/eval/values.ts
// Runtime values. Every value is an integer; `undefined` is the absence of a
// value (the result of `print`, or of a function that finishes without `return`).

import type { Expression } from "../ast";
import { formatExpression } from "../printer";
import { noValue } from "./errors";

export type Value = number | undefined;

/**
 * Narrow a result to an integer. `source` names the expression that produced it.
 */
export function requireInt(value: Value, source: Expression): number {
  if (value === undefined) {
    throw noValue(formatExpression(source));
  }
  return value;
}
