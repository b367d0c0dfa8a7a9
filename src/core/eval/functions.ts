// src/core/eval/functions.ts

import type { FunctionDeclaration, Program } from "../ast";

export type FunctionTable = ReadonlyMap<string, FunctionDeclaration>;

/**
 * Register every declaration by name. A later declaration replaces an earlier one.
 */
export function buildFunctionTable(prog: Program): FunctionTable {
  const table = new Map<string, FunctionDeclaration>();
  for (const fn of prog.functions) {
    table.set(fn.name.name, fn);
  }
  return table;
}
