// src/core/eval/completion.ts
// How a statement finished. `Return` travels up through every enclosing block
// until the call boundary turns it into the call's result.

import type { Value } from "./values";

export type Completion =
  | { tag: "Normal" }
  | { tag: "Return"; value: Value };

export const NORMAL: Completion = { tag: "Normal" };

export function returning(value: Value): Completion {
  return { tag: "Return", value };
}
