// src/core/combinator/trace.ts
// Process-wide parser trace. Diagnostic only: it never changes a parse result.

import type { TraceSink } from "../../ports/trace";
import { consoleTraceSink } from "../../ports/trace";
import type { Input } from "./input";
import { preview } from "./input";

type TraceState = {
  enabled: boolean;
  depth: number;
  sink: TraceSink;
};

const state: TraceState = {
  enabled: false,
  depth: 0,
  sink: consoleTraceSink,
};

export function enableTrace(sink: TraceSink = consoleTraceSink): void {
  state.enabled = true;
  state.depth = 0;
  state.sink = sink;
}

export function disableTrace(): void {
  state.enabled = false;
  state.depth = 0;
  state.sink = consoleTraceSink;
}

export function isTraceEnabled(): boolean {
  return state.enabled;
}

export function traceEnter(name: string, input: Input): void {
  state.sink.emit(`${"  ".repeat(state.depth)}Trying ${name} on: ${preview(input)}...`);
  state.depth++;
}

export function traceExit(name: string, outcome: string): void {
  state.depth = Math.max(0, state.depth - 1);
  state.sink.emit(`${"  ".repeat(state.depth)}${name} ${outcome}`);
}
