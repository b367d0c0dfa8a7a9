// src/core/combinator/input.ts
// Input positions for the combinator engine

/**
 * A position in the source text. Parsers never slice the source; they move the offset.
 */
export interface Input {
  readonly source: string;
  readonly offset: number;
}

export function inputOf(source: string, offset = 0): Input {
  return { source, offset };
}

export function advance(input: Input, count: number): Input {
  return { source: input.source, offset: input.offset + count };
}

export function atEnd(input: Input): boolean {
  return input.offset >= input.source.length;
}

export function peekChar(input: Input): string | undefined {
  return atEnd(input) ? undefined : input.source[input.offset];
}


export function preview(input: Input, length = 20): string {
  if (atEnd(input)) return "end of input";
  return `'${input.source.slice(input.offset, input.offset + length)}'`;
}
