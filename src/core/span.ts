// src/core/span.ts
// Source locations for diagnostics

export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

/**
 * 1-based line and column of `offset` in `source`.
 */
export function lineColAt(source: string, offset: number): { line: number; col: number } {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, col: end - lineStart + 1 };
}

export function spanAt(source: string, offset: number, file?: string): Span {
  const { line, col } = lineColAt(source, offset);
  return { file, startLine: line, startCol: col, endLine: line, endCol: col };
}
