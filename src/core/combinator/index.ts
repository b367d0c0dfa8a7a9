// src/core/combinator/index.ts

export {
  Parser,
  succeed,
  failAt,
  furthest,
  type ParseSuccess,
  type ParseError,
  type ParseProblem,
  type ParseOutcome,
} from "./parser";
export { type Input, inputOf, advance, atEnd, peekChar, preview } from "./input";
export { isDigit, isLetter, isAlphanumeric, isWhitespace } from "./chars";
export { enableTrace, disableTrace, isTraceEnabled } from "./trace";
