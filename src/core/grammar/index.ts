// src/core/grammar/index.ts

export { KEYWORDS, symbol, keyword, identifierToken, numberToken, operatorOf } from "./tokens";
export { expression, leftFold } from "./expression";
export { blockParser } from "./statement";
export {
  functionParser,
  programParser,
  expressionParser,
  parseFailure,
  parseProgram,
  parseExpression,
  type ParseOptions,
} from "./program";
