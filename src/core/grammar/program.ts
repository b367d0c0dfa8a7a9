// src/core/grammar/program.ts
// Function declarations, programs, and the parse entry points.

import { Parser } from "../combinator/parser";
import type { ParseError, ParseOutcome } from "../combinator/parser";
import { isWhitespace } from "../combinator/chars";
import type { Expression, FunctionDeclaration, Identifier, Program } from "../ast";
import { functionDeclaration, program } from "../ast";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, err, fail } from "../../outcome/constructors";
import { isDiagnosticCode, makeDiagnostic } from "../../outcome/codes";
import { inputOf } from "../combinator/input";
import { spanAt } from "../span";
import { expression } from "./expression";
import { blockParser } from "./statement";
import { identifierToken, keyword, symbol } from "./tokens";

const parameterList = identifierToken.sepBy(symbol(",")).between(symbol("("), symbol(")")).label("parameters");

/** Name and parameters of a declaration; a repeated parameter name is rejected. */
const signature: Parser<[Identifier, Identifier[]]> = keyword("fn")
  .ignoreThen(identifierToken)
  .then(parameterList)
  .tryMap(([name, parameters]) => {
    const seen = new Set<string>();
    for (const param of parameters) {
      if (seen.has(param.name)) {
        return fail({
          message: `Duplicate parameter '${param.name}' in function '${name.name}'`,
          code: "E0003",
          params: { name: param.name, fn: name.name },
        });
      }
      seen.add(param.name);
    }
    return done<[Identifier, Identifier[]]>([name, parameters]);
  });

export const functionParser: Parser<FunctionDeclaration> = signature
  .then(blockParser)
  .map(([[name, parameters], body]) => functionDeclaration(name, parameters, body))
  .label("function");

const trailingWhitespace = Parser.accumulateWhile(isWhitespace);

export const programParser: Parser<Program> = functionParser
  .repeated()
  .thenIgnore(trailingWhitespace)
  .eof()
  .map(program)
  .label("program");

export const expressionParser: Parser<Expression> = expression.thenIgnore(trailingWhitespace).eof();

export type ParseOptions = {
  /** File name recorded in diagnostic spans. */
  file?: string;
};

/**
 * Turn a parse error into a Failure with a line/column diagnostic. The span
 * points at the first non-blank character at or after the failure offset.
 * Errors with a known code render that code's template; the rest are E0001.
 */
export function parseFailure(source: string, error: ParseError, options: ParseOptions = {}) {
  let at = error.at;
  while (at < source.length && isWhitespace(source[at])) at++;
  const span = spanAt(source, at, options.file);
  const where = `${span.startLine}:${span.startCol}`;
  const diagnostic =
    error.code !== undefined && isDiagnosticCode(error.code)
      ? makeDiagnostic(error.code, error.params, span)
      : makeDiagnostic("E0001", { detail: error.message }, span);
  return err("parse-error", `Parse error at ${where}: ${diagnostic.message}`, {
    diagnostics: [diagnostic],
    context: { offset: at },
  }, { span });
}

/** Input nested deeper than the host stack allows is reported at its start. */
function nestingTooDeep(source: string): ParseError {
  return { message: "Nesting too deep", at: 0, input: inputOf(source), code: "E0005" };
}

function parseWith<T>(parser: Parser<T>, source: string, options: ParseOptions): Outcome<T> {
  let result: ParseOutcome<T>;
  try {
    result = parser.parse(source);
  } catch (error) {
    if (error instanceof RangeError) {
      return parseFailure(source, nestingTooDeep(source), options);
    }
    throw error;
  }
  if (isFail(result)) {
    return parseFailure(source, result.failure, options);
  }
  return done(result.value.value);
}

export function parseProgram(source: string, options: ParseOptions = {}): Outcome<Program> {
  return parseWith(programParser, source, options);
}

export function parseExpression(source: string, options: ParseOptions = {}): Outcome<Expression> {
  return parseWith(expressionParser, source, options);
}
