// src/core/grammar/tokens.ts
// Leaf token parsers. Every token skips the whitespace in front of it.

import { Parser, failAt, succeed } from "../combinator/parser";
import { preview } from "../combinator/input";
import { isDone, isFail } from "../../outcome/outcome";
import type { Identifier, NumberLiteral } from "../ast";
import { identifier, numberLiteral } from "../ast";

export const KEYWORDS: ReadonlySet<string> = new Set(["fn", "return", "if", "else", "while"]);

const word = Parser.ident();

export function symbol(token: string): Parser<string> {
  return Parser.just(token).padded().label(`'${token}'`);
}

/** A keyword matches a whole word only: `returnx` is an identifier, not `return x`. */
export function keyword(expected: string): Parser<string> {
  return new Parser<string>((input) => {
    const result = word.run(input);
    if (isDone(result) && result.value.value === expected) return result;
    return failAt(`Expected '${expected}', found ${preview(input, expected.length + 5)}`, input.offset, input);
  }, expected).padded().label(`keyword('${expected}')`);
}

/** An identifier that is not a keyword. */
export const identifierToken: Parser<Identifier> = new Parser<Identifier>((input) => {
  const result = word.run(input);
  if (isFail(result)) return result;
  const name = result.value.value;
  if (KEYWORDS.has(name)) {
    return failAt(`Expected an identifier, found keyword '${name}'`, input.offset, input);
  }
  return succeed(identifier(name), result.value.rest);
}, "identifier")
  .padded()
  .label("identifier");

export const numberToken: Parser<NumberLiteral> = Parser.number().padded().map(numberLiteral).label("number");

/** First match wins, so longer operators must come before their prefixes. */
export function operatorOf(operators: readonly string[]): Parser<string> {
  return operators
    .map(symbol)
    .reduce((acc, p) => acc.orElse(p))
    .label(`operator(${operators.join(" ")})`);
}
