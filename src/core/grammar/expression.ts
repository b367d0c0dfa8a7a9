// src/core/grammar/expression.ts
// Expression grammar. Precedence, low to high:
//   comparison (== != <= >= < >)  →  sum (+ -)  →  product (* /)  →  unary (-)  →  call  →  atom

import { Parser } from "../combinator/parser";
import type { Expression } from "../ast";
import {
  COMPARISON_OPERATORS,
  PRODUCT_OPERATORS,
  SUM_OPERATORS,
  binary,
  call,
  numberLiteral,
} from "../ast";
import { identifierToken, numberToken, operatorOf, symbol } from "./tokens";

/**
 * One operand, then any number of (operator, operand) pairs folded left in encounter order.
 */
export function leftFold(operand: Parser<Expression>, operator: Parser<string>): Parser<Expression> {
  return operand
    .then(operator.then(operand).repeated())
    .map(([first, rest]) => rest.reduce<Expression>((left, [op, right]) => binary(left, op, right), first));
}

export const expression: Parser<Expression> = Parser.recursive<Expression>((expr) => {
  const atom = numberToken
    .orElse(identifierToken)
    .orElse(expr.between(symbol("("), symbol(")")))
    .label("atom");

  const argumentList = expr.sepBy(symbol(",")).between(symbol("("), symbol(")")).label("arguments");

  // f(1)(2) is a call whose callee is a call
  const callOrAtom = atom
    .then(argumentList.repeated())
    .map(([callee, argLists]) => argLists.reduce<Expression>((fn, args) => call(fn, args), callee))
    .label("call");

  // Unary only wraps call-or-atom, so -2 * 2 is (-2) * 2. An odd run of minus
  // signs becomes a multiplication by -1; an even run disappears.
  const unary = symbol("-")
    .repeated()
    .then(callOrAtom)
    .map(([minuses, operand]) =>
      minuses.length % 2 === 1 ? binary(numberLiteral(-1), "*", operand) : operand
    )
    .label("unary");

  const product = leftFold(unary, operatorOf(PRODUCT_OPERATORS)).label("product");
  const sum = leftFold(product, operatorOf(SUM_OPERATORS)).label("sum");
  return leftFold(sum, operatorOf(COMPARISON_OPERATORS)).label("comparison");
}).label("expression");
