// src/core/grammar/statement.ts
// Statements and blocks.
//
// Simple statements (return, assignment, expression) end with `;`.
// Compound statements (if, while, nested block) end with their closing brace;
// a `;` after them is accepted and ignored.

import { Parser, failAt } from "../combinator/parser";
import { peekChar, preview } from "../combinator/input";
import { isDone } from "../../outcome/outcome";
import type { Block, Statement } from "../ast";
import {
  block,
  expressionStatement,
  ifStatement,
  returnStatement,
  varSet,
  whileStatement,
} from "../ast";
import { expression } from "./expression";
import { KEYWORDS, identifierToken, keyword, symbol } from "./tokens";

const semicolon = symbol(";");
const optionalSemicolon = semicolon.orNot();

const assignedWord = Parser.ident().padded().thenIgnore(symbol("="));

/**
 * Never succeeds. On `if = 2;` it reports the keyword at the `=`, which is as
 * far as the `if` branch gets, so the last alternative's message wins.
 */
const keywordAssignment = new Parser<Statement>((input) => {
  const result = assignedWord.run(input);
  if (isDone(result) && KEYWORDS.has(result.value.value) && peekChar(result.value.rest) !== "=") {
    const name = result.value.value;
    return failAt(`Keyword '${name}' cannot be assigned`, result.value.rest.offset - 1, input, "E0006", {
      keyword: name,
    });
  }
  return failAt(`Expected a statement, found ${preview(input)}`, input.offset, input);
}, "keyword assignment");

export const blockParser: Parser<Block> = Parser.recursive<Block>((nested) => {
  const returnStmt = keyword("return")
    .ignoreThen(expression)
    .thenIgnore(semicolon)
    .map(returnStatement)
    .label("return");

  const ifStmt = keyword("if")
    .ignoreThen(expression)
    .then(nested)
    .then(keyword("else").ignoreThen(nested).orNot())
    .thenIgnore(optionalSemicolon)
    .map(([[condition, thenBlock], elseBlock]) => ifStatement(condition, thenBlock, elseBlock))
    .label("if");

  const whileStmt = keyword("while")
    .ignoreThen(expression)
    .then(nested)
    .thenIgnore(optionalSemicolon)
    .map(([condition, body]) => whileStatement(condition, body))
    .label("while");

  const blockStmt = nested.thenIgnore(optionalSemicolon).label("block statement");

  const varSetStmt = identifierToken
    .thenIgnore(symbol("="))
    .then(expression)
    .thenIgnore(semicolon)
    .map(([name, rhs]) => varSet(name, rhs))
    .label("assignment");

  const expressionStmt = expression.thenIgnore(semicolon).map(expressionStatement).label("expression statement");

  const statement: Parser<Statement> = returnStmt
    .orElse(ifStmt)
    .orElse(whileStmt)
    .orElse(blockStmt)
    .orElse(varSetStmt)
    .orElse(expressionStmt)
    .orElse(keywordAssignment)
    .label("statement");

  return statement.repeated().between(symbol("{"), symbol("}")).map(block);
}).label("block");
