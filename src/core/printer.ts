// src/core/printer.ts
// Canonical source rendering of AST nodes (binary expressions fully parenthesised).

import type { Block, Expression, FunctionDeclaration, Program, Statement } from "./ast";

export function formatExpression(expr: Expression): string {
  switch (expr.tag) {
    case "NumberLiteral":
      return String(expr.value);
    case "Identifier":
      return expr.name;
    case "BinaryExpression":
      return `(${formatExpression(expr.left)} ${expr.operator} ${formatExpression(expr.right)})`;
    case "CallExpression":
      return `${formatExpression(expr.callee)}(${expr.arguments.map(formatExpression).join(", ")})`;
  }
}

function formatBlock(b: Block, indent: string): string {
  if (b.statements.length === 0) return "{}";
  const inner = b.statements.map((s) => `${indent}  ${formatStatement(s, `${indent}  `)}`);
  return `{\n${inner.join("\n")}\n${indent}}`;
}

export function formatStatement(stmt: Statement, indent = ""): string {
  switch (stmt.tag) {
    case "VarSet":
      return `${stmt.name.name} = ${formatExpression(stmt.rhs)};`;
    case "Return":
      return `return ${formatExpression(stmt.expr)};`;
    case "ExpressionStmt":
      return `${formatExpression(stmt.expr)};`;
    case "Block":
      return formatBlock(stmt, indent);
    case "If": {
      const head = `if ${formatExpression(stmt.condition)} ${formatBlock(stmt.thenBlock, indent)}`;
      return stmt.elseBlock.statements.length === 0
        ? head
        : `${head} else ${formatBlock(stmt.elseBlock, indent)}`;
    }
    case "While":
      return `while ${formatExpression(stmt.condition)} ${formatBlock(stmt.block, indent)}`;
  }
}

export function formatFunction(fn: FunctionDeclaration): string {
  const params = fn.parameters.map((p) => p.name).join(", ");
  return `fn ${fn.name.name}(${params}) ${formatBlock(fn.body, "")}`;
}

export function formatProgram(prog: Program): string {
  return prog.functions.map(formatFunction).join("\n\n");
}
