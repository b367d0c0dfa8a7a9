// src/core/ast.ts
// Abstract syntax tree for Knot programs.
// Every node is immutable and owned by its parent; nothing is shared between nodes.

export type Identifier = { readonly tag: "Identifier"; readonly name: string };

export type Expression =
  | { readonly tag: "NumberLiteral"; readonly value: number }
  | Identifier
  | { readonly tag: "BinaryExpression"; readonly left: Expression; readonly operator: string; readonly right: Expression }
  | { readonly tag: "CallExpression"; readonly callee: Expression; readonly arguments: readonly Expression[] };

export type Block = { readonly tag: "Block"; readonly statements: readonly Statement[] };

export type Statement =
  | { readonly tag: "VarSet"; readonly name: Identifier; readonly rhs: Expression }
  | { readonly tag: "Return"; readonly expr: Expression }
  | { readonly tag: "ExpressionStmt"; readonly expr: Expression }
  | Block
  | { readonly tag: "If"; readonly condition: Expression; readonly thenBlock: Block; readonly elseBlock: Block }
  | { readonly tag: "While"; readonly condition: Expression; readonly block: Block };

export type FunctionDeclaration = {
  readonly tag: "FunctionDeclaration";
  readonly name: Identifier;
  readonly parameters: readonly Identifier[];
  readonly body: Block;
};

export type Program = { readonly tag: "Program"; readonly functions: readonly FunctionDeclaration[] };

export type NumberLiteral = Extract<Expression, { tag: "NumberLiteral" }>;
export type BinaryExpression = Extract<Expression, { tag: "BinaryExpression" }>;
export type CallExpression = Extract<Expression, { tag: "CallExpression" }>;
export type VarSet = Extract<Statement, { tag: "VarSet" }>;
export type Return = Extract<Statement, { tag: "Return" }>;
export type ExpressionStmt = Extract<Statement, { tag: "ExpressionStmt" }>;
export type If = Extract<Statement, { tag: "If" }>;
export type While = Extract<Statement, { tag: "While" }>;

export const COMPARISON_OPERATORS = ["==", "!=", "<=", ">=", "<", ">"] as const;
export const SUM_OPERATORS = ["+", "-"] as const;
export const PRODUCT_OPERATORS = ["*", "/"] as const;

export type BinaryOperator =
  | (typeof COMPARISON_OPERATORS)[number]
  | (typeof SUM_OPERATORS)[number]
  | (typeof PRODUCT_OPERATORS)[number];

const BINARY_OPERATORS: ReadonlySet<string> = new Set<string>([
  ...COMPARISON_OPERATORS,
  ...SUM_OPERATORS,
  ...PRODUCT_OPERATORS,
]);

export function isBinaryOperator(op: string): op is BinaryOperator {
  return BINARY_OPERATORS.has(op);
}

// ─────────────────────────────────────────────────────────────────
// Builders
// ─────────────────────────────────────────────────────────────────

export const numberLiteral = (value: number): NumberLiteral => ({ tag: "NumberLiteral", value });

export const identifier = (name: string): Identifier => ({ tag: "Identifier", name });

export const binary = (left: Expression, operator: string, right: Expression): BinaryExpression =>
  ({ tag: "BinaryExpression", left, operator, right });

export const call = (callee: Expression, args: readonly Expression[]): CallExpression =>
  ({ tag: "CallExpression", callee, arguments: args });

export const block = (statements: readonly Statement[]): Block => ({ tag: "Block", statements });

export const varSet = (name: Identifier, rhs: Expression): VarSet => ({ tag: "VarSet", name, rhs });

export const returnStatement = (expr: Expression): Return => ({ tag: "Return", expr });

export const expressionStatement = (expr: Expression): ExpressionStmt => ({ tag: "ExpressionStmt", expr });

/** A missing else branch becomes a fresh empty block. */
export const ifStatement = (condition: Expression, thenBlock: Block, elseBlock?: Block): If =>
  ({ tag: "If", condition, thenBlock, elseBlock: elseBlock ?? block([]) });

export const whileStatement = (condition: Expression, body: Block): While =>
  ({ tag: "While", condition, block: body });

export const functionDeclaration = (
  name: Identifier,
  parameters: readonly Identifier[],
  body: Block
): FunctionDeclaration => ({ tag: "FunctionDeclaration", name, parameters, body });

export const program = (functions: readonly FunctionDeclaration[]): Program => ({ tag: "Program", functions });
