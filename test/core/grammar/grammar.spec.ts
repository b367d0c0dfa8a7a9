// test/core/grammar/grammar.spec.ts
// Tests for the Knot grammar: precedence, associativity, statements, and parse errors

import { describe, it, expect } from "vitest";
import { parseExpression, parseProgram } from "../../../src/core/grammar/program";
import { formatExpression, formatProgram } from "../../../src/core/printer";
import { binary, call, identifier, numberLiteral } from "../../../src/core/ast";
import type { Outcome } from "../../../src/outcome/outcome";
import type { Failure } from "../../../src/outcome/failure";

function expr(source: string): string {
  const result = parseExpression(source);
  if (result.tag === "Fail") throw new Error(result.failure.message);
  return formatExpression(result.value);
}

function prog(source: string): string {
  const result = parseProgram(source);
  if (result.tag === "Fail") throw new Error(result.failure.message);
  return formatProgram(result.value);
}

function failureOf<A>(result: Outcome<A>): Failure {
  if (result.tag === "Done") throw new Error("expected the parse to fail");
  return result.failure;
}

describe("expressions", () => {
  it("builds the AST for a product inside a sum", () => {
    const result = parseExpression("1 + 2 * 3");
    expect(result.tag === "Done" && result.value).toEqual(
      binary(numberLiteral(1), "+", binary(numberLiteral(2), "*", numberLiteral(3)))
    );
  });

  it("binds products tighter than sums", () => {
    expect(expr("2 + 3 * 4")).toBe("(2 + (3 * 4))");
    expect(expr("2 * 3 + 4")).toBe("((2 * 3) + 4)");
    expect(expr("(2 + 3) * 4")).toBe("((2 + 3) * 4)");
  });

  it("associates left at every level", () => {
    expect(expr("1 - 2 - 3")).toBe("((1 - 2) - 3)");
    expect(expr("8 / 4 / 2")).toBe("((8 / 4) / 2)");
    expect(expr("1 < 2 == 1")).toBe("((1 < 2) == 1)");
  });

  it("binds comparisons loosest", () => {
    expect(expr("a + 1 < b * 2")).toBe("((a + 1) < (b * 2))");
  });

  it("reads two-character comparison operators whole", () => {
    expect(expr("a <= b")).toBe("(a <= b)");
    expect(expr("a >= b")).toBe("(a >= b)");
    expect(expr("a != b")).toBe("(a != b)");
    expect(expr("a == b")).toBe("(a == b)");
    expect(expr("a<b")).toBe("(a < b)");
  });

  it("turns unary minus into multiplication by -1", () => {
    expect(expr("-3")).toBe("(-1 * 3)");
    expect(expr("-2 * 3")).toBe("((-1 * 2) * 3)");
    expect(expr("-f(2)")).toBe("(-1 * f(2))");
    expect(expr("1 - -2")).toBe("(1 - (-1 * 2))");
  });

  it("cancels an even run of minus signs", () => {
    expect(expr("- - 3")).toBe("3");
    expect(expr("---x")).toBe("(-1 * x)");
  });

  it("parses calls with any number of arguments", () => {
    expect(expr("f()")).toBe("f()");
    expect(expr("f(1, 2 + 3)")).toBe("f(1, (2 + 3))");
    expect(expr("f(g(x), y)")).toBe("f(g(x), y)");
  });

  it("chains calls on the result of a call", () => {
    const result = parseExpression("f(1)(2)");
    expect(result.tag === "Done" && result.value).toEqual(
      call(call(identifier("f"), [numberLiteral(1)]), [numberLiteral(2)])
    );
  });

  it("allows whitespace around tokens", () => {
    expect(expr("  1+2  \n")).toBe("(1 + 2)");
    expect(expr("f ( 1 ,2 )")).toBe("f(1, 2)");
  });

  it("treats identifiers that start with a keyword as identifiers", () => {
    expect(expr("returnx + iffy")).toBe("(returnx + iffy)");
  });

  it("reports a missing operand", () => {
    const failure = failureOf(parseExpression("1 +"));
    expect(failure.reason).toBe("parse-error");
    expect(failure.message).toBe("Parse error at 1:4: Expected '(', found end of input");
  });

  it("reports trailing input", () => {
    const failure = failureOf(parseExpression("1 2"));
    expect(failure.message).toBe("Parse error at 1:3: Expected end of input, found '2'");
    expect(failure.diagnostics[0].code).toBe("E0002");
  });
});

describe("programs", () => {
  it("parses an empty program", () => {
    expect(prog("")).toBe("");
    expect(prog("  \n ")).toBe("");
  });

  it("parses every statement form", () => {
    const source = `
      fn main() {
        x = 1;
        if x { print(x); } else { return 0; }
        while x < 3 { x = x + 1; }
        return x;
      }`;
    expect(prog(source)).toBe(
      [
        "fn main() {",
        "  x = 1;",
        "  if x {",
        "    print(x);",
        "  } else {",
        "    return 0;",
        "  }",
        "  while (x < 3) {",
        "    x = (x + 1);",
        "  }",
        "  return x;",
        "}",
      ].join("\n")
    );
  });

  it("parses several functions with parameters", () => {
    const source = "fn add(a, b) { return a + b; } fn main() { return add(1, 2); }";
    expect(prog(source)).toBe(
      "fn add(a, b) {\n  return (a + b);\n}\n\nfn main() {\n  return add(1, 2);\n}"
    );
  });

  it("accepts an optional semicolon after compound statements", () => {
    const source = "fn main() { if 1 { }; while 0 { }; { x = 1; }; return 0; }";
    expect(prog(source)).toBe(
      "fn main() {\n  if 1 {}\n  while 0 {}\n  {\n    x = 1;\n  }\n  return 0;\n}"
    );
  });

  it("gives a missing else an empty block", () => {
    const result = parseProgram("fn main() { if 1 { return 1; } }");
    if (result.tag === "Fail") throw new Error(result.failure.message);
    const stmt = result.value.functions[0].body.statements[0];
    expect(stmt.tag === "If" && stmt.elseBlock).toEqual({ tag: "Block", statements: [] });
  });

  it("parses nested blocks", () => {
    expect(prog("fn main() { { { } } }")).toBe("fn main() {\n  {\n    {}\n  }\n}");
  });

  it("parses assignments whose name starts with a keyword", () => {
    expect(prog("fn main() { returnx = 1; return returnx; }")).toBe(
      "fn main() {\n  returnx = 1;\n  return returnx;\n}"
    );
  });
});

describe("parse errors", () => {
  it("points at the token where a semicolon is missing", () => {
    const failure = failureOf(parseProgram("fn main() { return 1 }"));
    expect(failure.reason).toBe("parse-error");
    expect(failure.message).toBe("Parse error at 1:22: Expected ';', found '}'");
    expect(failure.diagnostics).toHaveLength(1);
    expect(failure.diagnostics[0].code).toBe("E0001");
    expect(failure.diagnostics[0].span?.startLine).toBe(1);
    expect(failure.diagnostics[0].span?.startCol).toBe(22);
  });

  it("counts lines and columns from 1", () => {
    const failure = failureOf(parseProgram("fn main() {\n  return 1\n}", { file: "main.knot" }));
    expect(failure.message).toBe("Parse error at 3:1: Expected ';', found '}'");
    expect(failure.diagnostics[0].span?.file).toBe("main.knot");
  });

  it("rejects input after the last function", () => {
    const failure = failureOf(parseProgram("fn main() {} x"));
    expect(failure.message).toBe("Parse error at 1:14: Expected end of input, found 'x'");
    expect(failure.diagnostics[0].code).toBe("E0002");
  });

  it("rejects a keyword used as a function name", () => {
    const failure = failureOf(parseProgram("fn if() {}"));
    expect(failure.message).toBe("Parse error at 1:4: Expected an identifier, found keyword 'if'");
  });

  it("rejects duplicate parameter names", () => {
    const failure = failureOf(parseProgram("fn f(a, a) { return a; }"));
    expect(failure.diagnostics[0].code).toBe("E0003");
    expect(failure.message).toBe("Parse error at 1:12: Duplicate parameter 'a' in function 'f'");
  });

  it("rejects integer literals that do not fit", () => {
    const failure = failureOf(parseProgram("fn main() { return 99999999999999999999; }"));
    expect(failure.diagnostics[0].code).toBe("E0004");
    expect(failure.message).toBe("Parse error at 1:40: Integer literal out of range: 99999999999999999999");
  });

  it("names the keyword in an assignment to it", () => {
    const failure = failureOf(parseProgram("fn main() { if = 2; return 1; }"));
    expect(failure.message).toBe("Parse error at 1:16: Keyword 'if' cannot be assigned");
    expect(failure.diagnostics[0].code).toBe("E0006");
    expect(failure.diagnostics[0].data).toEqual({ keyword: "if" });
  });

  it("still reads an if whose condition starts with ==", () => {
    const failure = failureOf(parseProgram("fn main() { if == 2 { } }"));
    expect(failure.diagnostics[0].code).toBe("E0001");
  });

  it("reports nesting deeper than the host stack as a parse error", () => {
    const failure = failureOf(parseExpression("(".repeat(50000) + "1" + ")".repeat(50000)));
    expect(failure.reason).toBe("parse-error");
    expect(failure.message).toBe("Parse error at 1:1: Nesting too deep");
    expect(failure.diagnostics[0].code).toBe("E0005");
  });

  it("parses moderately deep nesting", () => {
    expect(expr("(".repeat(200) + "7" + ")".repeat(200))).toBe("7");
  });

  it("renders coded errors from their templates", () => {
    const failure = failureOf(parseProgram("fn f(a, a) { return a; }"));
    expect(failure.diagnostics[0].data).toEqual({ name: "a", fn: "f" });
  });

  it("requires braces around a function body", () => {
    const failure = failureOf(parseProgram("fn main() return 1;"));
    expect(failure.message).toBe("Parse error at 1:11: Expected '{', found 'return'");
  });
});
