// src/core/combinator/parser.ts
// Parser combinator engine
//
// A Parser<T> wraps a pure function from an Input position to an Outcome of
// (value, rest). Combinators build new parsers and never mutate their operands.
// Every failure is reported at the position the failing parser was called with.

import type { Outcome, Fail } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { done, fail } from "../../outcome/constructors";
import type { Input } from "./input";
import { advance, atEnd, inputOf, peekChar, preview } from "./input";
import { isAlphanumeric, isDigit, isLetter, isWhitespace } from "./chars";
import { isTraceEnabled, traceEnter, traceExit } from "./trace";

export interface ParseSuccess<T> {
  readonly value: T;
  readonly rest: Input;
  /**
   * Furthest failure swallowed while producing this value (by `repeated`,
   * `orNot`, a failed alternative...). Reported if the next step fails.
   */
  readonly expected?: ParseError;
}

export interface ParseError {
  readonly message: string;
  /** Offset where the problem was detected. */
  readonly at: number;
  /** Position the failing parser started from. */
  readonly input: Input;
  /** Diagnostic code, when the failure is more specific than a syntax error. */
  readonly code?: string;
  /** Values for the code's message template. */
  readonly params?: Readonly<Record<string, string | number>>;
}

/** A rejection produced by `tryMap`. */
export interface ParseProblem {
  readonly message: string;
  readonly code?: string;
  readonly params?: Readonly<Record<string, string | number>>;
}

export type ParseOutcome<T> = Outcome<ParseSuccess<T>, ParseError>;

type ParseFn<T> = (input: Input) => ParseOutcome<T>;

export function succeed<T>(value: T, rest: Input, expected?: ParseError): ParseOutcome<T> {
  return done(expected === undefined ? { value, rest } : { value, rest, expected });
}

export function failAt(
  message: string,
  at: number,
  input: Input,
  code?: string,
  params?: Readonly<Record<string, string | number>>
): Fail<ParseError> {
  return fail({ message, at, input, code, params });
}

/**
 * Pick the error to report when several alternatives failed: the one detected
 * furthest into the input, the later alternative on a tie.
 */
export function furthest(a: ParseError, b: ParseError): ParseError {
  return a.at > b.at ? a : b;
}

function mergeExpected(a: ParseError | undefined, b: ParseError | undefined): ParseError | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return furthest(a, b);
}

function failWith(expected: ParseError | undefined, error: ParseError): Fail<ParseError> {
  return fail(expected === undefined ? error : furthest(expected, error));
}

export class Parser<T> {
  constructor(
    private readonly parseFn: ParseFn<T>,
    readonly name: string = "anonymous"
  ) {}

  run(input: Input): ParseOutcome<T> {
    if (!isTraceEnabled()) {
      return this.rewound(this.parseFn(input), input);
    }
    traceEnter(this.name, input);
    let result: ParseOutcome<T> | undefined;
    try {
      result = this.rewound(this.parseFn(input), input);
      return result;
    } finally {
      traceExit(
        this.name,
        result === undefined
          ? "threw"
          : isFail(result)
            ? `failed: ${result.failure.message}`
            : `succeeded (consumed ${result.value.rest.offset - input.offset})`
      );
    }
  }

  parse(text: string): ParseOutcome<T> {
    return this.run(inputOf(text));
  }

  label(name: string): Parser<T> {
    return new Parser(this.parseFn, name);
  }

  map<U>(f: (value: T) => U): Parser<U> {
    return new Parser<U>((input) => {
      const result = this.run(input);
      if (isFail(result)) return result;
      return succeed(f(result.value.value), result.value.rest, result.value.expected);
    }, `${this.name}.map`);
  }

  /**
   * Like `map`, but `f` may reject the value. The rejection is reported where
   * the rejected text ends; nothing is consumed.
   */
  tryMap<U>(f: (value: T) => Outcome<U, ParseProblem>): Parser<U> {
    return new Parser<U>((input) => {
      const result = this.run(input);
      if (isFail(result)) return result;
      const mapped = f(result.value.value);
      if (isFail(mapped)) {
        const { message, code, params } = mapped.failure;
        return failAt(message, result.value.rest.offset, input, code, params);
      }
      return succeed(mapped.value, result.value.rest, result.value.expected);
    }, `${this.name}.tryMap`);
  }

  then<U>(next: Parser<U>): Parser<[T, U]> {
    return new Parser<[T, U]>((input) => {
      const first = this.run(input);
      if (isFail(first)) return first;
      const second = next.run(first.value.rest);
      if (isFail(second)) return failWith(first.value.expected, second.failure);
      return succeed(
        [first.value.value, second.value.value],
        second.value.rest,
        mergeExpected(first.value.expected, second.value.expected)
      );
    }, `${this.name}.then(${next.name})`);
  }

  ignoreThen<U>(next: Parser<U>): Parser<U> {
    return this.then(next).map(([, right]) => right).label(`${this.name}.ignoreThen(${next.name})`);
  }

  thenIgnore<U>(next: Parser<U>): Parser<T> {
    return this.then(next).map(([left]) => left).label(`${this.name}.thenIgnore(${next.name})`);
  }

  orElse<U>(alternative: Parser<U>): Parser<T | U> {
    return new Parser<T | U>((input) => {
      const left = this.run(input);
      if (!isFail(left)) return left;
      const right = alternative.run(input);
      if (isFail(right)) return fail(furthest(left.failure, right.failure));
      return succeed(right.value.value, right.value.rest, mergeExpected(left.failure, right.value.expected));
    }, `${this.name}.orElse(${alternative.name})`);
  }

  /** Skip leading whitespace only. */
  padded(): Parser<T> {
    return new Parser<T>((input) => {
      let skipped = 0;
      while (input.offset + skipped < input.source.length && isWhitespace(input.source[input.offset + skipped])) {
        skipped++;
      }
      return this.run(advance(input, skipped));
    }, `${this.name}.padded()`);
  }

  between<O, C>(open: Parser<O>, close: Parser<C>): Parser<T> {
    return open.ignoreThen(this).thenIgnore(close).label(`${this.name}.between(${open.name}, ${close.name})`);
  }

  /**
   * Zero or more items separated by `delimiter`. Never fails. A delimiter that
   * is not followed by an item is left unconsumed.
   */
  sepBy<D>(delimiter: Parser<D>): Parser<T[]> {
    const following = delimiter.ignoreThen(this);
    return new Parser<T[]>((input) => {
      const values: T[] = [];
      const first = this.run(input);
      if (isFail(first)) return succeed(values, input, first.failure);
      if (first.value.rest.offset === input.offset) return succeed(values, input);
      values.push(first.value.value);
      let rest = first.value.rest;
      let expected = first.value.expected;
      for (;;) {
        const next = following.run(rest);
        if (isFail(next)) {
          expected = mergeExpected(expected, next.failure);
          break;
        }
        if (next.value.rest.offset === rest.offset) break;
        values.push(next.value.value);
        rest = next.value.rest;
        expected = mergeExpected(expected, next.value.expected);
      }
      return succeed(values, rest, expected);
    }, `${this.name}.sepBy(${delimiter.name})`);
  }

  /**
   * Zero or more occurrences. Never fails. Stops at the first item that fails
   * or that succeeds without consuming input; that item is not collected.
   */
  repeated(): Parser<T[]> {
    return new Parser<T[]>((input) => {
      const values: T[] = [];
      let rest = input;
      let expected: ParseError | undefined;
      for (;;) {
        const next = this.run(rest);
        if (isFail(next)) {
          expected = mergeExpected(expected, next.failure);
          break;
        }
        if (next.value.rest.offset === rest.offset) break;
        values.push(next.value.value);
        rest = next.value.rest;
        expected = mergeExpected(expected, next.value.expected);
      }
      return succeed(values, rest, expected);
    }, `${this.name}.repeated()`);
  }

  orNot(): Parser<T | undefined> {
    return new Parser<T | undefined>((input) => {
      const result = this.run(input);
      if (isFail(result)) return succeed(undefined, input, result.failure);
      return result;
    }, `orNot(${this.name})`);
  }

  eof(): Parser<T> {
    return new Parser<T>((input) => {
      const result = this.run(input);
      if (isFail(result)) return result;
      const rest = result.value.rest;
      if (!atEnd(rest)) {
        const found = preview(rest);
        return failWith(result.value.expected, {
          message: `Expected end of input, found ${found}`,
          at: rest.offset,
          input,
          code: "E0002",
          params: { found },
        });
      }
      return result;
    }, `${this.name}.eof()`);
  }

  // ───────────────────────────────────────────────────────────────
  // Leaf parsers
  // ───────────────────────────────────────────────────────────────

  static char(predicate: (c: string) => boolean, name = "char"): Parser<string> {
    return new Parser<string>((input) => {
      const c = peekChar(input);
      if (c !== undefined && predicate(c)) {
        return succeed(c, advance(input, 1));
      }
      return failAt(`Expected ${name}, found ${preview(input)}`, input.offset, input);
    }, name);
  }

  static just(token: string): Parser<string> {
    return new Parser<string>((input) => {
      if (input.source.startsWith(token, input.offset)) {
        return succeed(token, advance(input, token.length));
      }
      return failAt(`Expected '${token}', found ${preview(input, token.length + 5)}`, input.offset, input);
    }, `just('${token}')`);
  }

  /** Longest (possibly empty) run of characters satisfying `predicate`. Never fails. */
  static accumulateWhile(predicate: (c: string) => boolean): Parser<string> {
    return new Parser<string>((input) => {
      let end = input.offset;
      while (end < input.source.length && predicate(input.source[end])) end++;
      return succeed(input.source.slice(input.offset, end), advance(input, end - input.offset));
    }, "accumulateWhile");
  }

  static number(): Parser<number> {
    const digits = Parser.accumulateWhile(isDigit);
    return new Parser<number>((input) => {
      const result = digits.run(input);
      if (isFail(result) || result.value.value === "") {
        return failAt(`Expected a number, found ${preview(input)}`, input.offset, input);
      }
      const value = Number(result.value.value);
      if (!Number.isSafeInteger(value)) {
        const literal = result.value.value;
        return failAt(`Integer literal out of range: ${literal}`, result.value.rest.offset, input, "E0004", { literal });
      }
      return succeed(value, result.value.rest);
    }, "number");
  }

  /** A letter followed by letters and digits. */
  static ident(): Parser<string> {
    return new Parser<string>((input) => {
      const first = peekChar(input);
      if (first === undefined || !isLetter(first)) {
        return failAt(`Expected an identifier, found ${preview(input)}`, input.offset, input);
      }
      let end = input.offset + 1;
      while (end < input.source.length && isAlphanumeric(input.source[end])) end++;
      return succeed(input.source.slice(input.offset, end), advance(input, end - input.offset));
    }, "ident");
  }

  /**
   * Self-referential parsers. `define` receives a forward reference and returns
   * the real parser; the reference is wired to it before any input is parsed.
   */
  static recursive<T>(define: (self: Parser<T>) => Parser<T>): Parser<T> {
    let definition: Parser<T> | undefined;
    const reference = new Parser<T>((input) => {
      if (definition === undefined) {
        throw new Error("recursive parser invoked before its definition was supplied");
      }
      return definition.run(input);
    }, "recursive");
    definition = define(reference);
    return reference;
  }

  private rewound(result: ParseOutcome<T>, input: Input): ParseOutcome<T> {
    if (isFail(result) && result.failure.input.offset !== input.offset) {
      return fail({ ...result.failure, input }, result.meta);
    }
    return result;
  }
}
