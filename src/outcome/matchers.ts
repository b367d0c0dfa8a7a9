import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";

export function match<A, E, R>(
  outcome: Outcome<A, E>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail<E>) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B, E>(o: Outcome<A, E>, fn: (a: A) => B): Outcome<B, E> {
  if (isDone(o)) {
    return { ...o, value: fn(o.value) };
  }
  return o;
}

export function flatMapOutcome<A, B, E>(
  o: Outcome<A, E>,
  fn: (a: A) => Outcome<B, E>
): Outcome<B, E> {
  if (isDone(o)) {
    return fn(o.value);
  }
  return o;
}

export function mapFailure<A, E, F>(o: Outcome<A, E>, fn: (e: E) => F): Outcome<A, F> {
  if (isDone(o)) {
    return o;
  }
  return { ...o, failure: fn(o.failure) };
}

export function unwrap<A, E extends { message: string }>(o: Outcome<A, E>): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new Error(o.failure.message);
}

export function unwrapOr<A, E>(o: Outcome<A, E>, defaultValue: A): A {
  return isDone(o) ? o.value : defaultValue;
}
