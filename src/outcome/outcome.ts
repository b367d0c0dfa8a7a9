import type { Failure } from "./failure";
import type { Span } from "../core/span";

export interface OutcomeMeta {
  span?: Span;
  durationMs?: number;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail<E = Failure> {
  readonly tag: "Fail";
  readonly failure: E;
  readonly meta: OutcomeMeta;
}

export type Outcome<A, E = Failure> = Done<A> | Fail<E>;
export type Ok<A> = Done<A>;
export type Err<E = Failure> = Fail<E>;

export function isDone<A, E>(o: Outcome<A, E>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A, E>(o: Outcome<A, E>): o is Fail<E> {
  return o.tag === "Fail";
}
