/**
 * Either: the result of an operation with a precondition.
 *
 * `head`, `tail` and `zipWith` return `Either<Error, A>` instead of throwing,
 * so the empty and mismatched cases show up in the type and must be handled:
 *
 * ```typescript
 * const first = head(of(1, 2));       // Right(1)
 * const none = head(Nil);             // Left(EmptyAccessError)
 * getOrElse(none, () => 0);           // 0
 * ```
 */

import { unreachable } from "@seqlist/core";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";

export type Either<E, A> = Left<E> | Right<A>;

/** Failed result carrying the error. */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/** Successful result carrying the value. */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

/**
 * Eliminate both cases. Every other operation here is built on it.
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  switch (either._tag) {
    case "Left":
      return onLeft(either.left);
    case "Right":
      return onRight(either.right);
    default:
      return unreachable(either);
  }
}

/**
 * `fold` with named handlers.
 */
export function match<E, A, B>(
  either: Either<E, A>,
  patterns: { Left: (e: E) => B; Right: (a: A) => B },
): B {
  return fold(either, patterns.Left, patterns.Right);
}

/** Transform a successful value; a Left passes through. */
export function map<E, A, B>(
  either: Either<E, A>,
  f: (a: A) => B,
): Either<E, B> {
  return fold(either, (e) => Left<E, B>(e), (a) => Right<E, B>(f(a)));
}

/** Transform the error; a Right passes through. */
export function mapLeft<E, A, E2>(
  either: Either<E, A>,
  f: (e: E) => E2,
): Either<E2, A> {
  return fold(either, (e) => Left<E2, A>(f(e)), (a) => Right<E2, A>(a));
}

/** Chain another fallible step after a success. */
export function flatMap<E, A, B>(
  either: Either<E, A>,
  f: (a: A) => Either<E, B>,
): Either<E, B> {
  return fold(either, (e) => Left<E, B>(e), f);
}

/** The value, or a fallback computed from the error. */
export function getOrElse<E, A, B>(
  either: Either<E, A>,
  fallback: (e: E) => B,
): A | B {
  return fold<E, A, A | B>(either, fallback, (a) => a);
}

/**
 * The value; the error is thrown as is.
 *
 * @throws the Left value
 */
export function getOrThrow<E, A>(either: Either<E, A>): A {
  if (isLeft(either)) throw either.left;
  return either.right;
}

/** Results are equal when both sides and their contents match. */
export function getEq<E, A>(EE: Eq<E>, EA: Eq<A>): Eq<Either<E, A>> {
  return {
    eqv: (x, y) => {
      if (isLeft(x)) return isLeft(y) && EE.eqv(x.left, y.left);
      return isRight(y) && EA.eqv(x.right, y.right);
    },
  };
}

/** Renders `Left(...)` / `Right(...)`. */
export function getShow<E, A>(SE: Show<E>, SA: Show<A>): Show<Either<E, A>> {
  return {
    show: (either) =>
      fold(
        either,
        (e) => `Left(${SE.show(e)})`,
        (a) => `Right(${SA.show(a)})`,
      ),
  };
}
