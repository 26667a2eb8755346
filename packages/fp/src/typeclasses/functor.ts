/**
 * Functor: structures whose elements can be transformed without changing
 * their shape. List keeps its length and order; Maybe keeps Just or Nothing.
 *
 * Checked by `functorLaws` (identity, composition).
 */

import type { $, TypeFunction } from "../hkt.js";

export interface Functor<F extends TypeFunction> {
  readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
}

/**
 * Turn `A => B` into `F<A> => F<B>` for a given Functor.
 *
 * @example
 * ```typescript
 * const double = lift(listFunctor)((n: number) => n * 2);
 * toDisplayString(double(of(1, 2))); // "[2 4]"
 * ```
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: $<F, A>) => $<F, B> {
  return <A, B>(f: (a: A) => B) =>
    (fa: $<F, A>): $<F, B> =>
      F.map<A, B>(fa, f);
}
