/**
 * Functor Laws
 *
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * @module
 */

import type { Functor } from "../typeclasses/functor.js";
import type { Eq } from "../typeclasses/eq.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawSet } from "./types.js";

/**
 * Generate laws for a Functor instance, with composition checked through
 * two fixed functions.
 *
 * @param Fn - The Functor instance to verify
 * @param EqFA - Eq for F[A] values
 * @param EqFC - Eq for F[C] values
 *
 * @example
 * ```typescript
 * const laws = functorLaws(listFunctor, listEq, listEq, (n: number) => n + 1, (n) => n * 2);
 * forAll(genList, (fa) => expect(failingLaws(laws, fa)).toEqual([]));
 * ```
 */
export function functorLaws<F extends TypeFunction, A, B, C>(
  Fn: Functor<F>,
  EqFA: Eq<$<F, A>>,
  EqFC: Eq<$<F, C>>,
  f: (a: A) => B,
  g: (b: B) => C,
): LawSet<[$<F, A>]> {
  return [
    {
      name: "identity",
      arity: 1,
      description: "Mapping identity preserves structure: F.map(fa, a => a) === fa",
      check: (fa) =>
        EqFA.eqv(
          Fn.map<A, A>(fa, (a) => a),
          fa,
        ),
    },
    {
      name: "composition",
      arity: 1,
      description: "Mapping composes: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))",
      check: (fa) =>
        EqFC.eqv(
          Fn.map<B, C>(Fn.map<A, B>(fa, f), g),
          Fn.map<A, C>(fa, (a) => g(f(a))),
        ),
    },
  ];
}
