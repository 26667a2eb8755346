/**
 * Laws for equality instances.
 *
 * `getEq(E)` for List compares length first and then elements pairwise, so
 * it inherits these laws from the element `Eq`. Checking them over random
 * triples of short lists catches comparators that only look at a prefix or
 * ignore trailing elements.
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

/**
 * Reflexivity, symmetry and transitivity of `E.eqv`.
 */
export function eqLaws<A>(E: Eq<A>): LawSet<[A, A, A]> {
  return [
    {
      name: "reflexivity",
      arity: 1,
      description: "eqv(x, x)",
      check: (x) => E.eqv(x, x),
    },
    {
      name: "symmetry",
      arity: 2,
      description: "eqv(x, y) equals eqv(y, x)",
      check: (x, y) => E.eqv(x, y) === E.eqv(y, x),
    },
    {
      name: "transitivity",
      arity: 3,
      description: "eqv(x, y) and eqv(y, z) imply eqv(x, z)",
      check: (x, y, z) => !(E.eqv(x, y) && E.eqv(y, z)) || E.eqv(x, z),
    },
  ];
}
