/**
 * Laws for combining instances.
 *
 * For lists `combine` is `append` and `empty` is `Nil`:
 * `append(append(a, b), c)` and `append(a, append(b, c))` must hold the same
 * elements in the same order, and appending `Nil` on either side must give
 * back an equal list (`append` even returns the other operand itself).
 *
 * @module
 */

import type { Semigroup, Monoid } from "../typeclasses/semigroup.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Law, LawSet } from "./types.js";

/**
 * Associativity of `S.combine`, compared with `E`.
 */
export function semigroupLaws<A>(S: Semigroup<A>, E: Eq<A>): LawSet<[A, A, A]> {
  const { combine } = S;
  return [
    {
      name: "associativity",
      arity: 3,
      description: "grouping does not matter: (x + y) + z equals x + (y + z)",
      check: (x, y, z) =>
        E.eqv(combine(combine(x, y), z), combine(x, combine(y, z))),
    },
  ];
}

/**
 * The semigroup laws plus both identity laws for `M.empty`.
 */
export function monoidLaws<A>(M: Monoid<A>, E: Eq<A>): LawSet<[A, A, A]> {
  const identity = (
    name: string,
    combineWithEmpty: (x: A) => A,
  ): Law<[A, A, A]> => ({
    name,
    arity: 1,
    description: `${name}: combining with empty leaves x unchanged`,
    check: (x) => E.eqv(combineWithEmpty(x), x),
  });

  return [
    ...semigroupLaws(M, E),
    identity("left identity", (x) => M.combine(M.empty, x)),
    identity("right identity", (x) => M.combine(x, M.empty)),
  ];
}
