/**
 * @seqlist/fp Law Definitions
 *
 * Laws are data, not just comments: each one can be checked against
 * generated inputs.
 *
 * ```typescript
 * import { monoidLaws, failingLaws } from "@seqlist/fp/laws";
 * import { forAll } from "@seqlist/testing";
 *
 * const laws = monoidLaws(getMonoid<number>(), getEq(eqNumber));
 * forAll(genListTriple, ([x, y, z]) => {
 *   expect(failingLaws(laws, x, y, z)).toEqual([]);
 * });
 * ```
 *
 * @module
 */

export type { Law, LawSet } from "./types.js";
export { failingLaws } from "./types.js";

export { eqLaws } from "./eq.js";
export { semigroupLaws, monoidLaws } from "./semigroup.js";
export { functorLaws } from "./functor.js";
