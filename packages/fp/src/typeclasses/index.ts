/**
 * Typeclasses for @seqlist/fp
 */

export type { Eq, Ord } from "./eq.js";
export {
  eqStrict,
  eqNumber,
  eqString,
  ordFromComparator,
  ordNumber,
  ordString,
  eqBy,
} from "./eq.js";

export type { Show } from "./show.js";
export { showString, showNumber, showWith } from "./show.js";

export type { Semigroup, Monoid } from "./semigroup.js";
export {
  monoidSum,
  monoidProduct,
  monoidString,
  combineAll,
} from "./semigroup.js";

export type { Functor } from "./functor.js";
export { lift } from "./functor.js";
