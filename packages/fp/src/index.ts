/**
 * @seqlist/fp: Immutable sequences with a typed functional vocabulary
 *
 * Features:
 * - `List<A>`: persistent singly-linked list (map, filter, flatMap, append,
 *   sort, zipWith, fold)
 * - `Maybe<A>`: zero-or-one container with the same vocabulary
 * - `Either<E, A>`: typed results for operations with preconditions
 * - Eq / Show / Semigroup / Monoid / Functor instances and their laws
 *
 * @example
 * ```typescript
 * import { ListOps, EitherOps } from "@seqlist/fp";
 *
 * const xs = ListOps.of(7, 1, 5);
 * ListOps.toDisplayString(ListOps.sort(xs, (a, b) => a - b)); // "[1 5 7]"
 *
 * EitherOps.fold(
 *   ListOps.head(ListOps.empty<number>()),
 *   (err) => err.message, // "Cannot take the head of an empty list"
 *   (n) => `first: ${n}`,
 * );
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type { $, Kind, TypeFunction, ListF, MaybeF } from "./hkt.js";

// ============================================================================
// Typeclasses - namespace export to avoid collisions
// ============================================================================

export * as TC from "./typeclasses/index.js";
export type {
  Eq,
  Ord,
  Show,
  Semigroup,
  Monoid,
  Functor,
} from "./typeclasses/index.js";

// ============================================================================
// Data Types
// ============================================================================

export * from "./data/index.js";

// ============================================================================
// Errors
// ============================================================================

export {
  SeqlistError,
  EmptyAccessError,
  LengthMismatchError,
} from "./errors.js";
export type { SeqlistErrorReason } from "./errors.js";

// ============================================================================
// Typeclass Laws (for verification and property testing)
// ============================================================================

export * as Laws from "./laws/index.js";
export type { Law, LawSet } from "./laws/index.js";
export {
  eqLaws,
  semigroupLaws,
  monoidLaws,
  functorLaws,
  failingLaws,
} from "./laws/index.js";
