/**
 * Data Types Index
 *
 * - Types: `List<A>`, `Maybe<A>`, `Either<E, A>`
 * - Operations: `ListOps.map(...)`, `MaybeOps.filter(...)`, `EitherOps.fold(...)`
 * - Constructors: `Cons(...)`, `Nil`, `Just(...)`, `Nothing`, `Left(...)`, `Right(...)`
 */

// ============================================================================
// List: Immutable singly-linked list
// ============================================================================

export type { List } from "./list.js";
export { Cons, Nil, isCons, isNil, ListImpl } from "./list.js";
export * as ListOps from "./list.js";

// ============================================================================
// Maybe: Zero or one value
// ============================================================================

export type { Maybe } from "./maybe.js";
export { Just, Nothing, isJust, isNothing, MaybeImpl } from "./maybe.js";
export * as MaybeOps from "./maybe.js";

// ============================================================================
// Either: Typed error results
// ============================================================================

export type { Either } from "./either.js";
export { Left, Right, isLeft, isRight } from "./either.js";
export * as EitherOps from "./either.js";
