/**
 * Higher-Kinded Types for @seqlist/fp
 *
 * Type-level functions use the `this`-type encoding: a type function is an
 * interface whose `_` member mentions `this["__kind__"]`, and applying it
 * intersects the argument into `__kind__`.
 *
 * ```typescript
 * interface ListF extends TypeFunction { readonly _: List<this["__kind__"]> }
 * type Numbers = $<ListF, number>; // → List<number>
 * ```
 *
 * The encoding exists only at the type level; nothing here has a runtime
 * representation.
 */

import type { List } from "./data/list.js";
import type { Maybe } from "./data/maybe.js";

/**
 * Base shape of a type-level function.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply a type-level function to an argument.
 */
export type $<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Alias of `$` for readability in signatures.
 */
export type Kind<F extends TypeFunction, A> = $<F, A>;

/**
 * Type-level function for `List<A>`.
 */
export interface ListF extends TypeFunction {
  readonly _: List<this["__kind__"]>;
}

/**
 * Type-level function for `Maybe<A>`.
 */
export interface MaybeF extends TypeFunction {
  readonly _: Maybe<this["__kind__"]>;
}
