/**
 * Maybe Data Type
 *
 * A container holding zero or one value: either Just(value) or Nothing.
 * Unlike a nullable, Maybe keeps `Just(null)` and `Nothing` apart, and
 * every operation preserves the "at most one" cardinality.
 *
 * ```typescript
 * map(Just(3), (n) => n * 2)                 // Just(6)
 * flatMap(Just(3), (n) => Just(n % 2 === 0)) // Just(false)
 * filter(Just(3), (n) => n % 2 === 0)        // Nothing
 * ```
 */

import { unreachable } from "@seqlist/core";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import type { Functor } from "../typeclasses/functor.js";
import type { MaybeF } from "../hkt.js";

// ============================================================================
// Maybe Type Definition
// ============================================================================

/**
 * Maybe data type - either Just (one value) or Nothing (no value)
 */
export type Maybe<A> = Just<A> | Nothing;

/**
 * Just variant - holds exactly one value
 */
export interface Just<A> {
  readonly _tag: "Just";
  readonly value: A;
}

/**
 * Nothing variant - holds no value
 */
export interface Nothing {
  readonly _tag: "Nothing";
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Just value
 */
export function Just<A>(value: A): Maybe<A> {
  return { _tag: "Just", value };
}

/**
 * The empty Maybe (singleton)
 */
export const Nothing: Maybe<never> = { _tag: "Nothing" };

/**
 * Create a Maybe from a nullable value (null and undefined become Nothing)
 */
export function fromNullable<A>(value: A | null | undefined): Maybe<A> {
  return value === null || value === undefined ? Nothing : Just(value);
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Maybe is Just
 */
export function isJust<A>(maybe: Maybe<A>): maybe is Just<A> {
  return maybe._tag === "Just";
}

/**
 * Check if Maybe is Nothing
 */
export function isNothing<A>(maybe: Maybe<A>): maybe is Nothing {
  return maybe._tag === "Nothing";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the value
 */
export function map<A, B>(maybe: Maybe<A>, f: (a: A) => B): Maybe<B> {
  return isJust(maybe) ? Just(f(maybe.value)) : Nothing;
}

/**
 * FlatMap over the value. The result of `f` is returned as is.
 */
export function flatMap<A, B>(
  maybe: Maybe<A>,
  f: (a: A) => Maybe<B>,
): Maybe<B> {
  return isJust(maybe) ? f(maybe.value) : Nothing;
}

/**
 * Keep the value only if it satisfies the predicate.
 * A kept Just is returned as the same instance.
 */
export function filter<A>(
  maybe: Maybe<A>,
  predicate: (a: A) => boolean,
): Maybe<A> {
  return isJust(maybe) && predicate(maybe.value) ? maybe : Nothing;
}

/**
 * Fold over Maybe - provide handlers for both cases
 */
export function fold<A, B>(
  maybe: Maybe<A>,
  onNothing: () => B,
  onJust: (a: A) => B,
): B {
  return isJust(maybe) ? onJust(maybe.value) : onNothing();
}

/**
 * Match over Maybe (alias for fold with object syntax)
 */
export function match<A, B>(
  maybe: Maybe<A>,
  patterns: { Nothing: () => B; Just: (a: A) => B },
): B {
  switch (maybe._tag) {
    case "Nothing":
      return patterns.Nothing();
    case "Just":
      return patterns.Just(maybe.value);
    default:
      return unreachable(maybe);
  }
}

/**
 * Get the value or a default
 */
export function getOrElse<A, B>(maybe: Maybe<A>, defaultValue: () => B): A | B {
  return isJust(maybe) ? maybe.value : defaultValue();
}

/**
 * Convert to an array of zero or one element
 */
export function toArray<A>(maybe: Maybe<A>): A[] {
  return isJust(maybe) ? [maybe.value] : [];
}

/**
 * Render as `Just(value)` or `Nothing`
 */
export function toDisplayString<A>(
  maybe: Maybe<A>,
  show: (a: A) => string = String,
): string {
  return isJust(maybe) ? `Just(${show(maybe.value)})` : "Nothing";
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Maybe
 */
export function getEq<A>(E: Eq<A>): Eq<Maybe<A>> {
  return {
    eqv: (x, y) => {
      if (isJust(x) && isJust(y)) return E.eqv(x.value, y.value);
      return isNothing(x) && isNothing(y);
    },
  };
}

/**
 * Show instance for Maybe
 */
export function getShow<A>(S: Show<A>): Show<Maybe<A>> {
  return {
    show: (maybe) => toDisplayString(maybe, S.show),
  };
}

/**
 * Functor instance for Maybe
 */
export const maybeFunctor: Functor<MaybeF> = { map };

// ============================================================================
// Fluent API (Maybe class)
// ============================================================================

/**
 * Maybe with fluent methods
 *
 * @example
 * ```typescript
 * MaybeImpl.just(3).map((n) => n * 2).toString(); // "Just(6)"
 * ```
 */
export class MaybeImpl<A> {
  private constructor(private readonly maybe: Maybe<A>) {}

  static just<A>(value: A): MaybeImpl<A> {
    return new MaybeImpl(Just(value));
  }

  static nothing<A = never>(): MaybeImpl<A> {
    return new MaybeImpl<A>(Nothing);
  }

  static fromNullable<A>(value: A | null | undefined): MaybeImpl<A> {
    return new MaybeImpl(fromNullable(value));
  }

  static from<A>(maybe: Maybe<A>): MaybeImpl<A> {
    return new MaybeImpl(maybe);
  }

  get value(): Maybe<A> {
    return this.maybe;
  }

  isJust(): boolean {
    return isJust(this.maybe);
  }

  isNothing(): boolean {
    return isNothing(this.maybe);
  }

  map<B>(f: (a: A) => B): MaybeImpl<B> {
    return new MaybeImpl(map(this.maybe, f));
  }

  flatMap<B>(f: (a: A) => MaybeImpl<B>): MaybeImpl<B> {
    return new MaybeImpl(flatMap(this.maybe, (a) => f(a).maybe));
  }

  filter(predicate: (a: A) => boolean): MaybeImpl<A> {
    return new MaybeImpl(filter(this.maybe, predicate));
  }

  fold<B>(onNothing: () => B, onJust: (a: A) => B): B {
    return fold(this.maybe, onNothing, onJust);
  }

  getOrElse<B>(defaultValue: () => B): A | B {
    return getOrElse(this.maybe, defaultValue);
  }

  equals(
    other: MaybeImpl<A>,
    eq: (x: A, y: A) => boolean = (x, y) => x === y,
  ): boolean {
    return getEq({ eqv: eq }).eqv(this.maybe, other.maybe);
  }

  toString(): string {
    return toDisplayString(this.maybe);
  }
}
