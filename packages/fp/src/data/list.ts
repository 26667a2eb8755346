/**
 * Immutable List Data Type
 *
 * A purely functional, immutable singly-linked list.
 * Either Cons(head, tail) or Nil (empty).
 *
 * Lists are never mutated after construction, so tails are shared freely:
 * `prepend` reuses the list it extends and `append` reuses its right operand.
 * Every traversal is a loop over the cells, so long lists do not grow the
 * call stack.
 *
 * Element types are covariant: both variants only expose `readonly` fields,
 * so a `List<Cat>` can be passed where a `List<Animal>` is expected, and
 * `Nil` (a `List<never>`) fits every `List<A>`.
 */

import { unreachable } from "@seqlist/core";
import type { Either } from "./either.js";
import { Left, Right, map as mapEither } from "./either.js";
import type { Maybe } from "./maybe.js";
import { isJust } from "./maybe.js";
import { EmptyAccessError, LengthMismatchError } from "../errors.js";
import type { Eq, Ord } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import type { Semigroup, Monoid } from "../typeclasses/semigroup.js";
import type { Functor } from "../typeclasses/functor.js";
import type { ListF } from "../hkt.js";

// ============================================================================
// List Type Definition
// ============================================================================

/**
 * List data type - either Cons (non-empty) or Nil (empty)
 */
export type List<A> = Cons<A> | Nil;

/**
 * Cons variant - contains head and tail
 */
export interface Cons<A> {
  readonly _tag: "Cons";
  readonly head: A;
  readonly tail: List<A>;
}

/**
 * Nil variant - empty list
 */
export interface Nil {
  readonly _tag: "Nil";
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Cons cell
 */
export function Cons<A>(head: A, tail: List<A>): List<A> {
  return { _tag: "Cons", head, tail };
}

/**
 * The empty list (singleton)
 */
export const Nil: List<never> = { _tag: "Nil" };

/**
 * Create a list from variadic arguments
 */
export function of<A>(...as: A[]): List<A> {
  return fromArray(as);
}

/**
 * Create a list from an array
 */
export function fromArray<A>(arr: readonly A[]): List<A> {
  let result: List<A> = Nil;
  for (let i = arr.length - 1; i >= 0; i--) {
    result = Cons(arr[i], result);
  }
  return result;
}

/**
 * Create a list from an iterable
 */
export function fromIterable<A>(iter: Iterable<A>): List<A> {
  return fromArray([...iter]);
}

/**
 * Create a single-element list
 */
export function singleton<A>(a: A): List<A> {
  return Cons(a, Nil);
}

/**
 * Create a list of zero or one element from a Maybe
 */
export function fromMaybe<A>(maybe: Maybe<A>): List<A> {
  return isJust(maybe) ? singleton(maybe.value) : Nil;
}

/**
 * Create an empty list
 */
export function empty<A = never>(): List<A> {
  return Nil;
}

/**
 * Prepend an element in O(1). The receiver becomes the tail of the result.
 *
 * The element may widen the element type:
 * `prepend("x", of(1, 2))` is a `List<string | number>`.
 */
export function prepend<A, B>(element: B, list: List<A>): List<A | B> {
  return Cons<A | B>(element, list);
}

export { prepend as add };

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if List is Cons (non-empty)
 */
export function isCons<A>(list: List<A>): list is Cons<A> {
  return list._tag === "Cons";
}

/**
 * Check if List is Nil (empty)
 */
export function isNil<A>(list: List<A>): list is Nil {
  return list._tag === "Nil";
}

/**
 * Check if list is empty
 */
export function isEmpty<A>(list: List<A>): boolean {
  return isNil(list);
}

// ============================================================================
// Basic Operations
// ============================================================================

/**
 * Get the first element, or an EmptyAccessError for the empty list
 */
export function head<A>(list: List<A>): Either<EmptyAccessError, A> {
  return isCons(list)
    ? Right(list.head)
    : Left(new EmptyAccessError("head"));
}

/**
 * Get everything after the first element, or an EmptyAccessError for the
 * empty list
 */
export function tail<A>(list: List<A>): Either<EmptyAccessError, List<A>> {
  return isCons(list)
    ? Right(list.tail)
    : Left(new EmptyAccessError("tail"));
}

/**
 * Get the first element.
 *
 * @throws EmptyAccessError on the empty list
 */
export function unsafeHead<A>(list: List<A>): A {
  if (isNil(list)) throw new EmptyAccessError("head");
  return list.head;
}

/**
 * Get everything after the first element.
 *
 * @throws EmptyAccessError on the empty list
 */
export function unsafeTail<A>(list: List<A>): List<A> {
  if (isNil(list)) throw new EmptyAccessError("tail");
  return list.tail;
}

/**
 * Get the length of the list
 */
export function length<A>(list: List<A>): number {
  let count = 0;
  let current = list;
  while (isCons(current)) {
    count++;
    current = current.tail;
  }
  return count;
}

// ============================================================================
// Transformations
// ============================================================================

/**
 * Map over the list. `f` runs once per element, head first.
 */
export function map<A, B>(list: List<A>, f: (a: A) => B): List<B> {
  let acc: List<B> = Nil;
  let current = list;
  while (isCons(current)) {
    acc = Cons(f(current.head), acc);
    current = current.tail;
  }
  return reverse(acc);
}

/**
 * Keep the elements satisfying the predicate, in their original order
 */
export function filter<A>(
  list: List<A>,
  predicate: (a: A) => boolean,
): List<A> {
  let acc: List<A> = Nil;
  let current = list;
  while (isCons(current)) {
    if (predicate(current.head)) {
      acc = Cons(current.head, acc);
    }
    current = current.tail;
  }
  return reverse(acc);
}

/**
 * Concatenate two lists. The elements of `left` come first; `right` is
 * shared as the tail of the result rather than copied.
 */
export function append<A, B>(left: List<A>, right: List<B>): List<A | B> {
  if (isNil(left)) return right;
  if (isNil(right)) return left;
  let reversed = reverse(left);
  let result: List<A | B> = right;
  while (isCons(reversed)) {
    result = Cons<A | B>(reversed.head, result);
    reversed = reversed.tail;
  }
  return result;
}

/**
 * Concatenate, in order, the lists `f` produces for each element
 */
export function flatMap<A, B>(list: List<A>, f: (a: A) => List<B>): List<B> {
  let acc: List<B> = Nil;
  let current = list;
  while (isCons(current)) {
    let inner = f(current.head);
    while (isCons(inner)) {
      acc = Cons(inner.head, acc);
      inner = inner.tail;
    }
    current = current.tail;
  }
  return reverse(acc);
}

/**
 * Flatten a list of lists
 */
export function flatten<A>(lists: List<List<A>>): List<A> {
  return flatMap(lists, (list) => list);
}

/**
 * Reverse the list
 */
export function reverse<A>(list: List<A>): List<A> {
  let result: List<A> = Nil;
  let current = list;
  while (isCons(current)) {
    result = Cons(current.head, result);
    current = current.tail;
  }
  return result;
}

/**
 * Insertion sort.
 *
 * Equivalent to sorting the tail first and then inserting the head before
 * the first element `y` of the sorted tail with `compare(head, y) <= 0`.
 * Elements that compare equal therefore keep their input order. The
 * insertion runs from the last element back to the first, so no recursion
 * is needed. O(n²) comparisons.
 */
export function sort<A>(
  list: List<A>,
  compare: (x: A, y: A) => number,
): List<A> {
  let sorted: List<A> = Nil;
  let pending = reverse(list);
  while (isCons(pending)) {
    sorted = insertSorted(pending.head, sorted, compare);
    pending = pending.tail;
  }
  return sorted;
}

function insertSorted<A>(
  x: A,
  sorted: List<A>,
  compare: (x: A, y: A) => number,
): List<A> {
  // Elements that stay in front of x, most recent first
  let passed: List<A> = Nil;
  let rest = sorted;
  while (isCons(rest) && compare(x, rest.head) > 0) {
    passed = Cons(rest.head, passed);
    rest = rest.tail;
  }
  let result: List<A> = Cons(x, rest);
  while (isCons(passed)) {
    result = Cons(passed.head, result);
    passed = passed.tail;
  }
  return result;
}

/**
 * Sort by a key with an Ord instance
 */
export function sortBy<A, B>(list: List<A>, f: (a: A) => B, O: Ord<B>): List<A> {
  return sort(list, (x, y) => O.compare(f(x), f(y)));
}

/**
 * Combine two lists of equal length position by position.
 *
 * Lengths are compared before `combine` is called, so a mismatch yields a
 * LengthMismatchError without ever running `combine`, whichever side is
 * longer.
 */
export function zipWith<A, B, C>(
  left: List<A>,
  right: List<B>,
  combine: (a: A, b: B) => C,
): Either<LengthMismatchError, List<C>> {
  const leftLength = length(left);
  const rightLength = length(right);
  if (leftLength !== rightLength) {
    return Left(new LengthMismatchError(leftLength, rightLength));
  }

  let acc: List<C> = Nil;
  let currentA = left;
  let currentB = right;
  while (isCons(currentA) && isCons(currentB)) {
    acc = Cons(combine(currentA.head, currentB.head), acc);
    currentA = currentA.tail;
    currentB = currentB.tail;
  }
  return Right(reverse(acc));
}

/**
 * Pair two lists of equal length
 */
export function zip<A, B>(
  left: List<A>,
  right: List<B>,
): Either<LengthMismatchError, List<[A, B]>> {
  return zipWith(left, right, (a, b): [A, B] => [a, b]);
}

// ============================================================================
// Folds
// ============================================================================

/**
 * Left fold: `op` is applied once per element, strictly head to tail
 */
export function fold<A, B>(list: List<A>, seed: B, op: (acc: B, a: A) => B): B {
  let acc = seed;
  let current = list;
  while (isCons(current)) {
    acc = op(acc, current.head);
    current = current.tail;
  }
  return acc;
}

export { fold as foldLeft };

/**
 * Right fold (reverse + left fold)
 */
export function foldRight<A, B>(
  list: List<A>,
  seed: B,
  op: (a: A, acc: B) => B,
): B {
  return fold(reverse(list), seed, (acc, a) => op(a, acc));
}

// ============================================================================
// Pattern Matching
// ============================================================================

/**
 * Exhaustive dispatch over the two variants
 *
 * @example
 * ```typescript
 * match(list, {
 *   Nil: () => "List is empty",
 *   Cons: (h, t) => `Head is ${h} and tail is ${toDisplayString(t)}`,
 * });
 * ```
 */
export function match<A, B>(
  list: List<A>,
  patterns: { Nil: () => B; Cons: (head: A, tail: List<A>) => B },
): B {
  switch (list._tag) {
    case "Nil":
      return patterns.Nil();
    case "Cons":
      return patterns.Cons(list.head, list.tail);
    default:
      return unreachable(list);
  }
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert list to array
 */
export function toArray<A>(list: List<A>): A[] {
  const result: A[] = [];
  let current = list;
  while (isCons(current)) {
    result.push(current.head);
    current = current.tail;
  }
  return result;
}

/**
 * Render as `[e1 e2 e3]`: elements separated by single spaces, `[]` when
 * empty
 */
export function toDisplayString<A>(
  list: List<A>,
  show: (a: A) => string = String,
): string {
  return `[${toArray(list)
    .map((a) => show(a))
    .join(" ")}]`;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Structural equality: same length and pairwise equal elements
 */
export function equals<A>(
  x: List<A>,
  y: List<A>,
  eq: (a: A, b: A) => boolean = (a, b) => a === b,
): boolean {
  let currentX = x;
  let currentY = y;
  while (isCons(currentX) && isCons(currentY)) {
    if (!eq(currentX.head, currentY.head)) return false;
    currentX = currentX.tail;
    currentY = currentY.tail;
  }
  return isNil(currentX) && isNil(currentY);
}

/**
 * Eq instance for List
 */
export function getEq<A>(E: Eq<A>): Eq<List<A>> {
  return {
    eqv: (x, y) => equals(x, y, E.eqv),
  };
}

/**
 * Show instance for List
 */
export function getShow<A>(S: Show<A>): Show<List<A>> {
  return {
    show: (list) => toDisplayString(list, S.show),
  };
}

/**
 * Semigroup instance for List (concatenation)
 */
export function getSemigroup<A>(): Semigroup<List<A>> {
  return {
    combine: append,
  };
}

/**
 * Monoid instance for List
 */
export function getMonoid<A>(): Monoid<List<A>> {
  return {
    ...getSemigroup<A>(),
    empty: Nil,
  };
}

/**
 * Functor instance for List
 */
export const listFunctor: Functor<ListF> = { map };

// ============================================================================
// Do-notation Support
// ============================================================================

/**
 * Start a do-comprehension with List
 *
 * @example
 * ```typescript
 * const pairs = bind("s", () => of("a", "b"))(bind("n", () => of(1, 2))(Do));
 * // [{ n: 1, s: "a" } { n: 1, s: "b" } { n: 2, s: "a" } { n: 2, s: "b" }]
 * ```
 */
export const Do: List<{}> = singleton({});

/**
 * Bind a value in do-notation style
 */
export function bind<N extends string, A extends object, B>(
  name: Exclude<N, keyof A>,
  f: (a: A) => List<B>,
): (list: List<A>) => List<A & { readonly [K in N]: B }> {
  return (list) =>
    flatMap(list, (a) =>
      map(f(a), (b) => ({ ...a, [name]: b }) as A & { readonly [K in N]: B }),
    );
}

/**
 * Let - bind a non-effectful value
 */
export function let_<N extends string, A extends object, B>(
  name: Exclude<N, keyof A>,
  f: (a: A) => B,
): (list: List<A>) => List<A & { readonly [K in N]: B }> {
  return (list) =>
    map(list, (a) => ({ ...a, [name]: f(a) }) as A & { readonly [K in N]: B });
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Perform a side effect for each element, head first
 */
export function forEach<A>(list: List<A>, action: (a: A) => void): void {
  let current = list;
  while (isCons(current)) {
    action(current.head);
    current = current.tail;
  }
}

// ============================================================================
// Fluent API (List class)
// ============================================================================

/**
 * List with fluent methods
 *
 * @example
 * ```typescript
 * ListImpl.of(1, 2, 3).map((n) => n * 2).toString(); // "[2 4 6]"
 * ```
 */
export class ListImpl<A> implements Iterable<A> {
  private constructor(private readonly list: List<A>) {}

  static of<A>(...as: A[]): ListImpl<A> {
    return new ListImpl(fromArray(as));
  }

  static empty<A = never>(): ListImpl<A> {
    return new ListImpl<A>(Nil);
  }

  static from<A>(list: List<A>): ListImpl<A> {
    return new ListImpl(list);
  }

  get value(): List<A> {
    return this.list;
  }

  head(): Either<EmptyAccessError, A> {
    return head(this.list);
  }

  tail(): Either<EmptyAccessError, ListImpl<A>> {
    return mapEither(tail(this.list), ListImpl.from);
  }

  isEmpty(): boolean {
    return isEmpty(this.list);
  }

  length(): number {
    return length(this.list);
  }

  add<B>(element: B): ListImpl<A | B> {
    return new ListImpl(prepend(element, this.list));
  }

  map<B>(f: (a: A) => B): ListImpl<B> {
    return new ListImpl(map(this.list, f));
  }

  filter(predicate: (a: A) => boolean): ListImpl<A> {
    return new ListImpl(filter(this.list, predicate));
  }

  flatMap<B>(f: (a: A) => ListImpl<B>): ListImpl<B> {
    return new ListImpl(flatMap(this.list, (a) => f(a).list));
  }

  append<B>(other: ListImpl<B>): ListImpl<A | B> {
    return new ListImpl(append(this.list, other.list));
  }

  foreach(action: (a: A) => void): void {
    forEach(this.list, action);
  }

  sort(compare: (x: A, y: A) => number): ListImpl<A> {
    return new ListImpl(sort(this.list, compare));
  }

  zipWith<B, C>(
    other: ListImpl<B>,
    combine: (a: A, b: B) => C,
  ): Either<LengthMismatchError, ListImpl<C>> {
    return mapEither(zipWith(this.list, other.list, combine), ListImpl.from);
  }

  fold<B>(seed: B, op: (acc: B, a: A) => B): B {
    return fold(this.list, seed, op);
  }

  equals(
    other: ListImpl<A>,
    eq: (x: A, y: A) => boolean = (x, y) => x === y,
  ): boolean {
    return equals(this.list, other.list, eq);
  }

  toArray(): A[] {
    return toArray(this.list);
  }

  toString(): string {
    return toDisplayString(this.list);
  }

  *[Symbol.iterator](): Iterator<A> {
    let current = this.list;
    while (isCons(current)) {
      yield current.head;
      current = current.tail;
    }
  }
}
