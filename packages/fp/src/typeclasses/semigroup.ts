/**
 * Semigroup and Monoid
 *
 * `combine` must be associative; a Monoid's `empty` is a left and right
 * identity for it. List concatenation with `Nil` is the instance this
 * package cares about (`getMonoid` in `data/list.ts`).
 */

export interface Semigroup<A> {
  readonly combine: (x: A, y: A) => A;
}

export interface Monoid<A> extends Semigroup<A> {
  readonly empty: A;
}

export const monoidSum: Monoid<number> = {
  combine: (x, y) => x + y,
  empty: 0,
};

export const monoidProduct: Monoid<number> = {
  combine: (x, y) => x * y,
  empty: 1,
};

export const monoidString: Monoid<string> = {
  combine: (x, y) => x + y,
  empty: "",
};

/**
 * Combine every value left to right, starting from `empty`.
 *
 * @example
 * ```typescript
 * combineAll(monoidProduct, [1, 2, 3]); // 6
 * ```
 */
export function combineAll<A>(M: Monoid<A>, values: Iterable<A>): A {
  let acc = M.empty;
  for (const value of values) {
    acc = M.combine(acc, value);
  }
  return acc;
}
