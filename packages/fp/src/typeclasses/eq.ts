/**
 * Equality and ordering instances.
 *
 * `Ord.compare` follows the comparator convention used by `sort`: negative
 * when `x` goes first, zero for ties, positive when `y` goes first. Any
 * comparator passed to `sort` can be lifted with `ordFromComparator`.
 */

/** Decides when two values are the same. */
export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/** A total order consistent with its `eqv`. */
export interface Ord<A> extends Eq<A> {
  readonly compare: (x: A, y: A) => number;
}

/** Equality by `===`. */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

export const eqNumber: Eq<number> = eqStrict();
export const eqString: Eq<string> = eqStrict();

/**
 * Lift a sort comparator into an Ord. Two values are equal exactly when the
 * comparator ties them.
 */
export function ordFromComparator<A>(compare: (x: A, y: A) => number): Ord<A> {
  return {
    eqv: (x, y) => compare(x, y) === 0,
    compare,
  };
}

export const ordNumber: Ord<number> = ordFromComparator((x, y) => x - y);

export const ordString: Ord<string> = ordFromComparator((x, y) =>
  x < y ? -1 : x > y ? 1 : 0,
);

/** Compare values through a key. */
export function eqBy<A, K>(E: Eq<K>, key: (a: A) => K): Eq<A> {
  return { eqv: (x, y) => E.eqv(key(x), key(y)) };
}
