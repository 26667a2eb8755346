/**
 * Show: render a value for display.
 *
 * Element renderers plug into `getShow` for List and Maybe, so
 * `getShow(showString)` displays `of("a", "b")` as `["a" "b"]` while the
 * default `toDisplayString` gives `[a b]`.
 */

export interface Show<A> {
  readonly show: (a: A) => string;
}

/** Quoted, escaped strings. */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

/** A Show from any rendering function; `String` when none is given. */
export function showWith<A>(render: (a: A) => string = String): Show<A> {
  return { show: render };
}
