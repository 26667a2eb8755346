/**
 * Runtime checks shared by the seqlist packages.
 *
 * `unreachable` closes a `switch` over a tagged union: if a variant is added
 * and not handled, the call stops type-checking.
 *
 * ```typescript
 * switch (list._tag) {
 *   case "Nil": return patterns.Nil();
 *   case "Cons": return patterns.Cons(list.head, list.tail);
 *   default: return unreachable(list);
 * }
 * ```
 */

/**
 * Throw when `condition` is false; narrows it to true afterwards.
 */
export function invariant(
  condition: boolean,
  message?: string,
): asserts condition {
  if (condition) return;
  throw new Error(message ?? "Invariant violation");
}

/**
 * Throws with the offending value. Only reachable when a value escaped its
 * static type, e.g. parsed input.
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${JSON.stringify(value)}`);
}
