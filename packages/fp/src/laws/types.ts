/**
 * Law Definition Types for @seqlist/fp
 *
 * A law is a named predicate over generated inputs. Every law in a set takes
 * the same argument tuple; `arity` says how many leading arguments the law
 * actually inspects.
 *
 * @module
 */

/**
 * A single law.
 *
 * @example
 * ```typescript
 * const associativity: Law<[number, number, number]> = {
 *   name: "associativity",
 *   arity: 3,
 *   description: "combine(combine(a, b), c) === combine(a, combine(b, c))",
 *   check: (a, b, c) => (a + b) + c === a + (b + c),
 * };
 * ```
 */
export interface Law<Args extends readonly unknown[]> {
  /** Human-readable name, used in test descriptions */
  readonly name: string;

  /** Returns true if the law holds for the given inputs */
  readonly check: (...args: Args) => boolean;

  /** Number of leading arguments the law uses */
  readonly arity: number;

  /** The law in plain English */
  readonly description?: string;
}

/**
 * A collection of laws over the same inputs.
 */
export type LawSet<Args extends readonly unknown[]> = readonly Law<Args>[];

/**
 * Names of the laws in a set that fail for the given inputs.
 */
export function failingLaws<Args extends readonly unknown[]>(
  laws: LawSet<Args>,
  ...args: Args
): string[] {
  return laws.filter((law) => !law.check(...args)).map((law) => law.name);
}
