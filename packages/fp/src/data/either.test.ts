/**
 * Either Tests
 */
import { describe, it, expect } from "vitest";
import { eqNumber, eqString } from "../typeclasses/eq.js";
import { showNumber, showString } from "../typeclasses/show.js";
import {
  type Either,
  Left,
  Right,
  isLeft,
  isRight,
  map,
  mapLeft,
  flatMap,
  fold,
  match,
  getOrElse,
  getOrThrow,
  getEq,
  getShow,
} from "./either.js";

const parse = (s: string): Either<string, number> =>
  /^-?\d+$/.test(s) ? Right(parseInt(s, 10)) : Left(`not a number: ${s}`);

describe("Either", () => {
  it("Left and Right are told apart by the guards", () => {
    expect(isLeft(Left("e"))).toBe(true);
    expect(isRight(Right(1))).toBe(true);
    expect(isRight(Left("e"))).toBe(false);
  });

  it("map and flatMap act on Right only", () => {
    const show = getShow(showString, showNumber);
    expect(show.show(map(parse("4"), (n) => n * 2))).toBe("Right(8)");
    expect(show.show(map(parse("x"), (n) => n * 2))).toBe(
      'Left("not a number: x")',
    );
    expect(show.show(flatMap(parse("4"), (n) => parse(String(n + 1))))).toBe(
      "Right(5)",
    );
  });

  it("mapLeft acts on Left only", () => {
    const result = mapLeft(parse("x"), (e) => e.length);
    expect(fold(result, (len) => len, () => -1)).toBe(15);
    expect(getOrThrow(mapLeft(parse("1"), (e) => e.length))).toBe(1);
  });

  it("fold, match and getOrElse eliminate both cases", () => {
    expect(fold(parse("7"), () => "bad", (n) => `ok ${n}`)).toBe("ok 7");
    expect(match(parse("?"), { Left: (e) => e, Right: String })).toBe(
      "not a number: ?",
    );
    expect(getOrElse(parse("?"), () => 0)).toBe(0);
  });

  it("getOrThrow throws the Left value", () => {
    const error = new Error("boom");
    expect(() => getOrThrow(Left(error))).toThrow(error);
    expect(getOrThrow(Right("fine"))).toBe("fine");
  });

  it("getEq compares side and value", () => {
    const E = getEq(eqString, eqNumber);
    expect(E.eqv(Right(1), Right(1))).toBe(true);
    expect(E.eqv(Left("a"), Left("a"))).toBe(true);
    expect(E.eqv(Left("1"), Right(1))).toBe(false);
  });
});
