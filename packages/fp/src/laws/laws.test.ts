/**
 * Law checks for the List and Maybe instances
 */
import { describe, it, expect } from "vitest";
import {
  forAll,
  genArray,
  genInt,
  genPair,
  genTriple,
  mapGen,
} from "@seqlist/testing";
import { eqNumber, eqString } from "../typeclasses/eq.js";
import { monoidSum, monoidString } from "../typeclasses/semigroup.js";
import type { ListF, MaybeF } from "../hkt.js";
import * as L from "../data/list.js";
import * as M from "../data/maybe.js";
import {
  eqLaws,
  semigroupLaws,
  monoidLaws,
  functorLaws,
  failingLaws,
} from "./index.js";

// Small element range so that equal lists come up often
const genList = mapGen(genArray(genInt(0, 2), 3), L.fromArray);
const genMaybe = mapGen(
  genPair(genInt(0, 2), genInt(0, 2)),
  ([tag, n]): M.Maybe<number> => (tag === 0 ? M.Nothing : M.Just(n)),
);

const listEq = L.getEq(eqNumber);
const maybeEq = M.getEq(eqNumber);

describe("laws", () => {
  describe("List", () => {
    it("Eq is reflexive, symmetric and transitive", () => {
      const laws = eqLaws(listEq);
      forAll(genTriple(genList, genList, genList), 300, ([x, y, z]) => {
        expect(failingLaws(laws, x, y, z)).toEqual([]);
      });
    });

    it("append is an associative Monoid with Nil as identity", () => {
      const laws = monoidLaws(L.getMonoid<number>(), listEq);
      expect(laws.map((law) => law.name)).toEqual([
        "associativity",
        "left identity",
        "right identity",
      ]);
      forAll(genTriple(genList, genList, genList), ([x, y, z]) => {
        expect(failingLaws(laws, x, y, z)).toEqual([]);
      });
    });

    it("map satisfies the Functor laws", () => {
      const laws = functorLaws<ListF, number, number, string>(
        L.listFunctor,
        listEq,
        L.getEq(eqString),
        (n) => n + 1,
        (n) => String(n * 2),
      );
      forAll(genList, (xs) => {
        expect(failingLaws(laws, xs)).toEqual([]);
      });
    });
  });

  describe("Maybe", () => {
    it("Eq is reflexive, symmetric and transitive", () => {
      const laws = eqLaws(maybeEq);
      forAll(genTriple(genMaybe, genMaybe, genMaybe), ([x, y, z]) => {
        expect(failingLaws(laws, x, y, z)).toEqual([]);
      });
    });

    it("map satisfies the Functor laws", () => {
      const laws = functorLaws<MaybeF, number, string, number>(
        M.maybeFunctor,
        maybeEq,
        maybeEq,
        (n) => `${n}`,
        (s) => s.length,
      );
      forAll(genMaybe, (m) => {
        expect(failingLaws(laws, m)).toEqual([]);
      });
    });
  });

  describe("instances", () => {
    it("monoidSum and monoidString obey the Monoid laws", () => {
      const sumLaws = monoidLaws(monoidSum, eqNumber);
      forAll(genTriple(genInt(-9, 9), genInt(-9, 9), genInt(-9, 9)), ([a, b, c]) => {
        expect(failingLaws(sumLaws, a, b, c)).toEqual([]);
      });
      expect(failingLaws(monoidLaws(monoidString, eqString), "a", "b", "c")).toEqual(
        [],
      );
    });

    it("reports the name of a broken law", () => {
      const subtraction = { combine: (x: number, y: number) => x - y };
      expect(failingLaws(semigroupLaws(subtraction, eqNumber), 1, 2, 3)).toEqual([
        "associativity",
      ]);
    });
  });
});
