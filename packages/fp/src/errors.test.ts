/**
 * Error class tests
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { config } from "@seqlist/core";
import { SeqlistError, EmptyAccessError, LengthMismatchError } from "./errors.js";
import { head, tail, zipWith, of, Nil } from "./data/list.js";
import { isLeft } from "./data/either.js";

describe("errors", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
    vi.restoreAllMocks();
  });

  it("carry a name, a reason and their details", () => {
    const empty = new EmptyAccessError("tail");
    expect(empty).toBeInstanceOf(SeqlistError);
    expect(empty).toBeInstanceOf(Error);
    expect(empty.name).toBe("EmptyAccessError");
    expect(empty.reason).toBe("empty_access");

    const mismatch = new LengthMismatchError(2, 5);
    expect(mismatch.name).toBe("LengthMismatchError");
    expect(mismatch.reason).toBe("length_mismatch");
    expect([mismatch.leftLength, mismatch.rightLength]).toEqual([2, 5]);
    expect(mismatch.message).toBe("Lists do not have the same length (2 vs 5)");
  });

  it("log a diagnostic line when debug is enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    config.set({ debug: true });

    head(Nil);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      "[seqlist][fp] empty_access: Cannot take the head of an empty list",
    );
  });

  it("stay silent when debug is disabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    config.set({ debug: false });

    new LengthMismatchError(1, 0);

    expect(log).not.toHaveBeenCalled();
  });

  describe("with an unreadable config file", () => {
    let originalCwd: string;
    let tmpDir: string;

    beforeEach(() => {
      originalCwd = process.cwd();
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "seqlist-errors-"));
      fs.writeFileSync(path.join(tmpDir, ".seqlistrc.json"), "{ debug: ");
      process.chdir(tmpDir);
      config.reset();
    });

    afterEach(() => {
      process.chdir(originalCwd);
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("still return Left from head, tail and zipWith", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});

      const first = head(Nil);
      const rest = tail(Nil);
      const zipped = zipWith(of(1), Nil, (a: number, b: number) => a + b);

      expect(isLeft(first) && first.left).toBeInstanceOf(EmptyAccessError);
      expect(isLeft(rest) && rest.left).toBeInstanceOf(EmptyAccessError);
      expect(isLeft(zipped) && zipped.left).toBeInstanceOf(LengthMismatchError);
    });
  });
});
