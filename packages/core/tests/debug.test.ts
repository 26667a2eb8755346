import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  config,
  debugLog,
  formatDebugLine,
  isDebugEnabled,
} from "@seqlist/core";

describe("debugLog", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("is silent while debug is disabled", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    debugLog("list", "hello");
    expect(isDebugEnabled()).toBe(false);
    expect(spy).not.toHaveBeenCalled();
  });

  it("writes a prefixed line when debug is enabled", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    config.set({ debug: true });
    debugLog("list", "hello");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[seqlist][list] hello");
  });

  it("uses the configured prefix", () => {
    config.set({ log: { prefix: ">" } });
    expect(formatDebugLine("maybe", "x")).toBe(">[maybe] x");
  });
});
