import { describe, it, expect } from "vitest";
import { anyArg, argThat, argsMatch, valueMatches } from "../src/index.js";

describe("value matching", () => {
  it("should compare scalars by value", () => {
    expect(valueMatches("pending", "pending")).toBe(true);
    expect(valueMatches("pending", "shipped")).toBe(false);
    expect(valueMatches(42, 42)).toBe(true);
    expect(valueMatches(1.5, 1.5)).toBe(true);
    expect(valueMatches(1.5, 1.50001)).toBe(false);
    expect(valueMatches(true, true)).toBe(true);
    expect(valueMatches(true, false)).toBe(false);
    expect(valueMatches(10n, 10n)).toBe(true);
  });

  it("should be type-sensitive", () => {
    expect(valueMatches(1, "1")).toBe(false);
    expect(valueMatches("1", 1)).toBe(false);
    expect(valueMatches(1, 1n)).toBe(false);
    expect(valueMatches(0, false)).toBe(false);
    expect(valueMatches(1, null)).toBe(false);
  });

  it("should match any two timestamps regardless of their value", () => {
    const declared = new Date("2024-01-01T00:00:00Z");
    expect(valueMatches(declared, new Date("1999-12-31T23:59:59Z"))).toBe(true);
    expect(valueMatches(declared, new Date())).toBe(true);
  });

  it("should not relax timestamp slots to other types", () => {
    const declared = new Date("2024-01-01T00:00:00Z");
    expect(valueMatches(declared, "2024-01-01T00:00:00Z")).toBe(false);
    expect(valueMatches(declared, declared.getTime())).toBe(false);
  });

  it("should only match null against null", () => {
    expect(valueMatches(null, null)).toBe(true);
    expect(valueMatches(null, undefined)).toBe(false);
    expect(valueMatches(null, 0)).toBe(false);
  });

  it("should reject types outside the supported scalars", () => {
    expect(valueMatches(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(false);
  });

  it("should defer to argument matchers", () => {
    expect(valueMatches(anyArg(), { anything: true })).toBe(true);
    expect(valueMatches(anyArg(), undefined)).toBe(true);

    const positive = argThat("a positive number", (value) => typeof value === "number" && value > 0);
    expect(valueMatches(positive, 3)).toBe(true);
    expect(valueMatches(positive, -3)).toBe(false);
  });

  describe("argument lists", () => {
    it("should leave arguments unchecked when none were declared", () => {
      expect(argsMatch(undefined, [1, "two", null])).toBe(true);
      expect(argsMatch(undefined, [])).toBe(true);
    });

    it("should require equal length", () => {
      expect(argsMatch([1], [1, 2])).toBe(false);
      expect(argsMatch([1, 2], [1])).toBe(false);
      expect(argsMatch([], [])).toBe(true);
    });

    it("should match slot by slot", () => {
      expect(argsMatch([1, "a", anyArg()], [1, "a", new Date()])).toBe(true);
      expect(argsMatch([1, "a"], [1, "b"])).toBe(false);
    });
  });
});
