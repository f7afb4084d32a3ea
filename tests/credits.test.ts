import { describe, expect, test } from "vitest";
import { isZeroCredit, parseCredits } from "../harvest/listing/credits.js";

describe("parseCredits", () => {
  test("fixed values", () => {
    expect(parseCredits("3")).toBe(3);
    expect(parseCredits(" 1.5 ")).toBe(1.5);
    expect(parseCredits("0")).toBe(0);
  });

  test("ranges are ordered and collapse when equal", () => {
    expect(parseCredits("1-3")).toEqual({ min: 1, max: 3 });
    expect(parseCredits("3 - 1")).toEqual({ min: 1, max: 3 });
    expect(parseCredits("2-2")).toBe(2);
  });

  test("anything else is null", () => {
    expect(parseCredits("")).toBeNull();
    expect(parseCredits("var")).toBeNull();
  });
});

describe("isZeroCredit", () => {
  test("only an exact zero counts", () => {
    expect(isZeroCredit(0)).toBe(true);
    expect(isZeroCredit({ min: 0, max: 0 })).toBe(true);
    expect(isZeroCredit({ min: 0, max: 3 })).toBe(false);
    expect(isZeroCredit(3)).toBe(false);
    expect(isZeroCredit(null)).toBe(false);
  });
});
