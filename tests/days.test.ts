import { describe, expect, test } from "vitest";
import { canonicalizeDays } from "../harvest/listing/days.js";

describe("canonicalizeDays", () => {
  test.each([
    ["MWF", ["Mon", "Wed", "Fri"]],
    ["TuTh", ["Tue", "Thu"]],
    ["MTWRF", ["Mon", "Tue", "Wed", "Thu", "Fri"]],
    ["TR", ["Tue", "Thu"]],
    ["SaSu", ["Sat", "Sun"]],
    ["Th", ["Thu"]],
    ["M W", ["Mon", "Wed"]],
  ] as const)("%s", (token, expected) => {
    expect(canonicalizeDays(token)).toEqual(expected);
  });

  test("drops repeats, keeping first-occurrence order", () => {
    expect(canonicalizeDays("WMW")).toEqual(["Wed", "Mon"]);
    expect(canonicalizeDays("TuT")).toEqual(["Tue"]);
  });

  test("ignores characters it does not know", () => {
    expect(canonicalizeDays("Mx?F")).toEqual(["Mon", "Fri"]);
  });

  test("TBA and empty tokens have no days", () => {
    expect(canonicalizeDays("TBA")).toEqual([]);
    expect(canonicalizeDays("  ")).toEqual([]);
  });
});
