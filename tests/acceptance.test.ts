import { describe, expect, test } from "vitest";
import { acceptRow } from "../harvest/listing/acceptance.js";

const row = { number: "", section: "", callNumber: "", title: "" };

describe("acceptRow", () => {
  test("a titled row with no identifying field is rejected", () => {
    expect(acceptRow({ ...row, title: "COMPUTER SCIENCE" })).toBe(false);
  });

  test("an untitled row is rejected whatever else it has", () => {
    expect(acceptRow({ number: "3134", section: "001", callNumber: "10234", title: "  " })).toBe(false);
  });

  test("any one identifying field is enough", () => {
    expect(acceptRow({ ...row, number: "3134", title: "Data Structures" })).toBe(true);
    expect(acceptRow({ ...row, section: "001", title: "Data Structures" })).toBe(true);
    expect(acceptRow({ ...row, callNumber: "10234", title: "Data Structures" })).toBe(true);
  });

  test("call number must be an integer", () => {
    expect(acceptRow({ ...row, callNumber: "n/a", title: "Data Structures" })).toBe(false);
  });
});
