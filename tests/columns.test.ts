import { describe, expect, test } from "vitest";
import { columnIndexFromHeader, cutField, findHeaderLine, isHeaderLine, sliceField } from "../harvest/listing/columns.js";
import { MalformedPageError } from "../harvest/errors.js";

const HEADER = "Number  Sec  Call#  Pts  Title          Day   Time        Room  Building  Faculty";

describe("columnIndexFromHeader", () => {
  test("each slice runs from its label to the next one", () => {
    const index = columnIndexFromHeader(HEADER);
    expect(index.get("Number")).toEqual({ field: "Number", start: 0, end: 8 });
    expect(index.get("Sec")).toEqual({ field: "Sec", start: 8, end: 13 });
    expect(index.get("Title")).toEqual({ field: "Title", start: 25, end: 40 });
    expect(index.get("Faculty")).toEqual({ field: "Faculty", start: 74, end: null });
    expect(index.size).toBe(10);
  });

  test("labels the header leaves out have no slice", () => {
    const index = columnIndexFromHeader("Number   Call#   Title      Faculty");
    expect([...index.keys()]).toEqual(["Number", "Call#", "Title", "Faculty"]);
    expect(sliceField("3134     10234   Data       Lee", index, "Sec")).toBe("");
  });

  test("a line missing one of Number, Call# and Faculty is not a header", () => {
    expect(isHeaderLine("Number  Sec  Title  Faculty")).toBe(false);
    expect(() => columnIndexFromHeader("Number  Sec  Title  Faculty", "COMS Fall 2025")).toThrow(MalformedPageError);
  });

  test("labels only count as whole words", () => {
    expect(isHeaderLine("Numbers  Call#  Faculty")).toBe(false);
  });
});

describe("slicing", () => {
  const index = columnIndexFromHeader(HEADER);
  const line = "3134    001  10234  3    Data Structure TuTh  1:10-2:25pm 501   Mudd      Lee,";

  test("cutField trims the slice", () => {
    expect(cutField(line, index, "Number")).toBe("3134");
    expect(cutField(line, index, "Call#")).toBe("10234");
    expect(cutField(line, index, "Title")).toBe("Data Structure");
    expect(cutField(line, index, "Time")).toBe("1:10-2:25pm");
    expect(cutField(line, index, "Faculty")).toBe("Lee,");
  });

  test("short lines give empty trailing fields", () => {
    expect(cutField("3134    001", index, "Faculty")).toBe("");
  });

  test("findHeaderLine skips preamble", () => {
    expect(findHeaderLine(["Directory of Classes", "", HEADER, "----"])).toBe(2);
    expect(findHeaderLine(["no header here"])).toBe(-1);
  });
});
