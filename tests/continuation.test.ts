import { describe, expect, test } from "vitest";
import { ContinuationMerger } from "../harvest/listing/continuation.js";

describe("ContinuationMerger", () => {
  test("joins a wrapped name onto the previous row", () => {
    const merger = new ContinuationMerger<{ instructor: string }>();
    const first = { instructor: "Lee," };
    merger.accept(first);
    expect(merger.offer("Ey")).toBe(true);
    expect(first.instructor).toBe("Lee, Ey");
    expect(merger.merged).toBe(1);
  });

  test("ignores rows whose instructor has no trailing comma", () => {
    const merger = new ContinuationMerger<{ instructor: string }>();
    merger.accept({ instructor: "Lee" });
    expect(merger.offer("Ey")).toBe(false);
    expect(merger.merged).toBe(0);
  });

  test("takes at most one continuation per comma", () => {
    const merger = new ContinuationMerger<{ instructor: string }>();
    const first = { instructor: "Lee, " };
    merger.accept(first);
    expect(merger.offer("Ey")).toBe(true);
    expect(merger.offer("Kim")).toBe(false);
    expect(first.instructor).toBe("Lee, Ey");
  });

  test("a comma-joined name can keep wrapping", () => {
    const merger = new ContinuationMerger<{ instructor: string }>();
    const first = { instructor: "Lee," };
    merger.accept(first);
    merger.offer("Ey,");
    merger.offer("Kim");
    expect(first.instructor).toBe("Lee, Ey, Kim");
  });

  test("nothing happens before the first row or for empty text", () => {
    const merger = new ContinuationMerger<{ instructor: string }>();
    expect(merger.offer("Ey")).toBe(false);
    merger.accept({ instructor: "Lee," });
    expect(merger.offer("   ")).toBe(false);
  });
});
