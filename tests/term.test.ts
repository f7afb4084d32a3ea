import { describe, expect, test } from "vitest";
import { detailUrl, normalizeTerm, subjectPageUrl, termCode, textListingFallbackUrl } from "../harvest/listing/term.js";

const BASE = "https://doc.sis.columbia.edu";

describe("term", () => {
  test("termCode maps season to a digit", () => {
    expect(termCode("Fall 2025")).toBe("20253");
    expect(termCode("spring 2026")).toBe("20261");
    expect(termCode("2025 Summer")).toBe("20252");
    expect(termCode("Winter 2025")).toBeNull();
  });

  test("normalizeTerm drops whitespace", () => {
    expect(normalizeTerm("Fall 2025")).toBe("Fall2025");
  });

  test("listing urls", () => {
    expect(subjectPageUrl(`${BASE}/`, "COMS", "Fall 2025")).toBe(`${BASE}/subj/COMS/_Fall2025.html`);
    expect(textListingFallbackUrl(BASE, "COMS", "Fall 2025")).toBe(`${BASE}/subj/COMS/_Fall2025_text.html`);
  });

  test("detailUrl depends only on the section's identity", () => {
    const a = detailUrl(BASE, "COMS", "Fall 2025", "3134", "R01");
    expect(a).toBe(`${BASE}/subj/COMS/3134-20253-R01/`);
    expect(detailUrl(BASE, "COMS", "Fall 2025", "3134", "R01")).toBe(a);
    expect(detailUrl(BASE, "COMS", "Winter 2025", "W 3134", "001")).toBe(`${BASE}/subj/COMS/W3134-Winter2025-001/`);
  });
});
