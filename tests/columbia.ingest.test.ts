import { readFileSync } from "fs";
import { afterEach, describe, expect, test, vi } from "vitest";
import { harvestSubject, ingestColumbia, locateTextListing } from "../harvest/adapters/columbia.ingest.js";
import type { FetchHtml, HarvestDeps } from "../harvest/adapters/columbia.ingest.js";
import { ConfigError, FetchError } from "../harvest/errors.js";

const BASE = "https://doc.sis.columbia.edu";
const SUBJECT_PAGE = `${BASE}/subj/COMS/_Fall2025.html`;
const LINKED_LISTING = `${BASE}/subj/COMS/listing-text.html`;
const FALLBACK_LISTING = `${BASE}/subj/COMS/_Fall2025_text.html`;

const listing = readFileSync(new URL("./fixtures/coms-fall2025.txt", import.meta.url), "utf8");

function site(pages: Record<string, string>): FetchHtml {
  return async url => {
    const body = pages[url];
    if (body === undefined) throw new FetchError(url, 404);
    return body;
  };
}

const deps = (pages: Record<string, string>): HarvestDeps => ({
  base: BASE,
  fetchHtml: site(pages),
  link: { concurrency: 2, timeoutMs: 50, budgetMs: 0 },
});

const subjectPage = `<html><body><a href="listing-text.html">plain text</a></body></html>`;

describe("locateTextListing", () => {
  test("follows the plain text link", async () => {
    expect(await locateTextListing("COMS", "Fall 2025", deps({ [SUBJECT_PAGE]: subjectPage }))).toBe(LINKED_LISTING);
  });

  test("uses the conventional path when the subject page is missing", async () => {
    expect(await locateTextListing("COMS", "Fall 2025", deps({}))).toBe(FALLBACK_LISTING);
  });
});

describe("harvestSubject", () => {
  test("parses the listing and links recitations", async () => {
    const { sections, page } = await harvestSubject("COMS", "Fall 2025", deps({
      [SUBJECT_PAGE]: subjectPage,
      [LINKED_LISTING]: `<html><body><pre>${listing}</pre></body></html>`,
      [`${BASE}/subj/COMS/3134-20253-R01/`]: "<html><body><p>Required recitation: enrolled in (COMS)(3134)</p></body></html>",
    }));

    expect(sections).toHaveLength(11);
    expect(sections.filter(s => s.is_recitation).map(s => [s.course_code, s.section, s.parent_course_code])).toEqual([
      ["COMS3134", "R01", "COMS3134"],
      ["COMS3827", "R01", null],
    ]);
    expect(page).toMatchObject({ page_id: "COMS Fall 2025", url: LINKED_LISTING, status: "parsed", message: null });
    expect(page.stats?.rowsAccepted).toBe(11);
  });

  test("a page with no header is reported as malformed", async () => {
    const { sections, page } = await harvestSubject("COMS", "Fall 2025", deps({
      [FALLBACK_LISTING]: "<pre>No classes are offered this term.</pre>",
    }));
    expect(sections).toEqual([]);
    expect(page).toEqual({
      page_id: "COMS Fall 2025",
      subject: "COMS",
      term: "Fall 2025",
      url: FALLBACK_LISTING,
      status: "malformed",
      message: "no listing header found in COMS Fall 2025",
      stats: null,
    });
  });

  test("a listing that cannot be fetched is reported, not thrown", async () => {
    const { sections, page } = await harvestSubject("COMS", "Fall 2025", deps({}));
    expect(sections).toEqual([]);
    expect(page.status).toBe("fetch-failed");
    expect(page.message).toBe(`GET ${FALLBACK_LISTING} -> 404`);
  });
});

describe("ingestColumbia", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("refuses to run without subjects", async () => {
    vi.stubEnv("CATALOG_SUBJECTS", "");
    await expect(ingestColumbia({ subjects: [] })).rejects.toBeInstanceOf(ConfigError);
  });
});
