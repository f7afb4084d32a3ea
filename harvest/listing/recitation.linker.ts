import type { SectionRecord } from "../adapter.types.js";
import { FetchTimeoutError } from "../errors.js";
import { log } from "../utils/log.js";
import { mapPool } from "../utils/pool.js";
import { isZeroCredit } from "./credits.js";

export type FetchText = (url: string, signal: AbortSignal) => Promise<string>;

export type LinkOutcome =
  | { state: "linked"; parent: string; via: "detail" | "title" }
  | { state: "unlinked-ambiguous"; candidates: string[] }
  | { state: "unlinked-no-candidate" };

export type LinkOptions = {
  fetchText?: FetchText;
  concurrency?: number;
  timeoutMs?: number;
  budgetMs?: number;             // 0 = unlimited
  now?: () => number;
};

export type LinkReport = {
  records: SectionRecord[];
  outcomes: Array<{ record: SectionRecord; outcome: LinkOutcome }>;
};

const RECITATION_SECTION = /^R\d+$/i;
const REQUIRED_RECITATION = /required\s+recitation/i;
const ENROLLED_IN = /[Ee]nrolled\s+[Ii]n\s*\(?\s*([A-Z]{2,5})\s*\)?\s*\(?\s*([A-Z]{0,2}\s?\d{3,4}[A-Z]?)\s*\)?/;
const QUALIFIERS = /\b(?:recitations?|rec|lab(?:oratory)?|discussion|section|for)\b/g;

export function isRecitationCandidate(r: SectionRecord): boolean {
  return RECITATION_SECTION.test(r.section.trim()) || isZeroCredit(r.credits);
}

// "Required recitation ... enrolled in (COMS)(3134)" -> "COMS3134"
export function parentFromDetail(text: string): string | null {
  const at = text.search(REQUIRED_RECITATION);
  if (at < 0) return null;
  const m = ENROLLED_IN.exec(text.slice(at, at + 400));
  if (!m) return null;
  return `${m[1]}${m[2].replace(/\s+/g, "")}`;
}

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(QUALIFIERS, " ")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

export function matchByTitle(rec: SectionRecord, primaries: readonly SectionRecord[]): LinkOutcome {
  const wanted = normalizeTitle(rec.title);
  if (!wanted) return { state: "unlinked-no-candidate" };

  const codes = new Set<string>();
  for (const p of primaries) {
    if (normalizeTitle(p.title) === wanted) codes.add(p.course_code);
  }
  const candidates = [...codes].sort();
  if (candidates.length === 1) return { state: "linked", parent: candidates[0], via: "title" };
  if (candidates.length === 0) return { state: "unlinked-no-candidate" };
  return { state: "unlinked-ambiguous", candidates };
}

export async function fetchWithTimeout(fetchText: FetchText, url: string, timeoutMs: number): Promise<string> {
  const ctrl = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new FetchTimeoutError(url, timeoutMs));
      ctrl.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([fetchText(url, ctrl.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// Mutates `records` in place: detail page first, then a title match within the batch.
export async function linkRecitations(records: SectionRecord[], opts: LinkOptions = {}): Promise<LinkReport> {
  const now = opts.now ?? Date.now;
  const started = now();
  const budgetMs = opts.budgetMs ?? 0;
  const timeoutMs = opts.timeoutMs ?? 10_000;
  let budgetSpent = false;

  const flagged = records.filter(isRecitationCandidate);
  const primaries = records.filter(r => !isRecitationCandidate(r));

  async function fromDetail(rec: SectionRecord): Promise<string | null> {
    if (!opts.fetchText) return null;
    if (budgetMs > 0 && now() - started >= budgetMs) {
      if (!budgetSpent) log.warning(`link budget of ${budgetMs}ms spent; matching remaining recitations by title`);
      budgetSpent = true;
      return null;
    }
    try {
      const text = await fetchWithTimeout(opts.fetchText, rec.detail_url, timeoutMs);
      return parentFromDetail(text);
    } catch (e) {
      log.debug(`detail fetch failed for ${rec.detail_url}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }

  const outcomes = await mapPool(flagged, opts.concurrency ?? 4, async rec => {
    const parent = await fromDetail(rec);
    const outcome: LinkOutcome = parent ? { state: "linked", parent, via: "detail" } : matchByTitle(rec, primaries);
    rec.is_recitation = true;
    rec.parent_course_code = outcome.state === "linked" ? outcome.parent : null;
    return { record: rec, outcome };
  });

  return { records, outcomes };
}

export function summarizeOutcomes(outcomes: LinkReport["outcomes"]) {
  const counts = { flagged: outcomes.length, viaDetail: 0, viaTitle: 0, ambiguous: 0, noCandidate: 0 };
  for (const { outcome } of outcomes) {
    if (outcome.state === "linked") {
      if (outcome.via === "detail") counts.viaDetail += 1;
      else counts.viaTitle += 1;
    } else if (outcome.state === "unlinked-ambiguous") counts.ambiguous += 1;
    else counts.noCandidate += 1;
  }
  return counts;
}
