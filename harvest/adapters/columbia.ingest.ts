import "dotenv/config";
import { loadConfig } from "../config.js";
import { ConfigError, MalformedPageError } from "../errors.js";
import { emitNDJSON } from "../utils/emitter.js";
import { getText } from "../utils/httpHtml.js";
import { findLinks, htmlToText } from "../utils/htmlText.js";
import { log } from "../utils/log.js";
import { mapPool } from "../utils/pool.js";
import { linkRecitations, summarizeOutcomes } from "../listing/recitation.linker.js";
import type { LinkOptions } from "../listing/recitation.linker.js";
import { parsePage } from "../listing/section.parser.js";
import { subjectPageUrl, textListingFallbackUrl } from "../listing/term.js";
import { countIssues } from "../listing/validate.js";
import type { IngestResult, PageReport, PageResult, SchoolAdapter, SectionRecord } from "../adapter.types.js";

export type FetchHtml = (url: string, signal?: AbortSignal) => Promise<string>;

export type HarvestDeps = {
  base: string;
  fetchHtml: FetchHtml;
  link: Omit<LinkOptions, "fetchText">;
};

const PLAIN_TEXT_LINK = /plain\s*text/i;

function errMsg(e: unknown) { return e instanceof Error ? e.message : String(e); }

// subject page's "plain text" link, else the _text.html path
export async function locateTextListing(subject: string, term: string, deps: HarvestDeps): Promise<string> {
  const pageUrl = subjectPageUrl(deps.base, subject, term);
  try {
    const html = await deps.fetchHtml(pageUrl);
    const link = findLinks(html, pageUrl, PLAIN_TEXT_LINK)[0];
    if (link) return link.href;
    log.debug(`${subject}: no plain text link on ${pageUrl}`);
  } catch (e) {
    log.debug(`${subject}: subject page unavailable (${errMsg(e)})`);
  }
  return textListingFallbackUrl(deps.base, subject, term);
}

export async function harvestSubject(subject: string, term: string, deps: HarvestDeps): Promise<{ sections: SectionRecord[]; page: PageReport }> {
  const pageId = `${subject} ${term}`;
  const page: PageReport = { page_id: pageId, subject, term, url: null, status: "parsed", message: null, stats: null };

  const url = await locateTextListing(subject, term, deps);
  page.url = url;

  let text: string;
  try {
    text = htmlToText(await deps.fetchHtml(url));
  } catch (e) {
    log.error(`${pageId}: listing fetch failed (${errMsg(e)})`);
    return { sections: [], page: { ...page, status: "fetch-failed", message: errMsg(e) } };
  }

  let parsed: PageResult;
  try {
    parsed = parsePage(text, { subject, term, base: deps.base, pageId });
  } catch (e) {
    if (!(e instanceof MalformedPageError)) throw e;
    log.warning(`${e.pageId}: ${e.message}; page skipped`);
    return { sections: [], page: { ...page, status: "malformed", message: e.message } };
  }

  const fetchText = async (u: string, signal: AbortSignal) => htmlToText(await deps.fetchHtml(u, signal));
  const { records, outcomes } = await linkRecitations(parsed.sections, { ...deps.link, fetchText });
  const link = summarizeOutcomes(outcomes);

  log.info(`  ↳ ${subject}: ${records.length} section(s), ${parsed.stats.rowsRejected} line(s) dropped, ${parsed.stats.continuationsMerged} name wrap(s) joined`);
  if (link.flagged) {
    log.info(`  ↳ ${subject}: recitations ${link.flagged} (detail ${link.viaDetail}, title ${link.viaTitle}, ambiguous ${link.ambiguous}, none ${link.noCandidate})`);
  }
  return { sections: records, page: { ...page, stats: parsed.stats } };
}

export async function ingestColumbia(opts: { subjects?: string[]; term?: string } = {}): Promise<IngestResult> {
  const cfg = loadConfig();
  const term = opts.term ?? cfg.CATALOG_TERM;
  const subjects = (opts.subjects?.length ? opts.subjects : cfg.CATALOG_SUBJECTS).map(s => s.toUpperCase());
  if (!subjects.length) throw new ConfigError("no subjects given; pass them after the school or set CATALOG_SUBJECTS");

  const deps: HarvestDeps = {
    base: cfg.CATALOG_BASE,
    fetchHtml: (url, signal) => getText(url, { signal, timeoutMs: cfg.DETAIL_TIMEOUT_MS }),
    link: { concurrency: cfg.DETAIL_CONCURRENCY, timeoutMs: cfg.DETAIL_TIMEOUT_MS, budgetMs: cfg.LINK_BUDGET_MS },
  };

  log.info(`Harvesting ${subjects.length} subject(s) for ${term}`);
  const perSubject = await mapPool(subjects, cfg.PAGE_CONCURRENCY, subject => harvestSubject(subject, term, deps));

  const sections = perSubject.flatMap(r => r.sections);
  const pages = perSubject.map(r => r.page);
  const skipped = pages.filter(p => p.status !== "parsed");

  emitNDJSON(cfg.OUTDIR, "sections", sections);
  emitNDJSON(cfg.OUTDIR, "pages", pages);

  const issues = countIssues(sections);
  if (Object.keys(issues).length) log.info(`Validation: ${JSON.stringify(issues)}`);
  if (skipped.length) log.warning(`${skipped.length} page(s) skipped: ${skipped.map(p => `${p.page_id} (${p.status})`).join(", ")}`);
  log.success(`Columbia ingest complete. ${sections.length} section(s) written to ${cfg.OUTDIR}`);

  return { sections, pages };
}

export const columbiaAdapter: SchoolAdapter = { id: "columbia", ingest: ingestColumbia };
