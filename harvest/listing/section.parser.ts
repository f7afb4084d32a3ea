import { MalformedPageError } from "../errors.js";
import type { PageResult, ParseStats, SectionRecord } from "../adapter.types.js";
import { columnIndexFromHeader, cutField, findHeaderLine, isHeaderLine, sliceField } from "./columns.js";
import type { ColumnField } from "./columns.js";
import { acceptRow } from "./acceptance.js";
import { ContinuationMerger } from "./continuation.js";
import { parseCredits } from "./credits.js";
import { canonicalizeDays } from "./days.js";
import { repairLocation } from "./location.js";
import { parseTimeRange } from "./time.js";
import { DEFAULT_CATALOG_BASE, detailUrl } from "./term.js";

export type PageContext = {
  subject: string;
  term: string;                  // "Fall 2025"
  base?: string;
  pageId?: string;               // used in warnings; defaults to "<subject> <term>"
};

const RULER = /^[\s=-]+$/;

export function emptyStats(): ParseStats {
  return {
    linesScanned: 0,
    rowsAccepted: 0,
    rowsRejected: 0,
    continuationsMerged: 0,
    ambiguousTimes: 0,
    meridiemConflicts: 0,
    ambiguousLocations: 0,
  };
}

export function courseCode(subject: string, number: string) {
  return `${subject}${number}`.replace(/\s+/g, "");
}

export function parsePage(text: string, ctx: PageContext): PageResult {
  const pageId = ctx.pageId ?? `${ctx.subject} ${ctx.term}`;
  const base = ctx.base ?? DEFAULT_CATALOG_BASE;
  const lines = text.split(/\r?\n/);

  const headerAt = findHeaderLine(lines);
  if (headerAt < 0) throw new MalformedPageError(pageId);
  const index = columnIndexFromHeader(lines[headerAt], pageId);

  const stats = emptyStats();
  const merger = new ContinuationMerger<SectionRecord>();
  const sections: SectionRecord[] = [];

  for (const line of lines.slice(headerAt + 1)) {
    if (!line.trim() || RULER.test(line) || isHeaderLine(line)) continue;
    stats.linesScanned += 1;

    const cut = (f: ColumnField) => cutField(line, index, f);
    const faculty = cut("Faculty");
    const continued = merger.offer(faculty);

    const number = cut("Number");
    const section = cut("Sec");
    const callText = cut("Call#");
    const title = cut("Title").replace(/\s+/g, " ");

    if (!acceptRow({ number, section, callNumber: callText, title })) {
      if (!continued) stats.rowsRejected += 1;
      continue;
    }

    const time = parseTimeRange(line, sliceField(line, index, "Time"), index.get("Time")?.start ?? 0);
    if (time.status === "unparsed") stats.ambiguousTimes += 1;
    if (time.meridiemConflict) stats.meridiemConflicts += 1;

    const loc = repairLocation(sliceField(line, index, "Room"), sliceField(line, index, "Building"));
    if (loc.repair === "ambiguous") stats.ambiguousLocations += 1;

    const record: SectionRecord = {
      subject: ctx.subject,
      course_number: number,
      course_code: courseCode(ctx.subject, number),
      section,
      call_number: /^\d+$/.test(callText) ? Number(callText) : null,
      term: ctx.term,
      title,
      credits: parseCredits(cut("Pts")),
      days: canonicalizeDays(cut("Day")),
      start_time: time.start_time,
      end_time: time.end_time,
      room: loc.room,
      building: loc.building,
      instructor: continued ? "" : faculty,
      is_recitation: false,
      parent_course_code: null,
      detail_url: detailUrl(base, ctx.subject, ctx.term, number, section),
    };

    sections.push(record);
    merger.accept(record);
    stats.rowsAccepted += 1;
  }

  stats.continuationsMerged = merger.merged;
  return { sections, stats };
}
