import "dotenv/config";
import { SectionRecordSchema } from "./adapter.types.js";
import type { SectionRecord } from "./adapter.types.js";
import { loadConfig } from "./config.js";
import { readNDJSON } from "./utils/emitter.js";
import { countIssues } from "./listing/validate.js";

const pct = (n: number, d: number) => (d ? Number(((n / d) * 100).toFixed(1)) : 0);

function coverage(sections: SectionRecord[]) {
  const timed = sections.filter(s => s.start_time !== null).length;
  const located = sections.filter(s => s.building !== null).length;
  const taught = sections.filter(s => s.instructor).length;
  const recitations = sections.filter(s => s.is_recitation);
  const linked = recitations.filter(s => s.parent_course_code !== null).length;
  return {
    sectionCount: sections.length,
    pctWithTimes: pct(timed, sections.length),
    pctWithLocation: pct(located, sections.length),
    pctWithInstructor: pct(taught, sections.length),
    recitations: recitations.length,
    pctRecitationsLinked: pct(linked, recitations.length),
    issues: countIssues(sections),
  };
}

function main() {
  const { OUTDIR } = loadConfig();
  const rows = readNDJSON(OUTDIR, "sections");
  const sections: SectionRecord[] = [];
  let unreadable = 0;
  for (const row of rows) {
    const r = SectionRecordSchema.safeParse(row);
    if (r.success) sections.push(r.data);
    else unreadable += 1;
  }
  const pages = readNDJSON(OUTDIR, "pages");
  console.log(JSON.stringify({ pages: pages.length, unreadableRows: unreadable, ...coverage(sections) }, null, 2));
}

main();
