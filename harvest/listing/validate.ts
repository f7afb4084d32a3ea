import { SectionRecordSchema } from "../adapter.types.js";
import type { SectionRecord } from "../adapter.types.js";
import { ANNOUNCED_LATER } from "./location.js";
import { toMinutes } from "./time.js";

export type Issue = {
  level: "error" | "warning";
  field: string;
  message: string;
};

// Earliest plausible meeting; 00:10 and friends are afternoon times that missed pm coercion.
const EARLIEST_MINUTES = 6 * 60;

export function validateSection(r: SectionRecord): Issue[] {
  const issues: Issue[] = [];

  const shape = SectionRecordSchema.safeParse(r);
  if (!shape.success) {
    for (const i of shape.error.issues) {
      issues.push({ level: "error", field: i.path.join(".") || "record", message: i.message });
    }
  }
  if (!r.course_number && !r.section && r.call_number === null) {
    issues.push({ level: "error", field: "record", message: "no course number, section or call number" });
  }

  const start = r.start_time === null ? null : toMinutes(r.start_time);
  const end = r.end_time === null ? null : toMinutes(r.end_time);
  if ((start === null) !== (end === null)) {
    issues.push({ level: "warning", field: "end_time", message: "only one end of the meeting time is known" });
  }
  if (start !== null && end !== null && end < start) {
    issues.push({ level: "warning", field: "end_time", message: `ends (${r.end_time}) before it starts (${r.start_time})` });
  }
  for (const [field, v, raw] of [["start_time", start, r.start_time], ["end_time", end, r.end_time]] as const) {
    if (v !== null && v < EARLIEST_MINUTES) {
      issues.push({ level: "warning", field, message: `${raw} is before 06:00; likely a missed pm` });
    }
  }

  if (r.building === ANNOUNCED_LATER && r.room !== null) {
    issues.push({ level: "warning", field: "room", message: `room ${r.room} set while building is "${ANNOUNCED_LATER}"` });
  }
  if (r.is_recitation && r.parent_course_code === null) {
    issues.push({ level: "warning", field: "parent_course_code", message: "recitation not linked to a lecture" });
  }
  return issues;
}

export function countIssues(records: readonly SectionRecord[]) {
  const counts = new Map<string, number>();
  for (const r of records) {
    for (const i of validateSection(r)) {
      const key = `${i.level}:${i.field}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
}
