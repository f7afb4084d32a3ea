import { MalformedPageError } from "../errors.js";

export const COLUMN_FIELDS = ["Number", "Sec", "Call#", "Pts", "Title", "Day", "Time", "Room", "Building", "Faculty"] as const;
export type ColumnField = (typeof COLUMN_FIELDS)[number];

// [start, end); null end runs to end of line
export type ColumnSlice = { field: ColumnField; start: number; end: number | null };

export type ColumnIndex = ReadonlyMap<ColumnField, ColumnSlice>;

const HEADER_TOKENS: ColumnField[] = ["Number", "Call#", "Faculty"];

function escapeRe(s: string) { return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"); }

// Whole-word position of a label; "Sec" must not hit "Section" in a banner, etc.
function labelOffset(line: string, label: string): number {
  const m = new RegExp(`(?<=^|\\s)${escapeRe(label)}(?=\\s|$)`).exec(line);
  return m ? m.index : -1;
}

export function isHeaderLine(line: string): boolean {
  return HEADER_TOKENS.every(t => labelOffset(line, t) >= 0);
}

export function findHeaderLine(lines: readonly string[]): number {
  return lines.findIndex(isHeaderLine);
}

export function columnIndexFromHeader(header: string, pageId = "listing"): ColumnIndex {
  if (!isHeaderLine(header)) throw new MalformedPageError(pageId, `not a listing header in ${pageId}: ${header.trim()}`);

  const found = COLUMN_FIELDS
    .map(field => ({ field, start: labelOffset(header, field) }))
    .filter(x => x.start >= 0)
    .sort((a, b) => a.start - b.start);

  const index = new Map<ColumnField, ColumnSlice>();
  found.forEach((x, i) => {
    const next = found[i + 1];
    index.set(x.field, { field: x.field, start: x.start, end: next ? next.start : null });
  });
  return index;
}

export function sliceField(line: string, index: ColumnIndex, field: ColumnField): string {
  const s = index.get(field);
  if (!s) return "";
  return s.end === null ? line.slice(s.start) : line.slice(s.start, s.end);
}

export function cutField(line: string, index: ColumnIndex, field: ColumnField): string {
  return sliceField(line, index, field).trim();
}
