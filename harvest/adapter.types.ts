import { z } from "zod";

export const DAY_NAMES = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
export type DayName = (typeof DAY_NAMES)[number];

export const CreditsSchema = z.union([
  z.number().nonnegative(),
  z.object({ min: z.number().nonnegative(), max: z.number().nonnegative() }),
]).nullable();
export type Credits = z.infer<typeof CreditsSchema>;

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

export const SectionRecordSchema = z.object({
  subject: z.string().min(1),
  course_number: z.string(),
  course_code: z.string(),
  section: z.string(),
  call_number: z.number().int().nullable(),
  term: z.string().min(1),
  title: z.string().min(1),
  credits: CreditsSchema,
  days: z.array(z.enum(DAY_NAMES)),
  start_time: z.string().regex(HHMM).nullable(),   // null = to be announced
  end_time: z.string().regex(HHMM).nullable(),
  room: z.string().nullable(),
  building: z.string().nullable(),
  instructor: z.string(),
  is_recitation: z.boolean(),
  parent_course_code: z.string().nullable(),
  detail_url: z.string().url(),
});

export type SectionRecord = z.infer<typeof SectionRecordSchema>;

export type ParseStats = {
  linesScanned: number;
  rowsAccepted: number;
  rowsRejected: number;          // lines that failed the row gate
  continuationsMerged: number;
  ambiguousTimes: number;        // time text present but nothing trustworthy parsed
  meridiemConflicts: number;
  ambiguousLocations: number;
};

export type PageResult = {
  sections: SectionRecord[];
  stats: ParseStats;
};

export type PageReport = {
  page_id: string;
  subject: string;
  term: string;
  url: string | null;
  status: "parsed" | "malformed" | "fetch-failed";
  message: string | null;
  stats: ParseStats | null;
};

export type IngestResult = {
  sections: SectionRecord[];
  pages: PageReport[];
};

export interface SchoolAdapter {
  id: string;                                 // e.g. "columbia"
  ingest: (opts?: { subjects?: string[]; term?: string }) => Promise<IngestResult>;
}
