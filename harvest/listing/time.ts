// Grammars run in priority order over the line, then the Time slice; ranges must increase.

export type TimeGrammar = "ampm-range" | "24h-range" | "digit-range" | "single";
export type TimeSource = "line" | "slice";

export type GrammarResult =
  | { ok: true; grammar: TimeGrammar; start: number; end: number }
  | { ok: false; grammar: TimeGrammar; reason: "no-match" | "not-increasing" };

export type TimeRange = {
  start_time: string | null;
  end_time: string | null;
  status: "parsed" | "tba" | "unparsed";
  grammar: TimeGrammar | null;
  source: TimeSource | null;
  pmCoerced: boolean;
  meridiemConflict: boolean;     // line and slice disagree on am/pm
};

const DAY_MINUTES = 24 * 60;
const NOON = 12 * 60;

const DASHES = /[\u2010-\u2015\u2212\uFE58\uFE63\uFF0D]/g;
const MER = String.raw`(?:\s*([ap])\.?m\b\.?)?`;
const CLOCK = String.raw`(\d{1,2})(?::([0-5]\d))?`;

const AMPM_RANGE = new RegExp(String.raw`(?<![\d:])${CLOCK}${MER}-${CLOCK}${MER}(?![\d:])`, "gi");
const H24_RANGE = /(?<![\d:])([01]?\d|2[0-3]):([0-5]\d)-([01]?\d|2[0-3]):([0-5]\d)(?![\d:])/g;
const DIGIT_RANGE = /(?<![\d:])(\d{3,4})-(\d{3,4})(?![\d:])/g;
const SINGLE = /(?<![\d:])(\d{1,2}):([0-5]\d)(?:\s*([ap])\.?m\b\.?)?(?![\d:])|(?<![\d:])(\d{1,2})\s*([ap])\.?m\b\.?/gi;
const TBA = /\bTB[AD]\b|\bto be announced\b/i;

const PM_TOKEN = /(?<![a-z])p\.?m\b/i;
const AM_TOKEN = /(?<![a-z])a\.?m\b/i;

export function normalizeTimeText(raw: string): string {
  return raw
    .replace(DASHES, "-")
    .replace(/\bto\b/gi, "-")
    .replace(/\s*-\s*/g, "-");
}

export function formatHHMM(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

export function toMinutes(hhmm: string): number | null {
  const m = /^(\d{1,2}):(\d{2})$/.exec(hhmm);
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

type Meridiem = "a" | "p";

function meridiem(raw: string | undefined): Meridiem | null {
  if (!raw) return null;
  return raw.toLowerCase() === "p" ? "p" : "a";
}

function clock12(hour: number, minute: number, mer: Meridiem): number | null {
  if (hour < 1 || hour > 12) return null;
  return (hour % 12) * 60 + minute + (mer === "p" ? NOON : 0);
}

function clock24(hour: number, minute: number): number | null {
  if (hour > 23 || minute > 59) return null;
  return hour * 60 + minute;
}

function flip(m: Meridiem): Meridiem { return m === "p" ? "a" : "p"; }

// Matches ending at or before `minEnd` sit left of the Time column (a title's "1914-1945").
function matchesFrom(text: string, re: RegExp, minEnd: number): RegExpMatchArray[] {
  return [...text.matchAll(re)].filter(m => (m.index ?? 0) + m[0].length > minEnd);
}

// One side explicit: copy its meridiem to the other side unless that breaks the
// increasing range (11:00-12:15 pm), then try the opposite one.
function resolveAmPm(h1: number, m1: number, mer1: Meridiem | null, h2: number, m2: number, mer2: Meridiem | null): { start: number; end: number } | null {
  const pairs: Array<[Meridiem, Meridiem]> = [];
  if (mer1 && mer2) pairs.push([mer1, mer2]);
  else if (mer1) pairs.push([mer1, mer1], [mer1, flip(mer1)]);
  else if (mer2) pairs.push([mer2, mer2], [flip(mer2), mer2]);

  for (const [a, b] of pairs) {
    const start = clock12(h1, m1, a);
    const end = clock12(h2, m2, b);
    if (start !== null && end !== null && end > start) return { start, end };
  }
  return null;
}

export function matchAmPmRange(text: string, minEnd = 0): GrammarResult {
  const grammar = "ampm-range";
  let sawCandidate = false;
  for (const m of matchesFrom(text, AMPM_RANGE, minEnd)) {
    const mer1 = meridiem(m[3]);
    const mer2 = meridiem(m[6]);
    if (!mer1 && !mer2) continue;
    sawCandidate = true;
    const hit = resolveAmPm(Number(m[1]), Number(m[2] ?? 0), mer1, Number(m[4]), Number(m[5] ?? 0), mer2);
    if (hit) return { ok: true, grammar, ...hit };
  }
  return { ok: false, grammar, reason: sawCandidate ? "not-increasing" : "no-match" };
}

export function match24hRange(text: string, minEnd = 0): GrammarResult {
  const grammar = "24h-range";
  let sawCandidate = false;
  for (const m of matchesFrom(text, H24_RANGE, minEnd)) {
    sawCandidate = true;
    const start = clock24(Number(m[1]), Number(m[2]));
    const end = clock24(Number(m[3]), Number(m[4]));
    if (start !== null && end !== null && end > start) return { ok: true, grammar, start, end };
  }
  return { ok: false, grammar, reason: sawCandidate ? "not-increasing" : "no-match" };
}

export function matchDigitRange(text: string, minEnd = 0): GrammarResult {
  const grammar = "digit-range";
  let sawCandidate = false;
  for (const m of matchesFrom(text, DIGIT_RANGE, minEnd)) {
    const a = Number(m[1]);
    const b = Number(m[2]);
    const start = clock24(Math.floor(a / 100), a % 100);
    const end = clock24(Math.floor(b / 100), b % 100);
    if (start === null || end === null) continue;
    sawCandidate = true;
    if (end > start) return { ok: true, grammar, start, end };
  }
  return { ok: false, grammar, reason: sawCandidate ? "not-increasing" : "no-match" };
}

export function matchSingleTime(text: string, minEnd = 0): GrammarResult {
  const grammar = "single";
  const hits = matchesFrom(text, SINGLE, minEnd);
  if (hits.length !== 1) return { ok: false, grammar, reason: "no-match" };
  const m = hits[0];
  let minutes: number | null;
  if (m[1] !== undefined) {
    const mer = meridiem(m[3]);
    minutes = mer ? clock12(Number(m[1]), Number(m[2]), mer) : clock24(Number(m[1]), Number(m[2]));
  } else {
    const mer = meridiem(m[5]);
    minutes = mer ? clock12(Number(m[4]), 0, mer) : null;
  }
  if (minutes === null) return { ok: false, grammar, reason: "no-match" };
  return { ok: true, grammar, start: minutes, end: minutes };
}

export const TIME_GRAMMARS: ReadonlyArray<(text: string, minEnd?: number) => GrammarResult> = [
  matchAmPmRange,
  match24hRange,
  matchDigitRange,
  matchSingleTime,
];

type Markers = "pm" | "am" | "mixed" | "none";

function markers(text: string): Markers {
  const pm = PM_TOKEN.test(text);
  const am = AM_TOKEN.test(text);
  if (pm && am) return "mixed";
  if (pm) return "pm";
  return am ? "am" : "none";
}

// Pre-noon times move to the afternoon when the text says pm and never am.
export function coercePm(start: number, end: number, matchedText: string): { start: number; end: number; coerced: boolean } {
  if (markers(matchedText) !== "pm") return { start, end, coerced: false };
  const s = start < NOON ? start + NOON : start;
  const e = end < NOON ? end + NOON : end;
  const wasRange = end !== start;
  if (s >= DAY_MINUTES || e >= DAY_MINUTES) return { start, end, coerced: false };
  if (wasRange && e <= s) return { start, end, coerced: false };
  return { start: s, end: e, coerced: s !== start || e !== end };
}

function firstHit(text: string, minEnd: number): Extract<GrammarResult, { ok: true }> | null {
  for (const g of TIME_GRAMMARS) {
    const r = g(text, minEnd);
    if (r.ok) return r;
  }
  return null;
}

export function parseTimeRange(line: string, timeSlice: string, timeStart = 0): TimeRange {
  const inputs: Array<[TimeSource, string, number]> = [
    ["line", normalizeTimeText(line), normalizeTimeText(line.slice(0, timeStart)).length],
    ["slice", normalizeTimeText(timeSlice), 0],
  ];
  const lineMarks = markers(inputs[0][1]);
  const sliceMarks = markers(inputs[1][1]);
  const meridiemConflict = lineMarks !== "none" && sliceMarks !== "none" && lineMarks !== sliceMarks;

  for (const [source, text, minEnd] of inputs) {
    const hit = firstHit(text, minEnd);
    if (!hit) continue;
    const { start, end, coerced } = coercePm(hit.start, hit.end, text);
    return {
      start_time: formatHHMM(start),
      end_time: formatHHMM(end),
      status: "parsed",
      grammar: hit.grammar,
      source,
      pmCoerced: coerced,
      meridiemConflict,
    };
  }

  const tba = TBA.test(timeSlice) || (!timeSlice.trim() && TBA.test(line));
  return {
    start_time: null,
    end_time: null,
    status: tba || !timeSlice.trim() ? "tba" : "unparsed",
    grammar: null,
    source: null,
    pmCoerced: false,
    meridiemConflict,
  };
}
