import type { DayName } from "../adapter.types.js";

// Two-letter tokens first so "Tu" never splits into T + u.
const PAIRS: Record<string, DayName> = { Tu: "Tue", Th: "Thu", Su: "Sun", Sa: "Sat" };
const SINGLES: Record<string, DayName> = { M: "Mon", T: "Tue", W: "Wed", R: "Thu", F: "Fri", S: "Sat", U: "Sun" };

export function canonicalizeDays(token: string): DayName[] {
  const s = token.replace(/\s+/g, "");
  if (!s || /^TB[AD]$/i.test(s)) return [];

  const out: DayName[] = [];
  const add = (d: DayName) => { if (!out.includes(d)) out.push(d); };

  let i = 0;
  while (i < s.length) {
    const pair = PAIRS[s.slice(i, i + 2)];
    if (pair) { add(pair); i += 2; continue; }
    const single = SINGLES[s[i]];
    if (single) add(single);
    i += 1;
  }
  return out;
}
