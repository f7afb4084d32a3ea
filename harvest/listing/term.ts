export const DEFAULT_CATALOG_BASE = "https://doc.sis.columbia.edu";

const SEASON_DIGIT: Record<string, string> = { spring: "1", summer: "2", fall: "3" };

export function normalizeTerm(label: string): string {
  return label.replace(/\s+/g, "");
}

// "Fall 2025" -> "20253"
export function termCode(label: string): string | null {
  const m = /^\s*(spring|summer|fall)\s*(\d{4})\s*$/i.exec(label) ?? /^\s*(\d{4})\s*(spring|summer|fall)\s*$/i.exec(label);
  if (!m) return null;
  const [season, year] = /^\d/.test(m[1]) ? [m[2], m[1]] : [m[1], m[2]];
  return `${year}${SEASON_DIGIT[season.toLowerCase()]}`;
}

function trimBase(base: string) { return base.replace(/\/+$/, ""); }

export function subjectPageUrl(base: string, subject: string, term: string): string {
  return `${trimBase(base)}/subj/${subject}/_${normalizeTerm(term)}.html`;
}

export function textListingFallbackUrl(base: string, subject: string, term: string): string {
  return `${trimBase(base)}/subj/${subject}/_${normalizeTerm(term)}_text.html`;
}

// /subj/COMS/W3134-20253-001/
export function detailUrl(base: string, subject: string, term: string, courseNumber: string, section: string): string {
  const code = termCode(term) ?? normalizeTerm(term);
  const num = courseNumber.replace(/\s+/g, "");
  const sec = section.replace(/\s+/g, "");
  return `${trimBase(base)}/subj/${subject}/${num}-${code}-${sec}/`;
}
