import type { Credits } from "../adapter.types.js";

const NUM = String.raw`(\d+(?:\.\d+)?)`;
const FIXED = new RegExp(`^${NUM}$`);
const RANGE = new RegExp(String.raw`^${NUM}\s*[-\u2010-\u2015\u2212]\s*${NUM}$`);

export function parseCredits(pts: string): Credits {
  const s = pts.trim();
  const fixed = FIXED.exec(s);
  if (fixed) return Number(fixed[1]);

  const range = RANGE.exec(s);
  if (!range) return null;
  const a = Number(range[1]);
  const b = Number(range[2]);
  if (a === b) return a;
  return { min: Math.min(a, b), max: Math.max(a, b) };
}

export function isZeroCredit(c: Credits): boolean {
  if (c === null) return false;
  return typeof c === "number" ? c === 0 : c.max === 0;
}
