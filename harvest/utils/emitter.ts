import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function emitNDJSON(outdir: string, name: string, rows: unknown[]) {
  ensureDir(outdir);
  const body = rows.map(r => JSON.stringify(r)).join("\n");
  writeFileSync(join(outdir, name + ".ndjson"), rows.length ? body + "\n" : "");
}

export function readNDJSON(outdir: string, name: string): unknown[] {
  const p = join(outdir, name + ".ndjson");
  if (!existsSync(p)) return [];
  return readFileSync(p, "utf8")
    .split("\n")
    .filter(l => l.trim())
    .map((l): unknown => JSON.parse(l));
}
