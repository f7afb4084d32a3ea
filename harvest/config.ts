import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_CATALOG_BASE } from "./listing/term.js";

const list = (s: string) => s.split(",").map(x => x.trim()).filter(Boolean);

export const HarvestConfigSchema = z.object({
  CATALOG_BASE: z.string().url().default(DEFAULT_CATALOG_BASE),
  CATALOG_TERM: z.string().min(1).default("Fall 2025"),
  CATALOG_SUBJECTS: z.string().default("").transform(list),
  OUTDIR: z.string().min(1).default("./data/columbia"),
  PAGE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DETAIL_CONCURRENCY: z.coerce.number().int().positive().default(4),
  DETAIL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  // 0 = no overall budget for the linkage phase
  LINK_BUDGET_MS: z.coerce.number().int().nonnegative().default(120_000),
  HTTP_USER_AGENT: z.string().optional(),
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): HarvestConfig {
  const parsed = HarvestConfigSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid harvest configuration (${detail})`);
  }
  return parsed.data;
}
