import "dotenv/config";
import { columbiaAdapter } from "./adapters/columbia.ingest.js";
import type { SchoolAdapter } from "./adapter.types.js";
import { log } from "./utils/log.js";

const adapters: Record<string, SchoolAdapter> = {
  columbia: columbiaAdapter,
};

const [target, ...subjects] = process.argv.slice(2);
const adapter = target ? adapters[target] : undefined;
if (!adapter) {
  console.error("Usage: npm run ingest -- <school> [SUBJECT ...]");
  process.exit(1);
}
adapter.ingest({ subjects }).then(() => {
  log.info(`${adapter.id} done`);
}).catch(err => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
