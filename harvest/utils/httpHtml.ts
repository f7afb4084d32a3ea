import "dotenv/config";
import fetch from "node-fetch";
import { FetchError, FetchTimeoutError } from "../errors.js";

const DEFAULT_TIMEOUT_MS = Number(process.env.DETAIL_TIMEOUT_MS ?? 10_000);

const DEFAULT_HEADERS = {
  "Accept": "text/html,application/xhtml+xml,text/plain",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent": process.env.HTTP_USER_AGENT
    ?? "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36",
};

export type GetTextOptions = {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export async function getText(url: string, opts: GetTextOptions = {}): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const ctrl = new AbortController();
  const onAbort = () => ctrl.abort();
  opts.signal?.addEventListener("abort", onAbort, { once: true });
  const timer = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(url, { headers: { ...DEFAULT_HEADERS, ...opts.headers }, signal: ctrl.signal });
    if (!res.ok) throw new FetchError(url, res.status);
    return await res.text();
  } catch (e) {
    if (ctrl.signal.aborted && !opts.signal?.aborted) throw new FetchTimeoutError(url, timeoutMs);
    throw e;
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}
