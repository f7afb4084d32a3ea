import { load } from "cheerio";

// <pre> text is kept verbatim so the listing columns stay aligned
export function htmlToText(html: string): string {
  const $ = load(html);
  const pre = $("pre").map((_i, el) => $(el).text()).get();
  if (pre.length) return pre.join("\n");
  const body = $("body");
  return body.length ? body.text() : $.root().text();
}

export type PageLink = { text: string; href: string };

export function findLinks(html: string, pageUrl: string, pattern: RegExp): PageLink[] {
  const $ = load(html);
  const out: PageLink[] = [];
  $("a").each((_i, a) => {
    const text = $(a).text().replace(/\s+/g, " ").trim();
    const href = $(a).attr("href") || "";
    if (href && pattern.test(text)) out.push({ text, href: new URL(href, pageUrl).toString() });
  });
  return out;
}
