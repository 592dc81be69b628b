import { load as loadCheerio } from "cheerio";
import { normalizeWhitespace } from "./utils";

// URL shapes of the three crawl levels on the portal
export const LINK_PATTERNS = {
  institute: /Facult\/[A-Z]+(?=\/|$)/,
  department: /\/Facult\/[A-Z]+\/[A-Z]+(?:\/default\.aspx)?$/,
  program: /\/\d{2}\.\d{2}\.\d{2}[^/]*(?:\/default\.aspx)?$/,
} as const;

/**
 * Maps visible anchor text to an absolute URL. Anchors sharing the same text
 * collapse onto the last one seen.
 */
export function extractLinks(html: string, baseUrl: string): Map<string, string> {
  const $ = loadCheerio(html);
  const links = new Map<string, string>();
  $("a[href]").each((_, a) => {
    let href = $(a).attr("href") ?? "";
    if (!href.startsWith("http")) {
      try {
        href = new URL(href, baseUrl).toString();
      } catch {
        console.warn(`Skipping unresolvable link "${href}"`);
        return;
      }
    }
    links.set(normalizeWhitespace($(a).text()), href);
  });
  return links;
}

export function filterLinks(links: Map<string, string>, pattern: RegExp): Map<string, string> {
  const kept = new Map<string, string>();
  for (const [name, url] of links) {
    if (pattern.test(url)) kept.set(name, url);
  }
  return kept;
}
