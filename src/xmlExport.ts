import { load as loadCheerio } from "cheerio";
import type { Element } from "domhandler";
import { stripChars } from "./utils";

// SharePoint-encoded field that holds "URL, Name" for each curriculum entry
export const SUBJECT_FIELD = "ows__x041d__x0430__x0438__x043c__x04";

const EXPORT_ATTRIBUTE = "o:webquerysourcehref";
const EXPORT_MARKER = "XMLDATA";

export interface SubjectLink {
  name: string;
  url: string;
}

export function findXmlExportLink(html: string, pageUrl: string): string | null {
  const $ = loadCheerio(html);
  for (const el of $<Element, string>("*").toArray()) {
    const href = el.attribs[EXPORT_ATTRIBUTE];
    if (href && href.includes(EXPORT_MARKER)) {
      return new URL(href, pageUrl).toString();
    }
  }
  return null;
}

// Values of `field` on every z:row record of a list export
export function parseXmlExport(xml: string, field: string): string[] {
  const $ = loadCheerio(xml, { xml: true });
  const values: string[] = [];
  for (const el of $<Element, string>("*").toArray()) {
    if (el.name !== "z:row") continue;
    const value = el.attribs[field];
    if (value) values.push(value);
  }
  return values;
}

/**
 * Splits "URL, Name" on the first comma only; names may contain commas.
 * A later entry with the same name replaces the earlier URL.
 */
export function parseSubjectPairs(values: string[]): SubjectLink[] {
  const byName = new Map<string, string>();
  for (const raw of values) {
    const idx = raw.indexOf(",");
    if (idx === -1) {
      console.warn(`Skipping export value without a name: "${raw}"`);
      continue;
    }
    const url = raw.slice(0, idx).trim();
    const name = stripChars(raw.slice(idx + 1), " /");
    if (name) byName.set(name, url);
  }
  return [...byName].map(([name, url]) => ({ name, url }));
}
