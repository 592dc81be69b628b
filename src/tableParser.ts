import { load as loadCheerio, type CheerioAPI } from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import type { PageSource } from "./fetcher";
import type { TableRow } from "./types";
import { normalizeWhitespace } from "./utils";

const HEADER_ROW_CLASS = /ms-viewheadertr|ms-headerrow|ms-viewheader/;
const LAB_PRACTICE_SPLIT = /^\s*(\d+)\s*\/\s*(\d+)\s*$/;

interface ParsedTable {
  headers: string[];
  rows: Record<string, string>[];
}

// Text nodes under a cell, each trimmed, joined by single spaces
function cellText(node: AnyNode): string {
  const parts: string[] = [];
  const walk = (n: AnyNode) => {
    if (isText(n)) {
      const t = n.data.trim();
      if (t) parts.push(t);
    } else if (isTag(n)) {
      n.children.forEach(walk);
    }
  };
  walk(node);
  return normalizeWhitespace(parts.join(" "));
}

// A leading decorative cell: no text, an image, and no link carrying text
function isIconCell($: CheerioAPI, td: Element): boolean {
  if (cellText(td)) return false;
  const hasImage = $(td).find("img").length > 0;
  const linkWithText = $(td)
    .find("a")
    .toArray()
    .some((a) => cellText(a) !== "");
  return hasImage && !linkWithText;
}

function alignRow($: CheerioAPI, tds: Element[], headers: string[]): Record<string, string> {
  const cells = [...tds];
  const values = cells.map(cellText);
  while (values.length > headers.length && cells.length > 0 && isIconCell($, cells[0])) {
    cells.shift();
    values.shift();
  }
  while (values.length < headers.length) values.push("");
  values.length = headers.length;

  const row: Record<string, string> = {};
  headers.forEach((h, i) => {
    row[h] = values[i];
  });
  return row;
}

function parseOneTable($: CheerioAPI, table: Element): ParsedTable {
  const headerRow = $(table)
    .find("tr")
    .toArray()
    .find((tr) => HEADER_ROW_CLASS.test($(tr).attr("class") ?? ""));

  const headers: string[] = [];
  $(table)
    .find('[class*="ms-vh"]')
    .each((_, el) => {
      const t = cellText(el);
      if (t && !headers.includes(t)) headers.push(t);
    });
  if (headers.length === 0 && headerRow) {
    $(headerRow)
      .children("th, td")
      .each((_, el) => {
        const t = cellText(el);
        if (t) headers.push(t);
      });
  }

  const rows: Record<string, string>[] = [];
  if (headerRow) {
    $(headerRow)
      .nextAll("tr")
      .each((_, tr) => {
        const tds = $(tr).find("td").toArray();
        if (tds.length > 0 && headers.length > 0) rows.push(alignRow($, tds, headers));
      });
  } else {
    $(table)
      .find("tr")
      .each((_, tr) => {
        const values = $(tr).find("td").toArray().map(cellText);
        if (values.length === 0) return;
        const row: Record<string, string> = {};
        values.forEach((v, i) => {
          row[`col_${i + 1}`] = v;
        });
        rows.push(row);
      });
  }

  return { headers, rows };
}

function findKey(row: Record<string, string>, fragment: string): string | undefined {
  return Object.keys(row).find((k) => k.toLowerCase().includes(fragment));
}

export function canonicalizeRow(cells: Record<string, string>): TableRow {
  const row: TableRow = { cells };
  const pick = (...fragments: string[]): string | undefined => {
    for (const fragment of fragments) {
      const key = findKey(cells, fragment);
      if (key !== undefined) return cells[key];
    }
    return undefined;
  };

  row.semester = pick("семестр");
  row.lectures = pick("количество лек");
  row.labPractice = pick("лаборат", "практическ");
  row.evalMethod = pick("отчетност", "форма");
  row.lecturer = pick("лектор");
  row.assistants = pick("ассистент");

  const split = row.labPractice?.match(LAB_PRACTICE_SPLIT);
  if (split) {
    row.lab = split[1];
    row.practice = split[2];
  }
  return row;
}

/**
 * Parses the portal's list-view tables into rows with canonical fields.
 * The table whose headers mention a semester or course wins; otherwise the
 * first table that has rows. Pages without such tables give `[]`.
 */
export function parseTable(html: string): TableRow[] {
  const $ = loadCheerio(html);
  const parsed = $("table.ms-listviewtable")
    .toArray()
    .map((table) => parseOneTable($, table))
    .filter((t) => t.rows.length > 0);

  const selected =
    parsed.find((t) => {
      const text = t.headers.join(" ").toLowerCase();
      return text.includes("семестр") || text.includes("курс");
    }) ?? parsed[0];

  return selected ? selected.rows.map(canonicalizeRow) : [];
}

// null when the page itself could not be fetched
export async function fetchTable(source: PageSource, url: string): Promise<TableRow[] | null> {
  const html = await source.fetchText(url);
  return html === null ? null : parseTable(html);
}
