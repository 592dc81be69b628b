import type { PageSource, Pause } from "./fetcher";
import { LINK_PATTERNS, extractLinks, filterLinks } from "./links";
import type { LinkTable, Store } from "./store";

export interface CrawlContext {
  store: Store;
  source: PageSource;
  baseUrl: string;
  pause: Pause;
}

async function classifiedLinks(ctx: CrawlContext, url: string, pattern: RegExp): Promise<Map<string, string> | null> {
  const html = await ctx.source.fetchText(url);
  if (html === null) return null;
  return filterLinks(extractLinks(html, ctx.baseUrl), pattern);
}

export async function crawlInstitutes(ctx: CrawlContext): Promise<number> {
  const links = await classifiedLinks(ctx, ctx.baseUrl, LINK_PATTERNS.institute);
  if (!links || links.size === 0) {
    throw new Error(`No institutes found on ${ctx.baseUrl}; check the link patterns`);
  }
  const saved = ctx.store.upsertLinks("institutes", null, links);
  console.log(saved > 0 ? `${saved} new or updated institutes have been saved` : "No new or updated institutes to save");
  await ctx.pause();
  return saved;
}

/**
 * Walks parents from the one the last child row belongs to (inclusive, it
 * may be incomplete) and stores the children each parent page links to.
 */
async function crawlChildren(
  ctx: CrawlContext,
  parentTable: LinkTable,
  childTable: "departments" | "programs",
  pattern: RegExp
): Promise<number> {
  const fromId = ctx.store.lastParentId(childTable);
  let total = 0;

  for (const parent of ctx.store.linkRowsFrom(parentTable, fromId)) {
    const links = await classifiedLinks(ctx, parent.url, pattern);
    if (links === null) continue;
    if (links.size === 0) {
      console.log(`No ${childTable} found for ${parentTable} ${parent.id}`);
      continue;
    }
    const saved = ctx.store.upsertLinks(childTable, parent.id, links);
    console.log(
      saved > 0
        ? `${saved} new or updated ${childTable} saved for ${parentTable} ${parent.id}`
        : `No new or updated ${childTable} for ${parentTable} ${parent.id}`
    );
    total += saved;
    await ctx.pause();
  }
  console.log(`${childTable[0].toUpperCase()}${childTable.slice(1)} data has been saved`);
  return total;
}

export function crawlDepartments(ctx: CrawlContext): Promise<number> {
  return crawlChildren(ctx, "institutes", "departments", LINK_PATTERNS.department);
}

export function crawlPrograms(ctx: CrawlContext): Promise<number> {
  return crawlChildren(ctx, "departments", "programs", LINK_PATTERNS.program);
}
