import type { PageSource, Pause } from "./fetcher";
import type { Store, SubjectReader } from "./store";
import { fetchTable } from "./tableParser";
import type { LinkRow, NewSubject, PortalCredentials, ResolvedSubject } from "./types";
import { parseStrictInt } from "./utils";
import { SUBJECT_FIELD, findXmlExportLink, parseSubjectPairs, parseXmlExport } from "./xmlExport";

const UNRESOLVED: ResolvedSubject = { semester: 0, evalMethod: "" };

/**
 * Reads semester and evaluation method from a subject page. Any failure,
 * including an unreachable page, degrades to (0, "").
 */
export async function resolveSubject(source: PageSource, name: string, url: string): Promise<ResolvedSubject> {
  try {
    const rows = await fetchTable(source, url);
    if (rows === null) throw new Error("page unavailable");

    let semester = 0;
    const withSemester = rows.find((r) => r.semester);
    if (withSemester?.semester) {
      const parsed = parseStrictInt(withSemester.semester);
      if (parsed === null) {
        console.warn(`Invalid semester value for ${name}: ${withSemester.semester}`);
      } else {
        semester = parsed;
      }
    }
    const evalMethod = rows.find((r) => r.evalMethod)?.evalMethod ?? "";
    return { semester, evalMethod };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error parsing subject ${name} at ${url}: ${message}`);
    return { ...UNRESOLVED };
  }
}

export interface Lane {
  name: string;
  source: PageSource;
  reader: SubjectReader;
  signal: AbortSignal;
  pause: Pause;
}

// New subjects of one program; null when its page or list export is missing
async function resolveProgram(program: LinkRow, lane: Lane): Promise<NewSubject[] | null> {
  const page = await lane.source.fetchText(program.url);
  if (page === null) return null;
  const xmlLink = findXmlExportLink(page, program.url);
  if (!xmlLink) {
    console.warn(`No list export found for program ${program.id}`);
    return null;
  }
  const xml = await lane.source.fetchText(xmlLink);
  if (xml === null) return null;
  const subjects = parseSubjectPairs(parseXmlExport(xml, SUBJECT_FIELD));

  const existing = new Set(lane.reader.subjectKeys(program.id).map((k) => `${k.name}\u0000${k.semester}`));
  const fresh: NewSubject[] = [];
  for (const subject of subjects) {
    if (lane.signal.aborted) {
      console.log(`Lane ${lane.name} stopping: interrupted`);
      break;
    }
    const { semester, evalMethod } = await resolveSubject(lane.source, subject.name, subject.url);
    if (existing.has(`${subject.name}\u0000${semester}`)) continue;
    fresh.push({ name: subject.name, semester, evalMethod, url: subject.url, programId: program.id });
    console.log(`Subject: ${subject.name}, Semester: ${semester}, Eval method: ${evalMethod}, Program id: ${program.id}`);
  }
  return fresh;
}

/**
 * Resolves the subjects of each program in order and returns, per program,
 * the ones not yet stored under the same (name, semester). A program that
 * fails is logged and skipped. Stops between units of work once the signal
 * is aborted and returns what it has.
 */
export async function resolveProgramBatch(programs: LinkRow[], lane: Lane): Promise<NewSubject[][]> {
  const batches: NewSubject[][] = [];

  for (const program of programs) {
    if (lane.signal.aborted) {
      console.log(`Lane ${lane.name} stopping: interrupted`);
      break;
    }

    try {
      const fresh = await resolveProgram(program, lane);
      if (fresh === null) continue;
      if (fresh.length > 0) {
        batches.push(fresh);
      } else {
        console.log(`No new subjects for program ${program.id}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error resolving subjects for program ${program.id}: ${message}`);
      continue;
    }
    await lane.pause();
  }

  return batches;
}

// Contiguous slices, earlier slices take the remainder
export function splitEvenly<T>(items: T[], parts: number): T[][] {
  const slices: T[][] = [];
  const base = Math.floor(items.length / parts);
  let extra = items.length % parts;
  let start = 0;
  for (let i = 0; i < parts; i++) {
    const size = base + (extra > 0 ? 1 : 0);
    if (extra > 0) extra--;
    slices.push(items.slice(start, start + size));
    start += size;
  }
  return slices;
}

export interface CrawlSubjectsOptions {
  credentials: PortalCredentials[];
  createSource: (credentials: PortalCredentials) => PageSource;
  openReader: () => SubjectReader;
  pause: Pause;
  signal?: AbortSignal;
}

/**
 * Resumes at the program of the last stored subject (re-included, since it
 * may have been cut short), fans the programs out over one lane per
 * credential pair and commits every returned batch from this process only.
 */
export async function crawlSubjects(store: Store, options: CrawlSubjectsOptions): Promise<number> {
  if (options.credentials.length === 0) {
    throw new Error("crawlSubjects needs at least one credential pair");
  }
  const lastProgramId = store.lastParentId("subjects");
  const programs = store.linkRowsFrom("programs", lastProgramId);
  console.log(`Resolving subjects for ${programs.length} programs from id ${lastProgramId}`);

  const controller = new AbortController();
  const forward = () => controller.abort();
  if (options.signal?.aborted) controller.abort();
  options.signal?.addEventListener("abort", forward);
  const onInterrupt = () => {
    console.log("\n[!] Interrupt received, signaling lanes to stop...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const slices = splitEvenly(programs, options.credentials.length);
  let results: PromiseSettledResult<NewSubject[][]>[];
  try {
    results = await Promise.allSettled(
      slices.map(async (slice, i) => {
        const reader = options.openReader();
        try {
          return await resolveProgramBatch(slice, {
            name: `#${i + 1}`,
            source: options.createSource(options.credentials[i]),
            reader,
            signal: controller.signal,
            pause: options.pause,
          });
        } finally {
          reader.close();
        }
      })
    );
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    options.signal?.removeEventListener("abort", forward);
  }

  let saved = 0;
  results.forEach((result, i) => {
    if (result.status === "rejected") {
      console.error(`Lane #${i + 1} failed, its results are dropped:`, result.reason);
      return;
    }
    for (const batch of result.value) {
      saved += store.insertSubjects(batch);
      console.log(`${batch.length} new subjects saved`);
    }
  });
  return saved;
}
