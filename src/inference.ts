import * as fuzz from "fuzzball";
import type { Store } from "./store";
import type { EvalMethod, ProgramType } from "./types";
import { type RandomSource, randomInt } from "./utils";

export const MAX_SEMESTERS: Record<ProgramType, number> = {
  bachelor: 8,
  master: 4,
  specialist: 11,
};

// First matching type wins
const PROGRAM_KEYWORDS: [ProgramType, string[]][] = [
  ["master", ["магистр", "магистратура"]],
  ["bachelor", ["бакалавр", "бакалавриат"]],
  ["specialist", ["специалитет", "специалист"]],
];

// Practice and attestation templates with the semester they belong to
export const PRACTICE_TEMPLATES: Record<ProgramType, Record<string, number>> = {
  bachelor: {
    "1 учебная практика": 2,
    "2 учебная практика": 4,
    "производственная (технологическая) практика": 6,
    "производственная практика (нир)": 7,
    "преддипломная практика": 8,
    "государственная итоговая аттестация": 8,
  },
  master: {
    "учебная практика": 1,
    "производственная практика (технологическая)": 2,
    "производственная практика (педагогическая)": 3,
    "научно-исследовательская работа": 3,
    "преддипломная практика": 4,
    "государственная итоговая аттестация": 4,
  },
  specialist: {
    "1-ая учебная практика (ознакомительная)": 2,
    "2-ая учебная практика (обмерная)": 4,
    "3-ая учебная практика (геодезическая)": 6,
    "1-ая производственная практика (технологическая)": 6,
    "2-ая производственная практика (исследовательская)": 7,
    "3-я производственная практика (проектно-исследовательская)": 10,
    "преддипломная практика": 11,
    "государственная итоговая аттестация": 11,
  },
};

const FUZZY_THRESHOLD = 80;
const SEMESTER_IN_NAME = /(?<![\p{L}\p{N}_])(\d{1,2})(?:-й|-ой|-го|-му|-м)?\s*семестр/iu;

// 0–100 similarity of two strings
export type SimilarityScorer = (a: string, b: string) => number;

export const tokenSortRatio: SimilarityScorer = (a, b) => fuzz.token_sort_ratio(a, b);

export interface ProgramTypeInfo {
  type: ProgramType;
  maxSemesters: number;
}

/**
 * Keywords in the program name decide; without any, the number of subjects
 * stored for the program does. `subjectCount` is only called in that case.
 */
export function determineProgramType(programName: string, subjectCount: () => number): ProgramTypeInfo {
  const name = programName.toLowerCase();
  for (const [type, keywords] of PROGRAM_KEYWORDS) {
    if (keywords.some((k) => name.includes(k))) return { type, maxSemesters: MAX_SEMESTERS[type] };
  }
  const count = subjectCount();
  const type: ProgramType = count > 80 ? "specialist" : count > 40 ? "bachelor" : "master";
  return { type, maxSemesters: MAX_SEMESTERS[type] };
}

export function extractSemesterFromName(name: string): number | null {
  const match = name.match(SEMESTER_IN_NAME);
  return match ? parseInt(match[1], 10) : null;
}

export interface PracticeMatch {
  template: string;
  semester: number;
  score: number;
}

export function matchPractice(
  name: string,
  templates: Record<string, number>,
  scorer: SimilarityScorer = tokenSortRatio
): PracticeMatch | null {
  const query = name.toLowerCase().trim();
  let best: PracticeMatch | null = null;
  for (const [template, semester] of Object.entries(templates)) {
    const score = scorer(query, template);
    if (!best || score > best.score) best = { template, semester, score };
  }
  return best && best.score > FUZZY_THRESHOLD ? best : null;
}

export function determineEvalMethod(semester: number, maxSemesters: number, isPractice: boolean): EvalMethod {
  if (isPractice) return "Оценка";
  return semester >= maxSemesters - 1 ? "Экзамен" : "Зачет";
}

export interface InferenceDeps {
  scorer?: SimilarityScorer;
  random?: RandomSource;
}

export interface Inference {
  semester: number;
  evalMethod: string;
  source: "stored" | "name" | "template" | "random";
}

/**
 * Fills a zero semester from the subject name, then from the practice
 * templates, then at random within the program's length (a guess, not a
 * fact). An empty eval method is derived from the resulting semester.
 */
export function inferSubject(
  subject: { name: string; semester: number; evalMethod: string },
  program: ProgramTypeInfo,
  deps: InferenceDeps = {}
): Inference {
  let semester = subject.semester;
  let source: Inference["source"] = "stored";
  let isPractice = false;

  if (semester === 0) {
    const extracted = extractSemesterFromName(subject.name);
    if (extracted !== null && extracted <= program.maxSemesters) {
      semester = extracted;
      source = "name";
    } else {
      const match = matchPractice(subject.name, PRACTICE_TEMPLATES[program.type], deps.scorer);
      if (match) {
        semester = match.semester;
        source = "template";
        isPractice = true;
      } else {
        semester = randomInt(1, program.maxSemesters, deps.random);
        source = "random";
      }
    }
  }

  const evalMethod = subject.evalMethod || determineEvalMethod(semester, program.maxSemesters, isPractice);
  return { semester, evalMethod, source };
}

export interface Correction extends Inference {
  subjectId: number;
  name: string;
}

export function correctSubjects(store: Store, deps: InferenceDeps = {}): Correction[] {
  const rows = store.subjectsNeedingCorrection();
  if (rows.length === 0) {
    console.log("No semester or evaluation method data to update");
    return [];
  }

  const corrections: Correction[] = [];
  store.db.transaction(() => {
    for (const row of rows) {
      const programName = store.programName(row.programId) ?? "";
      const program = determineProgramType(programName, () => store.countSubjects(row.programId));
      const inference = inferSubject(row, program, deps);
      store.updateSubject(row.id, inference.semester, inference.evalMethod);
      corrections.push({ subjectId: row.id, name: row.name, ...inference });
      console.log(
        `Subject: ${row.name}, Semester: ${inference.semester}, Eval method: ${inference.evalMethod}, Program: ${programName}`
      );
    }
  })();
  console.log("Semesters and evaluation methods have been updated!");
  return corrections;
}
