import type { GeneratorSettings } from "./config";
import { currentSemester, studentPlacements } from "./generator";
import type { DB } from "./store";
import type { RandomSource } from "./utils";

export type ScholarshipSettings = Pick<
  GeneratorSettings,
  "fund" | "socialAmount" | "academicAmount" | "socialProbability" | "academicProbability"
>;

export interface ScholarshipAward {
  studentId: number;
  social: number;
  academic: number;
  reason: string;
}

const FAILING_GRADES = new Set([0, 2, 3]);
const MAX_FOURS_FOR_ACADEMIC = 2;

export function currentGrades(db: DB, studentId: number, semester: number): (number | null)[] {
  return db
    .prepare<[number, number], { grade: number | null }>(
      `SELECT gr.grade FROM grades gr JOIN subjects s ON s.id = gr.subject_id
       WHERE gr.student_id = ? AND s.semester = ?`
    )
    .all(studentId, semester)
    .map((r) => r.grade);
}

/**
 * Splits one fund over all students, first come first served in ascending
 * id order. A student who passes everything this semester may win the social
 * award; only a social winner with at most two fours may also win the
 * academic one. Every student's scholarship is overwritten.
 */
export function allocateScholarships(
  db: DB,
  settings: ScholarshipSettings,
  options: { now?: Date; random?: RandomSource } = {}
): ScholarshipAward[] {
  const now = options.now ?? new Date();
  const random = options.random ?? Math.random;
  const update = db.prepare<[number, number]>(`UPDATE students SET scholarship = ? WHERE id = ?`);
  let fund = settings.fund;
  const awards: ScholarshipAward[] = [];

  const decide = (studentId: number, grades: (number | null)[]): ScholarshipAward => {
    const award = (social: number, academic: number, reason: string) => ({ studentId, social, academic, reason });

    if (grades.length === 0) return award(0, 0, "no grades this semester");
    if (grades.some((g) => g === null)) return award(0, 0, "ungraded subjects");
    if (grades.some((g) => g !== null && FAILING_GRADES.has(g))) return award(0, 0, "failing grades");

    if (random() >= settings.socialProbability) return award(0, 0, "not selected");
    if (fund < settings.socialAmount) {
      console.log(`Student ${studentId}: insufficient funds (${fund} left, ${settings.socialAmount} needed)`);
      return award(0, 0, "insufficient funds");
    }
    fund -= settings.socialAmount;

    const fours = grades.filter((g) => g === 4).length;
    if (fours > MAX_FOURS_FOR_ACADEMIC) return award(settings.socialAmount, 0, "social");
    if (random() >= settings.academicProbability) return award(settings.socialAmount, 0, "social");
    if (fund < settings.academicAmount) {
      console.log(`Student ${studentId}: insufficient funds for the academic award (${fund} left)`);
      return award(settings.socialAmount, 0, "social; academic: insufficient funds");
    }
    fund -= settings.academicAmount;
    return award(settings.socialAmount, settings.academicAmount, "social and academic");
  };

  db.transaction(() => {
    for (const student of studentPlacements(db)) {
      const semester = currentSemester(student.courseYear, now);
      const result = decide(student.id, currentGrades(db, student.id, semester));
      update.run(result.social + result.academic, student.id);
      awards.push(result);
    }
  })();

  const total = awards.reduce((sum, a) => sum + a.social + a.academic, 0);
  console.log(`Scholarships: ${awards.filter((a) => a.social > 0).length} students awarded ${total}, ${fund} left`);
  return awards;
}
