import { fakerRU } from "@faker-js/faker";
import { deriveAbbreviation } from "./abbreviation";
import type { GeneratorSettings } from "./config";
import type { DB } from "./store";
import { type RandomSource, randomInt, weightedPick } from "./utils";

// Produces a display name for a synthetic student
export type NameSource = () => string;

export const russianNames: NameSource = () => {
  const sex = fakerRU.person.sexType();
  return `${fakerRU.person.lastName(sex)} ${fakerRU.person.firstName(sex)} ${fakerRU.person.middleName(sex)}`;
};

export interface GroupPlan {
  prefix: "м" | "б" | "с";
  count: number;
}

export function planGroups(maxSemester: number): GroupPlan {
  if (maxSemester <= 4) return { prefix: "м", count: 2 };
  if (maxSemester <= 8) return { prefix: "б", count: 4 };
  return { prefix: "с", count: 6 };
}

export function groupName(prefix: string, abbreviation: string, index: number): string {
  return abbreviation ? `${prefix}-${abbreviation}-${index}` : `${prefix}-${index}`;
}

/**
 * Current semester of a group: September to January is the odd half of the
 * academic year, February to August the even one.
 * TODO: course_year doubles as the group's creation index; split it into
 * sequence_index and academic_year once groups are created per intake.
 */
export function currentSemester(courseYear: number, now: Date): number {
  const month = now.getMonth() + 1;
  const autumn = month >= 9 || month === 1;
  return autumn ? courseYear * 2 - 1 : courseYear * 2;
}

function tableIsEmpty(db: DB, table: "students" | "grades"): boolean {
  const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
  return (row?.n ?? 0) === 0;
}

// Creates groups for every program that has subjects but no groups yet
export function generateGroups(db: DB): number {
  const programs = db
    .prepare<[], { id: number; name: string; maxSemester: number | null; groupCount: number }>(
      `SELECT p.id, p.name,
              (SELECT MAX(semester) FROM subjects s WHERE s.program_id = p.id) AS maxSemester,
              (SELECT COUNT(*) FROM student_groups g WHERE g.program_id = p.id) AS groupCount
       FROM programs p ORDER BY p.id`
    )
    .all();
  const insert = db.prepare<[string, number, number]>(
    `INSERT INTO student_groups (name, course_year, program_id) VALUES (?, ?, ?)`
  );

  let created = 0;
  db.transaction(() => {
    for (const program of programs) {
      if (program.groupCount > 0 || program.maxSemester === null) continue;
      const { prefix, count } = planGroups(program.maxSemester);
      const abbreviation = deriveAbbreviation(program.name);
      for (let index = 1; index <= count; index++) {
        insert.run(groupName(prefix, abbreviation, index), index, program.id);
        created++;
      }
    }
  })();
  console.log(`${created} groups created`);
  return created;
}

export function generateStudents(
  db: DB,
  settings: Pick<GeneratorSettings, "studentIdOffset" | "groupSize">,
  names: NameSource = russianNames,
  random: RandomSource = Math.random
): number {
  if (!tableIsEmpty(db, "students")) {
    console.log("Students already generated, skipping");
    return 0;
  }
  const groups = db.prepare<[], { id: number }>(`SELECT id FROM student_groups ORDER BY id`).all();
  const insert = db.prepare<[number, string, number]>(
    `INSERT INTO students (id, name, group_id, scholarship) VALUES (?, ?, ?, 0)`
  );

  let nextId = settings.studentIdOffset;
  db.transaction(() => {
    for (const group of groups) {
      const size = randomInt(settings.groupSize[0], settings.groupSize[1], random);
      for (let i = 0; i < size; i++) insert.run(nextId++, names(), group.id);
    }
  })();
  const created = nextId - settings.studentIdOffset;
  console.log(`${created} students created`);
  return created;
}

export interface StudentPlacement {
  id: number;
  courseYear: number;
  programId: number;
}

export function studentPlacements(db: DB): StudentPlacement[] {
  return db
    .prepare<[], StudentPlacement>(
      `SELECT st.id, g.course_year AS courseYear, g.program_id AS programId
       FROM students st JOIN student_groups g ON g.id = st.group_id
       ORDER BY st.id`
    )
    .all();
}

export function sampleGrade(
  evalMethod: string,
  settings: Pick<GeneratorSettings, "examWeights" | "passWeights">,
  random: RandomSource = Math.random
): number {
  if (evalMethod === "Экзамен" || evalMethod === "Оценка") {
    return weightedPick([5, 4, 3, 2], settings.examWeights, random);
  }
  return weightedPick([1, 0], settings.passWeights, random);
}

/**
 * One grade row per (student, subject of the student's program). Subjects
 * with an unknown semester or one after the student's current semester stay
 * null.
 */
export function generateGrades(
  db: DB,
  settings: Pick<GeneratorSettings, "examWeights" | "passWeights">,
  options: { now?: Date; random?: RandomSource } = {}
): number {
  if (!tableIsEmpty(db, "grades")) {
    console.log("Grades already generated, skipping");
    return 0;
  }
  const now = options.now ?? new Date();
  const subjectsOf = db.prepare<[number], { id: number; semester: number; evalMethod: string }>(
    `SELECT id, semester, eval_method AS evalMethod FROM subjects WHERE program_id = ? ORDER BY id`
  );
  const insert = db.prepare<[number, number, number | null]>(
    `INSERT INTO grades (student_id, subject_id, grade) VALUES (?, ?, ?)`
  );

  let created = 0;
  db.transaction(() => {
    for (const student of studentPlacements(db)) {
      const current = currentSemester(student.courseYear, now);
      for (const subject of subjectsOf.all(student.programId)) {
        const taken = subject.semester !== 0 && subject.semester <= current;
        insert.run(student.id, subject.id, taken ? sampleGrade(subject.evalMethod, settings, options.random) : null);
        created++;
      }
    }
  })();
  console.log(`${created} grades created`);
  return created;
}
