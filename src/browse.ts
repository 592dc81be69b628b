import { currentSemester } from "./generator";
import type { DB } from "./store";
import type { Department, Group, Institute, Program, Student, Subject } from "./types";

export class BrowseError extends Error {
  constructor(
    readonly status: 400 | 404,
    message: string
  ) {
    super(message);
    this.name = "BrowseError";
  }
}

function requireRow<T>(row: T | undefined, what: string, id: number): T {
  if (row === undefined) throw new BrowseError(404, `${what} ${id} not found`);
  return row;
}

export function listInstitutes(db: DB): Institute[] {
  return db.prepare<[], Institute>(`SELECT id, name, url FROM institutes ORDER BY id`).all();
}

export function listDepartments(db: DB, instituteId: number): Department[] {
  return db
    .prepare<[number], Department>(
      `SELECT id, name, url, institute_id AS instituteId FROM departments WHERE institute_id = ? ORDER BY id`
    )
    .all(instituteId);
}

export function listPrograms(db: DB, departmentId: number): (Program & { groups: Group[] })[] {
  const programs = db
    .prepare<[number], Program>(
      `SELECT id, name, url, department_id AS departmentId FROM programs WHERE department_id = ? ORDER BY id`
    )
    .all(departmentId);
  const groupsOf = db.prepare<[number], Group>(
    `SELECT id, name, course_year AS courseYear, program_id AS programId
     FROM student_groups WHERE program_id = ? ORDER BY id`
  );
  return programs.map((p) => ({ ...p, groups: groupsOf.all(p.id) }));
}

export function listSubjects(db: DB, programId: number): Subject[] {
  return db
    .prepare<[number], Subject>(
      `SELECT id, name, semester, eval_method AS evalMethod, url, program_id AS programId
       FROM subjects WHERE program_id = ? ORDER BY semester, id`
    )
    .all(programId);
}

function findGroup(db: DB, groupId: number): Group | undefined {
  return db
    .prepare<[number], Group>(
      `SELECT id, name, course_year AS courseYear, program_id AS programId FROM student_groups WHERE id = ?`
    )
    .get(groupId);
}

function findStudent(db: DB, studentId: number): Student | undefined {
  return db
    .prepare<[number], Student>(`SELECT id, name, group_id AS groupId, scholarship FROM students WHERE id = ?`)
    .get(studentId);
}

export function getGroup(db: DB, groupId: number): Group & { students: Student[] } {
  const group = requireRow(findGroup(db, groupId), "Group", groupId);
  const students = db
    .prepare<[number], Student>(
      `SELECT id, name, group_id AS groupId, scholarship FROM students WHERE group_id = ? ORDER BY id`
    )
    .all(groupId);
  return { ...group, students };
}

export interface StudentCard extends Student {
  semester: number;
  grades: { subjectId: number; subject: string; evalMethod: string; grade: number | null }[];
}

export function getStudent(db: DB, studentId: number, now: Date = new Date()): StudentCard {
  const student = requireRow(findStudent(db, studentId), "Student", studentId);
  const group = requireRow(findGroup(db, student.groupId), "Group", student.groupId);
  const semester = currentSemester(group.courseYear, now);
  const grades = db
    .prepare<[number, number, number], StudentCard["grades"][number]>(
      `SELECT s.id AS subjectId, s.name AS subject, s.eval_method AS evalMethod, gr.grade
       FROM subjects s LEFT JOIN grades gr ON gr.subject_id = s.id AND gr.student_id = ?
       WHERE s.program_id = ? AND s.semester = ? ORDER BY s.id`
    )
    .all(studentId, group.programId, semester);
  return { ...student, semester, grades };
}

function validName(name: unknown): string {
  if (typeof name !== "string" || name.trim() === "") {
    throw new BrowseError(400, "Student name must be a non-empty string");
  }
  return name.trim();
}

// New ids continue after the highest existing one, or start at `firstId`
export function addStudent(db: DB, groupId: number, name: unknown, firstId = 1): Student {
  requireRow(findGroup(db, groupId), "Group", groupId);
  const studentName = validName(name);
  const next = db.prepare<[], { id: number | null }>(`SELECT MAX(id) + 1 AS id FROM students`).get();
  const id = next?.id ?? firstId;
  db.prepare<[number, string, number]>(`INSERT INTO students (id, name, group_id, scholarship) VALUES (?, ?, ?, 0)`).run(
    id,
    studentName,
    groupId
  );
  return { id, name: studentName, groupId, scholarship: 0 };
}

export function deleteStudent(db: DB, studentId: number): void {
  const result = db.prepare<[number]>(`DELETE FROM students WHERE id = ?`).run(studentId);
  if (result.changes === 0) throw new BrowseError(404, `Student ${studentId} not found`);
}

export interface StudentEdit {
  name?: unknown;
  grades?: unknown; // { [subjectId]: grade | null }
}

function allowedGrades(evalMethod: string): number[] {
  return evalMethod === "Экзамен" || evalMethod === "Оценка" ? [2, 3, 4, 5] : [0, 1];
}

/**
 * Renames a student and upserts a sparse set of grades keyed by subject id.
 * Everything is validated before the first write.
 */
export function editStudent(db: DB, studentId: number, edit: StudentEdit): Student {
  const student = requireRow(findStudent(db, studentId), "Student", studentId);
  const group = requireRow(findGroup(db, student.groupId), "Group", student.groupId);
  const name = edit.name === undefined ? student.name : validName(edit.name);

  const updates: [number, number | null][] = [];
  if (edit.grades !== undefined) {
    if (typeof edit.grades !== "object" || edit.grades === null || Array.isArray(edit.grades)) {
      throw new BrowseError(400, "grades must be an object of subjectId -> grade");
    }
    const subjectOf = db.prepare<[number, number], { evalMethod: string }>(
      `SELECT eval_method AS evalMethod FROM subjects WHERE id = ? AND program_id = ?`
    );
    const entries: [string, unknown][] = Object.entries(edit.grades);
    for (const [key, grade] of entries) {
      const subjectId = Number(key);
      const subject = Number.isInteger(subjectId) ? subjectOf.get(subjectId, group.programId) : undefined;
      if (!subject) throw new BrowseError(400, `Subject ${key} is not part of the student's program`);
      if (grade === null) {
        updates.push([subjectId, null]);
        continue;
      }
      if (typeof grade !== "number" || !allowedGrades(subject.evalMethod).includes(grade)) {
        throw new BrowseError(400, `Grade ${String(grade)} is not valid for subject ${key}`);
      }
      updates.push([subjectId, grade]);
    }
  }

  const rename = db.prepare<[string, number]>(`UPDATE students SET name = ? WHERE id = ?`);
  const upsert = db.prepare<[number, number, number | null]>(
    `INSERT INTO grades (student_id, subject_id, grade) VALUES (?, ?, ?)
     ON CONFLICT(student_id, subject_id) DO UPDATE SET grade = excluded.grade`
  );
  db.transaction(() => {
    rename.run(name, studentId);
    for (const [subjectId, grade] of updates) upsert.run(studentId, subjectId, grade);
  })();
  return { ...student, name };
}
