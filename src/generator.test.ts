import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_GENERATOR } from "./config";
import {
  currentSemester,
  generateGrades,
  generateGroups,
  generateStudents,
  groupName,
  planGroups,
  russianNames,
  sampleGrade,
} from "./generator";
import { Store } from "./store";

describe("planGroups", () => {
  it("sizes the groups by program length", () => {
    expect(planGroups(4)).toEqual({ prefix: "м", count: 2 });
    expect(planGroups(5)).toEqual({ prefix: "б", count: 4 });
    expect(planGroups(8)).toEqual({ prefix: "б", count: 4 });
    expect(planGroups(11)).toEqual({ prefix: "с", count: 6 });
  });

  it("names groups with or without an abbreviation", () => {
    expect(groupName("б", "ИВТ", 2)).toBe("б-ИВТ-2");
    expect(groupName("м", "", 1)).toBe("м-1");
  });
});

describe("currentSemester", () => {
  it("counts September through January as the autumn semester", () => {
    expect(currentSemester(2, new Date(2024, 9, 1))).toBe(3);
    expect(currentSemester(2, new Date(2025, 0, 20))).toBe(3);
    expect(currentSemester(2, new Date(2025, 1, 1))).toBe(4);
    expect(currentSemester(1, new Date(2025, 7, 31))).toBe(2);
  });
});

describe("sampleGrade", () => {
  it("draws from 5..2 for graded subjects and 1/0 otherwise", () => {
    expect(sampleGrade("Экзамен", DEFAULT_GENERATOR, () => 0)).toBe(5);
    expect(sampleGrade("Оценка", DEFAULT_GENERATOR, () => 0.99)).toBe(2);
    expect(sampleGrade("Зачет", DEFAULT_GENERATOR, () => 0)).toBe(1);
    expect(sampleGrade("", DEFAULT_GENERATOR, () => 0.8)).toBe(0);
  });
});

describe("russianNames", () => {
  it("produces a three-part name", () => {
    expect(russianNames().split(" ")).toHaveLength(3);
  });
});

describe("population", () => {
  let store: Store;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new Store(":memory:");
    store.bootstrap();
    store.upsertLinks("institutes", null, new Map([["Институт ИТ", "https://portal.example.edu/Facult/IT"]]));
    store.upsertLinks("departments", 1, new Map([["Кафедра КИТ", "https://portal.example.edu/Facult/IT/KIT"]]));
    store.upsertLinks(
      "programs",
      1,
      new Map([
        ["09.03.01 Информатика и вычислительная техника", "https://portal.example.edu/p/1"],
        ["09.04.01 Без предметов", "https://portal.example.edu/p/2"],
      ])
    );
    store.insertSubjects([
      { name: "Алгебра", semester: 1, evalMethod: "Экзамен", url: "", programId: 1 },
      { name: "Физкультура", semester: 2, evalMethod: "Зачет", url: "", programId: 1 },
      { name: "Практика", semester: 0, evalMethod: "", url: "", programId: 1 },
      { name: "Диплом", semester: 8, evalMethod: "Оценка", url: "", programId: 1 },
    ]);
  });
  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  const groups = () =>
    store.db
      .prepare<[], { name: string; courseYear: number; programId: number }>(
        `SELECT name, course_year AS courseYear, program_id AS programId FROM student_groups ORDER BY id`
      )
      .all();

  it("creates groups only for programs with subjects, once", () => {
    expect(generateGroups(store.db)).toBe(4);
    expect(groups()).toEqual([
      { name: "б-ИВТ-1", courseYear: 1, programId: 1 },
      { name: "б-ИВТ-2", courseYear: 2, programId: 1 },
      { name: "б-ИВТ-3", courseYear: 3, programId: 1 },
      { name: "б-ИВТ-4", courseYear: 4, programId: 1 },
    ]);
    expect(generateGroups(store.db)).toBe(0);
  });

  it("numbers students from the offset and does not regenerate them", () => {
    generateGroups(store.db);
    let n = 0;
    const names = () => `Студент ${++n}`;

    const created = generateStudents(store.db, { studentIdOffset: 1000, groupSize: [2, 2] }, names);

    expect(created).toBe(8);
    const students = store.db
      .prepare<[], { id: number; name: string; groupId: number }>(`SELECT id, name, group_id AS groupId FROM students ORDER BY id`)
      .all();
    expect(students[0]).toEqual({ id: 1000, name: "Студент 1", groupId: 1 });
    expect(students[7]).toEqual({ id: 1007, name: "Студент 8", groupId: 4 });
    expect(generateStudents(store.db, { studentIdOffset: 1000, groupSize: [2, 2] }, names)).toBe(0);
  });

  it("grades subjects up to the current semester and leaves the rest null", () => {
    generateGroups(store.db);
    generateStudents(store.db, { studentIdOffset: 1, groupSize: [1, 1] }, () => "Студент");

    const created = generateGrades(store.db, DEFAULT_GENERATOR, { now: new Date(2024, 9, 1), random: () => 0 });

    expect(created).toBe(16);
    const gradesOf = (studentId: number) =>
      store.db
        .prepare<[number], { subjectId: number; grade: number | null }>(
          `SELECT subject_id AS subjectId, grade FROM grades WHERE student_id = ? ORDER BY subject_id`
        )
        .all(studentId);
    // first-year student in the autumn: semester 1 only
    expect(gradesOf(1)).toEqual([
      { subjectId: 1, grade: 5 },
      { subjectId: 2, grade: null },
      { subjectId: 3, grade: null },
      { subjectId: 4, grade: null },
    ]);
    // second-year student: semesters 1 to 3
    expect(gradesOf(2)).toEqual([
      { subjectId: 1, grade: 5 },
      { subjectId: 2, grade: 1 },
      { subjectId: 3, grade: null },
      { subjectId: 4, grade: null },
    ]);
    expect(generateGrades(store.db, DEFAULT_GENERATOR)).toBe(0);
  });
});
