import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  PRACTICE_TEMPLATES,
  correctSubjects,
  determineEvalMethod,
  determineProgramType,
  extractSemesterFromName,
  inferSubject,
  matchPractice,
} from "./inference";
import { Store } from "./store";

const bachelor = { type: "bachelor", maxSemesters: 8 } as const;
const master = { type: "master", maxSemesters: 4 } as const;
const exactOnly = (a: string, b: string) => (a === b ? 100 : 0);

describe("determineProgramType", () => {
  it("trusts keywords in the name without counting subjects", () => {
    const count = vi.fn(() => 100);
    expect(determineProgramType("Программа магистратуры", count)).toEqual({ type: "master", maxSemesters: 4 });
    expect(determineProgramType("09.03.01 Информатика (бакалавриат)", count)).toEqual({ type: "bachelor", maxSemesters: 8 });
    expect(count).not.toHaveBeenCalled();
  });

  it("falls back to the number of stored subjects", () => {
    expect(determineProgramType("Архитектура", () => 81).type).toBe("specialist");
    expect(determineProgramType("Архитектура", () => 41).type).toBe("bachelor");
    expect(determineProgramType("Архитектура", () => 40).type).toBe("master");
  });
});

describe("extractSemesterFromName", () => {
  it("finds a semester number before the word", () => {
    expect(extractSemesterFromName("Учебная практика (5 семестр)")).toBe(5);
    expect(extractSemesterFromName("Курсовой проект 3-й семестр")).toBe(3);
  });

  it("ignores digits that are part of a longer number", () => {
    expect(extractSemesterFromName("Набор 2025 семестр")).toBeNull();
    expect(extractSemesterFromName("История")).toBeNull();
  });
});

describe("matchPractice", () => {
  it("accepts the best template above the threshold", () => {
    const scorer = (_a: string, b: string) => (b === "преддипломная практика" ? 95 : 10);
    expect(matchPractice("Преддипломная практика", PRACTICE_TEMPLATES.bachelor, scorer)).toEqual({
      template: "преддипломная практика",
      semester: 8,
      score: 95,
    });
  });

  it("rejects a score of exactly 80", () => {
    expect(matchPractice("Практика", PRACTICE_TEMPLATES.bachelor, () => 80)).toBeNull();
  });

  it("matches a template spelled out in full with the default scorer", () => {
    expect(matchPractice("  Государственная итоговая аттестация ", PRACTICE_TEMPLATES.master)?.semester).toBe(4);
  });
});

describe("determineEvalMethod", () => {
  it("grades practices and examines the last two semesters", () => {
    expect(determineEvalMethod(2, 8, true)).toBe("Оценка");
    expect(determineEvalMethod(7, 8, false)).toBe("Экзамен");
    expect(determineEvalMethod(6, 8, false)).toBe("Зачет");
  });
});

describe("inferSubject", () => {
  it("takes the semester from the name when it fits the program", () => {
    expect(inferSubject({ name: "Курсовой проект 3-й семестр", semester: 0, evalMethod: "" }, master)).toEqual({
      semester: 3,
      evalMethod: "Экзамен",
      source: "name",
    });
  });

  it("uses a practice template and keeps a stored evaluation method", () => {
    const result = inferSubject(
      { name: "Преддипломная практика", semester: 0, evalMethod: "Зачет" },
      bachelor,
      { scorer: exactOnly }
    );
    expect(result).toEqual({ semester: 8, evalMethod: "Зачет", source: "template" });
  });

  it("guesses a semester within the program length as a last resort", () => {
    const semesters = [0, 0.5, 0.999].map(
      (r) => inferSubject({ name: "Физика", semester: 0, evalMethod: "" }, bachelor, { scorer: () => 0, random: () => r }).semester
    );
    expect(semesters).toEqual([1, 5, 8]);
  });

  it("skips a name semester beyond the program length", () => {
    const result = inferSubject({ name: "Проект 9 семестр", semester: 0, evalMethod: "" }, master, {
      scorer: () => 0,
      random: () => 0,
    });
    expect(result).toEqual({ semester: 1, evalMethod: "Зачет", source: "random" });
  });

  it("only fills the evaluation method when the semester is known", () => {
    expect(inferSubject({ name: "История", semester: 2, evalMethod: "" }, bachelor)).toEqual({
      semester: 2,
      evalMethod: "Зачет",
      source: "stored",
    });
  });
});

describe("correctSubjects", () => {
  let store: Store;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new Store(":memory:");
    store.bootstrap();
    store.upsertLinks("institutes", null, new Map([["Институт ИТ", "https://portal.example.edu/Facult/IT"]]));
    store.upsertLinks("departments", 1, new Map([["Кафедра КИТ", "https://portal.example.edu/Facult/IT/KIT"]]));
    store.upsertLinks("programs", 1, new Map([["09.03.01 Информатика (бакалавриат)", "https://portal.example.edu/p/1"]]));
  });
  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  it("persists inferred values for incomplete subjects only", () => {
    store.insertSubjects([
      { name: "Преддипломная практика", semester: 0, evalMethod: "", url: "", programId: 1 },
      { name: "Алгебра", semester: 2, evalMethod: "Экзамен", url: "", programId: 1 },
      { name: "Физика 3 семестр", semester: 0, evalMethod: "Зачет", url: "", programId: 1 },
    ]);

    const corrections = correctSubjects(store, { scorer: exactOnly });

    expect(corrections.map((c) => [c.subjectId, c.semester, c.evalMethod, c.source])).toEqual([
      [1, 8, "Оценка", "template"],
      [3, 3, "Зачет", "name"],
    ]);
    expect(store.subjectsNeedingCorrection()).toEqual([]);
    expect(store.subjectKeys(1)).toEqual([
      { name: "Преддипломная практика", semester: 8 },
      { name: "Алгебра", semester: 2 },
      { name: "Физика 3 семестр", semester: 3 },
    ]);
  });

  it("reports when there is nothing to correct", () => {
    expect(correctSubjects(store)).toEqual([]);
    expect(console.log).toHaveBeenCalledWith("No semester or evaluation method data to update");
  });
});
