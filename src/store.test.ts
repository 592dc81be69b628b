import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Store } from "./store";

describe("Store", () => {
  let store: Store;

  beforeEach(() => {
    store = new Store(":memory:");
    store.bootstrap();
  });
  afterEach(() => {
    store.close();
  });

  it("bootstraps the schema more than once", () => {
    expect(() => store.bootstrap()).not.toThrow();
  });

  it("writes only new or changed links and keeps ids stable", () => {
    const institutes = new Map([
      ["Институт ИТ", "https://portal.example.edu/Facult/IT"],
      ["Институт экономики", "https://portal.example.edu/Facult/EC"],
    ]);

    expect(store.upsertLinks("institutes", null, institutes)).toBe(2);
    expect(store.upsertLinks("institutes", null, institutes)).toBe(0);

    const moved = new Map([["Институт ИТ", "https://portal.example.edu/Facult/ITN"]]);
    expect(store.upsertLinks("institutes", null, moved)).toBe(1);
    expect(store.linkRowsFrom("institutes", 0)).toEqual([
      { id: 1, url: "https://portal.example.edu/Facult/ITN" },
      { id: 2, url: "https://portal.example.edu/Facult/EC" },
    ]);
  });

  it("scopes child names to their parent", () => {
    store.upsertLinks("institutes", null, new Map([["А", "https://portal.example.edu/Facult/A"], ["Б", "https://portal.example.edu/Facult/B"]]));
    store.upsertLinks("departments", 1, new Map([["Кафедра", "https://portal.example.edu/Facult/A/K"]]));
    store.upsertLinks("departments", 2, new Map([["Кафедра", "https://portal.example.edu/Facult/B/K"]]));

    expect(store.existingLinks("departments", 1)).toEqual(new Map([["Кафедра", "https://portal.example.edu/Facult/A/K"]]));
    expect(store.lastParentId("departments")).toBe(2);
  });

  it("rejects children of a missing parent", () => {
    expect(() => store.upsertLinks("departments", 99, new Map([["Кафедра", "https://portal.example.edu/x"]]))).toThrow();
  });

  it("reports 0 as the last parent of an empty table", () => {
    expect(store.lastParentId("subjects")).toBe(0);
  });

  it("stores subjects and lists the ones that need correction", () => {
    store.upsertLinks("institutes", null, new Map([["А", "https://portal.example.edu/Facult/A"]]));
    store.upsertLinks("departments", 1, new Map([["Кафедра", "https://portal.example.edu/Facult/A/K"]]));
    store.upsertLinks("programs", 1, new Map([["09.03.01 Информатика", "https://portal.example.edu/p/1"]]));

    store.insertSubjects([
      { name: "Алгебра", semester: 1, evalMethod: "Экзамен", url: "https://portal.example.edu/d/1", programId: 1 },
      { name: "Физика", semester: 0, evalMethod: "Зачет", url: "https://portal.example.edu/d/2", programId: 1 },
      { name: "История", semester: 2, evalMethod: "", url: "https://portal.example.edu/d/3", programId: 1 },
    ]);

    expect(store.countSubjects(1)).toBe(3);
    expect(store.subjectKeys(1)).toEqual([
      { name: "Алгебра", semester: 1 },
      { name: "Физика", semester: 0 },
      { name: "История", semester: 2 },
    ]);
    expect(store.subjectsNeedingCorrection().map((s) => s.name)).toEqual(["Физика", "История"]);
    expect(store.programName(1)).toBe("09.03.01 Информатика");
    expect(store.programName(2)).toBeUndefined();

    store.updateSubject(2, 4, "Зачет");
    expect(store.subjectsNeedingCorrection().map((s) => s.id)).toEqual([3]);
  });
});
