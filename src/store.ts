import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import type { LinkRow, NewSubject, SubjectKey } from "./types";

export type DB = Database.Database;

export const SCHEMA_PATH = path.resolve(__dirname, "..", "schema.sql");

// Crawl levels stored as (name, url) under a parent
export type LinkTable = "institutes" | "departments" | "programs";
// Tables whose rows point at a crawled parent
export type ChildTable = "departments" | "programs" | "subjects";

const PARENT_COLUMN: Record<ChildTable, string> = {
  departments: "institute_id",
  programs: "department_id",
  subjects: "program_id",
};

const UPSERT_SQL: Record<LinkTable, string> = {
  institutes: `INSERT INTO institutes (name, url) VALUES (@name, @url)
               ON CONFLICT(name) DO UPDATE SET url = excluded.url`,
  departments: `INSERT INTO departments (name, url, institute_id) VALUES (@name, @url, @parentId)
                ON CONFLICT(name, institute_id) DO UPDATE SET url = excluded.url`,
  programs: `INSERT INTO programs (name, url, department_id) VALUES (@name, @url, @parentId)
             ON CONFLICT(name, department_id) DO UPDATE SET url = excluded.url`,
};

export interface SubjectCorrectionRow {
  id: number;
  name: string;
  semester: number;
  evalMethod: string;
  programId: number;
}

// Read-only view a resolver lane needs for deduplication
export interface SubjectReader {
  subjectKeys(programId: number): SubjectKey[];
  close(): void;
}

export class Store implements SubjectReader {
  readonly db: DB;

  constructor(filename: string, options: { readonly?: boolean } = {}) {
    this.db = new Database(filename, { readonly: options.readonly ?? false });
    this.db.pragma("foreign_keys = ON");
  }

  bootstrap(schemaPath: string = SCHEMA_PATH): void {
    this.db.exec(fs.readFileSync(schemaPath, "utf-8"));
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  existingLinks(table: LinkTable, parentId: number | null): Map<string, string> {
    const rows =
      table === "institutes"
        ? this.db.prepare<[], { name: string; url: string }>(`SELECT name, url FROM institutes`).all()
        : this.db
            .prepare<[number], { name: string; url: string }>(
              `SELECT name, url FROM ${table} WHERE ${PARENT_COLUMN[table]} = ?`
            )
            .all(parentId ?? 0);
    return new Map(rows.map((r) => [r.name, r.url]));
  }

  /**
   * Writes only entries that are new or whose URL changed. Conflicting names
   * are updated in place so ids survive for later resumption.
   */
  upsertLinks(table: LinkTable, parentId: number | null, links: Map<string, string>): number {
    const existing = this.existingLinks(table, parentId);
    const changed = [...links].filter(([name, url]) => existing.get(name) !== url);
    if (changed.length === 0) return 0;

    const stmt = this.db.prepare<{ name: string; url: string; parentId?: number | null }>(UPSERT_SQL[table]);
    this.db.transaction(() => {
      for (const [name, url] of changed) {
        stmt.run(table === "institutes" ? { name, url } : { name, url, parentId });
      }
    })();
    return changed.length;
  }

  // Parent of the most recently inserted child row, 0 when the table is empty
  lastParentId(table: ChildTable): number {
    const row = this.db
      .prepare<[], { parentId: number }>(
        `SELECT ${PARENT_COLUMN[table]} AS parentId FROM ${table} ORDER BY id DESC LIMIT 1`
      )
      .get();
    return row?.parentId ?? 0;
  }

  linkRowsFrom(table: LinkTable, fromId: number): LinkRow[] {
    return this.db.prepare<[number], LinkRow>(`SELECT id, url FROM ${table} WHERE id >= ? ORDER BY id`).all(fromId);
  }

  subjectKeys(programId: number): SubjectKey[] {
    return this.db
      .prepare<[number], SubjectKey>(`SELECT name, semester FROM subjects WHERE program_id = ?`)
      .all(programId);
  }

  insertSubjects(subjects: NewSubject[]): number {
    const stmt = this.db.prepare<[string, number, string, string, number]>(
      `INSERT INTO subjects (name, semester, eval_method, url, program_id) VALUES (?, ?, ?, ?, ?)`
    );
    this.db.transaction(() => {
      for (const s of subjects) stmt.run(s.name, s.semester, s.evalMethod, s.url, s.programId);
    })();
    return subjects.length;
  }

  subjectsNeedingCorrection(): SubjectCorrectionRow[] {
    return this.db
      .prepare<[], SubjectCorrectionRow>(
        `SELECT id, name, semester, eval_method AS evalMethod, program_id AS programId
         FROM subjects WHERE semester = 0 OR eval_method = '' ORDER BY id`
      )
      .all();
  }

  programName(programId: number): string | undefined {
    return this.db.prepare<[number], { name: string }>(`SELECT name FROM programs WHERE id = ?`).get(programId)?.name;
  }

  countSubjects(programId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>(`SELECT COUNT(*) AS n FROM subjects WHERE program_id = ?`)
      .get(programId);
    return row?.n ?? 0;
  }

  updateSubject(id: number, semester: number, evalMethod: string): void {
    this.db.prepare<[number, string, number]>(`UPDATE subjects SET semester = ?, eval_method = ? WHERE id = ?`).run(
      semester,
      evalMethod,
      id
    );
  }
}
