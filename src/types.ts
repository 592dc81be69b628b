export type EvalMethod = "Экзамен" | "Зачет" | "Оценка" | "";

export type ProgramType = "bachelor" | "master" | "specialist";

export interface Institute {
  id: number;
  name: string;
  url: string;
}

export interface Department {
  id: number;
  name: string;
  url: string;
  instituteId: number;
}

export interface Program {
  id: number;
  name: string; // e.g. "09.03.01 Информатика и вычислительная техника (бакалавриат)"
  url: string;
  departmentId: number;
}

export interface Subject {
  id: number;
  name: string;
  semester: number; // 0 until resolved
  evalMethod: EvalMethod | string; // scraped text is stored as-is
  url: string;
  programId: number;
}

export interface Group {
  id: number;
  name: string; // e.g. "б-ИВТ-2"
  courseYear: number; // creation sequence index, also read as the academic year
  programId: number;
}

export interface Student {
  id: number;
  name: string;
  groupId: number;
  scholarship: number; // 0 = none
}

export interface Grade {
  studentId: number;
  subjectId: number;
  grade: number | null; // null = not taken yet
}

// Row of a parent level the crawl walks from
export interface LinkRow {
  id: number;
  url: string;
}

// Subject resolved from the portal, not yet persisted
export interface NewSubject {
  name: string;
  semester: number;
  evalMethod: string;
  url: string;
  programId: number;
}

// (name, semester) identity of a subject inside one program
export interface SubjectKey {
  name: string;
  semester: number;
}

// Normalized row of a list-view table
export interface TableRow {
  cells: Record<string, string>; // header -> raw cell text
  semester?: string;
  lectures?: string;
  labPractice?: string;
  lab?: string;
  practice?: string;
  evalMethod?: string;
  lecturer?: string;
  assistants?: string;
}

export interface ResolvedSubject {
  semester: number;
  evalMethod: string;
}

export interface PortalCredentials {
  username: string; // DOMAIN\user or plain user
  password: string;
}
