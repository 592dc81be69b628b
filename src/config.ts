/**
 * Runtime configuration, read from the environment (.env is loaded by the entry points)
 */

import type { PortalCredentials } from "./types";

export const OPERATIONS = [
  "institutes",
  "departments",
  "programs",
  "subjects",
  "data correction",
  "students generator",
] as const;

export type Operation = (typeof OPERATIONS)[number];

export interface GeneratorSettings {
  fund: number;
  socialAmount: number;
  academicAmount: number;
  socialProbability: number;
  academicProbability: number;
  examWeights: [number, number, number, number]; // for grades 5, 4, 3, 2
  passWeights: [number, number]; // for pass (1), fail (0)
  studentIdOffset: number;
  groupSize: [number, number]; // inclusive bounds
}

export interface AppConfig {
  mainUrl: string;
  credentials: PortalCredentials[];
  certificatePath: string | null;
  dbPath: string;
  retryLimit: number;
  pauseMs: [number, number];
  operations: Set<Operation>;
  generator: GeneratorSettings;
  port: number;
}

export const DEFAULT_GENERATOR: GeneratorSettings = {
  fund: 500_000,
  socialAmount: 3_500,
  academicAmount: 3_000,
  socialProbability: 0.3,
  academicProbability: 0.5,
  examWeights: [0.25, 0.4, 0.25, 0.1],
  passWeights: [0.75, 0.25],
  studentIdOffset: 100_000,
  groupSize: [15, 25],
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

// Comma-separated non-negative weights, e.g. EXAM_WEIGHTS=0.25,0.4,0.25,0.1
function readWeights(env: Env, key: string, count: number): number[] | null {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return null;
  const weights = raw.split(",").map((part) => Number(part.trim()));
  if (weights.length !== count || weights.some((w) => !Number.isFinite(w) || w < 0)) {
    throw new Error(`${key} must be ${count} comma-separated non-negative numbers, got "${raw}"`);
  }
  if (weights.every((w) => w === 0)) {
    throw new Error(`${key} must have at least one positive weight`);
  }
  return weights;
}

function readCredentials(env: Env): PortalCredentials[] {
  const credentials: PortalCredentials[] = [];
  // PORTAL_USERNAME, PORTAL_USERNAME_2, PORTAL_USERNAME_3, ...
  for (let i = 1; ; i++) {
    const suffix = i === 1 ? "" : `_${i}`;
    const username = env[`PORTAL_USERNAME${suffix}`];
    if (!username) break;
    credentials.push({ username, password: env[`PORTAL_PASSWORD${suffix}`] ?? "" });
  }
  return credentials;
}

export function parseOperations(list: string): Set<Operation> {
  const operations = new Set<Operation>();
  for (const raw of list.split(",")) {
    const name = raw.trim().toLowerCase().replace(/[-_]/g, " ");
    if (!name) continue;
    if (name === "all") {
      OPERATIONS.forEach((op) => operations.add(op));
      continue;
    }
    const op = OPERATIONS.find((o) => o === name);
    if (!op) {
      throw new Error(`Unknown operation "${raw.trim()}" (expected one of: all, ${OPERATIONS.join(", ")})`);
    }
    operations.add(op);
  }
  return operations;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const pauseMin = readNumber(env, "PAUSE_MIN_MS", 500);
  const pauseMax = readNumber(env, "PAUSE_MAX_MS", 2000);
  if (pauseMax < pauseMin) {
    throw new Error(`PAUSE_MAX_MS (${pauseMax}) is below PAUSE_MIN_MS (${pauseMin})`);
  }
  const [defaultMin, defaultMax] = DEFAULT_GENERATOR.groupSize;
  const groupMin = readNumber(env, "GROUP_SIZE_MIN", defaultMin);
  const groupMax = readNumber(env, "GROUP_SIZE_MAX", defaultMax);
  if (groupMin < 1 || groupMax < groupMin) {
    throw new Error(`Group size range ${groupMin}-${groupMax} is invalid`);
  }
  const exam = readWeights(env, "EXAM_WEIGHTS", 4);
  const pass = readWeights(env, "PASS_WEIGHTS", 2);

  return {
    mainUrl: env.PORTAL_URL || "https://portal.example.edu/Pages/Default.aspx",
    credentials: readCredentials(env),
    certificatePath: env.PORTAL_CERTIFICATE || null,
    dbPath: env.DB_PATH || "university.db",
    retryLimit: readNumber(env, "RETRY_LIMIT", 5),
    pauseMs: [pauseMin, pauseMax],
    operations: parseOperations(env.OPERATIONS ?? ""),
    generator: {
      ...DEFAULT_GENERATOR,
      fund: readNumber(env, "SCHOLARSHIP_FUND", DEFAULT_GENERATOR.fund),
      socialAmount: readNumber(env, "SOCIAL_AMOUNT", DEFAULT_GENERATOR.socialAmount),
      academicAmount: readNumber(env, "ACADEMIC_AMOUNT", DEFAULT_GENERATOR.academicAmount),
      socialProbability: readNumber(env, "SOCIAL_PROBABILITY", DEFAULT_GENERATOR.socialProbability),
      academicProbability: readNumber(env, "ACADEMIC_PROBABILITY", DEFAULT_GENERATOR.academicProbability),
      studentIdOffset: readNumber(env, "STUDENT_ID_OFFSET", DEFAULT_GENERATOR.studentIdOffset),
      examWeights: exam ? [exam[0], exam[1], exam[2], exam[3]] : DEFAULT_GENERATOR.examWeights,
      passWeights: pass ? [pass[0], pass[1]] : DEFAULT_GENERATOR.passWeights,
      groupSize: [groupMin, groupMax],
    },
    port: readNumber(env, "PORT", 3000),
  };
}
