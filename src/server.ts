import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { config } from "dotenv";
import {
  BrowseError,
  addStudent,
  deleteStudent,
  editStudent,
  getGroup,
  getStudent,
  listDepartments,
  listInstitutes,
  listPrograms,
  listSubjects,
} from "./browse";
import { loadConfig } from "./config";
import { type DB, Store } from "./store";

// The part of an express Response the error reply needs
export interface JsonReply {
  status(code: number): { json(body: unknown): unknown };
}

export function replyWithError(res: JsonReply, err: unknown): void {
  if (err instanceof BrowseError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error(err);
  res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
}

export function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) throw new BrowseError(400, `Invalid id "${raw}"`);
  return id;
}

export function createApp(db: DB, options: { firstStudentId?: number } = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/institutes", (_req, res) => {
    res.json(listInstitutes(db));
  });
  app.get("/api/institutes/:id/departments", (req, res) => {
    res.json(listDepartments(db, parseId(req.params.id)));
  });
  app.get("/api/departments/:id/programs", (req, res) => {
    res.json(listPrograms(db, parseId(req.params.id)));
  });
  app.get("/api/programs/:id/subjects", (req, res) => {
    res.json(listSubjects(db, parseId(req.params.id)));
  });
  app.get("/api/groups/:id", (req, res) => {
    res.json(getGroup(db, parseId(req.params.id)));
  });
  app.post("/api/groups/:id/students", (req, res) => {
    const body: { name?: unknown } = req.body ?? {};
    res.status(201).json(addStudent(db, parseId(req.params.id), body.name, options.firstStudentId));
  });
  app.get("/api/students/:id", (req, res) => {
    res.json(getStudent(db, parseId(req.params.id)));
  });
  app.patch("/api/students/:id", (req, res) => {
    const body: { name?: unknown; grades?: unknown } = req.body ?? {};
    res.json(editStudent(db, parseId(req.params.id), { name: body.name, grades: body.grades }));
  });
  app.delete("/api/students/:id", (req, res) => {
    deleteStudent(db, parseId(req.params.id));
    res.status(204).end();
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    replyWithError(res, err);
  });
  return app;
}

if (require.main === module) {
  config();
  const settings = loadConfig();
  const store = new Store(settings.dbPath);
  store.bootstrap();
  const app = createApp(store.db, { firstStudentId: settings.generator.studentIdOffset });
  app.listen(settings.port, () => console.log(`API on http://localhost:${settings.port}`));
  process.once("SIGINT", () => {
    store.close();
    process.exit(0);
  });
}
