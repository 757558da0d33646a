import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { log } from "../utils/logger.js";
import type { TaskRecord, TaskState } from "../server/types.js";

const logger = log.child("task-store");

const TASK_STATES = [
  "queued",
  "running",
  "completed",
  "partial",
  "failed",
  "deadline_exceeded",
  "routing_no_match",
] as const satisfies readonly TaskState[];

const StateSchema = z.enum(TASK_STATES);

const FailuresSchema = z.array(
  z.object({
    role: z.string(),
    kind: z.enum(["ProviderError", "ToolExecutionError", "DependencyFailed", "RoutingNoMatch", "DeadlineExceeded"]),
    cause: z.string(),
  }),
);

const NotesSchema = z.array(z.string());

type TaskRow = {
  task_id: string;
  agent_id: string;
  message: string;
  state: string;
  output: string | null;
  failures: string;
  notes: string;
  error: string | null;
  started_at: number;
  finished_at: number | null;
};

function parseJsonColumn<T>(schema: z.ZodType<T>, raw: string, fallback: T): T {
  try {
    const result = schema.safeParse(JSON.parse(raw));
    if (result.success) return result.data;
  } catch (err) {
    logger.warn("Corrupt JSON column", { error: String(err) });
  }
  return fallback;
}

function rowToTask(row: TaskRow): TaskRecord {
  const state = StateSchema.safeParse(row.state);
  return {
    taskId: row.task_id,
    agentId: row.agent_id,
    message: row.message,
    state: state.success ? state.data : "failed",
    output: row.output ?? undefined,
    failures: parseJsonColumn(FailuresSchema, row.failures, []),
    notes: parseJsonColumn(NotesSchema, row.notes, []),
    error: row.error ?? undefined,
    startedAt: row.started_at,
    finishedAt: row.finished_at ?? undefined,
  };
}

/** SQLite task history. Pass ":memory:" for a throwaway database. */
export class TaskStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        task_id     TEXT PRIMARY KEY,
        agent_id    TEXT NOT NULL DEFAULT '',
        message     TEXT NOT NULL,
        state       TEXT NOT NULL DEFAULT 'queued',
        output      TEXT,
        failures    TEXT NOT NULL DEFAULT '[]',
        notes       TEXT NOT NULL DEFAULT '[]',
        error       TEXT,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_started ON tasks(started_at DESC);
    `);
  }

  insert(task: TaskRecord): void {
    this.db
      .prepare<[string, string, string, string, string | null, string, string, string | null, number, number | null]>(`
      INSERT OR REPLACE INTO tasks (task_id, agent_id, message, state, output, failures, notes, error, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `)
      .run(
        task.taskId,
        task.agentId,
        task.message,
        task.state,
        task.output ?? null,
        JSON.stringify(task.failures),
        JSON.stringify(task.notes),
        task.error ?? null,
        task.startedAt,
        task.finishedAt ?? null,
      );
  }

  update(task: TaskRecord): void {
    this.insert(task);
  }

  get(taskId: string): TaskRecord | undefined {
    const row = this.db.prepare<[string], TaskRow>("SELECT * FROM tasks WHERE task_id = ?").get(taskId);
    return row ? rowToTask(row) : undefined;
  }

  list(limit = 50): TaskRecord[] {
    const rows = this.db.prepare<[number], TaskRow>("SELECT * FROM tasks ORDER BY started_at DESC LIMIT ?").all(limit);
    return rows.map(rowToTask);
  }

  /** Returns true if a row was deleted. */
  delete(taskId: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM tasks WHERE task_id = ?").run(taskId).changes > 0;
  }

  deleteOlderThan(timestamp: number): number {
    return this.db.prepare<[number]>("DELETE FROM tasks WHERE started_at < ?").run(timestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}
