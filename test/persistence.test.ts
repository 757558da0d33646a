import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TaskStore } from "../src/persistence/store.js";
import type { TaskRecord } from "../src/server/types.js";

function task(taskId: string, startedAt: number, extra: Partial<TaskRecord> = {}): TaskRecord {
  return { taskId, agentId: "research", message: "q", state: "queued", failures: [], notes: [], startedAt, ...extra };
}

describe("TaskStore", () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("stores and reads back a finished task", () => {
    const record = task("t-1", 1000, {
      state: "partial",
      output: "summary",
      failures: [{ role: "c", kind: "ProviderError", cause: "boom" }],
      notes: ["r1: registry down"],
      finishedAt: 1500,
    });
    store.insert(record);
    expect(store.get("t-1")).toEqual(record);
  });

  it("leaves optional fields unset", () => {
    store.insert(task("t-1", 1000));
    const read = store.get("t-1");
    expect(read?.output).toBeUndefined();
    expect(read?.error).toBeUndefined();
    expect(read?.finishedAt).toBeUndefined();
  });

  it("replaces a task on update", () => {
    store.insert(task("t-1", 1000));
    store.update(task("t-1", 1000, { state: "failed", error: "Unknown tool server \"kb\"", finishedAt: 1200 }));
    expect(store.get("t-1")).toMatchObject({ state: "failed", error: 'Unknown tool server "kb"', finishedAt: 1200 });
  });

  it("returns undefined for an unknown task", () => {
    expect(store.get("nope")).toBeUndefined();
  });

  it("lists newest first up to the limit", () => {
    store.insert(task("old", 1000));
    store.insert(task("new", 3000));
    store.insert(task("mid", 2000));
    expect(store.list().map((t) => t.taskId)).toEqual(["new", "mid", "old"]);
    expect(store.list(2).map((t) => t.taskId)).toEqual(["new", "mid"]);
  });

  it("deletes single tasks and tasks older than a cutoff", () => {
    store.insert(task("a", 1000));
    store.insert(task("b", 2000));
    store.insert(task("c", 3000));

    expect(store.delete("a")).toBe(true);
    expect(store.delete("a")).toBe(false);
    expect(store.deleteOlderThan(2500)).toBe(1);
    expect(store.list().map((t) => t.taskId)).toEqual(["c"]);
  });
});

describe("TaskStore on disk", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "task-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the database directory and keeps tasks across reopen", () => {
    const path = join(dir, "nested", "tasks.db");
    const first = new TaskStore(path);
    first.insert(task("t-1", 1000, { state: "completed", output: "done" }));
    first.close();
    expect(existsSync(path)).toBe(true);

    const second = new TaskStore(path);
    expect(second.get("t-1")?.output).toBe("done");
    second.close();
  });
});
