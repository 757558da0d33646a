import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";
import { configure, resetConfig } from "../../src/config.js";
import { TaskStore } from "../../src/persistence/store.js";
import { AgentRuntime } from "../../src/runtime.js";
import { EnvSecretStore } from "../../src/secrets/store.js";
import { TaskServer } from "../../src/server/server.js";
import { InMemoryConfigStore } from "../../src/stores/config-store.js";
import { createDefaultBuiltinRegistry } from "../../src/tools/builtin.js";
import { ToolServerDirectory } from "../../src/tools/server-directory.js";
import { ScriptedBackend, inputOf, role, roleOf, runtimeConfig, sleep } from "../helpers.js";

const Submitted = z.object({ taskId: z.string() });
const TaskView = z.object({ taskId: z.string(), state: z.string() }).passthrough();

let server: TaskServer;
let runtime: AgentRuntime;
let store: TaskStore;
let baseUrl: string;

beforeAll(async () => {
  configure({ retry: { maxAttempts: 1 }, rateLimit: { enabled: false } });
  const backend = new ScriptedBackend(async (req) => {
    if (inputOf(req).includes("slow")) await sleep(5000, req.signal);
    return `${roleOf(req)} answered`;
  });
  const configs = new InMemoryConfigStore().set(
    "support",
    runtimeConfig(
      "sequential",
      [role("triage", { description: "Sorts tickets" }), role("reply")],
      { name: "support-desk", description: "Answers support questions" },
    ),
  );
  runtime = new AgentRuntime({
    configStore: configs,
    backend,
    prompts: { byName: [] },
    builtins: createDefaultBuiltinRegistry(),
    directory: new ToolServerDirectory(),
    connector: { connect: async (entry) => Promise.reject(new Error(`no server ${entry.name}`)) },
    secrets: new EnvSecretStore({}),
    defaultAgentId: "support",
  });
  store = new TaskStore(":memory:");
  server = new TaskServer({ runtime, taskStore: store, port: 0, host: "127.0.0.1" });
  const addr = await server.start();
  baseUrl = `http://${addr.host}:${addr.port}`;
});

afterAll(async () => {
  await server.stop();
  await runtime.close();
  store.close();
  resetConfig();
});

function submit(body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/tasks`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

async function taskState(taskId: string): Promise<string> {
  const res = await fetch(`${baseUrl}/api/tasks/${taskId}`);
  return TaskView.parse(await res.json()).state;
}

async function waitForState(taskId: string, done: (state: string) => boolean): Promise<string> {
  for (let i = 0; i < 100; i++) {
    const state = await taskState(taskId);
    if (done(state)) return state;
    await sleep(20);
  }
  throw new Error(`task ${taskId} never reached the expected state`);
}

describe("TaskServer", () => {
  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, agentId: "support" });
  });

  it("publishes the agent card", async () => {
    const res = await fetch(`${baseUrl}/.well-known/agent.json`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      name: "support-desk",
      description: "Answers support questions",
      url: `${baseUrl}/`,
      version: "0.1.0",
      capabilities: { streaming: true },
      defaultInputModes: ["text"],
      defaultOutputModes: ["text"],
      executionType: "sequential",
      skills: [
        { id: "triage", name: "triage", description: "Sorts tickets" },
        { id: "reply", name: "reply", description: "" },
      ],
    });
  });

  it("answers CORS preflight", async () => {
    const res = await fetch(`${baseUrl}/api/tasks`, { method: "OPTIONS" });
    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await submit("not json");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("rejects a task without a message", async () => {
    const res = await submit({});
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "message: Required" });
  });

  it("rejects a deadline longer than a timer can hold", async () => {
    const res = await submit({ message: "hello", deadlineMs: 3_000_000_000 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "deadlineMs: Number must be less than or equal to 2147483647" });
  });

  it("runs a task to completion when asked to wait", async () => {
    const res = await submit({ message: "my printer is on fire", wait: true });
    expect(res.status).toBe(200);
    const outcome = await res.json();
    expect(outcome).toMatchObject({ status: "completed", output: "reply answered" });

    const { taskId } = Submitted.parse(outcome);
    expect(store.get(taskId)).toMatchObject({ agentId: "support", state: "completed", output: "reply answered" });
  });

  it("answers 422 for an agent it cannot configure", async () => {
    const res = await submit({ message: "hi", agentId: "ghost", wait: true });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: 'Agent "ghost" not found', code: "CONFIG_NOT_FOUND" });
  });

  it("accepts a task and runs it in the background", async () => {
    const res = await submit({ message: "hello" });
    expect(res.status).toBe(201);
    const { taskId } = Submitted.parse(await res.json());
    expect(await waitForState(taskId, (s) => s !== "queued" && s !== "running")).toBe("completed");
  });

  it("cancels a running task", async () => {
    const res = await submit({ message: "slow request" });
    const { taskId } = Submitted.parse(await res.json());
    await waitForState(taskId, (s) => s === "running");

    const cancel = await fetch(`${baseUrl}/api/tasks/${taskId}`, { method: "DELETE" });
    expect(await cancel.json()).toEqual({ cancelled: true, taskId });
    expect(await waitForState(taskId, (s) => s !== "running")).toBe("deadline_exceeded");

    const task = await (await fetch(`${baseUrl}/api/tasks/${taskId}`)).json();
    expect(task).toMatchObject({ failures: [{ role: "triage", kind: "DeadlineExceeded", cause: "task cancelled" }] });
  });

  it("deletes a finished task", async () => {
    const res = await submit({ message: "hello", wait: true });
    const { taskId } = Submitted.parse(await res.json());

    const del = await fetch(`${baseUrl}/api/tasks/${taskId}`, { method: "DELETE" });
    expect(await del.json()).toEqual({ deleted: true, taskId });
    expect((await fetch(`${baseUrl}/api/tasks/${taskId}`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/tasks/${taskId}`, { method: "DELETE" })).status).toBe(404);
  });

  it("lists recent tasks up to the limit", async () => {
    await submit({ message: "first", wait: true });
    await submit({ message: "second", wait: true });
    const res = await fetch(`${baseUrl}/api/tasks?limit=1`);
    const tasks = z.array(TaskView).parse(await res.json());
    expect(tasks).toHaveLength(1);
  });

  it("answers 404 for unknown routes", async () => {
    expect((await fetch(`${baseUrl}/api/nothing`)).status).toBe(404);
  });

  it("streams task events", async () => {
    const events = await fetch(`${baseUrl}/api/events`);
    expect(events.headers.get("content-type")).toBe("text/event-stream");
    const reader = events.body?.getReader();
    if (!reader) throw new Error("event stream has no body");

    const res = await submit({ message: "hello", wait: true });
    const { taskId } = Submitted.parse(await res.json());

    const decoder = new TextDecoder();
    let text = "";
    while (!text.includes('"type":"task:complete"')) {
      const { value, done } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    await reader.cancel();

    const types = text
      .split("\n\n")
      .filter((chunk) => chunk.startsWith("data: "))
      .map((chunk) => z.object({ type: z.string(), taskId: z.string() }).parse(JSON.parse(chunk.slice(6))))
      .filter((e) => e.taskId === taskId)
      .map((e) => e.type);
    expect(types).toEqual([
      "task:started",
      "node:started",
      "node:ended",
      "node:started",
      "node:ended",
      "task:complete",
    ]);
  });
});
