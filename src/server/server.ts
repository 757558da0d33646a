import { randomUUID } from "node:crypto";
import { type IncomingMessage, type Server, type ServerResponse, createServer } from "node:http";
import { getConfig } from "../config.js";
import { ConfigError, ParseError, errorMessage } from "../errors.js";
import type { ExecutionOutcome } from "../executor/types.js";
import type { TaskStore } from "../persistence/store.js";
import type { AgentRuntime } from "../runtime.js";
import { SubmitTaskRequestSchema, type SubmitTaskRequest, formatIssues } from "../schemas.js";
import { log } from "../utils/logger.js";
import { type SSEEvent, type TaskRecord, isFinished } from "./types.js";

const logger = log.child("server");

export type TaskServerOptions = {
  runtime: AgentRuntime;
  port?: number;
  host?: string;
  taskStore?: TaskStore;
  version?: string;
};

/**
 * HTTP front of the runtime: task submission, task history, cancellation,
 * an SSE event stream and the agent card.
 */
export class TaskServer {
  private runtime: AgentRuntime;
  private port: number;
  private host: string;
  private version: string;
  private server: Server | null = null;
  private tasks = new Map<string, TaskRecord>();
  private controllers = new Map<string, AbortController>();
  private taskStore?: TaskStore;
  private sseClients = new Set<ServerResponse>();

  constructor(opts: TaskServerOptions) {
    this.runtime = opts.runtime;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.taskStore = opts.taskStore;
    this.version = opts.version ?? "0.1.0";
  }

  async start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        logger.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) json(res, 500, { error: "Internal server error" });
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        logger.info(`Listening on http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  /** Cancels running tasks, ends SSE streams and stops listening. */
  async stop(): Promise<void> {
    for (const controller of this.controllers.values()) controller.abort(new Error("server stopping"));
    for (const client of this.sseClients) client.end();
    this.sseClients.clear();
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      return this.handleHealth(res);
    }

    if (method === "GET" && pathname === "/.well-known/agent.json") {
      return this.handleAgentCard(res);
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "GET" && pathname === "/api/tasks") {
      return this.handleListTasks(res, url.searchParams.get("limit"));
    }

    if (method === "POST" && pathname === "/api/tasks") {
      return this.handleSubmitTask(req, res);
    }

    const taskMatch = pathname.match(/^\/api\/tasks\/([^/]+)$/);
    const taskId = taskMatch?.[1] ? decodeURIComponent(taskMatch[1]) : undefined;
    if (method === "GET" && taskId) {
      return this.handleGetTask(res, taskId);
    }

    if (method === "DELETE" && taskId) {
      return this.handleDeleteTask(res, taskId);
    }

    json(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    json(res, 200, {
      ok: true,
      agentId: this.runtime.defaultAgentId,
      running: this.controllers.size,
      tasks: this.tasks.size,
    });
  }

  private async handleAgentCard(res: ServerResponse): Promise<void> {
    try {
      const config = await this.runtime.loadConfig();
      json(res, 200, {
        name: config.name ?? this.runtime.defaultAgentId,
        description: config.description ?? "",
        url: `http://${this.host}:${this.port}/`,
        version: this.version,
        capabilities: { streaming: true },
        defaultInputModes: ["text"],
        defaultOutputModes: ["text"],
        executionType: config.executionType,
        skills: config.roles.map((role) => ({
          id: role.name,
          name: role.name,
          description: role.description ?? "",
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private handleListTasks(res: ServerResponse, rawLimit: string | null): void {
    const parsed = rawLimit ? Number.parseInt(rawLimit, 10) : Number.NaN;
    const limit = Number.isFinite(parsed) && parsed > 0 ? parsed : 50;
    if (this.taskStore) {
      json(res, 200, this.taskStore.list(limit));
    } else {
      const tasks = [...this.tasks.values()].sort((a, b) => b.startedAt - a.startedAt);
      json(res, 200, tasks.slice(0, limit));
    }
  }

  private handleGetTask(res: ServerResponse, taskId: string): void {
    const task = this.tasks.get(taskId) ?? this.taskStore?.get(taskId);
    if (!task) {
      json(res, 404, { error: "Task not found" });
      return;
    }
    json(res, 200, task);
  }

  /** Cancels a task still running; otherwise removes it from history. */
  private handleDeleteTask(res: ServerResponse, taskId: string): void {
    const controller = this.controllers.get(taskId);
    if (controller) {
      controller.abort(new Error("task cancelled"));
      json(res, 200, { cancelled: true, taskId });
      return;
    }

    const inMemory = this.tasks.delete(taskId);
    const fromStore = this.taskStore?.delete(taskId) ?? false;
    if (!inMemory && !fromStore) {
      json(res, 404, { error: "Task not found" });
      return;
    }
    this.broadcastSSE({ type: "task:deleted", taskId });
    json(res, 200, { deleted: true, taskId });
  }

  private async handleSubmitTask(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      json(res, 400, { error: "Invalid JSON body" });
      return;
    }

    const result = SubmitTaskRequestSchema.safeParse(raw);
    if (!result.success) {
      json(res, 400, { error: formatIssues(result.error) });
      return;
    }
    const request: SubmitTaskRequest = result.data;

    const task: TaskRecord = {
      taskId: randomUUID(),
      agentId: this.runtime.agentIdFor(request.agentId),
      message: request.message,
      state: "queued",
      failures: [],
      notes: [],
      startedAt: Date.now(),
    };
    this.remember(task);

    if (request.wait) {
      try {
        const outcome = await this.executeTask(task, request);
        json(res, 200, outcome);
      } catch (err) {
        sendError(res, err);
      }
      return;
    }

    json(res, 201, { taskId: task.taskId });
    this.executeTask(task, request).catch((err) => {
      logger.error("Task execution error", { taskId: task.taskId, error: errorMessage(err) });
    });
  }

  private remember(task: TaskRecord): void {
    const max = getConfig().limits.maxTasks;
    for (const [id, existing] of this.tasks) {
      if (this.tasks.size < max) break;
      if (isFinished(existing.state)) this.tasks.delete(id);
    }
    this.tasks.set(task.taskId, task);
    this.persistTask(task);
  }

  private persistTask(task: TaskRecord): void {
    try {
      this.taskStore?.update(task);
    } catch (err) {
      logger.error("Failed to persist task", { taskId: task.taskId, error: errorMessage(err) });
    }
  }

  /** Runs the task and records its outcome. Errors that stop it from starting are recorded, then rethrown. */
  private async executeTask(task: TaskRecord, request: SubmitTaskRequest): Promise<ExecutionOutcome> {
    const { taskId } = task;
    const controller = new AbortController();
    this.controllers.set(taskId, controller);
    task.state = "running";
    this.persistTask(task);
    this.broadcastSSE({ type: "task:started", taskId, agentId: task.agentId, message: task.message });

    try {
      const outcome = await this.runtime.handleTask({
        taskId,
        message: request.message,
        agentId: request.agentId,
        deadlineMs: request.deadlineMs,
        signal: controller.signal,
        callbacks: {
          onNodeStart: (role) => this.broadcastSSE({ type: "node:started", taskId, role }),
          onNodeEnd: (role, o) => this.broadcastSSE({ type: "node:ended", taskId, role, status: o.status }),
          onToolCall: (role, tool) => this.broadcastSSE({ type: "tool:called", taskId, role, tool }),
        },
      });
      task.state = outcome.status;
      task.output = outcome.output;
      task.failures = outcome.failures;
      task.notes = outcome.notes;
      task.finishedAt = Date.now();
      this.broadcastSSE({ type: "task:complete", taskId, state: task.state, durationMs: outcome.durationMs });
      return outcome;
    } catch (err) {
      task.state = "failed";
      task.error = errorMessage(err);
      task.finishedAt = Date.now();
      this.broadcastSSE({ type: "task:error", taskId, error: task.error });
      throw err;
    } finally {
      this.controllers.delete(taskId);
      this.persistTask(task);
    }
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, err: unknown): void {
  if (err instanceof ConfigError || err instanceof ParseError) {
    json(res, 422, { error: err.message, code: err.code });
    return;
  }
  logger.error("Task failed to start", { error: errorMessage(err) });
  json(res, 500, { error: errorMessage(err) });
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
