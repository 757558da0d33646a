#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { configure, getConfig, settingsFromEnv } from "./config.js";
import { ConfigError, ParseError, errorMessage } from "./errors.js";
import type { ExecutionOutcome } from "./executor/types.js";
import { assembleGraph } from "./graph/assemble.js";
import { buildGraph } from "./graph/builder.js";
import { describeGraph } from "./graph/describe.js";
import type { ExecutionGraph } from "./graph/types.js";
import { TaskStore } from "./persistence/store.js";
import type { ResolvedPrompt } from "./prompts/resolver.js";
import type { RoleConfig, RuntimeConfig } from "./runtime-config/types.js";
import { type AgentRuntime, createRuntime, promptStoresFrom, secretStoreFrom, toolServerDirectoryFrom } from "./runtime.js";
import { MAX_TIMER_MS } from "./schemas.js";
import { TaskServer } from "./server/server.js";
import { FileConfigStore, InMemoryConfigStore, loadConfigFile } from "./stores/config-store.js";
import { createDefaultBuiltinRegistry } from "./tools/builtin.js";
import { McpConnector } from "./tools/mcp-connector.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

configure(settingsFromEnv());
setLogLevel(getConfig().logLevel);

const program = new Command();

function parseDeadline(raw: string): number {
  const ms = Number(raw);
  if (!Number.isSafeInteger(ms) || ms <= 0 || ms > MAX_TIMER_MS) {
    throw new InvalidArgumentError(`expected a whole number of milliseconds between 1 and ${MAX_TIMER_MS}`);
  }
  return ms;
}

program
  .name("agent-topology-runtime")
  .description("Build and run multi-agent topologies from a declarative runtime config")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

/** Exit code 1 for configuration problems, with the role when known. */
function reportFailure(err: unknown): void {
  if (err instanceof ConfigError) {
    console.error(`Configuration error [${err.code}]${err.role ? ` (role ${err.role})` : ""}: ${err.message}`);
  } else if (err instanceof ParseError) {
    console.error(`Invalid document: ${err.message}`);
  } else {
    console.error("Failed:", errorMessage(err));
  }
  process.exitCode = 1;
}

/** Placeholder instructions so a config can be checked without reaching any store. */
function plannedPrompt(role: RoleConfig): ResolvedPrompt {
  if (role.promptInline?.trim()) {
    return { text: role.promptInline, source: "inline", origin: "prompt_inline", degradations: [] };
  }
  if (role.externalPromptId) {
    return { text: "(resolved at run time)", source: "external_id", origin: role.externalPromptId, degradations: [] };
  }
  if (role.promptRef) {
    return { text: "(resolved at run time)", source: "prompt_ref", origin: role.promptRef, degradations: [] };
  }
  return { text: "(resolved at run time)", source: "local_file", origin: role.name, degradations: [] };
}

async function resolvedGraph(config: RuntimeConfig): Promise<ExecutionGraph> {
  const settings = getConfig();
  return assembleGraph(config, {
    prompts: promptStoresFrom(settings),
    tools: {
      builtins: createDefaultBuiltinRegistry(),
      directory: await toolServerDirectoryFrom(settings),
      connector: new McpConnector(),
      secrets: secretStoreFrom(settings, process.env),
    },
  });
}

function printOutcome(outcome: ExecutionOutcome): void {
  console.log(outcome.output);
  console.error(`\n--- ${outcome.status} in ${outcome.durationMs}ms ---`);
  for (const f of outcome.failures) console.error(`  [${f.kind}] ${f.role}: ${f.cause}`);
  for (const note of outcome.notes) console.error(`  note: ${note}`);
}

// --- validate ---
program
  .command("validate")
  .description("Check a runtime config file and print the graph it builds")
  .argument("<file>", "JSON runtime config or agent record")
  .option("--resolve", "Resolve prompts and connect to tool servers as a real build would")
  .action(async (file: string, opts: { resolve?: boolean }) => {
    try {
      const config = await loadConfigFile(file);
      const graph = opts.resolve
        ? await resolvedGraph(config)
        : buildGraph(config, new Map(config.roles.map((r): [string, ResolvedPrompt] => [r.name, plannedPrompt(r)])));
      console.log(describeGraph(graph));
      await graph.close();
    } catch (err) {
      reportFailure(err);
    }
  });

// --- run ---
program
  .command("run")
  .description("Execute one task and print the aggregated result")
  .argument("<message>", "The task input")
  .option("-a, --agent <id>", "Agent id to fetch from the registry (default: AGENT_ID, else legacy mode)")
  .option("-c, --config <file>", "Use a local config file instead of the registry")
  .option("--configs-dir <dir>", "Look agents up as <dir>/<id>.json")
  .option("--deadline <ms>", "Task deadline in milliseconds", parseDeadline)
  .option("--json", "Print the full outcome as JSON")
  .action(
    async (
      message: string,
      opts: { agent?: string; config?: string; configsDir?: string; deadline?: number; json?: boolean },
    ) => {
      let runtime: AgentRuntime | undefined;
      try {
        if (opts.config) {
          const id = opts.agent ?? "local";
          runtime = await createRuntime({
            configStore: new InMemoryConfigStore().set(id, await loadConfigFile(opts.config, id)),
            defaultAgentId: id,
          });
        } else {
          runtime = await createRuntime({
            configStore: opts.configsDir ? new FileConfigStore(opts.configsDir) : undefined,
            defaultAgentId: opts.agent,
          });
        }
        const outcome = await runtime.handleTask({ message, deadlineMs: opts.deadline });
        if (opts.json) console.log(JSON.stringify(outcome, null, 2));
        else printOutcome(outcome);
        if (outcome.status !== "completed" && outcome.status !== "partial") process.exitCode = 2;
      } catch (err) {
        reportFailure(err);
      } finally {
        await runtime?.close();
      }
    },
  );

// --- serve ---
program
  .command("serve")
  .description("Serve tasks over HTTP")
  .option("-a, --agent <id>", "Agent id served by default (default: AGENT_ID)")
  .option("--configs-dir <dir>", "Look agents up as <dir>/<id>.json instead of the registry")
  .option("-p, --port <port>", "Port (default: AGENT_PORT or 9100)")
  .option("--host <host>", "Host (default: AGENT_HOST or 0.0.0.0)")
  .option("--db <path>", "SQLite task history (default: TASK_DB; none when unset)")
  .action(async (opts: { agent?: string; configsDir?: string; port?: string; host?: string; db?: string }) => {
    const runtime = await createRuntime({
      configStore: opts.configsDir ? new FileConfigStore(opts.configsDir) : undefined,
      defaultAgentId: opts.agent,
    });
    const dbPath = opts.db ?? getConfig().server.dbPath;
    const taskStore = dbPath ? new TaskStore(dbPath) : undefined;

    if (runtime.defaultAgentId) {
      try {
        await runtime.graphFor();
        console.log(`Agent "${runtime.defaultAgentId}" ready.`);
      } catch (err) {
        reportFailure(err);
        console.error("    Tasks for this agent will fail until its configuration builds.\n");
        process.exitCode = undefined;
      }
    } else {
      console.log("No agent id set; serving the legacy single-role agent.");
    }

    const server = new TaskServer({
      runtime,
      port: opts.port ? Number(opts.port) : undefined,
      host: opts.host,
      taskStore,
    });
    const addr = await server.start();
    console.log(`Tasks:  http://${addr.host}:${addr.port}/api/tasks`);
    console.log(`Card:   http://${addr.host}:${addr.port}/.well-known/agent.json`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      const shutdown = async () => {
        await server.stop();
        await runtime.close();
        taskStore?.close();
      };
      shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("Shutdown failed:", errorMessage(err));
          process.exit(1);
        },
      );
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
