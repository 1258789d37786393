/**
 * `outpost run` command: the agent's main loop.
 *
 * Loads config, wires the services (lib/agent.ts) and starts the task
 * engine. Each task transition is printed as one line; structured logs go
 * to ~/.outpost/logs/agent.log (and stderr with --verbose).
 *
 * Runs until SIGINT/SIGTERM or a global sign-out, then stops polling,
 * waits for in-flight tasks and prints session statistics. With --once a
 * single poll cycle runs and the command exits after its tasks settle.
 */

import { Command } from "commander";
import type { Logger } from "pino";
import pc from "picocolors";
import { errorMessage, type Task, type TaskStatus, type UnauthorizedError } from "@outpost/shared";
import { buildAgent, syncDeviceSettings, type Agent, type AgentFactory } from "../lib/agent.js";
import { loadConfig, type OutpostConfig } from "../lib/config.js";
import { formatError, formatStatistics, formatTaskTransition } from "../lib/formatters.js";
import { createLogger } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Command definition
// ---------------------------------------------------------------------------

export interface RunOptions {
  once?: boolean;
  verbose?: boolean;
}

export function createRunCommand(): Command {
  return new Command("run")
    .description("Poll the backend for tasks and execute them")
    .option("--once", "Run a single poll cycle, wait for its tasks, then exit", false)
    .option("-v, --verbose", "Pretty debug logs on stderr", false)
    .action(async (opts: RunOptions) => {
      await runAgent(opts);
    });
}

// ---------------------------------------------------------------------------
// Run logic: extracted for testability
// ---------------------------------------------------------------------------

export interface RunDeps {
  buildAgent?: AgentFactory;
  logger?: Logger;
  /** Resolves when the agent should stop; defaults to SIGINT/SIGTERM */
  until?: Promise<unknown>;
}

export async function runAgent(opts: RunOptions, deps: RunDeps = {}): Promise<void> {
  let config: OutpostConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  const logger = deps.logger ?? createLogger({ verbose: opts.verbose });
  const factory: AgentFactory = deps.buildAgent ?? ((cfg, log) => buildAgent(cfg, log));

  let agent: Agent;
  try {
    agent = await factory(config, logger);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  const { engine } = agent;
  engine.on("task-status", (taskId: string, status: TaskStatus, task: Task) => {
    console.log(formatTaskTransition(taskId, status, task.description));
  });

  const shutdown: { signedOut: UnauthorizedError | null } = { signedOut: null };
  const signedOutPromise = new Promise<void>((resolve) => {
    engine.once("signed-out", (err: UnauthorizedError) => {
      shutdown.signedOut = err;
      resolve();
    });
  });

  console.log(
    `${pc.bold("outpost")} agent ${pc.cyan(config.agent.name)} · provider ${agent.provider.name} · ` +
      `up to ${config.agent.max_concurrent_tasks} concurrent task(s)`,
  );

  if (opts.once) {
    await engine.runOnce();
  } else {
    await engine.start();
    if (engine.snapshot().status === "running") {
      try {
        await syncDeviceSettings(agent);
      } catch (err) {
        logger.warn({ error: errorMessage(err) }, "Failed to sync device settings");
      }
      console.log(pc.dim("Polling for tasks. Press Ctrl+C to stop."));
      await Promise.race([deps.until ?? waitForShutdownSignal(), signedOutPromise]);
    }
    await engine.stop();
    await engine.drain();
  }

  if (shutdown.signedOut) {
    console.error(formatError(shutdown.signedOut));
    process.exitCode = 1;
  }

  console.log("");
  console.log(formatStatistics(engine.snapshot().statistics));
}

/** Resolves on the first SIGINT or SIGTERM; both listeners are removed. */
function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      console.log(pc.dim(`\nReceived ${signal}, finishing in-flight tasks...`));
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}
