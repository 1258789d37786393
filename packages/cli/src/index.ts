#!/usr/bin/env -S node --import tsx

/**
 * outpost CLI entry point.
 *
 * Available commands:
 *   init        — Write ~/.outpost/config.yaml with backend credentials
 *   run         — Poll for tasks and execute them until stopped
 *   status      — Agent, backend and device state
 *   workspaces  — list / create / archive / cleanup workspaces by hand
 */

import { Command } from "commander";
import pino from "pino";
import { createInitCommand } from "./commands/init.js";
import { createRunCommand } from "./commands/run.js";
import { createStatusCommand } from "./commands/status.js";
import { createWorkspacesCommand } from "./commands/workspaces.js";
import { CLI_VERSION } from "./lib/agent.js";

// ---------------------------------------------------------------------------
// Logger: fatal errors only; commands build their own
// ---------------------------------------------------------------------------

/** Logs to stderr so stdout stays clean for output. */
const logger = pino({
  name: "outpost",
  level: process.env.LOG_LEVEL ?? "warn",
  transport: { target: "pino/file", options: { destination: 2 } },
});

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("outpost")
  .description("Remote task execution agent")
  .version(CLI_VERSION);

program.addCommand(createInitCommand());
program.addCommand(createRunCommand());
program.addCommand(createStatusCommand());
program.addCommand(createWorkspacesCommand());

// ---------------------------------------------------------------------------
// Global error handling
// ---------------------------------------------------------------------------

process.on("unhandledRejection", (reason) => {
  logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(1);
});

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception");
  process.exit(1);
});

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, "CLI execution failed");
  process.exit(1);
});
