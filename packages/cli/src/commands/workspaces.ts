/**
 * `outpost workspaces` command group: manage this machine's workspaces
 * by hand, outside the task loop.
 *
 *   outpost workspaces list [--active] [--json]
 *   outpost workspaces create [--repo <url>] [--branch <name>] [--name <name>]
 *   outpost workspaces archive <id>
 *   outpost workspaces cleanup <id> [--delete]
 *
 * Every subcommand registers the device if needed, which starts the
 * heartbeat; it is stopped again before the command returns.
 */

import { Command } from "commander";
import type { Logger } from "pino";
import pc from "picocolors";
import type { Workspace } from "@outpost/shared";
import { holdsCapacitySlot } from "@outpost/core";
import { buildAgent, type Agent, type AgentFactory } from "../lib/agent.js";
import { loadConfig } from "../lib/config.js";
import {
  formatBytes,
  formatError,
  formatWorkspaceDetail,
  formatWorkspaceTable,
  outputResult,
} from "../lib/formatters.js";
import { createLogger } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Command definition
// ---------------------------------------------------------------------------

export function createWorkspacesCommand(): Command {
  const cmd = new Command("workspaces").description("Manage this machine's workspaces");

  cmd
    .command("list")
    .description("List workspaces on this device, newest first")
    .option("--active", "Only workspaces that hold a capacity slot")
    .option("--json", "Output as JSON")
    .action(async (opts: WorkspacesListOptions) => {
      await runWorkspacesList(opts);
    });

  cmd
    .command("create")
    .description("Create a workspace and wait for its setup to finish")
    .option("--repo <url>", "Repository to clone into src/")
    .option("--branch <name>", "Branch to check out", "main")
    .option("--name <name>", "Workspace name")
    .action(async (opts: WorkspaceCreateOptions) => {
      await runWorkspaceCreate(opts);
    });

  cmd
    .command("archive")
    .description("Pack a workspace into a tar.gz archive and register it as an artifact")
    .argument("<id>", "Workspace ID")
    .action(async (id: string) => {
      await runWorkspaceArchive(id);
    });

  cmd
    .command("cleanup")
    .description("Remove a workspace directory from disk")
    .argument("<id>", "Workspace ID")
    .option("--delete", "Also delete the backend record")
    .action(async (id: string, opts: { delete?: boolean }) => {
      await runWorkspaceCleanup(id, opts);
    });

  return cmd;
}

// ---------------------------------------------------------------------------
// Shared setup
// ---------------------------------------------------------------------------

export interface WorkspacesDeps {
  buildAgent?: AgentFactory;
  logger?: Logger;
}

/**
 * Load config, build the services and run `fn`. Errors are printed and
 * set exit code 1; the heartbeat is always stopped.
 */
async function withAgent(deps: WorkspacesDeps, fn: (agent: Agent) => Promise<void>): Promise<void> {
  let agent: Agent;
  try {
    const config = loadConfig();
    const logger = deps.logger ?? createLogger();
    agent = await (deps.buildAgent ?? ((cfg, log) => buildAgent(cfg, log)))(config, logger);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  try {
    await fn(agent);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  } finally {
    await agent.registry.stop();
  }
}

// ---------------------------------------------------------------------------
// Subcommands: extracted for testability
// ---------------------------------------------------------------------------

export interface WorkspacesListOptions {
  active?: boolean;
  json?: boolean;
}

export async function runWorkspacesList(opts: WorkspacesListOptions, deps: WorkspacesDeps = {}): Promise<void> {
  await withAgent(deps, async (agent) => {
    const device = await agent.registry.ensureRegistered();
    const rows = await agent.backend.listWorkspaces({ executorDeviceId: device.id });
    const workspaces = rows
      .filter((ws) => !opts.active || holdsCapacitySlot(ws.status))
      .sort((a, b) => b.created_at.localeCompare(a.created_at));

    outputResult(workspaces, { json: opts.json, format: formatWorkspaceTable });
  });
}

export interface WorkspaceCreateOptions {
  repo?: string;
  branch?: string;
  name?: string;
}

export async function runWorkspaceCreate(opts: WorkspaceCreateOptions, deps: WorkspacesDeps = {}): Promise<void> {
  await withAgent(deps, async (agent) => {
    const created = await agent.workspaces.createWorkspace(agent.config.agent.name, {
      repoUrl: opts.repo ?? null,
      branch: opts.branch,
      name: opts.name,
    });
    console.log(pc.dim(`Creating workspace ${created.id}...`));

    const workspace: Workspace = await agent.workspaces.waitForSetup(created.id);
    console.log(formatWorkspaceDetail(workspace));
    if (workspace.status === "failed") {
      process.exitCode = 1;
    }
  });
}

export async function runWorkspaceArchive(id: string, deps: WorkspacesDeps = {}): Promise<void> {
  await withAgent(deps, async (agent) => {
    await agent.workspaces.track(id);
    const artifact = await agent.workspaces.archiveWorkspace(id);
    console.log(
      `${pc.green("✓")} Archived ${id} -> ${artifact.file_path} (${formatBytes(artifact.file_size_bytes)})`,
    );
  });
}

export async function runWorkspaceCleanup(
  id: string,
  opts: { delete?: boolean } = {},
  deps: WorkspacesDeps = {},
): Promise<void> {
  await withAgent(deps, async (agent) => {
    await agent.workspaces.track(id);
    await agent.workspaces.cleanupWorkspace(id, { deleteRecord: opts.delete === true });
    console.log(`${pc.green("✓")} Cleaned up ${id}${opts.delete ? " and deleted its record" : ""}`);
  });
}
