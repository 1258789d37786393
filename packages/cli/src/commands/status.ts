/**
 * `outpost status` command: agent, backend and device state.
 *
 * Shows the configured agent, backend connectivity with latency, this
 * machine's device record and its live workspaces. If the backend is
 * unreachable only the local part is shown.
 */

import { Command } from "commander";
import pc from "picocolors";
import type { Device, Workspace } from "@outpost/shared";
import {
  NodeProcessRunner,
  holdsCapacitySlot,
  resolveHardwareId,
  type ExecutorBackend,
  type TaskQueueClient,
} from "@outpost/core";
import { OutpostApiClient } from "../lib/api-client.js";
import { configExists, loadConfig, type OutpostConfig } from "../lib/config.js";
import { formatBytes, formatError, formatWorkspaceTable, outputResult } from "../lib/formatters.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StatusBackend = Pick<TaskQueueClient, "healthCheck"> &
  Pick<ExecutorBackend, "listDevices" | "listWorkspaces">;

export interface StatusData {
  agent: {
    name: string;
    provider: string;
    maxConcurrentTasks: number;
    pollingIntervalSeconds: number;
    workspacesEnabled: boolean;
  };
  backend: {
    url: string;
    status: "connected" | "unreachable";
    latencyMs?: number;
  };
  /** null when unregistered or the backend is unreachable */
  device: Device | null;
  hardwareId: string;
  activeWorkspaces: Workspace[];
}

// ---------------------------------------------------------------------------
// Data Layer
// ---------------------------------------------------------------------------

export async function fetchStatus(
  backend: StatusBackend,
  config: OutpostConfig,
  hardwareId: string,
): Promise<StatusData> {
  const agent = {
    name: config.agent.name,
    provider: config.provider.type === "command" ? `command:${config.provider.command ?? "?"}` : config.provider.model,
    maxConcurrentTasks: config.agent.max_concurrent_tasks,
    pollingIntervalSeconds: config.agent.polling_interval_seconds,
    workspacesEnabled: config.workspaces.enabled,
  };

  const startMs = Date.now();
  const healthy = await backend.healthCheck();
  const latencyMs = Date.now() - startMs;

  if (!healthy) {
    return {
      agent,
      backend: { url: config.backend.url, status: "unreachable" },
      device: null,
      hardwareId,
      activeWorkspaces: [],
    };
  }

  const devices = await backend.listDevices();
  const device = devices.find((d) => d.device_id === hardwareId) ?? null;

  let activeWorkspaces: Workspace[] = [];
  if (device) {
    const workspaces = await backend.listWorkspaces({ executorDeviceId: device.id });
    activeWorkspaces = workspaces.filter((ws) => holdsCapacitySlot(ws.status));
  }

  return {
    agent,
    backend: { url: config.backend.url, status: "connected", latencyMs },
    device,
    hardwareId,
    activeWorkspaces,
  };
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

export function formatStatus(data: StatusData): string {
  const lines: string[] = [];
  lines.push("outpost status");
  lines.push("");

  lines.push(`  Agent:      ${data.agent.name}`);
  lines.push(`  Provider:   ${data.agent.provider}`);
  lines.push(
    `  Tasks:      up to ${data.agent.maxConcurrentTasks} concurrent · polling every ${data.agent.pollingIntervalSeconds}s`,
  );
  lines.push(`  Workspaces: ${data.agent.workspacesEnabled ? "enabled" : pc.dim("disabled")}`);

  if (data.backend.status === "connected") {
    const latency = data.backend.latencyMs !== undefined ? ` · ${data.backend.latencyMs}ms` : "";
    lines.push(`  Backend:    ${pc.green("✓")} Connected (${data.backend.url})${latency}`);
  } else {
    lines.push(`  Backend:    ${pc.red("✗")} Unreachable (${data.backend.url})`);
    lines.push("");
    lines.push("  " + pc.dim("(Cannot fetch device data -- backend offline)"));
    return lines.join("\n");
  }

  lines.push("");
  if (!data.device) {
    lines.push(`  Device:     ${pc.dim(`not registered (${data.hardwareId})`)}`);
    lines.push(pc.dim("              Registered on the first 'outpost run'."));
    return lines.join("\n");
  }

  const { device } = data;
  lines.push(`  Device:     ${device.device_name} (${device.id}) · ${device.status}${device.is_online ? "" : pc.dim(" · offline")}`);
  lines.push(`  Root:       ${device.root_workspace_path}`);
  lines.push(
    `  Capacity:   ${device.current_workspaces_count}/${device.max_concurrent_workspaces} workspaces · ` +
      `${formatBytes(device.current_disk_usage_bytes)} of ${formatBytes(device.max_disk_usage_bytes)}`,
  );

  lines.push("");
  lines.push("  Active Workspaces:");
  if (data.activeWorkspaces.length === 0) {
    lines.push("    " + pc.dim("none"));
  } else {
    for (const line of formatWorkspaceTable(data.activeWorkspaces).split("\n")) {
      lines.push(`    ${line}`);
    }
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Command Definition
// ---------------------------------------------------------------------------

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show agent configuration, backend connectivity and device state")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await runStatus(opts);
    });
}

export interface StatusDeps {
  backend?: StatusBackend;
  hardwareId?: string;
}

/**
 * Core status logic. Separated from Commander for testability.
 */
export async function runStatus(opts: { json?: boolean } = {}, deps: StatusDeps = {}): Promise<void> {
  if (!configExists()) {
    if (opts.json) {
      process.stdout.write(JSON.stringify({ agent: { status: "not_initialized" } }, null, 2) + "\n");
    } else {
      console.log("Agent: Not initialized");
      console.log("Run 'outpost init' to configure this machine.");
    }
    return;
  }

  let config: OutpostConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  try {
    const backend = deps.backend ?? new OutpostApiClient({
      baseUrl: config.backend.url,
      apiKey: config.backend.api_key,
      timeoutMs: 3_000,
    });
    const hardwareId = deps.hardwareId ?? (await resolveHardwareId(new NodeProcessRunner()));
    const data = await fetchStatus(backend, config, hardwareId);

    outputResult(data, { json: opts.json, format: formatStatus });
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
