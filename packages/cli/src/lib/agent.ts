/**
 * Composition root: turns a validated config into the running services.
 *
 *   OutpostApiClient ──> DeviceRegistry ──> WorkspaceManager
 *          │                   │                   │
 *          └──────────────> TaskEngine <───────────┘
 *                               │
 *                      CapabilityProvider
 *
 * 401s raised off the poll path (heartbeat, background workspace work)
 * are routed into engine.signOut() so one rejected key stops everything.
 */

import * as os from "node:os";
import type { Logger } from "pino";
import { ConfigError, type Device } from "@outpost/shared";
import {
  AnthropicProvider,
  CommandProvider,
  DeviceRegistry,
  NodeProcessRunner,
  TaskEngine,
  WorkspaceManager,
  resolveHardwareId,
  type CapabilityProvider,
  type ExecutorBackend,
  type ProcessRunner,
  type TaskQueueClient,
} from "@outpost/core";
import { OutpostApiClient } from "./api-client.js";
import type { OutpostConfig } from "./config.js";

export const CLI_VERSION = "0.1.0";

const GB = 1024 * 1024 * 1024;

export interface Agent {
  config: OutpostConfig;
  logger: Logger;
  backend: TaskQueueClient & ExecutorBackend;
  registry: DeviceRegistry;
  workspaces: WorkspaceManager;
  engine: TaskEngine;
  provider: CapabilityProvider;
  hardwareId: string;
}

/** Seams for tests; production wiring uses none of them */
export interface AgentOverrides {
  backend?: TaskQueueClient & ExecutorBackend;
  runner?: ProcessRunner;
  provider?: CapabilityProvider;
  hardwareId?: string;
}

export type AgentFactory = (config: OutpostConfig, logger: Logger) => Promise<Agent>;

export function createProvider(config: OutpostConfig, runner: ProcessRunner): CapabilityProvider {
  const { provider, agent } = config;

  if (provider.type === "command") {
    if (!provider.command) {
      throw new ConfigError("provider.command is required for the command provider", "CONFIG_INVALID", {
        key: "provider.command",
      });
    }
    return new CommandProvider({
      command: provider.command,
      args: provider.args,
      runner,
      timeoutMs: agent.task_timeout_seconds * 1000,
    });
  }

  if (!provider.api_key) {
    throw new ConfigError("provider.api_key (or ANTHROPIC_API_KEY) is required", "CONFIG_INVALID", {
      key: "provider.api_key",
    });
  }
  return new AnthropicProvider({
    apiKey: provider.api_key,
    model: provider.model,
    maxTokens: provider.max_tokens,
    requestTimeoutMs: agent.task_timeout_seconds * 1000,
  });
}

export async function buildAgent(
  config: OutpostConfig,
  logger: Logger,
  overrides: AgentOverrides = {},
): Promise<Agent> {
  const runner = overrides.runner ?? new NodeProcessRunner();
  const backend = overrides.backend ?? OutpostApiClient.fromConfig(config, logger);
  const provider = overrides.provider ?? createProvider(config, runner);
  const hardwareId = overrides.hardwareId ?? (await resolveHardwareId(runner));

  const registry = new DeviceRegistry({
    backend,
    identity: {
      hardwareId,
      name: config.device.name ?? os.hostname(),
      platform: process.platform,
      osVersion: os.release(),
      executorVersion: CLI_VERSION,
      rootWorkspacePath: config.device.root_workspace_path,
    },
    defaults: {
      maxConcurrentWorkspaces: config.device.max_concurrent_workspaces,
      maxDiskUsageBytes: config.device.max_disk_usage_gb * GB,
      defaultTimeoutMinutes: Math.ceil(config.agent.task_timeout_seconds / 60),
    },
    heartbeatIntervalMs: config.device.heartbeat_interval_seconds * 1000,
    logger,
    onUnauthorized: (err) => engine.signOut(err),
  });

  const workspaces = new WorkspaceManager({
    backend,
    registry,
    runner,
    logger,
    rootPath: config.device.root_workspace_path,
    cloneTimeoutMs: config.workspaces.clone_timeout_seconds * 1000,
    onUnauthorized: (err) => engine.signOut(err),
  });

  const engine = new TaskEngine({
    agentName: config.agent.name,
    queue: backend,
    provider,
    logger,
    pollIntervalMs: config.agent.polling_interval_seconds * 1000,
    maxConcurrentTasks: config.agent.max_concurrent_tasks,
    taskTimeoutMs: config.agent.task_timeout_seconds * 1000,
    registry,
    workspaces: config.workspaces.enabled
      ? {
          manager: workspaces,
          archiveOnComplete: config.workspaces.archive_on_complete,
          cleanupOnComplete: config.workspaces.cleanup_on_complete,
        }
      : undefined,
    testConnection: true,
  });

  return { config, logger, backend, registry, workspaces, engine, provider, hardwareId };
}

/**
 * Push configured capacity to an existing device record when it differs
 * (the record keeps whatever it was registered with otherwise).
 */
export async function syncDeviceSettings(agent: Agent): Promise<Device> {
  const { device } = agent.config;
  return agent.registry.updateConfiguration({
    root_workspace_path: device.root_workspace_path,
    max_concurrent_workspaces: device.max_concurrent_workspaces,
    max_disk_usage_bytes: device.max_disk_usage_gb * GB,
  });
}
