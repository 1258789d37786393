/**
 * Shared fixtures for CLI tests: a tmp ~/.outpost, captured stdout/stderr,
 * and an in-memory backend that serves both the task queue and the
 * executor endpoints.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import type { Task, TaskResult, TaskStatus } from "@outpost/shared";
import type { CapabilityProvider, ExecutionRequest, ExecutionResult, TaskQueueClient } from "@outpost/core";
import { FakeExecutorBackend, createFakeQueue } from "@outpost/core/testing";
import { overrideConfigPaths, saveConfig, type OutpostConfigInput } from "../lib/config.js";

// ---------------------------------------------------------------------------
// Config directory
// ---------------------------------------------------------------------------

/** Point ~/.outpost at a fresh tmp dir. Returns the dir and a cleanup function. */
export function useTmpConfigDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "outpost-cli-"));
  overrideConfigPaths(dir);
  return {
    dir,
    cleanup: () => {
      overrideConfigPaths(undefined);
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function writeTestConfig(dir: string, extra: Partial<OutpostConfigInput> = {}): void {
  saveConfig({
    backend: { url: "http://127.0.0.1:1", api_key: "test-key" },
    agent: { name: "agent-test", polling_interval_seconds: 10 },
    provider: { api_key: "test-provider-key" },
    device: { root_workspace_path: path.join(dir, "workspaces") },
    ...extra,
  });
}

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

export interface CapturedOutput {
  stdout: () => string;
  stderr: () => string;
  restore: () => void;
}

/** Collects console.log, console.error and process.stdout.write as plain lines. */
export function captureOutput(): CapturedOutput {
  const out: string[] = [];
  const err: string[] = [];

  const logSpy = vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    out.push(args.map(String).join(" ") + "\n");
  });
  const errorSpy = vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    err.push(args.map(String).join(" ") + "\n");
  });
  const writeSpy = vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    out.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8"));
    return true;
  });

  return {
    stdout: () => out.join(""),
    stderr: () => err.join(""),
    restore: () => {
      logSpy.mockRestore();
      errorSpy.mockRestore();
      writeSpy.mockRestore();
    },
  };
}

// ---------------------------------------------------------------------------
// Backend and provider
// ---------------------------------------------------------------------------

/** FakeExecutorBackend plus a scripted task queue, as one object like the real client. */
export class FakeAgentBackend extends FakeExecutorBackend implements TaskQueueClient {
  readonly queue: ReturnType<typeof createFakeQueue>;

  constructor(batches: Task[][] = []) {
    super();
    this.queue = createFakeQueue(batches);
  }

  pollPendingTasks(agent: string): Promise<Task[]> {
    return this.queue.pollPendingTasks(agent);
  }

  acceptTask(taskId: string, agent: string): Promise<void> {
    return this.queue.acceptTask(taskId, agent);
  }

  updateTaskStatus(taskId: string, status: TaskStatus, progress?: number): Promise<void> {
    return this.queue.updateTaskStatus(taskId, status, progress);
  }

  completeTask(taskId: string, result: TaskResult): Promise<void> {
    return this.queue.completeTask(taskId, result);
  }

  failTask(taskId: string, message: string): Promise<void> {
    return this.queue.failTask(taskId, message);
  }

  healthCheck(): Promise<boolean> {
    return this.queue.healthCheck();
  }
}

export function stubProvider(
  execute: (request: ExecutionRequest) => Promise<ExecutionResult> = async () => ({
    outputText: "done",
    tokenUsage: { input_tokens: 10, output_tokens: 5, total_tokens: 15 },
    durationSeconds: 0.1,
    model: "stub-model",
    costUsd: 0.01,
  }),
): CapabilityProvider {
  return { name: "stub", execute };
}
