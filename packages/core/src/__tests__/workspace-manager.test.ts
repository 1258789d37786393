/**
 * Tests for WorkspaceManager: creation, setup, capacity, failure
 * diagnostics, archive/cleanup and usage reporting.
 *
 * Each test gets a fresh tmp root, an in-memory backend and a scripted
 * process runner; git and tar are never executed.
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CapacityExceededError } from "@outpost/shared";
import type { NewWorkspace } from "../backend.js";
import { DeviceRegistry } from "../device-registry.js";
import { WORKSPACE_DIRS, WorkspaceManager } from "../workspace-manager.js";
import { FakeExecutorBackend, ScriptedRunner, defaultHandler, silentLogger, type ScriptedHandler } from "./fakes.js";

let root: string;
let backend: FakeExecutorBackend;
let registry: DeviceRegistry;

beforeEach(() => {
  root = mkdtempSync(path.join(tmpdir(), "outpost-ws-"));
  backend = new FakeExecutorBackend();
  registry = new DeviceRegistry({
    backend,
    identity: {
      hardwareId: "hw-test",
      name: "test-box",
      platform: "linux",
      osVersion: "6.0",
      executorVersion: "0.1.0",
      rootWorkspacePath: root,
    },
    defaults: { maxConcurrentWorkspaces: 2 },
    heartbeatIntervalMs: 60_000,
    logger: silentLogger,
  });
});

afterEach(async () => {
  await registry.stop();
  rmSync(root, { recursive: true, force: true });
});

function createManager(handler?: ScriptedHandler) {
  const runner = new ScriptedRunner(handler ?? defaultHandler);
  const manager = new WorkspaceManager({ backend, registry, runner, logger: silentLogger, rootPath: root });
  return { manager, runner };
}

// ---------------------------------------------------------------------------
// Creation and setup
// ---------------------------------------------------------------------------

describe("createWorkspace", () => {
  test("returns immediately in status creating", async () => {
    const { manager } = createManager();
    const ws = await manager.createWorkspace("agent-1");

    expect(ws.status).toBe("creating");
    expect(ws.agent_id).toBe("agent-1");
    expect(path.dirname(ws.workspace_path)).toBe(root);
    expect(path.basename(ws.workspace_path)).toMatch(new RegExp(`^task-${ws.id}-\\d+$`));

    await manager.waitForSetup(ws.id);
  });

  test("without a repository reaches ready without cloning", async () => {
    const { manager, runner } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);

    expect(ws.status).toBe("ready");
    expect(ws.progress_percentage).toBe(100);
    expect(ws.ready_at).not.toBeNull();
    expect(backend.statusHistory.get(ws.id)).toEqual(["creating", "initializing", "ready"]);
    expect(runner.calls).toEqual([]);
  });

  test("creates the directory skeleton and metadata file", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);

    for (const dir of WORKSPACE_DIRS) {
      expect(existsSync(path.join(ws.workspace_path, dir))).toBe(true);
    }
    const metadata = JSON.parse(readFileSync(path.join(ws.workspace_path, ".workspace"), "utf-8"));
    expect(metadata).toEqual({
      workspace_id: ws.id,
      created_at: ws.created_at,
      repository_url: null,
      branch: "main",
    });
  });

  test("derives the name from the repository URL", async () => {
    const { manager } = createManager();
    const ws = await manager.createWorkspace("agent-1", { repoUrl: "https://github.com/acme/widgets.git" });
    expect(ws.workspace_name).toBe("widgets");
    await manager.waitForSetup(ws.id);
  });

  test("clones, checks out a non-default branch and ends ready", async () => {
    const { manager, runner } = createManager();
    const created = await manager.createWorkspace("agent-1", {
      repoUrl: "https://github.com/acme/widgets.git",
      branch: "feature/login",
    });
    const ws = await manager.waitForSetup(created.id);

    expect(ws.status).toBe("ready");
    expect(backend.statusHistory.get(ws.id)).toEqual(["creating", "initializing", "cloning", "ready"]);
    expect(runner.calls.map((c) => c.argv)).toEqual([
      ["git", "clone", "https://github.com/acme/widgets.git", "src"],
      ["git", "checkout", "feature/login"],
    ]);
    expect(runner.calls[0].options.cwd).toBe(ws.workspace_path);
    expect(runner.calls[1].options.cwd).toBe(path.join(ws.workspace_path, "src"));
    expect(existsSync(path.join(ws.workspace_path, "src", "README.md"))).toBe(true);
  });

  test("skips the checkout for the default branch", async () => {
    const { manager, runner } = createManager();
    const created = await manager.createWorkspace("agent-1", { repoUrl: "https://github.com/acme/widgets.git" });
    await manager.waitForSetup(created.id);

    expect(runner.commands()).toEqual(["git clone"]);
  });

  test("a failing clone leaves the workspace failed with the captured output", async () => {
    const { manager } = createManager((argv) =>
      argv[1] === "clone" ? { exitCode: 128, output: "fatal: repository 'https://example.test/x' not found" } : {},
    );
    const created = await manager.createWorkspace("agent-1", { repoUrl: "https://example.test/acme/x" });
    const ws = await manager.waitForSetup(created.id);

    expect(ws.status).toBe("failed");
    expect(ws.error_message).toBe("fatal: repository 'https://example.test/x' not found");
    expect(ws.progress_percentage).toBe(40);
    expect(backend.statusHistory.get(ws.id)).toEqual(["creating", "initializing", "cloning", "failed"]);

    const failure = backend.events[backend.events.length - 1];
    expect(failure.event_category).toBe("error");
    expect(failure.level).toBe("error");
    expect(failure.details.error).toBe("fatal: repository 'https://example.test/x' not found");
  });

  test("refuses past capacity without creating a record", async () => {
    const { manager } = createManager();
    const a = await manager.createWorkspace("agent-1");
    const b = await manager.createWorkspace("agent-1");

    await expect(manager.createWorkspace("agent-1")).rejects.toBeInstanceOf(CapacityExceededError);
    expect(backend.workspaces.size).toBe(2);

    await manager.waitForSetup(a.id);
    await manager.waitForSetup(b.id);
  });

  test("a rejected create gives the slot back", async () => {
    const { manager } = createManager();
    backend.failNext.set("createWorkspace", new Error("backend down"));

    await expect(manager.createWorkspace("agent-1")).rejects.toThrow("backend down");
    expect(registry.availableSlots()).toBe(2);
  });

  test("event logging failures do not affect setup", async () => {
    const { manager } = createManager();
    backend.failNext.set("logEvent", new Error("events down"));

    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);
    expect(ws.status).toBe("ready");
  });

  test("logs one lifecycle event per transition", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    await manager.waitForSetup(created.id);

    expect(backend.events.map((e) => e.message)).toEqual([
      "Workspace creating -> initializing",
      "Workspace initializing -> ready",
    ]);
    expect(backend.events.every((e) => e.event_category === "lifecycle")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Status and assignment
// ---------------------------------------------------------------------------

describe("status changes", () => {
  test("invalid transitions are rejected and leave the status alone", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    await manager.waitForSetup(created.id);

    await expect(manager.updateStatus(created.id, "running")).rejects.toMatchObject({
      code: "WORKSPACE_INVALID_TRANSITION",
    });
    expect(manager.get(created.id)?.status).toBe("ready");
  });

  test("assignTask links the task and moves to assigned", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");

    const assignment = await manager.assignTask(created.id, "task-1", { mode: "execute" });

    expect(assignment.task_id).toBe("task-1");
    expect(backend.assignments[0].config).toEqual({ mode: "execute" });
    expect(manager.get(created.id)?.status).toBe("assigned");
  });

  test("a running workspace can pause and resume, then nothing moves it back from completed", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    await manager.assignTask(created.id, "task-1");

    await manager.updateStatus(created.id, "running");
    await manager.updateStatus(created.id, "paused");
    await manager.updateStatus(created.id, "running");
    await manager.updateStatus(created.id, "completed");

    await expect(manager.updateStatus(created.id, "running")).rejects.toMatchObject({
      code: "WORKSPACE_INVALID_TRANSITION",
    });
    expect(backend.statusHistory.get(created.id)).toEqual([
      "creating",
      "initializing",
      "ready",
      "assigned",
      "running",
      "paused",
      "running",
      "completed",
    ]);
  });

  test("progress is capped at 100", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    await manager.waitForSetup(created.id);

    const ws = await manager.updateProgress(created.id, "working", 150);
    expect(ws.progress_percentage).toBe(100);
    expect(ws.current_phase).toBe("working");
  });

  test("unknown workspaces are reported as not found", async () => {
    const { manager } = createManager();
    await expect(manager.updateStatus("missing", "failed")).rejects.toMatchObject({ code: "WORKSPACE_NOT_FOUND" });
  });
});

// ---------------------------------------------------------------------------
// Archive and cleanup
// ---------------------------------------------------------------------------

describe("archive and cleanup", () => {
  test("archive then cleanup leaves no directory and one archive artifact", async () => {
    const { manager, runner } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);
    writeFileSync(path.join(ws.workspace_path, "output", "report.txt"), "result");

    const artifact = await manager.archiveWorkspace(ws.id, "task-9");

    expect(artifact.artifact_type).toBe("other");
    expect(artifact.mime_type).toBe("application/gzip");
    expect(artifact.tags).toEqual(["archive", "workspace"]);
    expect(artifact.task_id).toBe("task-9");
    expect(artifact.file_size_bytes).toBe("archive-bytes".length);
    expect(path.dirname(artifact.file_path)).toBe(path.join(root, "archives"));
    expect(artifact.file_name).toMatch(new RegExp(`^workspace-${ws.id}-\\d+\\.tar\\.gz$`));
    expect(runner.calls[0].argv).toEqual(["tar", "-czf", artifact.file_path, "-C", ws.workspace_path, "."]);
    expect(manager.get(ws.id)?.status).toBe("archived");

    await manager.cleanupWorkspace(ws.id);

    expect(existsSync(ws.workspace_path)).toBe(false);
    expect(backend.artifacts).toHaveLength(1);
    expect(backend.statusHistory.get(ws.id)).toEqual(["creating", "initializing", "ready", "archived", "cleanup"]);
    expect(manager.get(ws.id)).toBeNull();
    expect(registry.device?.current_workspaces_count).toBe(0);
  });

  test("cleanup archives first when needed", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);

    await manager.cleanupWorkspace(ws.id, { deleteRecord: true });

    expect(backend.statusHistory.get(ws.id)).toEqual(["creating", "initializing", "ready", "archived", "cleanup"]);
    expect(backend.artifacts).toEqual([]);
    expect(backend.deleted).toEqual([ws.id]);
    expect(existsSync(ws.workspace_path)).toBe(false);
  });

  test("a failed workspace can be cleaned up", async () => {
    const { manager } = createManager(() => ({ exitCode: 1, output: "clone failed" }));
    const created = await manager.createWorkspace("agent-1", { repoUrl: "https://example.test/acme/x" });
    await manager.waitForSetup(created.id);

    await manager.cleanupWorkspace(created.id);
    expect(backend.statusHistory.get(created.id)?.slice(-3)).toEqual(["failed", "archived", "cleanup"]);
  });

  test("cleanup of an unknown workspace is a no-op", async () => {
    const { manager } = createManager();
    await expect(manager.cleanupWorkspace("missing")).resolves.toBeUndefined();
  });

  test("an archived workspace from an earlier run can be tracked and cleaned up", async () => {
    const first = createManager().manager;
    const created = await first.createWorkspace("agent-1");
    await first.waitForSetup(created.id);
    await first.archiveWorkspace(created.id);

    const { manager } = createManager();
    const tracked = await manager.track(created.id);
    expect(tracked.status).toBe("archived");

    await manager.cleanupWorkspace(created.id);
    expect(existsSync(created.workspace_path)).toBe(false);
    expect(backend.statusHistory.get(created.id)?.slice(-2)).toEqual(["archived", "cleanup"]);
  });

  test("tracking an id this device does not own fails", async () => {
    const { manager } = createManager();
    await expect(manager.track("missing")).rejects.toMatchObject({ code: "WORKSPACE_NOT_FOUND" });
  });

  test("a failing archive command is reported and the status is kept", async () => {
    const { manager } = createManager((argv) => (argv[0] === "tar" ? { exitCode: 2, output: "tar: disk full" } : {}));
    const created = await manager.createWorkspace("agent-1");
    await manager.waitForSetup(created.id);

    await expect(manager.archiveWorkspace(created.id)).rejects.toThrow("tar: disk full");
    expect(manager.get(created.id)?.status).toBe("ready");
    expect(backend.artifacts).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Task files and outputs
// ---------------------------------------------------------------------------

describe("task files", () => {
  test("writeInputFiles writes nested files under input/", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);

    const written = await manager.writeInputFiles(ws.id, { "notes/a.txt": "hello" });

    expect(written).toEqual(["notes/a.txt"]);
    expect(readFileSync(path.join(ws.workspace_path, "input", "notes", "a.txt"), "utf-8")).toBe("hello");
  });

  test("writeInputFiles refuses paths outside input/", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    await manager.waitForSetup(created.id);

    await expect(manager.writeInputFiles(created.id, { "../escape.txt": "x" })).rejects.toMatchObject({
      code: "WORKSPACE_INVALID_PATH",
    });
  });

  test("collectOutputs uploads every output file", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);
    writeFileSync(path.join(ws.workspace_path, "output", "report.md"), "# Report\n");
    writeFileSync(path.join(ws.workspace_path, "output", "chart.png"), "PNG");

    const artifacts = await manager.collectOutputs(ws.id, "task-1");

    expect(artifacts.map((a) => a.file_name)).toEqual(["chart.png", "report.md"]);
    expect(artifacts[0]).toMatchObject({
      artifact_type: "image",
      storage_type: "reference",
      content: null,
      is_output: true,
    });
    expect(artifacts[1]).toMatchObject({
      artifact_type: "document",
      mime_type: "text/markdown",
      storage_type: "inline",
      content: "# Report\n",
      task_id: "task-1",
      is_output: true,
    });
  });
});

// ---------------------------------------------------------------------------
// Usage and sync
// ---------------------------------------------------------------------------

describe("usage and sync", () => {
  test("refreshUsage pushes disk usage and records a snapshot", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    const ws = await manager.waitForSetup(created.id);
    writeFileSync(path.join(ws.workspace_path, "output", "data.txt"), "0123456789");
    const expectedBytes = statSync(path.join(ws.workspace_path, ".workspace")).size + 10;

    const updated = await manager.refreshUsage(ws.id, "task-1");

    expect(updated.disk_usage_bytes).toBe(expectedBytes);
    expect(updated.file_count).toBe(2);
    expect(backend.workspaces.get(ws.id)?.disk_usage_bytes).toBe(expectedBytes);
    expect(backend.metrics[0]).toMatchObject({ task_id: "task-1", metric_type: "snapshot", file_count: 2 });
    expect(registry.device?.current_disk_usage_bytes).toBe(expectedBytes);
  });

  test("recordFinalMetrics carries the task cost", async () => {
    const { manager } = createManager();
    const created = await manager.createWorkspace("agent-1");
    await manager.waitForSetup(created.id);

    await manager.recordFinalMetrics(created.id, "task-1", 0.25);
    expect(backend.metrics[0]).toMatchObject({ metric_type: "final", cumulative_cost_usd: 0.25 });
  });

  test("refreshActiveWorkspaces adopts live records and resyncs the slot count", async () => {
    const device = await registry.ensureRegistered();
    const existing: NewWorkspace = {
      id: "ws-existing",
      executor_device_id: device.id,
      agent_id: "agent-1",
      workspace_path: path.join(root, "existing"),
      workspace_name: "existing",
      repo_url: null,
      repo_branch: "main",
      max_disk_usage_mb: 1024,
      execution_timeout_minutes: 60,
      enable_network: true,
      enable_git: true,
      allowed_commands: null,
      environment_vars: {},
      status: "ready",
      created_at: "2026-01-01T00:00:00.000Z",
    };
    await backend.createWorkspace(existing);
    await backend.createWorkspace({ ...existing, id: "ws-done", status: "archived" });

    const { manager } = createManager();
    const active = await manager.refreshActiveWorkspaces();

    expect(active.map((w) => w.id)).toEqual(["ws-existing"]);
    expect(registry.device?.current_workspaces_count).toBe(1);
  });
});
