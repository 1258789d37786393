/**
 * Workspace lifecycle manager.
 *
 * Creates, initializes, tracks and tears down isolated workspaces on this
 * device. The remote backend is the source of truth for workspace status:
 * every change is sent as a sparse update first and only mirrored into the
 * local cache once the backend acknowledged it.
 *
 * Flow for one workspace:
 *   1. createWorkspace()  — capacity check, slot reservation, remote record,
 *                           returns immediately in status "creating"
 *   2. setup (async)      — setupDirectories() then cloneRepository() when a
 *                           repository is set, otherwise straight to "ready"
 *   3. assignTask() / updateStatus() while a task runs in it
 *   4. archiveWorkspace() — optional tarball, registered as an artifact
 *   5. cleanupWorkspace() — archived -> cleanup, directory removed
 *
 * Transitions for one workspace run strictly one after another (a
 * per-workspace promise chain), each validated against the lifecycle table
 * and each followed by a best-effort audit event. A capacity slot is held
 * from creation until the workspace reaches "archived".
 */

import { mkdir, rm, stat, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import {
  CapacityExceededError,
  SetupFailureError,
  WorkspaceError,
  errorMessage,
  generateId,
  isDefaultBranch,
  isUnauthorized,
  repoNameFromUrl,
  type ArtifactType,
  type EventCategory,
  type EventLevel,
  type MetricType,
  type NewArtifact,
  type UnauthorizedError,
  type Workspace,
  type WorkspaceArtifact,
  type WorkspaceConfig,
  type WorkspaceStatus,
  type WorkspaceTaskAssignment,
  type WorkspaceUpdate,
} from "@outpost/shared";
import type { ExecutorBackend, NewWorkspace } from "./backend.js";
import type { DeviceRegistry } from "./device-registry.js";
import { bytesToMb, listFiles, measureDirectory } from "./disk-usage.js";
import { describeFailure, type ProcessRunner } from "./process-runner.js";
import { holdsCapacitySlot, isSetupComplete, isValidTransition } from "./workspace-lifecycle.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorkspaceManagerOptions {
  backend: ExecutorBackend;
  registry: DeviceRegistry;
  runner: ProcessRunner;
  logger: Logger;
  /** Root used when the device record carries none */
  rootPath: string;
  cloneTimeoutMs?: number;
  archiveTimeoutMs?: number;
  onUnauthorized?: (err: UnauthorizedError) => void;
  /** Injected in tests */
  now?: () => Date;
}

export interface CleanupOptions {
  /** Also delete the backend record once the directory is gone */
  deleteRecord?: boolean;
}

/** Caller-supplied part of an event; the manager fills in the rest */
export interface EventInput {
  taskId?: string | null;
  type: string;
  category: EventCategory;
  level: EventLevel;
  message: string;
  details?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed subdirectories of every workspace */
export const WORKSPACE_DIRS = ["src", "input", "output", "logs", "artifacts", "temp"] as const;

/** Metadata descriptor written at the workspace root */
export const METADATA_FILE = ".workspace";

const DEFAULT_CLONE_TIMEOUT_MS = 300_000;
const DEFAULT_ARCHIVE_TIMEOUT_MS = 600_000;

const DEFAULT_MAX_DISK_USAGE_MB = 10_240;

/** Text outputs below this size are uploaded inline */
const INLINE_CONTENT_LIMIT = 100_000;

const EXTENSION_TYPES: Record<string, { type: ArtifactType; mime: string; text: boolean }> = {
  ".md": { type: "document", mime: "text/markdown", text: true },
  ".txt": { type: "document", mime: "text/plain", text: true },
  ".log": { type: "log", mime: "text/plain", text: true },
  ".json": { type: "data", mime: "application/json", text: true },
  ".csv": { type: "data", mime: "text/csv", text: true },
  ".yaml": { type: "data", mime: "application/yaml", text: true },
  ".yml": { type: "data", mime: "application/yaml", text: true },
  ".ts": { type: "source_code", mime: "text/plain", text: true },
  ".js": { type: "source_code", mime: "text/javascript", text: true },
  ".py": { type: "source_code", mime: "text/x-python", text: true },
  ".sh": { type: "source_code", mime: "text/x-shellscript", text: true },
  ".html": { type: "document", mime: "text/html", text: true },
  ".png": { type: "image", mime: "image/png", text: false },
  ".jpg": { type: "image", mime: "image/jpeg", text: false },
  ".jpeg": { type: "image", mime: "image/jpeg", text: false },
  ".svg": { type: "image", mime: "image/svg+xml", text: true },
  ".pdf": { type: "document", mime: "application/pdf", text: false },
};

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class WorkspaceManager {
  private readonly active = new Map<string, Workspace>();
  private readonly chains = new Map<string, Promise<unknown>>();
  private readonly setups = new Map<string, Promise<Workspace>>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: WorkspaceManagerOptions) {
    this.log = options.logger.child({ component: "workspace-manager" });
    this.now = options.now ?? (() => new Date());
  }

  /** Point-in-time copy of one cached workspace */
  get(id: string): Workspace | null {
    const ws = this.active.get(id);
    return ws ? { ...ws } : null;
  }

  /** Point-in-time copies of every cached workspace, oldest first */
  list(): Workspace[] {
    return [...this.active.values()]
      .map((ws) => ({ ...ws }))
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  // -------------------------------------------------------------------------
  // Creation and setup
  // -------------------------------------------------------------------------

  /**
   * Create a workspace for `agentId`. Refuses with CapacityExceededError
   * (and creates nothing) when the device has no free slot. Setup runs in
   * the background; the returned workspace is in status "creating".
   */
  async createWorkspace(agentId: string, config: WorkspaceConfig = {}): Promise<Workspace> {
    const { registry, backend } = this.options;
    const device = await registry.ensureRegistered();

    if (registry.availableSlots() <= 0) {
      throw new CapacityExceededError(
        `Device ${device.device_name || device.id} has no free workspace slot ` +
          `(${device.current_workspaces_count}/${device.max_concurrent_workspaces})`,
        {
          deviceId: device.id,
          current: device.current_workspaces_count,
          max: device.max_concurrent_workspaces,
        },
      );
    }
    await registry.reserveSlot();

    const id = generateId();
    const createdAt = this.now();
    const repoUrl = config.repoUrl?.trim() || null;
    const workspacePath =
      config.workspacePath ??
      path.join(this.rootPath(), `task-${id}-${Math.floor(createdAt.getTime() / 1000)}`);

    const body: NewWorkspace = {
      id,
      executor_device_id: device.id,
      agent_id: agentId,
      workspace_path: workspacePath,
      workspace_name:
        config.name ?? (repoUrl ? repoNameFromUrl(repoUrl) : null) ?? `workspace-${id.slice(-8).toLowerCase()}`,
      repo_url: repoUrl,
      repo_branch: config.branch ?? "main",
      max_disk_usage_mb: config.maxDiskUsageMb ?? DEFAULT_MAX_DISK_USAGE_MB,
      execution_timeout_minutes: config.executionTimeoutMinutes ?? device.default_timeout_minutes,
      enable_network: config.enableNetwork ?? device.allow_network_access,
      enable_git: config.enableGit ?? true,
      allowed_commands: config.allowedCommands ?? null,
      environment_vars: config.environmentVars ?? {},
      status: "creating",
      created_at: createdAt.toISOString(),
    };

    let created: Workspace;
    try {
      created = await backend.createWorkspace(body);
    } catch (err) {
      await registry.releaseSlot();
      throw err;
    }

    this.active.set(created.id, created);
    this.log.info(
      { workspaceId: created.id, path: created.workspace_path, repoUrl },
      "Workspace created",
    );

    const snapshot = { ...created };
    this.setups.set(created.id, this.runSetup(created.id));
    return snapshot;
  }

  /**
   * Resolves with the workspace once its background setup settled (ready
   * or failed). Resolves immediately for workspaces that were not set up
   * by this manager.
   */
  async waitForSetup(id: string): Promise<Workspace> {
    const setup = this.setups.get(id);
    if (setup) return setup;
    return this.require(id);
  }

  /**
   * Create the directory skeleton and the metadata descriptor.
   * Progress: 10% on entering "initializing", 30% once the tree exists.
   */
  async setupDirectories(workspace: Workspace): Promise<Workspace> {
    const { id, workspace_path: root } = workspace;
    await this.transition(id, "initializing", { progress_percentage: 10, current_phase: "initializing" });

    await mkdir(root, { recursive: true });
    for (const dir of WORKSPACE_DIRS) {
      await mkdir(path.join(root, dir), { recursive: true });
    }

    const metadata = {
      workspace_id: id,
      created_at: workspace.created_at,
      repository_url: workspace.repo_url,
      branch: workspace.repo_branch,
    };
    await writeFile(path.join(root, METADATA_FILE), JSON.stringify(metadata, null, 2) + "\n", "utf-8");

    return this.updateProgress(id, "directories_created", 30);
  }

  /**
   * Clone the repository into src/ and check out the branch when it is
   * not a default one. A non-zero exit or timeout throws SetupFailureError
   * whose message is the captured output. Ends in "ready" at 100%.
   */
  async cloneRepository(workspace: Workspace): Promise<Workspace> {
    const { id, workspace_path: root, repo_url: repoUrl, repo_branch: branch } = workspace;
    if (!repoUrl) {
      return this.transition(id, "ready", { progress_percentage: 100, current_phase: "ready" });
    }

    await this.transition(id, "cloning", { progress_percentage: 40, current_phase: "cloning" });

    const timeoutMs = this.options.cloneTimeoutMs ?? DEFAULT_CLONE_TIMEOUT_MS;
    await this.runOrThrow(["git", "clone", repoUrl, "src"], root, timeoutMs, "SETUP_CLONE_FAILED");
    await this.updateProgress(id, "cloned", 70);

    if (!isDefaultBranch(branch)) {
      await this.runOrThrow(["git", "checkout", branch], path.join(root, "src"), timeoutMs, "SETUP_CHECKOUT_FAILED");
      await this.updateProgress(id, `checked_out:${branch}`, 80);
    }

    return this.transition(id, "ready", { progress_percentage: 100, current_phase: "ready" });
  }

  // -------------------------------------------------------------------------
  // Progress and status
  // -------------------------------------------------------------------------

  /**
   * Report a milestone. 100% is reserved for "ready" and later, so earlier
   * phases are capped at 99.
   */
  async updateProgress(id: string, phase: string, percent: number): Promise<Workspace> {
    return this.serialize(id, async () => {
      const current = this.require(id);
      const ceiling = isSetupComplete(current.status) ? 100 : 99;
      const progress = Math.min(ceiling, Math.max(0, Math.round(percent)));
      return this.applyUpdate(current, { current_phase: phase, progress_percentage: progress });
    });
  }

  /** Move to `status`, optionally recording an error message. */
  async updateStatus(id: string, status: WorkspaceStatus, error?: string): Promise<Workspace> {
    return this.transition(id, status, error !== undefined ? { error_message: error } : {});
  }

  /** Link a task to a ready workspace, then move it to "assigned". */
  async assignTask(
    id: string,
    taskId: string,
    config: Record<string, unknown> = {},
  ): Promise<WorkspaceTaskAssignment> {
    await this.waitForSetup(id);
    const current = this.require(id);
    if (!isValidTransition(current.status, "assigned")) {
      throw invalidTransition(current, "assigned");
    }

    const assignment = await this.options.backend.assignTask(id, taskId, config);
    await this.transition(id, "assigned", { current_phase: `task:${taskId}` }, taskId);
    this.log.info({ workspaceId: id, taskId }, "Task assigned to workspace");
    return assignment;
  }

  // -------------------------------------------------------------------------
  // Teardown
  // -------------------------------------------------------------------------

  /**
   * Pack the workspace into <root>/archives/workspace-<id>-<ts>.tar.gz and
   * register it as an artifact of type "other", then mark the workspace
   * "archived". Any failure is thrown; nothing falls back to plain cleanup.
   */
  async archiveWorkspace(id: string, taskId: string | null = null): Promise<WorkspaceArtifact> {
    await this.waitForSetup(id);
    const ws = this.require(id);
    if (ws.status !== "archived" && !isValidTransition(ws.status, "archived")) {
      throw invalidTransition(ws, "archived");
    }

    const archivesDir = path.join(this.rootPath(), "archives");
    const fileName = `workspace-${id}-${Math.floor(this.now().getTime() / 1000)}.tar.gz`;
    const archivePath = path.join(archivesDir, fileName);

    await mkdir(archivesDir, { recursive: true });
    await this.runOrThrow(
      ["tar", "-czf", archivePath, "-C", ws.workspace_path, "."],
      undefined,
      this.options.archiveTimeoutMs ?? DEFAULT_ARCHIVE_TIMEOUT_MS,
      "SETUP_ARCHIVE_FAILED",
    );

    let size: number;
    try {
      size = (await stat(archivePath)).size;
    } catch {
      throw new SetupFailureError(`Archive was not produced at ${archivePath}`, "SETUP_ARCHIVE_MISSING", {
        workspaceId: id,
      });
    }

    const artifact = await this.options.backend.uploadArtifact(id, {
      task_id: taskId,
      file_path: archivePath,
      file_name: fileName,
      file_extension: ".tar.gz",
      artifact_type: "other",
      file_size_bytes: size,
      mime_type: "application/gzip",
      storage_type: "reference",
      content: null,
      description: `Archive of workspace ${ws.workspace_name}`,
      tags: ["archive", "workspace"],
      is_output: false,
    });
    this.log.info({ workspaceId: id, archivePath, sizeBytes: size }, "Workspace archived");

    if (this.require(id).status !== "archived") {
      await this.transition(id, "archived", { current_phase: "archived" }, taskId);
    }
    return artifact;
  }

  /**
   * Retire the workspace (archived, unless it already is), move it to
   * "cleanup", delete its directory and drop it from the active set.
   * Unknown ids and missing directories are not errors.
   */
  async cleanupWorkspace(id: string, options: CleanupOptions = {}): Promise<void> {
    if (!this.active.has(id)) {
      this.log.debug({ workspaceId: id }, "Cleanup requested for unknown workspace, nothing to do");
      return;
    }

    await this.waitForSetup(id);
    const ws = this.require(id);

    if (ws.status !== "archived" && ws.status !== "cleanup") {
      await this.transition(id, "archived", { current_phase: "archived" });
    }
    if (this.require(id).status !== "cleanup") {
      await this.transition(id, "cleanup", { current_phase: "cleanup" });
    }

    await rm(ws.workspace_path, { recursive: true, force: true });

    this.active.delete(id);
    this.setups.delete(id);
    this.chains.delete(id);
    this.log.info({ workspaceId: id, path: ws.workspace_path }, "Workspace cleaned up");

    if (options.deleteRecord) {
      await this.options.backend.deleteWorkspace(id);
    }
  }

  // -------------------------------------------------------------------------
  // Sync and usage
  // -------------------------------------------------------------------------

  /**
   * Load this device's live workspaces from the backend into the cache.
   * Cached entries win over listed ones (they may be fresher). Without an
   * agent filter the device's slot count is resynchronized as well.
   */
  async refreshActiveWorkspaces(agentId?: string): Promise<Workspace[]> {
    const device = await this.options.registry.ensureRegistered();
    const rows = await this.options.backend.listWorkspaces({ executorDeviceId: device.id, agentId });

    for (const row of rows) {
      if (holdsCapacitySlot(row.status) && !this.active.has(row.id)) {
        this.active.set(row.id, row);
      }
    }

    if (agentId === undefined) {
      const holding = [...this.active.values()].filter((ws) => holdsCapacitySlot(ws.status)).length;
      await this.options.registry.setWorkspaceCount(holding);
    }
    return this.list();
  }

  /**
   * Bring one of this device's workspaces into the cache whatever its
   * status, so archived rows can still be cleaned up by id.
   */
  async track(id: string): Promise<Workspace> {
    const cached = this.active.get(id);
    if (cached) return { ...cached };

    const device = await this.options.registry.ensureRegistered();
    const rows = await this.options.backend.listWorkspaces({ executorDeviceId: device.id });
    const row = rows.find((ws) => ws.id === id);
    if (!row) {
      throw new WorkspaceError(`Workspace not found: ${id}`, "WORKSPACE_NOT_FOUND", { workspaceId: id });
    }
    this.active.set(id, row);
    return { ...row };
  }

  /**
   * Measure the tree, push disk_usage_bytes/file_count and record a
   * metrics snapshot. Advisory only.
   */
  async refreshUsage(id: string, taskId: string | null = null): Promise<Workspace> {
    return this.recordUsage(id, taskId, "snapshot", 0);
  }

  /** Final metrics for a task that ran in this workspace. */
  async recordFinalMetrics(id: string, taskId: string, costUsd: number): Promise<Workspace> {
    return this.recordUsage(id, taskId, "final", costUsd);
  }

  // -------------------------------------------------------------------------
  // Task files
  // -------------------------------------------------------------------------

  /** Write task-provided files into input/. Paths must stay inside it. */
  async writeInputFiles(id: string, files: Record<string, string>): Promise<string[]> {
    const ws = this.require(id);
    const inputDir = path.join(ws.workspace_path, "input");
    const written: string[] = [];

    for (const [relative, content] of Object.entries(files)) {
      const target = path.resolve(inputDir, relative);
      if (!target.startsWith(inputDir + path.sep)) {
        throw new WorkspaceError(`Input file escapes the workspace: ${relative}`, "WORKSPACE_INVALID_PATH", {
          workspaceId: id,
          path: relative,
        });
      }
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
      written.push(relative);
    }
    return written;
  }

  /** Upload every file under output/ as an output artifact of `taskId`. */
  async collectOutputs(id: string, taskId: string): Promise<WorkspaceArtifact[]> {
    const ws = this.require(id);
    const outputDir = path.join(ws.workspace_path, "output");
    const uploaded: WorkspaceArtifact[] = [];

    for (const relative of await listFiles(outputDir)) {
      const fullPath = path.join(outputDir, relative);
      const size = (await stat(fullPath)).size;
      const extension = path.extname(relative).toLowerCase();
      const known = EXTENSION_TYPES[extension];
      const inline = known?.text === true && size < INLINE_CONTENT_LIMIT;

      const artifact: NewArtifact = {
        task_id: taskId,
        file_path: fullPath,
        file_name: path.basename(relative),
        file_extension: extension || null,
        artifact_type: known?.type ?? "output",
        file_size_bytes: size,
        mime_type: known?.mime ?? "application/octet-stream",
        storage_type: inline ? "inline" : "reference",
        content: inline ? await readFile(fullPath, "utf-8") : null,
        description: null,
        tags: ["output"],
        is_output: true,
      };
      uploaded.push(await this.options.backend.uploadArtifact(id, artifact));
    }

    if (uploaded.length > 0) {
      this.log.info({ workspaceId: id, taskId, count: uploaded.length }, "Collected output artifacts");
    }
    return uploaded;
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  /** Append an audit event. Failures are logged, never thrown. */
  async logEvent(id: string, input: EventInput): Promise<void> {
    try {
      await this.options.backend.logEvent(id, {
        workspace_id: id,
        task_id: input.taskId ?? null,
        event_type: input.type,
        event_category: input.category,
        message: input.message,
        level: input.level,
        details: input.details ?? {},
        source: "workspace-manager",
        created_at: this.now().toISOString(),
      });
    } catch (err) {
      this.handleBackgroundError(err, { workspaceId: id, eventType: input.type }, "Failed to log workspace event");
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async runSetup(id: string): Promise<Workspace> {
    try {
      const initialized = await this.setupDirectories(this.require(id));
      const ready = await this.cloneRepository(initialized);
      this.log.info({ workspaceId: id, path: ready.workspace_path }, "Workspace ready");
      return ready;
    } catch (err) {
      const message = errorMessage(err);
      this.log.error({ workspaceId: id, error: message }, "Workspace setup failed");

      if (isUnauthorized(err)) {
        this.options.onUnauthorized?.(err);
        return this.require(id);
      }

      try {
        return await this.transition(id, "failed", { error_message: message, current_phase: "failed" });
      } catch (reportErr) {
        this.handleBackgroundError(reportErr, { workspaceId: id }, "Failed to record workspace setup failure");
        return this.require(id);
      }
    }
  }

  /** Validated, serialized status change carrying extra sparse fields. */
  private transition(
    id: string,
    status: WorkspaceStatus,
    extra: WorkspaceUpdate,
    taskId: string | null = null,
  ): Promise<Workspace> {
    return this.serialize(id, async () => {
      const current = this.require(id);
      if (current.status === status) {
        return this.applyUpdate(current, extra);
      }
      if (!isValidTransition(current.status, status)) {
        throw invalidTransition(current, status);
      }

      const at = this.now().toISOString();
      const update: WorkspaceUpdate = { ...extra, status };
      if (status === "initializing") update.initialized_at = at;
      if (status === "ready") update.ready_at = at;
      if (status === "archived") update.archived_at = at;

      const updated = await this.applyUpdate(current, update);
      const from = current.status;

      if (status === "failed") {
        this.log.error({ workspaceId: id, from, error: updated.error_message }, "Workspace failed");
      } else {
        this.log.info({ workspaceId: id, from, to: status, progress: updated.progress_percentage }, "Workspace status changed");
      }

      if (status === "archived" && holdsCapacitySlot(from)) {
        await this.options.registry.releaseSlot();
      }

      await this.logEvent(id, {
        taskId,
        type: status === "failed" ? "workspace_failed" : "status_changed",
        category: status === "failed" ? "error" : "lifecycle",
        level: status === "failed" ? "error" : "info",
        message: `Workspace ${from} -> ${status}`,
        details: {
          from,
          to: status,
          progress: updated.progress_percentage,
          ...(updated.error_message && status === "failed" ? { error: updated.error_message } : {}),
        },
      });

      return updated;
    });
  }

  /**
   * Send the fields of `update` that differ from `current`, then mirror
   * them locally. Must run inside serialize().
   */
  private async applyUpdate(current: Workspace, update: WorkspaceUpdate): Promise<Workspace> {
    const changed = sparseDiff(current, update);
    if (Object.keys(changed).length === 0) return { ...current };

    const remote = await this.options.backend.updateWorkspace(current.id, changed);
    const next: Workspace = {
      ...current,
      ...changed,
      updated_at: remote.updated_at || this.now().toISOString(),
    };
    this.active.set(current.id, next);
    return { ...next };
  }

  private async recordUsage(
    id: string,
    taskId: string | null,
    metricType: MetricType,
    costUsd: number,
  ): Promise<Workspace> {
    const ws = this.require(id);
    const usage = await measureDirectory(ws.workspace_path);

    const updated = await this.serialize(id, async () =>
      this.applyUpdate(this.require(id), { disk_usage_bytes: usage.bytes, file_count: usage.files }),
    );

    await this.options.backend.recordMetrics(id, {
      task_id: taskId,
      executor_device_id: ws.executor_device_id,
      metric_type: metricType,
      disk_usage_mb: bytesToMb(usage.bytes),
      file_count: usage.files,
      cumulative_cost_usd: costUsd,
      recorded_at: this.now().toISOString(),
    });

    const deviceTotal = [...this.active.values()].reduce((sum, w) => sum + w.disk_usage_bytes, 0);
    await this.options.registry.reportDiskUsage(deviceTotal);
    return updated;
  }

  /** Run `fn` after every earlier operation on the same workspace settled. */
  private serialize<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(id) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    this.chains.set(
      id,
      run.catch(() => undefined),
    );
    return run;
  }

  private async runOrThrow(argv: string[], cwd: string | undefined, timeoutMs: number, code: string): Promise<void> {
    const result = await this.options.runner.run(argv, {
      cwd,
      timeoutMs,
      env: { GIT_TERMINAL_PROMPT: "0" },
    });
    if (result.timedOut || result.exitCode !== 0) {
      throw new SetupFailureError(describeFailure(argv, result), code, {
        argv,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
      });
    }
  }

  private rootPath(): string {
    return this.options.registry.device?.root_workspace_path || this.options.rootPath;
  }

  private require(id: string): Workspace {
    const ws = this.active.get(id);
    if (!ws) {
      throw new WorkspaceError(`Workspace not found: ${id}`, "WORKSPACE_NOT_FOUND", { workspaceId: id });
    }
    return { ...ws };
  }

  private handleBackgroundError(err: unknown, context: Record<string, unknown>, message: string): void {
    if (isUnauthorized(err)) {
      this.log.error({ ...context, error: err.message }, "Workspace request unauthorized");
      this.options.onUnauthorized?.(err);
      return;
    }
    this.log.warn({ ...context, error: errorMessage(err) }, message);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const WORKSPACE_UPDATE_KEYS = [
  "status",
  "progress_percentage",
  "current_phase",
  "error_message",
  "disk_usage_bytes",
  "file_count",
  "initialized_at",
  "ready_at",
  "archived_at",
] as const satisfies ReadonlyArray<keyof WorkspaceUpdate>;

function sparseDiff(current: Workspace, update: WorkspaceUpdate): WorkspaceUpdate {
  const changed: WorkspaceUpdate = {};
  for (const key of WORKSPACE_UPDATE_KEYS) {
    const value = update[key];
    if (value !== undefined && value !== current[key]) {
      Object.assign(changed, { [key]: value });
    }
  }
  return changed;
}

function invalidTransition(ws: Workspace, to: WorkspaceStatus): WorkspaceError {
  return new WorkspaceError(
    `Invalid workspace transition: ${ws.status} -> ${to}`,
    "WORKSPACE_INVALID_TRANSITION",
    { workspaceId: ws.id, from: ws.status, to },
  );
}
