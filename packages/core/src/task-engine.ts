/**
 * Task execution engine: polls the remote queue, claims tasks up to the
 * concurrency bound, runs them through the capability provider and
 * reports the outcome.
 *
 * One poll cycle (driven by a Ticker, never overlapping):
 *   1. Retry undelivered outcome reports (reconciliation)
 *   2. Fetch pending tasks for this agent
 *   3. Claim them in backend order while |activeTasks| < maxConcurrentTasks;
 *      the rest wait for a later cycle
 *
 * Per task: accept -> "running" update -> execute -> complete | fail.
 * Each task runs as its own promise; the ticker never waits for it.
 *
 * A 401 from any backend call is a global sign-out: the ticker and the
 * heartbeat stop, "signed-out" is emitted and nothing is retried. Every
 * other failure is contained to the task (or the poll cycle) it hit.
 *
 * Events (EventEmitter is untyped at runtime):
 *   'task-status' -> (taskId: string, status: TaskStatus, task: Task) => void
 *   'signed-out'  -> (error: UnauthorizedError) => void
 *   'state'       -> (snapshot: EngineSnapshot) => void
 *   'log'         -> (entry: EngineLogEntry) => void
 */

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import {
  SetupFailureError,
  errorMessage,
  isUnauthorized,
  type Task,
  type TaskResult,
  type UnauthorizedError,
  type Workspace,
} from "@outpost/shared";
import type { TaskQueueClient } from "./backend.js";
import type { DeviceRegistry } from "./device-registry.js";
import { flattenContext, type CapabilityProvider, type ExecutionResult } from "./providers/capability-provider.js";
import { Ticker } from "./ticker.js";
import type { WorkspaceManager } from "./workspace-manager.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EngineStatus = "idle" | "running" | "paused" | "signed_out";

export interface EngineStatistics {
  total: number;
  completed: number;
  failed: number;
  tokens: number;
  costUsd: number;
  /** completed / total, 0 when nothing finished yet */
  successRate: number;
}

export interface EngineSnapshot {
  readonly status: EngineStatus;
  readonly agentName: string;
  readonly activeTaskIds: readonly string[];
  /** Most recent local task records, oldest first */
  readonly tasks: readonly Task[];
  readonly statistics: Readonly<EngineStatistics>;
  readonly lastSyncTime: string | null;
  readonly lastError: string | null;
}

export interface EngineLogEntry {
  level: "info" | "warn" | "error";
  message: string;
  taskId: string | null;
  at: string;
}

export interface WorkspaceExecutionOptions {
  manager: WorkspaceManager;
  archiveOnComplete: boolean;
  cleanupOnComplete: boolean;
}

export interface TaskEngineOptions {
  agentName: string;
  queue: TaskQueueClient;
  provider: CapabilityProvider;
  logger: Logger;
  pollIntervalMs: number;
  maxConcurrentTasks: number;
  /** Upper bound for one provider execution */
  taskTimeoutMs: number;
  /** Registered (and heartbeating) on start() when present */
  registry?: DeviceRegistry;
  /** Present = every task runs in its own workspace */
  workspaces?: WorkspaceExecutionOptions;
  /** Check the queue's health endpoint and the provider on start() */
  testConnection?: boolean;
  /** Delivery retries for an outcome report before it is dropped */
  maxReportRetries?: number;
  /** Local task records kept for snapshots */
  recentTaskLimit?: number;
}

type PendingReport =
  | { kind: "fail"; message: string; retries: number }
  | { kind: "complete"; result: TaskResult; retries: number };

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_MAX_REPORT_RETRIES = 3;
const DEFAULT_RECENT_TASK_LIMIT = 50;

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class TaskEngine extends EventEmitter {
  private status: EngineStatus = "idle";
  private ticker: Ticker | null = null;
  private readonly activeTasks = new Set<string>();
  private readonly inFlight = new Map<string, Promise<void>>();
  /** Claimed tasks whose workspace is not created yet; they count against free slots */
  private readonly slotHolds = new Set<string>();
  private readonly tasks = new Map<string, Task>();
  private readonly pendingReports = new Map<string, PendingReport>();
  private readonly stats: EngineStatistics = {
    total: 0,
    completed: 0,
    failed: 0,
    tokens: 0,
    costUsd: 0,
    successRate: 0,
  };
  private lastSyncTime: Date | null = null;
  private lastError: string | null = null;
  private readonly log: Logger;

  constructor(private readonly options: TaskEngineOptions) {
    super();
    this.log = options.logger.child({ component: "task-engine", agent: options.agentName });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Check the backend (optional), make sure the device is registered and
   * start polling. The first poll runs immediately.
   */
  async start(): Promise<void> {
    if (!(await this.prepare()) || this.isSignedOut()) return;

    this.ticker = new Ticker(() => this.poll(), {
      name: "poll",
      intervalMs: this.options.pollIntervalMs,
      immediate: true,
      logger: this.options.logger,
    });
    this.ticker.start();
    this.log.info(
      { provider: this.options.provider.name, maxConcurrentTasks: this.options.maxConcurrentTasks },
      "Engine started",
    );
  }

  /** Same preparation as start(), one poll cycle, then drain and stop. */
  async runOnce(): Promise<void> {
    if (!(await this.prepare()) || this.isSignedOut()) return;

    this.log.info({ provider: this.options.provider.name }, "Running a single poll cycle");
    await this.poll();
    await this.drain();
    await this.stop();
  }

  /** Stop polling and heartbeating. In-flight tasks keep running; see drain(). */
  async stop(): Promise<void> {
    this.ticker?.stop();
    this.ticker = null;
    await this.options.registry?.stop();
    if (this.status === "running" || this.status === "paused") {
      this.setStatus("idle");
      this.log.info({ inFlight: this.inFlight.size }, "Engine stopped");
    }
  }

  /** Resolves once every in-flight task has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  /** Stop claiming new tasks; reconciliation keeps running. */
  pause(): void {
    if (this.status !== "running") return;
    this.setStatus("paused");
    this.log.info("Engine paused");
  }

  resume(): void {
    if (this.status !== "paused") return;
    this.setStatus("running");
    this.log.info("Engine resumed");
  }

  // -------------------------------------------------------------------------
  // Poll and claim
  // -------------------------------------------------------------------------

  /** One poll cycle. No-op unless the engine is running (or paused). */
  async poll(): Promise<void> {
    if (this.status !== "running" && this.status !== "paused") return;

    await this.reconcile();
    if (this.status !== "running") return;

    let pending: Task[];
    try {
      pending = await this.options.queue.pollPendingTasks(this.options.agentName);
    } catch (err) {
      if (isUnauthorized(err)) {
        this.signOut(err);
        return;
      }
      this.lastError = errorMessage(err);
      this.log.warn({ error: this.lastError }, "Poll failed, retrying next cycle");
      this.emitState();
      return;
    }

    this.lastSyncTime = new Date();
    let waiting = 0;
    for (const task of pending) {
      if (this.status !== "running") break;
      if (this.activeTasks.size >= this.options.maxConcurrentTasks) {
        waiting++;
        continue;
      }
      this.claim(task);
    }

    if (waiting > 0) {
      this.log.debug({ waiting, active: this.activeTasks.size }, "At concurrency limit, leaving tasks for next cycle");
    }
    this.emitState();
  }

  /**
   * Take ownership of `task` and start running it. Returns false (and
   * leaves the task for a later cycle) when the engine is not running,
   * the concurrency bound is reached, the task is already in flight or no
   * workspace slot is free.
   */
  claim(task: Task): boolean {
    if (this.status !== "running") return false;
    if (this.activeTasks.has(task.id)) {
      this.log.debug({ taskId: task.id }, "Task already in flight, skipping");
      return false;
    }
    if (this.activeTasks.size >= this.options.maxConcurrentTasks) return false;

    if (this.options.workspaces && this.options.registry) {
      const free = this.options.registry.availableSlots() - this.slotHolds.size;
      if (free <= 0) {
        this.log.debug({ taskId: task.id }, "No free workspace slot, leaving task for next cycle");
        return false;
      }
      this.slotHolds.add(task.id);
    }

    this.activeTasks.add(task.id);
    const run = this.runTask(task);
    this.inFlight.set(task.id, run);
    this.emitState();
    return true;
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  /**
   * Run a claimed task through the provider and report the outcome. Never
   * rejects: provider and setup failures become a fail report.
   */
  async execute(task: Task): Promise<void> {
    const log = this.log.child({ taskId: task.id });
    let workspace: Workspace | null = null;
    let result: ExecutionResult;

    try {
      if (this.options.workspaces) {
        workspace = await this.createTaskWorkspace(task, this.options.workspaces);
        workspace = await this.startInWorkspace(task, workspace, this.options.workspaces);
      }

      const timeoutMs = this.timeoutFor(task);
      result = await this.options.provider.execute({
        taskId: task.id,
        description: task.description,
        context: flattenContext(task.context),
        mode: task.mode,
        workspacePath: workspace?.workspace_path,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      if (isUnauthorized(err)) {
        this.signOut(err);
        return;
      }
      const message = errorMessage(err);
      log.error({ error: message }, "Task execution failed");
      await this.reportFailure(task.id, message);
      if (workspace) await this.finishWorkspace(task.id, workspace, "failed", 0, message);
      return;
    }

    const costCap = task.guardrails.cost_cap_usd;
    if (costCap !== null && result.costUsd !== null && result.costUsd > costCap) {
      const note = `cost_cap_exceeded: $${result.costUsd.toFixed(4)} > $${costCap.toFixed(4)}`;
      log.warn({ costUsd: result.costUsd, costCapUsd: costCap }, "Task exceeded its cost cap");
      this.appendTaskLog(task.id, note);
      this.emitLog("warn", `Task ${task.id} exceeded its cost cap`, task.id);
    }

    const taskResult: TaskResult = {
      output_text: result.outputText,
      usage: result.tokenUsage,
      model: result.model,
      duration_seconds: result.durationSeconds,
      cost_usd: result.costUsd,
    };

    try {
      await this.options.queue.completeTask(task.id, taskResult);
    } catch (err) {
      if (isUnauthorized(err)) {
        // The outcome was never delivered; the task stays running locally.
        this.signOut(err);
        return;
      }
      this.lastError = errorMessage(err);
      log.error({ error: this.lastError }, "Failed to report completion, queued for retry");
      this.pendingReports.set(task.id, { kind: "complete", result: taskResult, retries: 0 });
    }

    this.stats.total++;
    this.stats.completed++;
    this.stats.tokens += result.tokenUsage.total_tokens;
    this.stats.costUsd += result.costUsd ?? 0;
    this.updateTask(task.id, { status: "completed", progress: 100, result: taskResult, completed_at: new Date().toISOString() });
    log.info({ durationSeconds: result.durationSeconds, tokens: result.tokenUsage.total_tokens }, "Task completed");
    this.emitLog("info", `Task ${task.id} completed`, task.id);

    if (workspace) await this.finishWorkspace(task.id, workspace, "completed", result.costUsd ?? 0);
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  snapshot(): EngineSnapshot {
    const statistics = Object.freeze({
      ...this.stats,
      successRate: this.stats.total > 0 ? this.stats.completed / this.stats.total : 0,
    });
    return Object.freeze({
      status: this.status,
      agentName: this.options.agentName,
      activeTaskIds: Object.freeze([...this.activeTasks]),
      tasks: Object.freeze([...this.tasks.values()].map((t) => ({ ...t, logs: [...t.logs] }))),
      statistics,
      lastSyncTime: this.lastSyncTime?.toISOString() ?? null,
      lastError: this.lastError,
    });
  }

  /** Receive a snapshot after every state change. Returns an unsubscribe function. */
  subscribe(listener: (snapshot: EngineSnapshot) => void): () => void {
    this.on("state", listener);
    return () => {
      this.off("state", listener);
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Health check, registration and workspace adoption. Ends in "running",
   * or returns false when the engine is already active or signed out.
   */
  private async prepare(): Promise<boolean> {
    if (this.status === "running" || this.status === "paused") return false;
    if (this.status === "signed_out") {
      this.log.warn("Engine was signed out; re-run init with a valid API key");
      return false;
    }

    if (this.options.testConnection) {
      const healthy = await this.options.queue.healthCheck().catch(() => false);
      if (!healthy) {
        this.log.warn("Backend health check failed, polling anyway");
      }

      const { provider } = this.options;
      if (provider.testConnection) {
        const reachable = await provider.testConnection().catch(() => false);
        if (!reachable) {
          this.log.warn({ provider: provider.name }, "Provider connection test failed, polling anyway");
          this.emitLog("warn", `Provider ${provider.name} did not answer its connection test`, null);
        }
      }
    }

    if (this.options.registry) {
      try {
        await this.options.registry.start();
      } catch (err) {
        if (isUnauthorized(err)) {
          this.signOut(err);
          return false;
        }
        this.lastError = errorMessage(err);
        this.log.warn({ error: this.lastError }, "Device registration failed, retrying on next start");
      }
    }

    if (this.options.workspaces) {
      try {
        await this.options.workspaces.manager.refreshActiveWorkspaces();
      } catch (err) {
        if (isUnauthorized(err)) {
          this.signOut(err);
          return false;
        }
        this.log.warn({ error: errorMessage(err) }, "Failed to load active workspaces");
      }
    }

    // A heartbeat 401 can land while the steps above are awaited
    if (this.isSignedOut()) return false;

    this.setStatus("running");
    return true;
  }

  private isSignedOut(): boolean {
    return this.status === "signed_out";
  }

  private async runTask(task: Task): Promise<void> {
    const log = this.log.child({ taskId: task.id });
    this.recordTask(task);

    try {
      try {
        await this.options.queue.acceptTask(task.id, this.options.agentName);
        this.updateTask(task.id, { status: "accepted", accepted_at: new Date().toISOString() });
        log.info("Task accepted");

        await this.options.queue.updateTaskStatus(task.id, "running", 0);
        this.updateTask(task.id, { status: "running", progress: 0 });
      } catch (err) {
        if (isUnauthorized(err)) {
          this.signOut(err);
          return;
        }
        this.lastError = errorMessage(err);
        log.warn({ error: this.lastError }, "Failed to claim task");

        if (this.tasks.get(task.id)?.status === "accepted") {
          await this.reportFailure(task.id, this.lastError);
        } else {
          this.tasks.delete(task.id);
        }
        return;
      }

      await this.execute(task);
    } finally {
      this.activeTasks.delete(task.id);
      this.slotHolds.delete(task.id);
      this.inFlight.delete(task.id);
      this.emitState();
    }
  }

  /** Create the task's workspace; the engine's slot hold ends here either way. */
  private async createTaskWorkspace(task: Task, ws: WorkspaceExecutionOptions): Promise<Workspace> {
    try {
      return await ws.manager.createWorkspace(this.options.agentName, {
        repoUrl: task.workspace?.repo_url ?? null,
        branch: task.workspace?.branch ?? undefined,
      });
    } finally {
      this.slotHolds.delete(task.id);
    }
  }

  /**
   * Wait for setup, write the input files and hand the workspace the task.
   * A throw here leaves the created workspace for finishWorkspace().
   */
  private async startInWorkspace(task: Task, created: Workspace, ws: WorkspaceExecutionOptions): Promise<Workspace> {
    const ready = await ws.manager.waitForSetup(created.id);
    if (ready.status !== "ready") {
      throw new SetupFailureError(ready.error_message ?? "Workspace setup failed", "SETUP_FAILED", {
        workspaceId: created.id,
      });
    }

    const files = task.workspace?.files ?? {};
    if (Object.keys(files).length > 0) {
      await ws.manager.writeInputFiles(created.id, files);
    }
    await ws.manager.assignTask(created.id, task.id, { mode: task.mode, priority: task.priority });
    return ws.manager.updateStatus(created.id, "running");
  }

  /** Outputs, final status, metrics, then archive/cleanup. Never changes the task outcome. */
  private async finishWorkspace(
    taskId: string,
    workspace: Workspace,
    outcome: "completed" | "failed",
    costUsd: number,
    error?: string,
  ): Promise<void> {
    const ws = this.options.workspaces;
    if (!ws) return;
    const id = workspace.id;

    await this.teardownStep(taskId, id, "collect outputs", () => ws.manager.collectOutputs(id, taskId));
    // A failed setup already left the workspace in "failed"
    if (ws.manager.get(id)?.status !== outcome) {
      await this.teardownStep(taskId, id, "set final status", () => ws.manager.updateStatus(id, outcome, error));
    }
    await this.teardownStep(taskId, id, "record metrics", () => ws.manager.recordFinalMetrics(id, taskId, costUsd));
    if (ws.archiveOnComplete) {
      await this.teardownStep(taskId, id, "archive", () => ws.manager.archiveWorkspace(id, taskId));
    }
    if (ws.cleanupOnComplete) {
      await this.teardownStep(taskId, id, "cleanup", () => ws.manager.cleanupWorkspace(id));
    }
  }

  private async teardownStep(taskId: string, workspaceId: string, step: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      if (isUnauthorized(err)) {
        this.signOut(err);
        return;
      }
      this.log.error({ taskId, workspaceId, step, error: errorMessage(err) }, "Workspace teardown step failed");
    }
  }

  /** One fail report; a non-auth delivery failure is queued for reconciliation. */
  private async reportFailure(taskId: string, message: string): Promise<void> {
    try {
      await this.options.queue.failTask(taskId, message);
    } catch (err) {
      if (isUnauthorized(err)) {
        this.signOut(err);
      } else {
        this.lastError = errorMessage(err);
        this.log.error({ taskId, error: this.lastError }, "Failed to report task failure, queued for retry");
        this.pendingReports.set(taskId, { kind: "fail", message, retries: 0 });
      }
    }

    this.stats.total++;
    this.stats.failed++;
    this.updateTask(taskId, { status: "failed", error: message, failed_at: new Date().toISOString() });
    this.emitLog("error", `Task ${taskId} failed: ${message}`, taskId);
  }

  /** Redeliver outcome reports that failed earlier, before any new claim. */
  private async reconcile(): Promise<void> {
    const max = this.options.maxReportRetries ?? DEFAULT_MAX_REPORT_RETRIES;

    for (const [taskId, report] of [...this.pendingReports]) {
      try {
        if (report.kind === "fail") {
          await this.options.queue.failTask(taskId, report.message);
        } else {
          await this.options.queue.completeTask(taskId, report.result);
        }
        this.pendingReports.delete(taskId);
        this.log.info({ taskId, kind: report.kind }, "Delivered pending task report");
      } catch (err) {
        if (isUnauthorized(err)) {
          this.signOut(err);
          return;
        }
        const retries = report.retries + 1;
        if (retries >= max) {
          this.pendingReports.delete(taskId);
          this.log.error({ taskId, kind: report.kind, retries, error: errorMessage(err) }, "Dropping undeliverable task report");
        } else {
          this.pendingReports.set(taskId, { ...report, retries });
          this.log.warn({ taskId, kind: report.kind, retries, error: errorMessage(err) }, "Task report still undeliverable");
        }
      }
    }
  }

  /**
   * Global sign-out. Also the target of the registry's and the workspace
   * manager's onUnauthorized callbacks, whose 401s happen off the poll path.
   */
  signOut(err: UnauthorizedError): void {
    if (this.status === "signed_out") return;

    this.lastError = err.message;
    this.log.error({ error: err.message }, "Backend rejected the API key, signing out");
    this.ticker?.stop();
    this.ticker = null;
    this.options.registry?.stop().catch((stopErr: unknown) => {
      this.log.warn({ error: errorMessage(stopErr) }, "Failed to stop heartbeat");
    });

    this.setStatus("signed_out");
    this.emit("signed-out", err);
    this.emitLog("error", "Signed out: the backend rejected the API key", null);
  }

  private timeoutFor(task: Task): number {
    const cap = task.guardrails.time_cap_min;
    if (cap === null || cap <= 0) return this.options.taskTimeoutMs;
    return Math.min(this.options.taskTimeoutMs, cap * 60_000);
  }

  private recordTask(task: Task): void {
    this.tasks.set(task.id, { ...task, logs: [...task.logs] });
    const limit = this.options.recentTaskLimit ?? DEFAULT_RECENT_TASK_LIMIT;
    for (const id of this.tasks.keys()) {
      if (this.tasks.size <= limit) break;
      if (!this.activeTasks.has(id)) this.tasks.delete(id);
    }
  }

  private updateTask(taskId: string, patch: Partial<Task>): void {
    const current = this.tasks.get(taskId);
    if (!current) return;
    const next = { ...current, ...patch };
    this.tasks.set(taskId, next);
    if (patch.status && patch.status !== current.status) {
      this.emit("task-status", taskId, patch.status, { ...next });
    }
    this.emitState();
  }

  private appendTaskLog(taskId: string, line: string): void {
    const current = this.tasks.get(taskId);
    if (current) this.tasks.set(taskId, { ...current, logs: [...current.logs, line] });
  }

  private setStatus(status: EngineStatus): void {
    this.status = status;
    this.emitState();
  }

  private emitState(): void {
    this.emit("state", this.snapshot());
  }

  private emitLog(level: EngineLogEntry["level"], message: string, taskId: string | null): void {
    const entry: EngineLogEntry = { level, message, taskId, at: new Date().toISOString() };
    this.emit("log", entry);
  }
}
