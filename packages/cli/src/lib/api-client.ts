/**
 * HTTP client for the task queue and executor backend.
 *
 * Implements both core contracts (TaskQueueClient and ExecutorBackend) over
 * one request helper, so the engine, the workspace manager and the device
 * registry share a single authenticated connection.
 *
 * Features:
 *   - Bearer token authentication from config
 *   - Per-request timeouts via AbortSignal.timeout
 *   - Error classification: 401 -> UnauthorizedError, other non-2xx ->
 *     ApiError, transport failures -> ApiConnectionError (both NetworkError)
 *   - Response envelopes ({ tasks }, { device }, ...) unwrapped and
 *     validated with the shared zod schemas
 *   - Local task status "running" sent as the wire status "in_progress"
 */

import type { Logger } from "pino";
import { z } from "zod";
import {
  NetworkError,
  UnauthorizedError,
  ValidationError,
  artifactSchema,
  deviceSchema,
  taskSchema,
  workspaceAssignmentSchema,
  workspaceSchema,
  type Device,
  type DeviceRegistration,
  type DeviceUpdate,
  type NewArtifact,
  type RemoteTaskStatus,
  type Task,
  type TaskResult,
  type TaskStatus,
  type Workspace,
  type WorkspaceArtifact,
  type WorkspaceEvent,
  type WorkspaceListFilters,
  type WorkspaceMetrics,
  type WorkspaceTaskAssignment,
  type WorkspaceUpdate,
} from "@outpost/shared";
import type { ExecutorBackend, NewWorkspace, TaskQueueClient } from "@outpost/core";
import type { OutpostConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Error Classes
// ---------------------------------------------------------------------------

/** Non-2xx, non-401 response. Keeps the status and the parsed body. */
export class ApiError extends NetworkError {
  readonly statusCode: number;
  readonly body?: unknown;

  constructor(message: string, statusCode: number, body?: unknown) {
    super(message, `NETWORK_HTTP_${statusCode}`, { statusCode });
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

/** Network-level failure: DNS resolution, connection refused, timeout. */
export class ApiConnectionError extends NetworkError {
  constructor(message: string, code: string = "NETWORK_UNREACHABLE", context: Record<string, unknown> = {}) {
    super(message, code, context);
    this.name = "ApiConnectionError";
  }
}

// ---------------------------------------------------------------------------
// Response envelopes
// ---------------------------------------------------------------------------

const tasksEnvelope = z.object({ tasks: z.array(z.unknown()).default([]) });
const deviceEnvelope = z.object({ device: deviceSchema });
const devicesEnvelope = z.object({ devices: z.array(deviceSchema).default([]) });
const workspaceEnvelope = z.object({ workspace: workspaceSchema });
const workspacesEnvelope = z.object({ workspaces: z.array(workspaceSchema).default([]) });
const assignmentEnvelope = z.object({ assignment: workspaceAssignmentSchema });
const artifactEnvelope = z.object({ artifact: artifactSchema });

function parseResponse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Unexpected response from ${what}`, "VALIDATION_RESPONSE", {
      endpoint: what,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

/** Local status -> wire vocabulary */
export function toRemoteStatus(status: TaskStatus): RemoteTaskStatus {
  return status === "running" ? "in_progress" : status;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ApiClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  /** Receives a warning for every task dropped by validation */
  logger?: Logger;
}

type Method = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export class OutpostApiClient implements TaskQueueClient, ExecutorBackend {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly log: Logger | undefined;

  constructor(opts: ApiClientOptions) {
    // Strip trailing slashes for clean path joining
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.timeout = opts.timeoutMs ?? 10_000;
    this.log = opts.logger?.child({ component: "api-client" });
  }

  static fromConfig(config: OutpostConfig, logger?: Logger): OutpostApiClient {
    return new OutpostApiClient({
      baseUrl: config.backend.url,
      apiKey: config.backend.api_key,
      timeoutMs: config.backend.timeout_ms,
      logger,
    });
  }

  // -------------------------------------------------------------------------
  // Core HTTP helper
  // -------------------------------------------------------------------------

  /**
   * Execute a request and return the decoded JSON body (undefined for an
   * empty body). The path is appended to the base URL, so a base URL with
   * a path prefix keeps it.
   */
  private async request(
    method: Method,
    path: string,
    options?: {
      query?: Record<string, string | undefined>;
      body?: unknown;
    },
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    if (options?.query) {
      for (const [key, value] of Object.entries(options.query)) {
        if (value !== undefined) {
          url.searchParams.set(key, value);
        }
      }
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: "application/json",
    };
    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.timeout),
    };
    if (options?.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      if (cause.name === "TimeoutError") {
        throw new ApiConnectionError(`${method} ${path} timed out after ${this.timeout}ms`, "NETWORK_TIMEOUT", {
          method,
          path,
          timeoutMs: this.timeout,
        });
      }
      throw new ApiConnectionError(`Failed to ${method} ${path}: ${cause.message}`, "NETWORK_UNREACHABLE", {
        method,
        path,
        cause: cause.message,
      });
    }

    const text = await response.text().catch(() => "");
    let body: unknown;
    try {
      body = text ? JSON.parse(text) : undefined;
    } catch {
      body = text;
    }

    if (response.status === 401) {
      throw new UnauthorizedError(`${method} ${path} was rejected: invalid API key`, { method, path });
    }

    if (!response.ok) {
      const message =
        typeof body === "object" && body !== null && "error" in body && typeof body.error === "string"
          ? body.error
          : `HTTP ${response.status}: ${response.statusText}`;
      throw new ApiError(message, response.status, body);
    }

    if (typeof body === "string") {
      throw new ApiError(`Failed to parse response from ${method} ${path} as JSON`, response.status, body);
    }
    return body;
  }

  // -------------------------------------------------------------------------
  // Task queue
  // -------------------------------------------------------------------------

  /** Pending tasks in backend order. Rows that fail validation are dropped with a warning. */
  async pollPendingTasks(agent: string): Promise<Task[]> {
    const res = parseResponse(
      tasksEnvelope,
      await this.request("GET", "/tasks/pending", { query: { agent } }),
      "GET /tasks/pending",
    );

    const tasks: Task[] = [];
    for (const row of res.tasks) {
      const parsed = taskSchema.safeParse(row);
      if (parsed.success) {
        tasks.push(parsed.data);
      } else {
        this.log?.warn(
          { issues: parsed.error.issues.map((issue) => issue.path.join(".")) },
          "Dropping invalid task from poll response",
        );
      }
    }
    return tasks;
  }

  async acceptTask(taskId: string, agent: string): Promise<void> {
    await this.request("POST", `/tasks/${encodeURIComponent(taskId)}/accept`, { body: { agent } });
  }

  async updateTaskStatus(taskId: string, status: TaskStatus, progress?: number): Promise<void> {
    const body: { status: RemoteTaskStatus; progress?: number } = { status: toRemoteStatus(status) };
    if (progress !== undefined) body.progress = progress;
    await this.request("PATCH", `/tasks/${encodeURIComponent(taskId)}/status`, { body });
  }

  async completeTask(taskId: string, result: TaskResult): Promise<void> {
    await this.request("POST", `/tasks/${encodeURIComponent(taskId)}/complete`, {
      body: { result, completed_at: new Date().toISOString() },
    });
  }

  async failTask(taskId: string, errorMessage: string): Promise<void> {
    await this.request("POST", `/tasks/${encodeURIComponent(taskId)}/fail`, {
      body: { error: errorMessage, failed_at: new Date().toISOString() },
    });
  }

  /** True on any 2xx. Never throws. */
  async healthCheck(): Promise<boolean> {
    try {
      await this.request("GET", "/health");
      return true;
    } catch {
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Devices
  // -------------------------------------------------------------------------

  async registerDevice(registration: DeviceRegistration): Promise<Device> {
    const res = parseResponse(
      deviceEnvelope,
      await this.request("POST", "/api/executor/devices", { body: registration }),
      "POST /api/executor/devices",
    );
    return res.device;
  }

  async listDevices(): Promise<Device[]> {
    const res = parseResponse(
      devicesEnvelope,
      await this.request("GET", "/api/executor/devices"),
      "GET /api/executor/devices",
    );
    return res.devices;
  }

  async updateDevice(deviceId: string, update: DeviceUpdate): Promise<Device> {
    const path = `/api/executor/devices/${encodeURIComponent(deviceId)}`;
    const res = parseResponse(deviceEnvelope, await this.request("PUT", path, { body: update }), `PUT ${path}`);
    return res.device;
  }

  async heartbeat(deviceId: string): Promise<void> {
    await this.request("POST", `/api/executor/devices/${encodeURIComponent(deviceId)}/heartbeat`);
  }

  // -------------------------------------------------------------------------
  // Workspaces
  // -------------------------------------------------------------------------

  async createWorkspace(workspace: NewWorkspace): Promise<Workspace> {
    const res = parseResponse(
      workspaceEnvelope,
      await this.request("POST", "/api/executor/workspaces", { body: workspace }),
      "POST /api/executor/workspaces",
    );
    return res.workspace;
  }

  async updateWorkspace(workspaceId: string, update: WorkspaceUpdate): Promise<Workspace> {
    const path = workspacePath(workspaceId);
    const res = parseResponse(workspaceEnvelope, await this.request("PUT", path, { body: update }), `PUT ${path}`);
    return res.workspace;
  }

  async listWorkspaces(filters: WorkspaceListFilters): Promise<Workspace[]> {
    const res = parseResponse(
      workspacesEnvelope,
      await this.request("GET", "/api/executor/workspaces", {
        query: {
          executor_device_id: filters.executorDeviceId,
          agent_id: filters.agentId,
          status: filters.status,
          limit: filters.limit !== undefined ? String(filters.limit) : undefined,
          offset: filters.offset !== undefined ? String(filters.offset) : undefined,
        },
      }),
      "GET /api/executor/workspaces",
    );
    return res.workspaces;
  }

  async deleteWorkspace(workspaceId: string): Promise<void> {
    await this.request("DELETE", workspacePath(workspaceId));
  }

  async assignTask(
    workspaceId: string,
    taskId: string,
    config: Record<string, unknown>,
  ): Promise<WorkspaceTaskAssignment> {
    const path = `${workspacePath(workspaceId)}/tasks`;
    const res = parseResponse(
      assignmentEnvelope,
      await this.request("POST", path, { body: { ...config, ai_task_id: taskId } }),
      `POST ${path}`,
    );
    return res.assignment;
  }

  async logEvent(workspaceId: string, event: WorkspaceEvent): Promise<void> {
    await this.request("POST", `${workspacePath(workspaceId)}/events`, { body: event });
  }

  async uploadArtifact(workspaceId: string, artifact: NewArtifact): Promise<WorkspaceArtifact> {
    const path = `${workspacePath(workspaceId)}/artifacts`;
    const res = parseResponse(artifactEnvelope, await this.request("POST", path, { body: artifact }), `POST ${path}`);
    return res.artifact;
  }

  async recordMetrics(workspaceId: string, metrics: WorkspaceMetrics): Promise<void> {
    await this.request("POST", `${workspacePath(workspaceId)}/metrics`, { body: metrics });
  }
}

function workspacePath(workspaceId: string): string {
  return `/api/executor/workspaces/${encodeURIComponent(workspaceId)}`;
}
