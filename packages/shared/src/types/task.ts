/**
 * Task type definitions.
 *
 * A Task is created by the remote backend and observed by the engine.
 * The engine only ever mutates the status and result fields; everything
 * else is owned by the backend (including the retry budget).
 *
 * Lifecycle: pending -> accepted -> running -> completed | failed | cancelled | paused
 * "paused -> running" is the only re-entry. Failed tasks are never retried
 * by the engine itself.
 */

/** Local task states */
export type TaskStatus =
  | "pending"
  | "accepted"
  | "running"
  | "paused"
  | "completed"
  | "failed"
  | "cancelled";

export const TASK_STATUSES = [
  "pending",
  "accepted",
  "running",
  "paused",
  "completed",
  "failed",
  "cancelled",
] as const satisfies readonly TaskStatus[];

/**
 * The backend speaks a slightly different vocabulary for two states.
 * Local "running" is "in_progress" on the wire; "assigned" is read back
 * as "accepted".
 */
export type RemoteTaskStatus = Exclude<TaskStatus, "running"> | "in_progress";

export const REMOTE_STATUS_ALIASES: Readonly<Record<string, TaskStatus>> = {
  in_progress: "running",
  assigned: "accepted",
};

/** How far the provider is allowed to go */
export type TaskMode = "plan_only" | "dry_run" | "execute";

export const TASK_MODES = [
  "plan_only",
  "dry_run",
  "execute",
] as const satisfies readonly TaskMode[];

export type TaskPriority = "low" | "normal" | "high" | "urgent";

/** Policy constraints carried by a task. Enforced by policy, not by scheduling. */
export interface TaskGuardrails {
  /** Spend limit for one execution, in USD (null = uncapped) */
  cost_cap_usd: number | null;
  /** Wall-clock limit for one execution, in minutes (null = engine default) */
  time_cap_min: number | null;
  /** Backend holds the task until a human approves it */
  requires_human_approval: boolean;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

/** Structured result sent with the complete call */
export interface TaskResult {
  output_text: string;
  usage: TokenUsage;
  model: string;
  duration_seconds: number;
  cost_usd: number | null;
}

/** Optional per-task workspace request (used when workspaces are enabled) */
export interface TaskWorkspaceRequest {
  repo_url: string | null;
  branch: string | null;
  /** Relative path -> file content, written into the workspace's input/ */
  files: Record<string, string>;
}

export interface Task {
  id: string;
  description: string;
  objective: string | null;
  /** Flat key/value context handed to the provider */
  context: Record<string, unknown>;
  mode: TaskMode;
  guardrails: TaskGuardrails;
  priority: TaskPriority;
  status: TaskStatus;
  /** 0-100 */
  progress: number;
  retry_count: number;
  max_retries: number;
  estimated_cost_usd: number | null;
  actual_cost_usd: number | null;
  workspace: TaskWorkspaceRequest | null;
  result: TaskResult | null;
  error: string | null;
  logs: string[];
  created_at: string | null;
  accepted_at: string | null;
  completed_at: string | null;
  failed_at: string | null;
}
