/**
 * Workspace type definitions.
 *
 * A Workspace is an isolated directory tree on the device, optionally
 * holding a git checkout, with its own execution limits. It belongs to
 * exactly one device and one agent.
 *
 * Lifecycle:
 *   creating -> initializing -> cloning? -> ready -> assigned -> running
 *     -> completed | failed | paused -> archived -> cleanup
 */

export type WorkspaceStatus =
  | "creating"
  | "initializing"
  | "cloning"
  | "ready"
  | "assigned"
  | "running"
  | "paused"
  | "completed"
  | "failed"
  | "archived"
  | "cleanup";

export const WORKSPACE_STATUSES = [
  "creating",
  "initializing",
  "cloning",
  "ready",
  "assigned",
  "running",
  "paused",
  "completed",
  "failed",
  "archived",
  "cleanup",
] as const satisfies readonly WorkspaceStatus[];

/** Workspace record as stored by the backend (`executor_workspaces`) */
export interface Workspace {
  id: string;
  /** Backend id of the owning device */
  executor_device_id: string;
  agent_id: string;
  workspace_path: string;
  workspace_name: string;
  repo_url: string | null;
  repo_branch: string;
  max_disk_usage_mb: number;
  execution_timeout_minutes: number;
  enable_network: boolean;
  enable_git: boolean;
  /** null = no allow-list */
  allowed_commands: string[] | null;
  environment_vars: Record<string, string>;
  status: WorkspaceStatus;
  /** 0-100; frozen at its last value once the workspace fails */
  progress_percentage: number;
  current_phase: string | null;
  error_message: string | null;
  disk_usage_bytes: number;
  file_count: number;
  created_at: string;
  initialized_at: string | null;
  ready_at: string | null;
  archived_at: string | null;
  updated_at: string;
}

/** Caller-side options for creating a workspace (all optional) */
export interface WorkspaceConfig {
  /** Absolute path; generated under the device root when omitted */
  workspacePath?: string;
  name?: string;
  repoUrl?: string | null;
  branch?: string;
  maxDiskUsageMb?: number;
  executionTimeoutMinutes?: number;
  enableNetwork?: boolean;
  enableGit?: boolean;
  allowedCommands?: string[] | null;
  environmentVars?: Record<string, string>;
}

/** Sparse workspace update: only the fields that changed are sent */
export type WorkspaceUpdate = Partial<
  Pick<
    Workspace,
    | "status"
    | "progress_percentage"
    | "current_phase"
    | "error_message"
    | "disk_usage_bytes"
    | "file_count"
    | "initialized_at"
    | "ready_at"
    | "archived_at"
  >
>;

/** Filters for listing workspaces */
export interface WorkspaceListFilters {
  executorDeviceId?: string;
  agentId?: string;
  status?: WorkspaceStatus;
  limit?: number;
  offset?: number;
}

/** Link between a workspace and the task it runs */
export interface WorkspaceTaskAssignment {
  id: string;
  workspace_id: string;
  task_id: string;
  status: string;
  assigned_at: string;
  config: Record<string, unknown>;
}
