/**
 * Contracts for the remote backend, as consumed by the core services.
 *
 * The core never talks HTTP itself: the CLI supplies an implementation
 * (OutpostApiClient) and tests supply in-memory fakes. Every method may
 * reject with UnauthorizedError on a 401, which callers must special-case,
 * or with a NetworkError for anything else.
 */

import type {
  Device,
  DeviceRegistration,
  DeviceUpdate,
  NewArtifact,
  Task,
  TaskResult,
  TaskStatus,
  Workspace,
  WorkspaceArtifact,
  WorkspaceEvent,
  WorkspaceListFilters,
  WorkspaceMetrics,
  WorkspaceTaskAssignment,
  WorkspaceUpdate,
} from "@outpost/shared";

/** Task queue endpoints */
export interface TaskQueueClient {
  /** Tasks eligible for this agent, in backend order */
  pollPendingTasks(agent: string): Promise<Task[]>;
  acceptTask(taskId: string, agent: string): Promise<void>;
  updateTaskStatus(taskId: string, status: TaskStatus, progress?: number): Promise<void>;
  completeTask(taskId: string, result: TaskResult): Promise<void>;
  failTask(taskId: string, errorMessage: string): Promise<void>;
  /** Cheap connectivity check; false when the backend is unreachable */
  healthCheck(): Promise<boolean>;
}

/** Body of a workspace create call */
export type NewWorkspace = Omit<
  Workspace,
  | "progress_percentage"
  | "current_phase"
  | "error_message"
  | "disk_usage_bytes"
  | "file_count"
  | "initialized_at"
  | "ready_at"
  | "archived_at"
  | "updated_at"
>;

/** Device and workspace CRUD, mirroring the backend's REST resources */
export interface ExecutorBackend {
  registerDevice(registration: DeviceRegistration): Promise<Device>;
  listDevices(): Promise<Device[]>;
  /** Sparse update: only the fields present are sent */
  updateDevice(deviceId: string, update: DeviceUpdate): Promise<Device>;
  heartbeat(deviceId: string): Promise<void>;

  createWorkspace(workspace: NewWorkspace): Promise<Workspace>;
  /** Sparse update: only the fields present are sent */
  updateWorkspace(workspaceId: string, update: WorkspaceUpdate): Promise<Workspace>;
  listWorkspaces(filters: WorkspaceListFilters): Promise<Workspace[]>;
  deleteWorkspace(workspaceId: string): Promise<void>;

  assignTask(
    workspaceId: string,
    taskId: string,
    config: Record<string, unknown>,
  ): Promise<WorkspaceTaskAssignment>;
  logEvent(workspaceId: string, event: WorkspaceEvent): Promise<void>;
  uploadArtifact(workspaceId: string, artifact: NewArtifact): Promise<WorkspaceArtifact>;
  recordMetrics(workspaceId: string, metrics: WorkspaceMetrics): Promise<void>;
}
