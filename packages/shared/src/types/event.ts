/**
 * Workspace event records.
 *
 * Events are the append-only audit trail of a workspace: every lifecycle
 * transition and every error is written as one. They are write-only from
 * the agent's point of view.
 */

export type EventCategory = "lifecycle" | "task" | "error" | "resource" | "system";

export type EventLevel = "debug" | "info" | "warning" | "error" | "critical";

export interface WorkspaceEvent {
  workspace_id: string;
  task_id: string | null;
  /** Machine-readable event type (e.g., "status_changed", "clone_failed") */
  event_type: string;
  event_category: EventCategory;
  message: string;
  level: EventLevel;
  details: Record<string, unknown>;
  /** Which part of the agent emitted it */
  source: string;
  created_at: string;
}
