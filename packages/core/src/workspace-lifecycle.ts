/**
 * Workspace lifecycle state machine.
 *
 * Formalizes the states a workspace can be in and the allowed transitions
 * between them. The manager validates every status change against this
 * table before it reaches the backend.
 *
 * State diagram:
 *   creating -> initializing -> cloning -> ready -> assigned -> running
 *                    \                       |          |        |  ^
 *                     +----------------------+          |        v  |
 *                       (no repository: skip cloning)   |       paused
 *                                                       |
 *   running -> completed | failed | paused
 *   {completed | failed | paused | ready | assigned} -> archived -> cleanup
 *
 *   failed  is reachable from every state before archived
 *   cleanup -> (terminal)
 */

import type { WorkspaceStatus } from "@outpost/shared";

// ---------------------------------------------------------------------------
// Transition map
// ---------------------------------------------------------------------------

/**
 * Allowed transitions for each workspace status.
 *
 *   creating     -> [initializing, failed]
 *   initializing -> [cloning, ready, failed]     (ready: no repository to clone)
 *   cloning      -> [ready, failed]
 *   ready        -> [assigned, archived, failed] (archived: retired unused)
 *   assigned     -> [running, archived, failed]
 *   running      -> [paused, completed, failed]
 *   paused       -> [running, archived, failed]
 *   completed    -> [archived]
 *   failed       -> [archived]
 *   archived     -> [cleanup]
 *   cleanup      -> []                           (terminal)
 */
export const TRANSITIONS: Record<WorkspaceStatus, WorkspaceStatus[]> = {
  creating: ["initializing", "failed"],
  initializing: ["cloning", "ready", "failed"],
  cloning: ["ready", "failed"],
  ready: ["assigned", "archived", "failed"],
  assigned: ["running", "archived", "failed"],
  running: ["paused", "completed", "failed"],
  paused: ["running", "archived", "failed"],
  completed: ["archived"],
  failed: ["archived"],
  archived: ["cleanup"],
  cleanup: [],
};

/** Statuses in which the workspace still holds a device capacity slot */
const SLOT_HOLDING: ReadonlySet<WorkspaceStatus> = new Set<WorkspaceStatus>([
  "creating",
  "initializing",
  "cloning",
  "ready",
  "assigned",
  "running",
  "paused",
  "completed",
  "failed",
]);

/** Statuses reached only through a completed setup */
const SETUP_COMPLETE: ReadonlySet<WorkspaceStatus> = new Set<WorkspaceStatus>([
  "ready",
  "assigned",
  "running",
  "paused",
  "completed",
]);

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Check whether moving from `from` to `to` is a valid lifecycle move.
 * Re-entering the current status is not a transition.
 */
export function isValidTransition(from: WorkspaceStatus, to: WorkspaceStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** True while the workspace counts against max_concurrent_workspaces. */
export function holdsCapacitySlot(status: WorkspaceStatus): boolean {
  return SLOT_HOLDING.has(status);
}

/** True once setup finished successfully and the tree is usable. */
export function isSetupComplete(status: WorkspaceStatus): boolean {
  return SETUP_COMPLETE.has(status);
}

/** True once setup has settled one way or the other. */
export function isSetupSettled(status: WorkspaceStatus): boolean {
  return status !== "creating" && status !== "initializing" && status !== "cloning";
}
