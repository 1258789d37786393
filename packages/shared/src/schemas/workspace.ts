/**
 * Zod schemas for workspace records returned by the backend.
 */

import { z } from "zod";
import { WORKSPACE_STATUSES, type Workspace, type WorkspaceTaskAssignment } from "../types/workspace.js";
import { counter, idSchema, nullable } from "./helpers.js";

export const workspaceStatusSchema = z.enum(WORKSPACE_STATUSES);

export const workspaceSchema = z
  .object({
    id: idSchema,
    executor_device_id: idSchema,
    agent_id: z.string().default(""),
    workspace_path: z.string().min(1),
    workspace_name: z.string().default(""),
    repo_url: nullable(z.string()),
    repo_branch: z.string().default("main"),
    max_disk_usage_mb: z.number().nonnegative().default(10240),
    execution_timeout_minutes: z.number().positive().default(60),
    enable_network: z.boolean().default(true),
    enable_git: z.boolean().default(true),
    allowed_commands: nullable(z.array(z.string())),
    environment_vars: z.record(z.string()).default({}),
    status: workspaceStatusSchema,
    progress_percentage: z.number().min(0).max(100).default(0),
    current_phase: nullable(z.string()),
    error_message: nullable(z.string()),
    disk_usage_bytes: counter,
    file_count: counter,
    created_at: z.string().default(""),
    initialized_at: nullable(z.string()),
    ready_at: nullable(z.string()),
    archived_at: nullable(z.string()),
    updated_at: z.string().default(""),
  })
  .transform((workspace): Workspace => workspace);

export const workspaceAssignmentSchema = z
  .object({
    id: idSchema,
    workspace_id: idSchema,
    task_id: idSchema,
    status: z.string().default("assigned"),
    assigned_at: z.string().default(""),
    config: z.record(z.unknown()).default({}),
  })
  .transform((assignment): WorkspaceTaskAssignment => assignment);
