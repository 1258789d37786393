/**
 * Zod schema for tasks returned by the backend queue.
 *
 * Used by the API client to validate every task of a poll response before
 * it reaches the engine. Missing optional fields are filled with neutral
 * defaults; remote status spellings are mapped to local TaskStatus values.
 */

import { z } from "zod";
import {
  REMOTE_STATUS_ALIASES,
  TASK_MODES,
  TASK_STATUSES,
  type Task,
  type TaskGuardrails,
} from "../types/task.js";
import { counter, idSchema, nullable } from "./helpers.js";

/** "in_progress" -> "running", "assigned" -> "accepted", everything else as-is */
export const taskStatusSchema = z.preprocess(
  (value) =>
    typeof value === "string" ? (REMOTE_STATUS_ALIASES[value] ?? value) : value,
  z.enum(TASK_STATUSES),
);

const DEFAULT_GUARDRAILS: TaskGuardrails = {
  cost_cap_usd: null,
  time_cap_min: null,
  requires_human_approval: false,
};

export const guardrailsSchema = z
  .object({
    cost_cap_usd: nullable(z.number().nonnegative()),
    time_cap_min: nullable(z.number().positive()),
    requires_human_approval: z.boolean().default(false),
  })
  .nullish()
  .transform((value): TaskGuardrails => value ?? DEFAULT_GUARDRAILS);

export const tokenUsageSchema = z.object({
  input_tokens: counter,
  output_tokens: counter,
  total_tokens: counter,
});

export const taskResultSchema = z.object({
  output_text: z.string().default(""),
  usage: tokenUsageSchema,
  model: z.string().default(""),
  duration_seconds: counter,
  cost_usd: nullable(z.number()),
});

export const taskWorkspaceRequestSchema = z.object({
  repo_url: nullable(z.string().min(1)),
  branch: nullable(z.string().min(1)),
  files: z.record(z.string()).default({}),
});

export const taskSchema = z
  .object({
    id: idSchema,
    description: z.string().default(""),
    objective: nullable(z.string()),
    context: z
      .record(z.unknown())
      .nullish()
      .transform((value) => value ?? {}),
    mode: z.enum(TASK_MODES).default("execute"),
    guardrails: guardrailsSchema,
    priority: z.enum(["low", "normal", "high", "urgent"]).default("normal"),
    status: taskStatusSchema.default("pending"),
    progress: counter,
    retry_count: counter,
    max_retries: counter,
    estimated_cost_usd: nullable(z.number()),
    actual_cost_usd: nullable(z.number()),
    workspace: nullable(taskWorkspaceRequestSchema),
    // A malformed stale result must not make the whole task unreadable
    result: nullable(taskResultSchema).catch(null),
    error: nullable(z.string()),
    logs: z.array(z.string()).default([]),
    created_at: nullable(z.string()),
    accepted_at: nullable(z.string()),
    completed_at: nullable(z.string()),
    failed_at: nullable(z.string()),
  })
  .refine((task) => task.description.trim() !== "" || !!task.objective, {
    message: "task needs a description or an objective",
    path: ["description"],
  })
  .transform(
    (task): Task => ({
      ...task,
      description: task.description.trim() !== "" ? task.description : (task.objective ?? ""),
    }),
  );
