/**
 * Capability provider contract and the prompt/pricing helpers shared by
 * the concrete providers.
 *
 * A provider takes a task description plus a flat context map and returns
 * a structured result, or throws ProviderExecutionError. Providers never
 * see the queue: reporting is the engine's job.
 */

import type { TaskMode, TokenUsage } from "@outpost/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExecutionRequest {
  taskId: string;
  description: string;
  /** Flattened task context (see flattenContext) */
  context: Record<string, string>;
  mode: TaskMode;
  /** Set when the task runs inside a workspace */
  workspacePath?: string;
  /** Aborted when the per-task timeout expires */
  signal?: AbortSignal;
}

export interface ExecutionResult {
  outputText: string;
  tokenUsage: TokenUsage;
  durationSeconds: number;
  model: string;
  /** null when the provider cannot price its usage */
  costUsd: number | null;
}

export interface CapabilityProvider {
  readonly name: string;
  execute(request: ExecutionRequest): Promise<ExecutionResult>;
  /** Cheap reachability check, run by TaskEngine.start() when testConnection is set */
  testConnection?(): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Context flattening
// ---------------------------------------------------------------------------

/**
 * Reduce arbitrary task context to string values, keeping key order.
 * null/undefined entries are dropped; objects and arrays become JSON.
 */
export function flattenContext(context: Record<string, unknown>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === null || value === undefined) continue;
    flat[key] = typeof value === "object" ? JSON.stringify(value) : String(value);
  }
  return flat;
}

// ---------------------------------------------------------------------------
// Prompt building
// ---------------------------------------------------------------------------

const MODE_INSTRUCTIONS: Record<TaskMode, string | null> = {
  execute: null,
  plan_only:
    "MODE: plan only. Produce a step-by-step plan for this task. Do not carry out any of the steps.",
  dry_run:
    "MODE: dry run. Describe exactly which actions you would take and what they would change, without performing them.",
};

/**
 * Render the task into the prompt sent to a provider:
 *
 *   TASK:
 *   <description>
 *
 *   MODE: ...            (plan_only / dry_run only)
 *
 *   ADDITIONAL CONTEXT:  (only when there is context)
 *   key: value
 */
export function buildTaskPrompt(
  description: string,
  context: Record<string, string>,
  mode: TaskMode,
): string {
  const lines = ["TASK:", description];

  const instruction = MODE_INSTRUCTIONS[mode];
  if (instruction) {
    lines.push("", instruction);
  }

  const entries = Object.entries(context);
  if (entries.length > 0) {
    lines.push("", "ADDITIONAL CONTEXT:");
    for (const [key, value] of entries) {
      lines.push(`${key}: ${value}`);
    }
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

/** USD per million tokens, matched by model family substring */
export const MODEL_PRICING: ReadonlyArray<{ family: string; inputPerMtok: number; outputPerMtok: number }> = [
  { family: "opus", inputPerMtok: 15.0, outputPerMtok: 75.0 },
  { family: "sonnet", inputPerMtok: 3.0, outputPerMtok: 15.0 },
  { family: "haiku", inputPerMtok: 0.8, outputPerMtok: 4.0 },
];

/**
 * Approximate USD cost of one call. Returns null for models outside the
 * pricing table.
 */
export function estimateCostUsd(model: string, usage: TokenUsage): number | null {
  const pricing = MODEL_PRICING.find((p) => model.includes(p.family));
  if (!pricing) return null;
  return (
    (usage.input_tokens * pricing.inputPerMtok + usage.output_tokens * pricing.outputPerMtok) /
    1_000_000
  );
}

/** Seconds elapsed since `startedAt` (a Date.now() value), two decimals */
export function elapsedSeconds(startedAt: number): number {
  return Math.round((Date.now() - startedAt) / 10) / 100;
}
