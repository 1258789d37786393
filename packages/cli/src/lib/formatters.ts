/**
 * Output formatting utilities for the outpost CLI.
 *
 * Terminal-friendly formatting for durations, costs, byte sizes, task and
 * workspace states, tables and errors. All color output uses picocolors.
 */

import pc from "picocolors";
import { OutpostError, type TaskStatus, type Workspace, type WorkspaceStatus } from "@outpost/shared";
import type { EngineStatistics } from "@outpost/core";
import { ApiConnectionError, ApiError } from "./api-client.js";

// ---------------------------------------------------------------------------
// ANSI Utilities
// ---------------------------------------------------------------------------

const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, "");
}

/** Visible width, ignoring ANSI codes */
function displayWidth(str: string): number {
  return stripAnsi(str).length;
}

// ---------------------------------------------------------------------------
// Durations, costs and sizes
// ---------------------------------------------------------------------------

/**
 * Largest sensible unit: "0s", "45s", "12m", "2h", "3d". "-" for
 * null/undefined/0.
 */
export function formatDuration(ms: number | null | undefined): string {
  if (ms === null || ms === undefined || ms === 0) return "-";
  if (ms < 1000) return "0s";

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m`;

  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h`;

  return `${Math.floor(hours / 24)}d`;
}

/** "-" for unknown, "<$0.01" under a cent, "$X.XX" otherwise */
export function formatCost(usd: number | null | undefined): string {
  if (usd === null || usd === undefined) return "-";
  if (usd === 0) return "$0.00";
  if (usd > 0 && usd < 0.01) return "<$0.01";
  return `$${usd.toFixed(2)}`;
}

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/** 512 -> "512 B", 1536 -> "1.5 KB", 10485760 -> "10 MB" */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const rounded = unit === 0 ? String(value) : String(parseFloat(value.toFixed(1)));
  return `${rounded} ${BYTE_UNITS[unit]}`;
}

/** 500 -> "500", 1500 -> "1.5K", 2000000 -> "2M" */
export function formatNumber(n: number): string {
  if (n < 1000) return String(n);
  if (n < 1_000_000) return `${parseFloat((n / 1000).toFixed(1))}K`;
  return `${parseFloat((n / 1_000_000).toFixed(1))}M`;
}

// ---------------------------------------------------------------------------
// Status formatting
// ---------------------------------------------------------------------------

type Colorizer = (s: string) => string;

const WORKSPACE_STATUS_COLORS: Record<WorkspaceStatus, Colorizer> = {
  creating: pc.dim,
  initializing: pc.dim,
  cloning: pc.cyan,
  ready: pc.green,
  assigned: pc.cyan,
  running: pc.yellow,
  paused: pc.yellow,
  completed: pc.green,
  failed: pc.red,
  archived: pc.dim,
  cleanup: pc.dim,
};

export function formatWorkspaceStatus(status: WorkspaceStatus): string {
  return WORKSPACE_STATUS_COLORS[status](status.toUpperCase());
}

const TASK_STATUS_STYLES: Record<TaskStatus, { icon: string; color: Colorizer }> = {
  pending: { icon: "○", color: pc.dim },
  accepted: { icon: "◐", color: pc.cyan },
  running: { icon: "●", color: pc.yellow },
  paused: { icon: "◑", color: pc.yellow },
  completed: { icon: "✓", color: pc.green },
  failed: { icon: "✗", color: pc.red },
  cancelled: { icon: "▪", color: pc.dim },
};

/** e.g. green("✓ completed") */
export function formatTaskStatus(status: TaskStatus): string {
  const style = TASK_STATUS_STYLES[status];
  return style.color(`${style.icon} ${status}`);
}

/** One line per task transition, as printed by `outpost run` */
export function formatTaskTransition(taskId: string, status: TaskStatus, description: string): string {
  return `${formatTaskStatus(status)}  ${pc.bold(taskId)}  ${truncate(description, 60)}`;
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/** ANSI-aware: measures visible width; the result is plain text when cut */
export function truncate(text: string, maxLen: number): string {
  if (displayWidth(text) <= maxLen) return text;
  if (maxLen <= 3) return "...".slice(0, maxLen);
  return stripAnsi(text).slice(0, maxLen - 3) + "...";
}

// ---------------------------------------------------------------------------
// Table Rendering
// ---------------------------------------------------------------------------

interface ColumnDef {
  header: string;
  minWidth?: number;
  align?: "left" | "right";
}

/**
 * Aligned, auto-sized table. Widths are ANSI-aware; columns are separated
 * by two spaces; trailing padding is trimmed.
 */
export function renderTable(opts: { columns: ColumnDef[]; rows: string[][] }): string {
  const { columns, rows } = opts;
  const gap = "  ";

  const widths = columns.map((col, i) =>
    Math.max(col.minWidth ?? 0, displayWidth(col.header), ...rows.map((row) => displayWidth(row[i] ?? ""))),
  );

  function formatCell(value: string, i: number): string {
    const padding = " ".repeat(widths[i] - displayWidth(value));
    return columns[i].align === "right" ? padding + value : value + padding;
  }

  const header = columns.map((col, i) => formatCell(pc.dim(col.header), i)).join(gap).trimEnd();
  const lines = rows.map((row) =>
    columns
      .map((_, i) => formatCell(row[i] ?? "", i))
      .join(gap)
      .trimEnd(),
  );
  return [header, ...lines].join("\n");
}

// ---------------------------------------------------------------------------
// Workspace and statistics views
// ---------------------------------------------------------------------------

/** [id, name, status, progress, repo, disk] */
export function formatWorkspaceRow(workspace: Workspace): string[] {
  return [
    workspace.id,
    workspace.workspace_name,
    formatWorkspaceStatus(workspace.status),
    `${workspace.progress_percentage}%`,
    workspace.repo_url ? `${workspace.repo_url}#${workspace.repo_branch}` : pc.dim("-"),
    formatBytes(workspace.disk_usage_bytes),
  ];
}

export function formatWorkspaceTable(workspaces: Workspace[]): string {
  if (workspaces.length === 0) return formatEmpty("workspaces");
  return renderTable({
    columns: [
      { header: "ID" },
      { header: "NAME" },
      { header: "STATUS" },
      { header: "PROGRESS", align: "right" },
      { header: "REPO" },
      { header: "DISK", align: "right" },
    ],
    rows: workspaces.map(formatWorkspaceRow),
  });
}

/** Multi-line workspace detail, printed after create */
export function formatWorkspaceDetail(workspace: Workspace): string {
  const lines = [
    `${pc.bold("Workspace")}  ${workspace.id}`,
    `  Status:   ${formatWorkspaceStatus(workspace.status)} (${workspace.progress_percentage}%)`,
    `  Path:     ${workspace.workspace_path}`,
  ];
  if (workspace.repo_url) lines.push(`  Repo:     ${workspace.repo_url} (${workspace.repo_branch})`);
  if (workspace.current_phase) lines.push(`  Phase:    ${workspace.current_phase}`);
  if (workspace.error_message) lines.push(`  Error:    ${pc.red(workspace.error_message)}`);
  return lines.join("\n");
}

/** Summary printed when `outpost run` stops */
export function formatStatistics(stats: EngineStatistics): string {
  const rate = `${Math.round(stats.successRate * 100)}%`;
  return [
    pc.bold("Session statistics"),
    `  Tasks:        ${stats.total} (${pc.green(String(stats.completed))} completed, ${pc.red(String(stats.failed))} failed)`,
    `  Success rate: ${rate}`,
    `  Tokens:       ${formatNumber(stats.tokens)}`,
    `  Cost:         ${formatCost(stats.costUsd)}`,
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Empty State and Error Formatting
// ---------------------------------------------------------------------------

export function formatEmpty(entity: string): string {
  return pc.dim(`No ${entity} found.`);
}

/** User-facing error line; codes shown for OutpostErrors */
export function formatError(error: unknown): string {
  if (error instanceof OutpostError && error.code === "AUTH_UNAUTHORIZED") {
    return pc.red("Authentication failed. Check your API key (outpost init --force).");
  }

  if (error instanceof ApiError) {
    if (error.statusCode === 404) {
      return pc.red(`Not found: ${error.message}`);
    }
    return pc.red(`API error (${error.statusCode}): ${error.message}`);
  }

  if (error instanceof ApiConnectionError) {
    return pc.red(`Connection failed: ${error.message}`);
  }

  if (error instanceof OutpostError) {
    return pc.red(`Error [${error.code}]: ${error.message}`);
  }

  if (error instanceof Error) {
    return pc.red(`Error: ${error.message}`);
  }

  return pc.red(`Error: ${String(error)}`);
}

/** JSON (2-space indent) or the formatted text, to stdout */
export function outputResult<T>(data: T, opts: { json?: boolean; format: (data: T) => string }): void {
  if (opts.json) {
    process.stdout.write(JSON.stringify(data, null, 2) + "\n");
  } else {
    process.stdout.write(opts.format(data) + "\n");
  }
}
