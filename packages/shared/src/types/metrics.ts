/**
 * Workspace resource metrics. Advisory only: nothing in the agent enforces
 * quotas from these numbers.
 */

export type MetricType = "snapshot" | "final";

export interface WorkspaceMetrics {
  task_id: string | null;
  executor_device_id: string;
  metric_type: MetricType;
  disk_usage_mb: number;
  file_count: number;
  cumulative_cost_usd: number;
  recorded_at: string;
}
