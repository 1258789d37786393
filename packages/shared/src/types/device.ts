/**
 * Device type definitions.
 *
 * A Device is the local machine running the agent. It is registered once
 * per machine (looked up by its hardware-derived device_id before being
 * created) and then heartbeats. The agent never deletes it.
 */

export type DeviceStatus = "active" | "inactive" | "maintenance" | "disabled";

/** Device record as returned by the backend (`executor_devices`) */
export interface Device {
  /** Backend-assigned primary key */
  id: string;
  /** Stable hardware-derived identifier: the idempotency key */
  device_id: string;
  device_name: string;
  /** "darwin", "linux", "win32" */
  platform: string;
  os_version: string;
  executor_version: string;
  root_workspace_path: string;
  max_concurrent_workspaces: number;
  max_disk_usage_bytes: number;
  current_workspaces_count: number;
  current_disk_usage_bytes: number;
  default_shell: string;
  default_timeout_minutes: number;
  allow_network_access: boolean;
  status: DeviceStatus;
  is_online: boolean;
  last_heartbeat_at: string | null;
  created_at: string;
  updated_at: string;
}

/** Body of the register call */
export interface DeviceRegistration {
  device_id: string;
  device_name: string;
  platform: string;
  os_version: string;
  executor_version: string;
  root_workspace_path: string;
  max_concurrent_workspaces: number;
  max_disk_usage_bytes: number;
  default_shell: string;
  default_timeout_minutes: number;
  allow_network_access: boolean;
}

/** Sparse device update: only the fields that changed are sent */
export type DeviceUpdate = Partial<
  Pick<
    Device,
    | "device_name"
    | "os_version"
    | "executor_version"
    | "root_workspace_path"
    | "max_concurrent_workspaces"
    | "max_disk_usage_bytes"
    | "current_workspaces_count"
    | "current_disk_usage_bytes"
    | "default_shell"
    | "default_timeout_minutes"
    | "allow_network_access"
    | "status"
  >
>;
