/**
 * Zod schema for device records returned by the backend.
 */

import { z } from "zod";
import type { Device } from "../types/device.js";
import { counter, idSchema, nullable } from "./helpers.js";

export const deviceSchema = z
  .object({
    id: idSchema,
    device_id: z.string().min(1),
    device_name: z.string().default(""),
    platform: z.string().default(""),
    os_version: z.string().default(""),
    executor_version: z.string().default(""),
    root_workspace_path: z.string().default(""),
    max_concurrent_workspaces: z.number().int().nonnegative(),
    max_disk_usage_bytes: counter,
    current_workspaces_count: counter,
    current_disk_usage_bytes: counter,
    default_shell: z.string().default("/bin/bash"),
    default_timeout_minutes: z.number().positive().default(60),
    allow_network_access: z.boolean().default(true),
    status: z.enum(["active", "inactive", "maintenance", "disabled"]).default("active"),
    is_online: z.boolean().default(false),
    last_heartbeat_at: nullable(z.string()),
    created_at: z.string().default(""),
    updated_at: z.string().default(""),
  })
  .transform((device): Device => device);
