/**
 * Device registry: this machine's identity and capacity on the backend.
 *
 * ensureRegistered() is single-flight. Concurrent callers share one
 * in-flight lookup-or-register, so a machine never ends up with two device
 * records. The lookup matches on the hardware-derived device_id; only when
 * nothing matches is a new device registered with default capacity.
 *
 * Once a device is known the registry owns the heartbeat ticker. Heartbeat
 * failures are logged and retried on the next tick; only a 401 escapes,
 * through the onUnauthorized callback. After stop() the heartbeat stays
 * off until start(), even when later calls still resolve the device.
 *
 * The registry is also the single writer of current_workspaces_count:
 * slots are reserved synchronously (so two concurrent workspace creations
 * can never both take the last slot) and the new count is pushed to the
 * backend in call order.
 */

import type { Logger } from "pino";
import {
  errorMessage,
  isUnauthorized,
  type Device,
  type DeviceRegistration,
  type DeviceUpdate,
  type UnauthorizedError,
} from "@outpost/shared";
import type { ExecutorBackend } from "./backend.js";
import { Ticker } from "./ticker.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DeviceIdentity {
  /** Stable hardware-derived id (see resolveHardwareId) */
  hardwareId: string;
  name: string;
  platform: string;
  osVersion: string;
  executorVersion: string;
  rootWorkspacePath: string;
}

export interface DeviceDefaults {
  maxConcurrentWorkspaces: number;
  maxDiskUsageBytes: number;
  defaultShell: string;
  defaultTimeoutMinutes: number;
  allowNetworkAccess: boolean;
}

export interface DeviceRegistryOptions {
  backend: ExecutorBackend;
  identity: DeviceIdentity;
  /** Capacity used only when a new device record is created */
  defaults?: Partial<DeviceDefaults>;
  heartbeatIntervalMs?: number;
  logger: Logger;
  onUnauthorized?: (err: UnauthorizedError) => void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const HEARTBEAT_INTERVAL_MS = 30_000;

const GB = 1024 * 1024 * 1024;

export function defaultDeviceSettings(platform: string): DeviceDefaults {
  return {
    maxConcurrentWorkspaces: 5,
    maxDiskUsageBytes: 100 * GB,
    defaultShell: platform === "darwin" ? "/bin/zsh" : "/bin/bash",
    defaultTimeoutMinutes: 60,
    allowNetworkAccess: true,
  };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class DeviceRegistry {
  private current: Device | null = null;
  private registering: Promise<Device> | null = null;
  private heartbeatTicker: Ticker | null = null;
  private stopped = false;
  private countSync: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(private readonly options: DeviceRegistryOptions) {
    this.log = options.logger.child({ component: "device-registry" });
  }

  /** The adopted or registered device, or null before ensureRegistered() */
  get device(): Device | null {
    return this.current ? { ...this.current } : null;
  }

  get heartbeatRunning(): boolean {
    return this.heartbeatTicker !== null;
  }

  /**
   * Adopt the existing device record for this machine or register a new
   * one, then start heartbeating. Safe to call concurrently and repeatedly.
   */
  ensureRegistered(): Promise<Device> {
    if (this.current) {
      if (!this.stopped) this.startHeartbeat(this.current.id);
      return Promise.resolve({ ...this.current });
    }

    if (!this.registering) {
      this.registering = this.lookupOrRegister()
        .then((device) => {
          this.current = device;
          if (!this.stopped) this.startHeartbeat(device.id);
          return { ...device };
        })
        .finally(() => {
          this.registering = null;
        });
    }
    return this.registering;
  }

  /** Free workspace slots; 0 before registration */
  availableSlots(): number {
    if (!this.current) return 0;
    return Math.max(
      0,
      this.current.max_concurrent_workspaces - this.current.current_workspaces_count,
    );
  }

  /**
   * Take one slot. The local count changes before this returns its
   * promise; the backend push happens afterwards and is best-effort.
   */
  reserveSlot(): Promise<void> {
    return this.adjustWorkspaceCount(1);
  }

  /** Give one slot back (never below zero). */
  releaseSlot(): Promise<void> {
    return this.adjustWorkspaceCount(-1);
  }

  /** Replace the count wholesale, e.g. after listing workspaces on startup. */
  setWorkspaceCount(count: number): Promise<void> {
    const device = this.current;
    if (!device || device.current_workspaces_count === count) return Promise.resolve();
    this.current = { ...device, current_workspaces_count: Math.max(0, count) };
    return this.queueCountPush();
  }

  /** Advisory disk counter; errors are logged, never thrown. */
  async reportDiskUsage(bytes: number): Promise<void> {
    const device = this.current;
    if (!device) return;
    this.current = { ...device, current_disk_usage_bytes: bytes };
    try {
      await this.options.backend.updateDevice(device.id, { current_disk_usage_bytes: bytes });
    } catch (err) {
      this.handleBackgroundError(err, "Failed to report disk usage");
    }
  }

  /**
   * Sparse configuration update: only fields that differ from the current
   * record are sent. Returns the updated device.
   */
  async updateConfiguration(update: DeviceUpdate): Promise<Device> {
    const device = await this.ensureRegistered();
    const changed = sparseDiff(device, update);
    if (Object.keys(changed).length === 0) return device;

    const updated = await this.options.backend.updateDevice(device.id, changed);
    // The local count stays authoritative; a concurrent reservation must not be lost.
    this.current = {
      ...updated,
      current_workspaces_count: this.current?.current_workspaces_count ?? updated.current_workspaces_count,
    };
    this.log.info({ deviceId: device.id, fields: Object.keys(changed) }, "Device configuration updated");
    return { ...this.current };
  }

  /** Clear an earlier stop(), then register and heartbeat as usual. */
  start(): Promise<Device> {
    this.stopped = false;
    return this.ensureRegistered();
  }

  /**
   * Stop heartbeating until the next start(). Waits for an in-flight
   * heartbeat to settle.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    const ticker = this.heartbeatTicker;
    this.heartbeatTicker = null;
    if (!ticker) return;
    ticker.stop();
    await ticker.idle();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async lookupOrRegister(): Promise<Device> {
    const { backend, identity } = this.options;

    const devices = await backend.listDevices();
    const existing = devices.find((d) => d.device_id === identity.hardwareId);

    if (existing) {
      const changed = sparseDiff(existing, {
        device_name: identity.name,
        os_version: identity.osVersion,
        executor_version: identity.executorVersion,
      });
      if (Object.keys(changed).length === 0) {
        this.log.info({ deviceId: existing.id }, "Adopted existing device");
        return existing;
      }
      const refreshed = await backend.updateDevice(existing.id, changed);
      this.log.info(
        { deviceId: existing.id, fields: Object.keys(changed) },
        "Adopted existing device and refreshed its identity",
      );
      return refreshed;
    }

    const defaults = { ...defaultDeviceSettings(identity.platform), ...this.options.defaults };
    const registration: DeviceRegistration = {
      device_id: identity.hardwareId,
      device_name: identity.name,
      platform: identity.platform,
      os_version: identity.osVersion,
      executor_version: identity.executorVersion,
      root_workspace_path: identity.rootWorkspacePath,
      max_concurrent_workspaces: defaults.maxConcurrentWorkspaces,
      max_disk_usage_bytes: defaults.maxDiskUsageBytes,
      default_shell: defaults.defaultShell,
      default_timeout_minutes: defaults.defaultTimeoutMinutes,
      allow_network_access: defaults.allowNetworkAccess,
    };

    const device = await backend.registerDevice(registration);
    this.log.info({ deviceId: device.id, hardwareId: identity.hardwareId }, "Registered new device");
    return device;
  }

  private startHeartbeat(deviceId: string): void {
    if (this.heartbeatTicker) return;

    this.heartbeatTicker = new Ticker(
      async () => {
        try {
          await this.options.backend.heartbeat(deviceId);
          if (this.current) {
            this.current = {
              ...this.current,
              is_online: true,
              last_heartbeat_at: new Date().toISOString(),
            };
          }
        } catch (err) {
          this.handleBackgroundError(err, "Heartbeat failed, retrying next tick");
        }
      },
      {
        name: "heartbeat",
        intervalMs: this.options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS,
        immediate: true,
        logger: this.options.logger,
      },
    );
    this.heartbeatTicker.start();
  }

  private adjustWorkspaceCount(delta: number): Promise<void> {
    const device = this.current;
    if (!device) return Promise.resolve();
    this.current = {
      ...device,
      current_workspaces_count: Math.max(0, device.current_workspaces_count + delta),
    };
    return this.queueCountPush();
  }

  /** Pushes run strictly in call order so the backend never sees a stale count. */
  private queueCountPush(): Promise<void> {
    const next = this.countSync.then(async () => {
      const device = this.current;
      if (!device) return;
      try {
        await this.options.backend.updateDevice(device.id, {
          current_workspaces_count: device.current_workspaces_count,
        });
      } catch (err) {
        this.handleBackgroundError(err, "Failed to push workspace count");
      }
    });
    this.countSync = next;
    return next;
  }

  private handleBackgroundError(err: unknown, message: string): void {
    if (isUnauthorized(err)) {
      this.log.error({ error: err.message }, "Device request unauthorized");
      this.options.onUnauthorized?.(err);
      return;
    }
    this.log.warn({ error: errorMessage(err) }, message);
  }
}

const DEVICE_UPDATE_KEYS = [
  "device_name",
  "os_version",
  "executor_version",
  "root_workspace_path",
  "max_concurrent_workspaces",
  "max_disk_usage_bytes",
  "current_workspaces_count",
  "current_disk_usage_bytes",
  "default_shell",
  "default_timeout_minutes",
  "allow_network_access",
  "status",
] as const satisfies ReadonlyArray<keyof DeviceUpdate>;

/** Fields of `update` whose value differs from `device`. */
function sparseDiff(device: Device, update: DeviceUpdate): DeviceUpdate {
  const changed: DeviceUpdate = {};
  for (const key of DEVICE_UPDATE_KEYS) {
    const value = update[key];
    if (value !== undefined && value !== device[key]) {
      Object.assign(changed, { [key]: value });
    }
  }
  return changed;
}
