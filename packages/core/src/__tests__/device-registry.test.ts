/**
 * Tests for DeviceRegistry: idempotent registration, slot accounting,
 * heartbeat and sparse configuration updates.
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { NetworkError, UnauthorizedError } from "@outpost/shared";
import { DeviceRegistry, defaultDeviceSettings, type DeviceIdentity } from "../device-registry.js";
import { FakeExecutorBackend, makeDevice, silentLogger } from "./fakes.js";

const identity: DeviceIdentity = {
  hardwareId: "hw-test",
  name: "test-box",
  platform: "linux",
  osVersion: "6.0",
  executorVersion: "0.1.0",
  rootWorkspacePath: "/tmp/outpost-test",
};

const registries: DeviceRegistry[] = [];

function createRegistry(backend: FakeExecutorBackend, onUnauthorized?: (err: UnauthorizedError) => void) {
  const registry = new DeviceRegistry({
    backend,
    identity,
    heartbeatIntervalMs: 60_000,
    logger: silentLogger,
    onUnauthorized,
  });
  registries.push(registry);
  return registry;
}

afterEach(async () => {
  await Promise.all(registries.splice(0).map((r) => r.stop()));
});

describe("defaultDeviceSettings", () => {
  test("uses zsh on darwin and bash elsewhere", () => {
    expect(defaultDeviceSettings("darwin").defaultShell).toBe("/bin/zsh");
    expect(defaultDeviceSettings("linux").defaultShell).toBe("/bin/bash");
  });

  test("defaults to five workspaces and 100 GB", () => {
    const defaults = defaultDeviceSettings("linux");
    expect(defaults.maxConcurrentWorkspaces).toBe(5);
    expect(defaults.maxDiskUsageBytes).toBe(100 * 1024 * 1024 * 1024);
  });
});

describe("ensureRegistered", () => {
  test("registers a new device when none matches", async () => {
    const backend = new FakeExecutorBackend();
    const device = await createRegistry(backend).ensureRegistered();

    expect(backend.registrations).toBe(1);
    expect(device.device_id).toBe("hw-test");
    expect(device.max_concurrent_workspaces).toBe(5);
    expect(device.root_workspace_path).toBe("/tmp/outpost-test");
  });

  test("calling twice yields the same device id", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);

    const first = await registry.ensureRegistered();
    const second = await registry.ensureRegistered();

    expect(second.id).toBe(first.id);
    expect(backend.registrations).toBe(1);
  });

  test("concurrent callers share one registration", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);

    const [a, b, c] = await Promise.all([
      registry.ensureRegistered(),
      registry.ensureRegistered(),
      registry.ensureRegistered(),
    ]);

    expect(new Set([a.id, b.id, c.id]).size).toBe(1);
    expect(backend.registrations).toBe(1);
  });

  test("a second registry on the same machine adopts the existing record", async () => {
    const backend = new FakeExecutorBackend();
    const first = await createRegistry(backend).ensureRegistered();
    const second = await createRegistry(backend).ensureRegistered();

    expect(second.id).toBe(first.id);
    expect(backend.registrations).toBe(1);
  });

  test("adopting sends only the identity fields that changed", async () => {
    const backend = new FakeExecutorBackend();
    backend.devices.push(makeDevice({ id: "dev-9", device_id: "hw-test", executor_version: "0.0.9" }));

    const device = await createRegistry(backend).ensureRegistered();

    expect(device.id).toBe("dev-9");
    expect(backend.deviceUpdates[0]).toEqual({ id: "dev-9", update: { executor_version: "0.1.0" } });
  });

  test("starts heartbeating once registered", async () => {
    const backend = new FakeExecutorBackend();
    await createRegistry(backend).ensureRegistered();
    await vi.waitFor(() => expect(backend.heartbeats).toBe(1));
  });

  test("a failed lookup can be retried", async () => {
    const backend = new FakeExecutorBackend();
    backend.failNext.set("listDevices", new NetworkError("unreachable", "NETWORK_UNREACHABLE"));
    const registry = createRegistry(backend);

    await expect(registry.ensureRegistered()).rejects.toThrow("unreachable");
    const device = await registry.ensureRegistered();
    expect(device.device_id).toBe("hw-test");
  });
});

describe("heartbeat", () => {
  test("a 401 is reported through onUnauthorized", async () => {
    const backend = new FakeExecutorBackend();
    backend.failNext.set("heartbeat", new UnauthorizedError());
    const onUnauthorized = vi.fn();

    await createRegistry(backend, onUnauthorized).ensureRegistered();

    await vi.waitFor(() => expect(onUnauthorized).toHaveBeenCalledTimes(1));
  });

  test("other heartbeat errors are swallowed", async () => {
    const backend = new FakeExecutorBackend();
    backend.failNext.set("heartbeat", new NetworkError("HTTP 503", "NETWORK_HTTP_503"));
    const onUnauthorized = vi.fn();
    const registry = createRegistry(backend, onUnauthorized);

    await registry.ensureRegistered();
    await registry.stop();

    expect(onUnauthorized).not.toHaveBeenCalled();
    expect(backend.heartbeats).toBe(0);
  });
});

describe("stop and start", () => {
  test("a lookup after stop() does not restart the heartbeat", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);
    await registry.ensureRegistered();
    await vi.waitFor(() => expect(backend.heartbeats).toBe(1));

    await registry.stop();
    const device = await registry.ensureRegistered();

    expect(device.device_id).toBe("hw-test");
    expect(registry.heartbeatRunning).toBe(false);
  });

  test("start() resumes heartbeating after a stop", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);
    await registry.ensureRegistered();
    await registry.stop();

    await registry.start();

    expect(registry.heartbeatRunning).toBe(true);
    await vi.waitFor(() => expect(backend.heartbeats).toBe(2));
  });
});

describe("slots", () => {
  test("availableSlots is zero before registration", () => {
    expect(createRegistry(new FakeExecutorBackend()).availableSlots()).toBe(0);
  });

  test("reserve and release adjust the count locally and on the backend", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);
    await registry.ensureRegistered();

    const pushes = [registry.reserveSlot(), registry.reserveSlot()];
    expect(registry.availableSlots()).toBe(3);
    await Promise.all(pushes);

    await registry.releaseSlot();
    expect(registry.availableSlots()).toBe(4);

    const counts = backend.deviceUpdates.map((u) => u.update.current_workspaces_count);
    // Both reservations land before the first queued push runs.
    expect(counts).toEqual([2, 2, 1]);
    expect(backend.devices[0].current_workspaces_count).toBe(1);
  });

  test("release never goes below zero", async () => {
    const registry = createRegistry(new FakeExecutorBackend());
    await registry.ensureRegistered();
    await registry.releaseSlot();
    expect(registry.device?.current_workspaces_count).toBe(0);
  });

  test("setWorkspaceCount replaces the count", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);
    await registry.ensureRegistered();

    await registry.setWorkspaceCount(4);
    expect(registry.availableSlots()).toBe(1);
    expect(backend.devices[0].current_workspaces_count).toBe(4);
  });
});

describe("updateConfiguration", () => {
  test("sends only changed fields", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);
    await registry.ensureRegistered();

    const updated = await registry.updateConfiguration({ max_concurrent_workspaces: 8, default_shell: "/bin/bash" });

    expect(updated.max_concurrent_workspaces).toBe(8);
    expect(backend.deviceUpdates).toEqual([{ id: updated.id, update: { max_concurrent_workspaces: 8 } }]);
  });

  test("an update with nothing new makes no call", async () => {
    const backend = new FakeExecutorBackend();
    const registry = createRegistry(backend);
    await registry.ensureRegistered();

    await registry.updateConfiguration({ default_shell: "/bin/bash" });
    expect(backend.deviceUpdates).toEqual([]);
  });
});
