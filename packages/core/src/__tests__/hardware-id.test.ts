/**
 * Tests for resolveHardwareId: per-platform lookups and the hostname fallback.
 */

import { createHash } from "node:crypto";
import { describe, expect, test } from "vitest";
import { resolveHardwareId } from "../hardware-id.js";
import { ScriptedRunner } from "./fakes.js";

function fallbackId(hostname: string, platform: string, arch: string): string {
  const digest = createHash("sha256").update(`${hostname}:${platform}:${arch}`).digest("hex");
  return `host-${digest.slice(0, 16)}`;
}

const missing = async (): Promise<string> => {
  throw new Error("ENOENT");
};

describe("resolveHardwareId", () => {
  test("linux reads /etc/machine-id", async () => {
    const id = await resolveHardwareId(new ScriptedRunner(), {
      platform: "linux",
      readFile: async (p) => (p === "/etc/machine-id" ? "abc123def456\n" : ""),
    });
    expect(id).toBe("abc123def456");
  });

  test("linux falls back to the dbus machine-id", async () => {
    const id = await resolveHardwareId(new ScriptedRunner(), {
      platform: "linux",
      readFile: async (p) => {
        if (p === "/etc/machine-id") throw new Error("ENOENT");
        return "dbus-id\n";
      },
    });
    expect(id).toBe("dbus-id");
  });

  test("darwin parses IOPlatformUUID from ioreg", async () => {
    const runner = new ScriptedRunner(() => ({
      output: '  "IOPlatformSerialNumber" = "C02"\n  "IOPlatformUUID" = "1234-ABCD-5678"\n',
    }));
    const id = await resolveHardwareId(runner, { platform: "darwin" });

    expect(id).toBe("1234-ABCD-5678");
    expect(runner.calls[0].argv).toEqual(["ioreg", "-rd1", "-c", "IOPlatformExpertDevice"]);
  });

  test("win32 parses MachineGuid from the registry", async () => {
    const runner = new ScriptedRunner(() => ({
      output: "HKEY_LOCAL_MACHINE\\SOFTWARE\\Microsoft\\Cryptography\n    MachineGuid    REG_SZ    9f8e-7d6c\n",
    }));
    expect(await resolveHardwareId(runner, { platform: "win32" })).toBe("9f8e-7d6c");
  });

  test("a failing lookup falls back to the hostname hash", async () => {
    const runner = new ScriptedRunner(() => ({ exitCode: 1 }));
    const id = await resolveHardwareId(runner, { platform: "darwin", hostname: "box", arch: "arm64" });
    expect(id).toBe(fallbackId("box", "darwin", "arm64"));
  });

  test("linux without machine-id files falls back to the hostname hash", async () => {
    const id = await resolveHardwareId(new ScriptedRunner(), {
      platform: "linux",
      hostname: "box",
      arch: "x64",
      readFile: missing,
    });
    expect(id).toBe(fallbackId("box", "linux", "x64"));
  });

  test("the fallback is stable across calls", async () => {
    const overrides = { platform: "freebsd" as const, hostname: "box", arch: "x64" };
    const first = await resolveHardwareId(new ScriptedRunner(), overrides);
    const second = await resolveHardwareId(new ScriptedRunner(), overrides);
    expect(first).toBe(second);
    expect(first).toMatch(/^host-[0-9a-f]{16}$/);
  });
});
