/**
 * Stable hardware-derived device identifier.
 *
 * The device registry looks up this id before registering, so it must not
 * change across restarts of the agent. Sources, first match wins:
 *   linux:  /etc/machine-id, then /var/lib/dbus/machine-id
 *   darwin: IOPlatformUUID from `ioreg -rd1 -c IOPlatformExpertDevice`
 *   win32:  MachineGuid from the Cryptography registry key
 *   any:    "host-" + sha256(hostname:platform:arch), first 16 hex chars
 */

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import os from "node:os";
import type { ProcessRunner } from "./process-runner.js";

export interface HardwareIdSources {
  platform: NodeJS.Platform;
  hostname: string;
  arch: string;
  readFile(path: string): Promise<string>;
  runner: ProcessRunner;
}

const LINUX_ID_FILES = ["/etc/machine-id", "/var/lib/dbus/machine-id"];

const LOOKUP_TIMEOUT_MS = 5_000;

/**
 * Resolve the hardware id. Never throws: lookup failures fall through to
 * the hostname hash.
 */
export async function resolveHardwareId(
  runner: ProcessRunner,
  overrides: Partial<HardwareIdSources> = {},
): Promise<string> {
  const sources: HardwareIdSources = {
    platform: process.platform,
    hostname: os.hostname(),
    arch: os.arch(),
    readFile: (path) => readFile(path, "utf-8"),
    runner,
    ...overrides,
  };

  const platformId = await readPlatformId(sources);
  if (platformId) return platformId;

  const digest = createHash("sha256")
    .update(`${sources.hostname}:${sources.platform}:${sources.arch}`)
    .digest("hex");
  return `host-${digest.slice(0, 16)}`;
}

async function readPlatformId(sources: HardwareIdSources): Promise<string | null> {
  switch (sources.platform) {
    case "linux":
      for (const path of LINUX_ID_FILES) {
        try {
          const id = (await sources.readFile(path)).trim();
          if (id) return id;
        } catch {
          // not present on this distro, try the next one
        }
      }
      return null;

    case "darwin":
      return readCommandMatch(
        sources.runner,
        ["ioreg", "-rd1", "-c", "IOPlatformExpertDevice"],
        /"IOPlatformUUID"\s*=\s*"([^"]+)"/,
      );

    case "win32":
      return readCommandMatch(
        sources.runner,
        ["reg", "query", "HKLM\\SOFTWARE\\Microsoft\\Cryptography", "/v", "MachineGuid"],
        /MachineGuid\s+REG_SZ\s+(\S+)/,
      );

    default:
      return null;
  }
}

async function readCommandMatch(
  runner: ProcessRunner,
  argv: string[],
  pattern: RegExp,
): Promise<string | null> {
  try {
    const result = await runner.run(argv, { timeoutMs: LOOKUP_TIMEOUT_MS });
    if (result.exitCode !== 0) return null;
    const match = result.output.match(pattern);
    return match ? match[1] : null;
  } catch {
    return null;
  }
}
