/**
 * Tests for config loading, validation and persistence.
 *
 * Every test runs against its own tmp directory via overrideConfigPaths.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  applyEnvOverrides,
  configExists,
  ensureDirectories,
  getConfigPath,
  getLogDir,
  loadConfig,
  overrideConfigPaths,
  parseConfig,
  saveConfig,
  validateInitSections,
} from "../config.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "outpost-config-"));
  overrideConfigPaths(tmpDir);
});

afterEach(() => {
  overrideConfigPaths(undefined);
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const MINIMAL = {
  backend: { url: "https://queue.example.test", api_key: "test-key" },
  provider: { api_key: "test-provider-key" },
};

function writeRaw(content: string) {
  fs.writeFileSync(getConfigPath(), content);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

describe("loadConfig", () => {
  it("throws CONFIG_NOT_FOUND when the file is missing", () => {
    expect(() => loadConfig({})).toThrow(expect.objectContaining({ code: "CONFIG_NOT_FOUND" }));
  });

  it("throws CONFIG_CORRUPTED for invalid YAML", () => {
    writeRaw("backend: [unclosed\n");
    expect(() => loadConfig({})).toThrow(expect.objectContaining({ code: "CONFIG_CORRUPTED" }));
  });

  it("fills every default from a minimal file", () => {
    saveConfig(MINIMAL);
    const config = loadConfig({});

    expect(config.backend.timeout_ms).toBe(10_000);
    expect(config.agent.name).toBe(`executor-${os.hostname()}`);
    expect(config.agent.polling_interval_seconds).toBe(30);
    expect(config.agent.max_concurrent_tasks).toBe(2);
    expect(config.agent.task_timeout_seconds).toBe(600);
    expect(config.provider).toEqual({
      type: "anthropic",
      api_key: "test-provider-key",
      model: "claude-sonnet-4-5",
      max_tokens: 4096,
      args: [],
    });
    expect(config.device.root_workspace_path).toBe(path.join(tmpDir, "workspaces"));
    expect(config.device.max_concurrent_workspaces).toBe(5);
    expect(config.workspaces).toEqual({
      enabled: false,
      archive_on_complete: false,
      cleanup_on_complete: true,
      clone_timeout_seconds: 300,
    });
  });

  it("lists every invalid path in one CONFIG_INVALID error", () => {
    saveConfig({
      backend: { url: "not a url", api_key: "test-key" },
      agent: { polling_interval_seconds: 5, max_concurrent_tasks: 11 },
      provider: { api_key: "test-provider-key" },
    });

    expect(() => loadConfig({})).toThrow(
      expect.objectContaining({
        code: "CONFIG_INVALID",
        context: expect.objectContaining({
          issues: ["backend.url", "agent.polling_interval_seconds", "agent.max_concurrent_tasks"],
        }),
      }),
    );
  });

  it("requires a provider key for anthropic", () => {
    saveConfig({ backend: MINIMAL.backend });
    expect(() => loadConfig({})).toThrow(
      expect.objectContaining({ context: expect.objectContaining({ issues: ["provider.api_key"] }) }),
    );
  });

  it("requires a command for the command provider", () => {
    saveConfig({ backend: MINIMAL.backend, provider: { type: "command" } });
    expect(() => loadConfig({})).toThrow(
      expect.objectContaining({ context: expect.objectContaining({ issues: ["provider.command"] }) }),
    );
  });

  it("expands ~ in the workspace root", () => {
    saveConfig({ ...MINIMAL, device: { root_workspace_path: "~/outpost-ws" } });
    expect(loadConfig({}).device.root_workspace_path).toBe(path.join(os.homedir(), "outpost-ws"));
  });
});

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

describe("environment overrides", () => {
  it("win over the file", () => {
    saveConfig({ backend: { url: "https://file.example.test", api_key: "file-key" } });

    const config = loadConfig({
      OUTPOST_BACKEND_URL: "https://env.example.test",
      OUTPOST_API_KEY: "env-key",
      ANTHROPIC_API_KEY: "env-provider-key",
    });

    expect(config.backend.url).toBe("https://env.example.test");
    expect(config.backend.api_key).toBe("env-key");
    expect(config.provider.api_key).toBe("env-provider-key");
  });

  it("create missing sections and leave other keys alone", () => {
    expect(applyEnvOverrides({ backend: { url: "u", timeout_ms: 5 } }, { OUTPOST_API_KEY: "k" })).toEqual({
      backend: { url: "u", timeout_ms: 5, api_key: "k" },
    });
    expect(applyEnvOverrides(null, { ANTHROPIC_API_KEY: "k" })).toEqual({ provider: { api_key: "k" } });
  });

  it("ignore empty variables and non-object documents", () => {
    expect(applyEnvOverrides({}, { OUTPOST_API_KEY: "" })).toEqual({});
    expect(applyEnvOverrides("text", { OUTPOST_API_KEY: "k" })).toBe("text");
  });
});

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

describe("saveConfig", () => {
  it("writes a 0600 file and leaves no tmp files behind", () => {
    saveConfig(MINIMAL);

    expect(configExists()).toBe(true);
    expect(fs.statSync(getConfigPath()).mode & 0o777).toBe(0o600);
    expect(fs.readdirSync(tmpDir)).toEqual(["config.yaml"]);
    expect(fs.readFileSync(getConfigPath(), "utf-8").startsWith("# outpost agent configuration\n")).toBe(true);
  });

  it("round-trips through loadConfig", () => {
    saveConfig({ ...MINIMAL, agent: { name: "builder-1", max_concurrent_tasks: 4 } });
    const config = loadConfig({});
    expect(config.agent.name).toBe("builder-1");
    expect(config.agent.max_concurrent_tasks).toBe(4);
  });
});

describe("ensureDirectories", () => {
  it("creates the config and log directories", () => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    ensureDirectories();
    expect(fs.statSync(getLogDir()).isDirectory()).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Partial validation
// ---------------------------------------------------------------------------

describe("validation helpers", () => {
  it("validateInitSections ignores the provider section", () => {
    expect(() => validateInitSections({ backend: MINIMAL.backend })).not.toThrow();
  });

  it("validateInitSections rejects a bad agent name", () => {
    expect(() => validateInitSections({ backend: MINIMAL.backend, agent: { name: "" } })).toThrow(
      "Config at init has invalid values: agent.name:",
    );
  });

  it("parseConfig names its source", () => {
    expect(() => parseConfig({}, "inline")).toThrow(/^Config at inline has invalid values: backend:/);
  });
});
