/**
 * Configuration file management for the outpost agent.
 *
 * Manages the ~/.outpost/ directory and its config.yaml. Config is read
 * once at startup and written only by `outpost init`, so every operation
 * here is synchronous.
 *
 * Directory layout:
 *   ~/.outpost/
 *     config.yaml   — backend credentials, agent, provider, device and workspace settings
 *     logs/         — agent.log (JSON lines)
 *     workspaces/   — default workspace root
 *
 * Environment overrides (applied before validation):
 *   OUTPOST_BACKEND_URL -> backend.url
 *   OUTPOST_API_KEY     -> backend.api_key
 *   ANTHROPIC_API_KEY   -> provider.api_key
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "@outpost/shared";

// ---------------------------------------------------------------------------
// Path constants: all agent state lives under ~/.outpost/
// ---------------------------------------------------------------------------

export const CONFIG_DIR = path.join(os.homedir(), ".outpost");

export const CONFIG_PATH = path.join(CONFIG_DIR, "config.yaml");

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** "~/x" -> "<home>/x"; anything else untouched */
function expandHome(value: string): string {
  return value === "~" || value.startsWith("~/") ? path.join(os.homedir(), value.slice(1)) : value;
}

const backendSchema = z.object({
  url: z.string().url(),
  api_key: z.string().min(1),
  /** Per-request timeout for backend calls */
  timeout_ms: z.number().int().positive().default(10_000),
});

const agentSchema = z
  .object({
    name: z.string().min(1).max(64).default(() => `executor-${os.hostname()}`),
    polling_interval_seconds: z.number().int().min(10).max(300).default(30),
    max_concurrent_tasks: z.number().int().min(1).max(10).default(2),
    task_timeout_seconds: z.number().int().positive().default(600),
  })
  .default({});

const providerSchema = z
  .object({
    type: z.enum(["anthropic", "command"]).default("anthropic"),
    api_key: z.string().min(1).optional(),
    model: z.string().min(1).default("claude-sonnet-4-5"),
    max_tokens: z.number().int().positive().default(4096),
    /** Executable for the command provider */
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
  })
  .default({})
  .superRefine((provider, ctx) => {
    if (provider.type === "anthropic" && !provider.api_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "required for the anthropic provider (or set ANTHROPIC_API_KEY)",
        path: ["api_key"],
      });
    }
    if (provider.type === "command" && !provider.command) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "required for the command provider",
        path: ["command"],
      });
    }
  });

const deviceSchema = z
  .object({
    /** Defaults to the hostname */
    name: z.string().min(1).max(64).optional(),
    root_workspace_path: z
      .string()
      .min(1)
      .default(() => getWorkspacesDir())
      .transform(expandHome),
    max_concurrent_workspaces: z.number().int().min(1).default(5),
    max_disk_usage_gb: z.number().positive().default(100),
    heartbeat_interval_seconds: z.number().int().min(5).default(30),
  })
  .default({});

const workspacesSchema = z
  .object({
    /** Run every task in its own workspace */
    enabled: z.boolean().default(false),
    archive_on_complete: z.boolean().default(false),
    cleanup_on_complete: z.boolean().default(true),
    clone_timeout_seconds: z.number().int().positive().default(300),
  })
  .default({});

export const configSchema = z.object({
  backend: backendSchema,
  agent: agentSchema,
  provider: providerSchema,
  device: deviceSchema,
  workspaces: workspacesSchema,
});

/** Validated config with every default filled in */
export type OutpostConfig = z.output<typeof configSchema>;

/** What may be written to config.yaml: sections and defaulted keys are optional */
export type OutpostConfigInput = z.input<typeof configSchema>;

// ---------------------------------------------------------------------------
// Test path overrides
// ---------------------------------------------------------------------------

let _configDirOverride: string | undefined;

export function getConfigDir(): string {
  return _configDirOverride ?? CONFIG_DIR;
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

export function getLogDir(): string {
  return path.join(getConfigDir(), "logs");
}

export function getWorkspacesDir(): string {
  return path.join(getConfigDir(), "workspaces");
}

/**
 * Redirect every path under ~/.outpost/ to `baseDir`: for tests only.
 * Pass `undefined` to reset back to the real paths.
 */
export function overrideConfigPaths(baseDir: string | undefined): void {
  _configDirOverride = baseDir;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

/**
 * Load, apply environment overrides and validate.
 *
 * @throws ConfigError CONFIG_NOT_FOUND: file does not exist
 * @throws ConfigError CONFIG_CORRUPTED: file exists but is not valid YAML
 * @throws ConfigError CONFIG_INVALID: fails schema validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OutpostConfig {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found at ${configPath}. Run 'outpost init' first.`,
      "CONFIG_NOT_FOUND",
      { path: configPath },
    );
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Config file at ${configPath} is not valid YAML.`, "CONFIG_CORRUPTED", {
      path: configPath,
      parseError: String(err),
    });
  }

  return parseConfig(applyEnvOverrides(parsed, env), configPath);
}

/** Validate an already-parsed config object. */
export function parseConfig(input: unknown, source = "config"): OutpostConfig {
  return validate(configSchema, input, source);
}

/**
 * Validate only the sections `outpost init` writes. Provider keys are
 * left out: they may come from the environment at load time.
 */
export function validateInitSections(input: unknown): void {
  validate(configSchema.pick({ backend: true, agent: true }), input, "init");
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, source: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(
      `Config at ${source} has invalid values: ${issues.join("; ")}`,
      "CONFIG_INVALID",
      { path: source, issues: result.error.issues.map((issue) => issue.path.join(".")) },
    );
  }
  return result.data;
}

/**
 * Persist config with an atomic write (tmp file in the same directory,
 * then rename), mode 0600 since it holds API keys.
 */
export function saveConfig(config: OutpostConfigInput): void {
  const configPath = getConfigPath();
  const configDir = getConfigDir();

  fs.mkdirSync(configDir, { recursive: true });

  const yamlContent =
    "# outpost agent configuration\n" +
    "# Generated by 'outpost init'. Edit with care.\n\n" +
    stringifyYaml(config, { lineWidth: 120 });

  const tmpPath = path.join(configDir, `.config.yaml.tmp.${crypto.randomBytes(4).toString("hex")}`);

  try {
    fs.writeFileSync(tmpPath, yamlContent, { mode: 0o600 });
    fs.renameSync(tmpPath, configPath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

/** Create ~/.outpost/ and its logs/ directory. */
export function ensureDirectories(): void {
  fs.mkdirSync(getConfigDir(), { recursive: true });
  fs.mkdirSync(getLogDir(), { recursive: true });
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

const ENV_OVERRIDES: ReadonlyArray<{ variable: string; section: string; key: string }> = [
  { variable: "OUTPOST_BACKEND_URL", section: "backend", key: "url" },
  { variable: "OUTPOST_API_KEY", section: "backend", key: "api_key" },
  { variable: "ANTHROPIC_API_KEY", section: "provider", key: "api_key" },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Copy of `parsed` with every set override variable written into it */
export function applyEnvOverrides(parsed: unknown, env: NodeJS.ProcessEnv): unknown {
  let root: Record<string, unknown>;
  if (parsed === null || parsed === undefined) {
    root = {};
  } else if (isRecord(parsed)) {
    root = { ...parsed };
  } else {
    return parsed;
  }

  for (const { variable, section, key } of ENV_OVERRIDES) {
    const value = env[variable];
    if (!value) continue;
    const current = root[section];
    root[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return root;
}
