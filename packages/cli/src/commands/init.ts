/**
 * `outpost init` command.
 *
 * Writes ~/.outpost/config.yaml with the backend credentials and agent
 * name. Everything else keeps its schema default and can be edited in the
 * file afterwards.
 *
 * Flow:
 *   1. Refuse to overwrite an existing config unless --force (which
 *      starts from a fresh file)
 *   2. Resolve URL and API key from flags, then OUTPOST_* env
 *   3. Validate through the config schema, then write atomically
 *   4. Check backend health (warn-only)
 */

import { Command } from "commander";
import pc from "picocolors";
import { OutpostApiClient } from "../lib/api-client.js";
import {
  configExists,
  ensureDirectories,
  getConfigPath,
  saveConfig,
  validateInitSections,
  type OutpostConfigInput,
} from "../lib/config.js";
import { formatError } from "../lib/formatters.js";

// ---------------------------------------------------------------------------
// Command definition
// ---------------------------------------------------------------------------

export function createInitCommand(): Command {
  return new Command("init")
    .description("Configure this machine as an outpost agent")
    .option("--url <url>", "Backend URL (or set OUTPOST_BACKEND_URL)")
    .option("--api-key <key>", "Backend API key (or set OUTPOST_API_KEY)")
    .option("--agent <name>", "Agent name used when polling (default: executor-<hostname>)")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: InitOptions) => {
      await runInit(opts);
    });
}

// ---------------------------------------------------------------------------
// Init logic: extracted for testability
// ---------------------------------------------------------------------------

export interface InitOptions {
  url?: string;
  apiKey?: string;
  agent?: string;
  force?: boolean;
}

export async function runInit(opts: InitOptions, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  if (configExists() && !opts.force) {
    console.log("Already initialized. Use --force to re-initialize.");
    return;
  }

  const url = opts.url ?? env.OUTPOST_BACKEND_URL;
  const apiKey = opts.apiKey ?? env.OUTPOST_API_KEY;
  if (!url || !apiKey) {
    console.error(
      pc.red(`${!url ? "Backend URL" : "API key"} is required. Provide --url and --api-key, or set OUTPOST_BACKEND_URL and OUTPOST_API_KEY.`),
    );
    process.exitCode = 1;
    return;
  }

  const input: OutpostConfigInput = {
    backend: { url, api_key: apiKey },
    ...(opts.agent ? { agent: { name: opts.agent } } : {}),
  };

  try {
    validateInitSections(input);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  ensureDirectories();
  saveConfig(input);

  const healthy = await new OutpostApiClient({ baseUrl: url, apiKey, timeoutMs: 5_000 }).healthCheck();

  console.log("");
  console.log(pc.green("outpost initialized."));
  console.log("");
  console.log(`  Config:       ${getConfigPath()}`);
  console.log(`  Backend URL:  ${url}`);
  if (opts.agent) console.log(`  Agent:        ${opts.agent}`);
  console.log(
    `  Backend:      ${healthy ? pc.green("reachable") : pc.yellow("unreachable (config saved anyway)")}`,
  );
  console.log("");
}
