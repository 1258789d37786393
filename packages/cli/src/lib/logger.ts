/**
 * pino logger factory for the agent CLI.
 *
 * Two destinations:
 *   - JSON lines to ~/.outpost/logs/agent.log (always, at the active level)
 *   - stderr: pino-pretty when --verbose or LOG_LEVEL is set, otherwise
 *     plain JSON at warn so stdout stays clean for command output
 *
 * Services get their own child logger ({ component }) from the core.
 */

import * as path from "node:path";
import pino from "pino";
import { getLogDir } from "./config.js";

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to ~/.outpost/logs */
  logDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LogTarget {
  target: string;
  level: string;
  options: Record<string, unknown>;
}

/** Resolved level and transport targets; exported for tests */
export function loggerTargets(options: LoggerOptions = {}): { level: string; targets: LogTarget[] } {
  const env = options.env ?? process.env;
  const level = env.LOG_LEVEL ?? (options.verbose ? "debug" : "info");
  const pretty = options.verbose === true || env.LOG_LEVEL !== undefined;

  const stderr: LogTarget = pretty
    ? {
        target: "pino-pretty",
        level,
        options: { destination: 2, colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
      }
    : { target: "pino/file", level: "warn", options: { destination: 2 } };

  return {
    level,
    targets: [
      stderr,
      {
        target: "pino/file",
        level,
        options: { destination: path.join(options.logDir ?? getLogDir(), "agent.log"), mkdir: true },
      },
    ],
  };
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const { level, targets } = loggerTargets(options);
  return pino({
    name: "outpost",
    level,
    transport: { targets },
  });
}
