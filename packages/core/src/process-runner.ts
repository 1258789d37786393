/**
 * Narrow subprocess interface used for every external command the agent
 * runs (git clone/checkout, tar, command-line providers).
 *
 * Commands are argv arrays, never shell strings, so repository URLs and
 * branch names are passed through verbatim. Output from stdout and stderr
 * is captured interleaved, in arrival order, because that combined text is
 * what ends up as a workspace's error_message when a command fails.
 *
 * Every run carries a hard timeout. On expiry the child gets SIGTERM, then
 * SIGKILL after a short grace period, and the result reports timedOut.
 */

import { spawn } from "node:child_process";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessRunOptions {
  cwd?: string;
  /** Hard limit for the whole run, in milliseconds */
  timeoutMs: number;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  /** Abort the run early (treated like a timeout) */
  signal?: AbortSignal;
}

export interface ProcessResult {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  /** stdout and stderr, interleaved, trimmed */
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface ProcessRunner {
  run(argv: readonly string[], options: ProcessRunOptions): Promise<ProcessResult>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Time between SIGTERM and SIGKILL after a timeout */
const KILL_GRACE_MS = 2_000;

/** Captured output beyond this many bytes is dropped (head is kept) */
const MAX_OUTPUT_BYTES = 1024 * 1024;

// ---------------------------------------------------------------------------
// Node implementation
// ---------------------------------------------------------------------------

export class NodeProcessRunner implements ProcessRunner {
  run(argv: readonly string[], options: ProcessRunOptions): Promise<ProcessResult> {
    const [command, ...args] = argv;
    if (!command) {
      return Promise.reject(new Error("ProcessRunner: empty argv"));
    }

    const startedAt = Date.now();

    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ["ignore", "pipe", "pipe"],
      });

      const chunks: Buffer[] = [];
      let captured = 0;
      let timedOut = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;

      const collect = (chunk: Buffer) => {
        if (captured >= MAX_OUTPUT_BYTES) return;
        const slice = chunk.subarray(0, MAX_OUTPUT_BYTES - captured);
        chunks.push(slice);
        captured += slice.length;
      };
      child.stdout.on("data", collect);
      child.stderr.on("data", collect);

      const terminate = () => {
        if (timedOut) return;
        timedOut = true;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
      };

      const timeout = setTimeout(terminate, options.timeoutMs);
      if (options.signal?.aborted) {
        terminate();
      } else {
        options.signal?.addEventListener("abort", terminate, { once: true });
      }

      const finish = () => {
        clearTimeout(timeout);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener("abort", terminate);
      };

      child.on("error", (err) => {
        finish();
        reject(err);
      });

      child.on("close", (code) => {
        finish();
        resolve({
          exitCode: code,
          output: Buffer.concat(chunks).toString("utf-8").trim(),
          timedOut,
          durationMs: Date.now() - startedAt,
        });
      });
    });
  }
}

/**
 * Diagnostic text for a failed run: the captured output as-is, with a
 * synthesized line when the command timed out or printed nothing.
 */
export function describeFailure(argv: readonly string[], result: ProcessResult): string {
  const name = argv.join(" ");
  if (result.timedOut) {
    const line = `${name} timed out after ${result.durationMs}ms`;
    return result.output ? `${result.output}\n${line}` : line;
  }
  return result.output || `${name} exited with code ${result.exitCode ?? "null"}`;
}
