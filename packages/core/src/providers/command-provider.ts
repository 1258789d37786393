/**
 * Workspace-scoped tool session: runs a configured command-line agent
 * inside the task's workspace and treats its output as the result.
 *
 * argv = [command, ...args, prompt], cwd = the workspace root. The prompt
 * describes the workspace layout so the tool knows where inputs live and
 * where outputs go. A non-zero exit or a timeout fails the task with the
 * captured output as the error message.
 *
 * Token usage is not observable from outside the tool, so it is reported
 * as zero and the cost as unknown.
 */

import { ProviderExecutionError } from "@outpost/shared";
import { describeFailure, type ProcessResult, type ProcessRunner } from "../process-runner.js";
import {
  buildTaskPrompt,
  elapsedSeconds,
  type CapabilityProvider,
  type ExecutionRequest,
  type ExecutionResult,
} from "./capability-provider.js";

export interface CommandProviderOptions {
  /** Executable, e.g. "claude" */
  command: string;
  /** Arguments placed before the prompt, e.g. ["-p"] */
  args: string[];
  runner: ProcessRunner;
  /** Used when the engine does not pass a tighter signal */
  timeoutMs: number;
}

const WORKSPACE_GUIDE = [
  "WORKSPACE:",
  "- ./input/   : files provided with this task",
  "- ./src/     : repository checkout, when there is one",
  "- ./output/  : put every file you produce here",
  "- ./logs/    : put log files here",
  "",
  "Finish with a short summary of what you did.",
].join("\n");

export class CommandProvider implements CapabilityProvider {
  readonly name: string;

  constructor(private readonly options: CommandProviderOptions) {
    this.name = `command:${options.command}`;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    if (!request.workspacePath) {
      throw new ProviderExecutionError(
        "Command provider needs a workspace; enable workspaces in the config",
        "PROVIDER_NO_WORKSPACE",
        { taskId: request.taskId },
      );
    }

    const startedAt = Date.now();
    const prompt = `${buildTaskPrompt(request.description, request.context, request.mode)}\n\n${WORKSPACE_GUIDE}`;
    const argv = [this.options.command, ...this.options.args, prompt];

    let result: ProcessResult;
    try {
      result = await this.options.runner.run(argv, {
        cwd: request.workspacePath,
        timeoutMs: this.options.timeoutMs,
        signal: request.signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderExecutionError(`Failed to start ${this.options.command}: ${message}`, "PROVIDER_SPAWN", {
        taskId: request.taskId,
      });
    }

    if (result.timedOut) {
      throw new ProviderExecutionError(describeFailure([this.options.command], result), "PROVIDER_TIMEOUT", {
        taskId: request.taskId,
      });
    }
    if (result.exitCode !== 0) {
      throw new ProviderExecutionError(describeFailure([this.options.command], result), "PROVIDER_EXIT", {
        taskId: request.taskId,
        exitCode: result.exitCode,
      });
    }

    return {
      outputText: result.output,
      tokenUsage: { input_tokens: 0, output_tokens: 0, total_tokens: 0 },
      durationSeconds: elapsedSeconds(startedAt),
      model: this.options.command,
      costUsd: null,
    };
  }

  async testConnection(): Promise<boolean> {
    try {
      const result = await this.options.runner.run([this.options.command, "--version"], { timeoutMs: 10_000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
