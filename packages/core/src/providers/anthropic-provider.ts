/**
 * Capability provider backed by the Anthropic Messages API.
 *
 * One task = one non-streaming messages.create call. The per-task timeout
 * arrives as an AbortSignal and is combined with the provider's own
 * request timeout. Every failure is normalized into ProviderExecutionError:
 *   - abort/timeout          -> PROVIDER_TIMEOUT
 *   - 401 (bad provider key) -> PROVIDER_AUTH (the task fails; this is not
 *                               the queue's 401 and must not sign the agent out)
 *   - 429                    -> PROVIDER_RATE_LIMITED, with retryAfter when sent
 *   - other HTTP status      -> PROVIDER_HTTP_<status>
 */

import Anthropic, { type APIError } from "@anthropic-ai/sdk";
import { ProviderExecutionError } from "@outpost/shared";
import {
  buildTaskPrompt,
  elapsedSeconds,
  estimateCostUsd,
  type CapabilityProvider,
  type ExecutionRequest,
  type ExecutionResult,
} from "./capability-provider.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The slice of a Messages API response this provider reads */
export interface ProviderMessage {
  model: string;
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

export interface MessageCreateBody {
  model: string;
  max_tokens: number;
  system?: string;
  messages: Array<{ role: "user"; content: string }>;
}

/** The slice of the SDK client used here; `new Anthropic().messages` satisfies it */
export interface MessageCreator {
  create(body: MessageCreateBody, options?: { signal?: AbortSignal }): Promise<ProviderMessage>;
}

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  /** Upper bound for a single API call */
  requestTimeoutMs?: number;
  /** Injected in tests */
  messages?: MessageCreator;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SYSTEM_PROMPT =
  "You are an autonomous task executor. Complete the task and report your approach, any code or artifacts you produced, and recommended next steps.";

const DEFAULT_REQUEST_TIMEOUT_MS = 600_000;

const PING_TIMEOUT_MS = 15_000;

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class AnthropicProvider implements CapabilityProvider {
  readonly name = "anthropic";
  private readonly messages: MessageCreator;

  constructor(private readonly options: AnthropicProviderOptions) {
    this.messages = options.messages ?? new Anthropic({ apiKey: options.apiKey }).messages;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const prompt = buildTaskPrompt(request.description, request.context, request.mode);
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

    let response: ProviderMessage;
    try {
      response = await this.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: prompt }],
        },
        { signal },
      );
    } catch (err) {
      throw toProviderError(err, request.taskId);
    }

    const outputText = response.content
      .map((block) => (block.type === "text" && block.text ? block.text : ""))
      .join("")
      .trim();

    const tokenUsage = {
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
      total_tokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    return {
      outputText,
      tokenUsage,
      durationSeconds: elapsedSeconds(startedAt),
      model: response.model,
      costUsd: estimateCostUsd(response.model, tokenUsage),
    };
  }

  /** One-token round trip; false on any error */
  async testConnection(): Promise<boolean> {
    try {
      await this.messages.create(
        {
          model: this.options.model,
          max_tokens: 1,
          messages: [{ role: "user", content: "ping" }],
        },
        { signal: AbortSignal.timeout(PING_TIMEOUT_MS) },
      );
      return true;
    } catch {
      return false;
    }
  }
}

// ---------------------------------------------------------------------------
// Error handling
// ---------------------------------------------------------------------------

/** Normalize whatever the SDK threw into a ProviderExecutionError. */
export function toProviderError(error: unknown, taskId: string): ProviderExecutionError {
  if (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError" || error instanceof Anthropic.APIUserAbortError)
  ) {
    return new ProviderExecutionError("Provider call timed out", "PROVIDER_TIMEOUT", { taskId });
  }

  if (error instanceof Anthropic.APIError) {
    const status = error.status;

    if (status === 401) {
      return new ProviderExecutionError("Invalid Anthropic API key", "PROVIDER_AUTH", { taskId, status });
    }

    if (status === 429) {
      return new ProviderExecutionError("Anthropic API rate limited", "PROVIDER_RATE_LIMITED", {
        taskId,
        status,
        retryAfter: extractRetryAfter(error),
      });
    }

    if (status !== undefined) {
      return new ProviderExecutionError(`Anthropic API error: ${status} ${error.message}`, `PROVIDER_HTTP_${status}`, {
        taskId,
        status,
      });
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderExecutionError(`Provider call failed: ${message}`, "PROVIDER_ERROR", { taskId });
}

/** retry-after header in seconds, when the API sent one */
function extractRetryAfter(error: APIError): number | undefined {
  const retryAfter = error.headers?.["retry-after"];
  if (!retryAfter) return undefined;
  const seconds = parseInt(retryAfter, 10);
  return !isNaN(seconds) && seconds > 0 ? seconds : undefined;
}
