/**
 * Structured error hierarchy for outpost.
 *
 * All outpost errors extend OutpostError, which adds:
 *   - `code`: Machine-readable error code (e.g., "CONFIG_NOT_FOUND")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to user)
 *   - JSON serialization via toJSON()
 *
 * Error categories:
 *   - ConfigError:            Config file issues (missing, corrupted, invalid values)
 *   - NetworkError:           HTTP failures, timeouts, unreachable backend
 *   - UnauthorizedError:      The backend rejected our credential (401). Fatal to the session.
 *   - ValidationError:        Zod schema validation failures
 *   - CapacityExceededError:  The device has no free workspace slot
 *   - SetupFailureError:      A workspace subprocess (clone, checkout, archive) failed
 *   - ProviderExecutionError: The capability provider could not produce a result
 *   - WorkspaceError:         Unknown workspace, invalid lifecycle transition
 */

/**
 * Base error class for all outpost errors.
 * Adds a machine-readable code and structured context for debugging.
 */
export class OutpostError extends Error {
  /** Machine-readable error code (e.g., "CONFIG_NOT_FOUND", "NETWORK_TIMEOUT") */
  readonly code: string;
  /** Structured debugging context: never shown to end users */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "OutpostError";
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for JSON logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Configuration errors: config file missing, corrupted, or invalid.
 * Code prefix: CONFIG_*
 *
 * @example
 *   throw new ConfigError("Config file not found", "CONFIG_NOT_FOUND", { path: "~/.outpost/config.yaml" })
 */
export class ConfigError extends OutpostError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Network errors: HTTP failures, timeouts, connection refused.
 * Code prefix: NETWORK_*
 *
 * Recoverable by design of the polling loop: the operation is abandoned
 * for this cycle and naturally retried on the next one.
 */
export class NetworkError extends OutpostError {
  constructor(
    message: string,
    code: string = "NETWORK_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NetworkError";
  }
}

/**
 * The backend answered 401. Every caller must special-case this: it
 * ends the whole agent session (sign-out), it is never retried.
 */
export class UnauthorizedError extends OutpostError {
  constructor(
    message: string = "Unauthorized",
    context: Record<string, unknown> = {},
  ) {
    super(message, "AUTH_UNAUTHORIZED", context);
    this.name = "UnauthorizedError";
  }
}

/**
 * Validation errors: Zod schema failures, invalid input data.
 * Code prefix: VALIDATION_*
 */
export class ValidationError extends OutpostError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Workspace creation refused: the device already holds
 * max_concurrent_workspaces slots. Not retried automatically.
 */
export class CapacityExceededError extends OutpostError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, "CAPACITY_EXCEEDED", context);
    this.name = "CapacityExceededError";
  }
}

/**
 * A workspace setup or teardown subprocess failed. The message is the
 * captured process output so it can be stored verbatim as the
 * workspace's error_message.
 * Code prefix: SETUP_*
 */
export class SetupFailureError extends OutpostError {
  constructor(
    message: string,
    code: string = "SETUP_FAILED",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "SetupFailureError";
  }
}

/**
 * The capability provider failed to execute a task (non-2xx, timeout,
 * non-zero exit). The task is failed and reported; the retry budget is
 * owned by the backend.
 * Code prefix: PROVIDER_*
 */
export class ProviderExecutionError extends OutpostError {
  constructor(
    message: string,
    code: string = "PROVIDER_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ProviderExecutionError";
  }
}

/**
 * Workspace manager errors: unknown id, invalid lifecycle transition,
 * device not registered.
 * Code prefix: WORKSPACE_*
 */
export class WorkspaceError extends OutpostError {
  constructor(
    message: string,
    code: string = "WORKSPACE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "WorkspaceError";
  }
}

/** Type guard used at every call site that must special-case a 401. */
export function isUnauthorized(err: unknown): err is UnauthorizedError {
  return err instanceof UnauthorizedError;
}

/** Best-effort message extraction for values caught from `catch`. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
