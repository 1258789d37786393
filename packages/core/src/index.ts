/**
 * @outpost/core: agent services barrel export.
 *
 * Everything here is transport-agnostic: services receive the backend
 * contracts (TaskQueueClient, ExecutorBackend), a ProcessRunner and a pino
 * Logger through their constructors. The CLI wires the real HTTP client
 * and NodeProcessRunner; tests wire in-memory fakes.
 */

// Backend contracts implemented by the CLI's API client
export type { TaskQueueClient, ExecutorBackend, NewWorkspace } from "./backend.js";

// Task engine: poll, claim, execute, report
export {
  TaskEngine,
  type TaskEngineOptions,
  type WorkspaceExecutionOptions,
  type EngineStatus,
  type EngineStatistics,
  type EngineSnapshot,
  type EngineLogEntry,
} from "./task-engine.js";

// Workspace lifecycle: state machine and manager
export {
  TRANSITIONS,
  isValidTransition,
  holdsCapacitySlot,
  isSetupComplete,
  isSetupSettled,
} from "./workspace-lifecycle.js";
export {
  WorkspaceManager,
  WORKSPACE_DIRS,
  METADATA_FILE,
  type WorkspaceManagerOptions,
  type CleanupOptions,
  type EventInput,
} from "./workspace-manager.js";

// Device identity, registration and heartbeat
export {
  DeviceRegistry,
  HEARTBEAT_INTERVAL_MS,
  defaultDeviceSettings,
  type DeviceIdentity,
  type DeviceDefaults,
  type DeviceRegistryOptions,
} from "./device-registry.js";
export { resolveHardwareId, type HardwareIdSources } from "./hardware-id.js";

// Capability providers
export {
  flattenContext,
  buildTaskPrompt,
  estimateCostUsd,
  MODEL_PRICING,
  type CapabilityProvider,
  type ExecutionRequest,
  type ExecutionResult,
} from "./providers/capability-provider.js";
export {
  AnthropicProvider,
  toProviderError,
  type AnthropicProviderOptions,
  type MessageCreator,
  type MessageCreateBody,
  type ProviderMessage,
} from "./providers/anthropic-provider.js";
export { CommandProvider, type CommandProviderOptions } from "./providers/command-provider.js";

// Runtime utilities
export { Ticker, type TickFn, type TickerOptions } from "./ticker.js";
export {
  NodeProcessRunner,
  describeFailure,
  type ProcessRunner,
  type ProcessRunOptions,
  type ProcessResult,
} from "./process-runner.js";
export { measureDirectory, listFiles, bytesToMb, type DiskUsage } from "./disk-usage.js";
