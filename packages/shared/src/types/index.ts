/**
 * Barrel re-export for all type definitions.
 */
export * from "./task.js";
export * from "./device.js";
export * from "./workspace.js";
export * from "./event.js";
export * from "./artifact.js";
export * from "./metrics.js";
