/**
 * Barrel re-export for all Zod schemas.
 */
export * from "./helpers.js";
export * from "./task.js";
export * from "./device.js";
export * from "./workspace.js";
export * from "./artifact.js";
