/**
 * @outpost/shared: the contract layer for the outpost monorepo.
 *
 * Every other package imports from here. Contains:
 *   - TypeScript types for tasks, devices, workspaces, events, artifacts and metrics
 *   - Zod schemas for backend payloads
 *   - ULID generation
 *   - Repository URL normalization
 *   - Structured error hierarchy
 */

// Type definitions for all domain entities
export * from "./types/index.js";

// Zod schemas for backend payloads
export * from "./schemas/index.js";

// ULID generation and validation
export * from "./ulid.js";

// Repository URL normalization and naming
export * from "./repo-url.js";

// Structured error classes
export * from "./errors.js";
