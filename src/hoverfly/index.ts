/**
 * Hoverfly module exports
 */

export { HoverflyClient } from "./client.js";
export * from "./config.js";
export * from "./process.js";
export { TempFileManager } from "./temp-files.js";
export { findFreePort, isPortAvailable } from "./ports.js";

// Re-export types and schemas for convenience
export type {
  HoverflyClientOptions,
  HoverflyConfig,
  HoverflyConfigOptions,
  HoverflyMode,
} from "../types.js";
export { HoverflyClientOptionsSchema, HoverflyConfigSchema, HoverflyModeSchema } from "../schemas.js";
