/**
 * hoverfly-test-client
 * Fluent simulation DSL and lifecycle management for the Hoverfly API simulator
 */

// Core exports
export * from "./errors.js";
export * from "./schemas.js";

// Types - explicit exports to avoid conflicts
export type {
  HttpMethod,
  HoverflyMode,
  LogLevel,
  FieldMatcher,
  ValuedFieldMatcher,
  RequestFieldMatcher,
  MatcherInput,
  RequestMatcher,
  Response,
  RequestResponsePair,
  DelaySettings,
  Simulation,
  FieldMatcherDocument,
  RequestDocument,
  ResponseDocument,
  DelayDocument,
  SimulationDocument,
  HoverflyClientOptions,
  HoverflyConfigOptions,
  HoverflyConfig,
} from "./types.js";

// DSL module
export * from "./dsl/index.js";

// Simulation module
export * from "./simulation/index.js";

// Hoverfly module
export * from "./hoverfly/index.js";

// Utilities
export { createLogger, Logger, type LogSink } from "./utils/logger.js";
export { formEncode } from "./utils/encoding.js";

// Version
export const VERSION = "0.1.0";
