/**
 * DSL module exports
 */

export * from "./field-matcher.js";
export * from "./matchers.js";
export * from "./query-params.js";
export * from "./body-converter.js";
export * from "./response-builder.js";
export * from "./delay-settings.js";
export * from "./request-matcher-builder.js";
export * from "./stub-service-builder.js";

// Re-export types for convenience
export type {
  FieldMatcher,
  MatcherInput,
  RequestFieldMatcher,
  RequestMatcher,
  RequestResponsePair,
  Response,
  DelaySettings,
} from "../types.js";
