/**
 * Core type definitions for the Hoverfly test client
 */

// ============================================================================
// Basic Types
// ============================================================================

/**
 * HTTP method accepted by the DSL
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

/**
 * Hoverfly run mode
 * - "simulate": replay the loaded simulation
 * - "capture": record traffic into a simulation
 * - "spy": replay on match, pass through otherwise
 */
export type HoverflyMode = "simulate" | "capture" | "spy" | "synthesize" | "modify" | "diff";

/**
 * Log threshold ("silent" disables all output)
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

// ============================================================================
// Matching Model
// ============================================================================

/**
 * Matching rule applied to a single request field.
 *
 * `blank` accepts only an empty or absent value; `any` accepts everything.
 */
export type FieldMatcher =
  | { readonly kind: "exact"; readonly value: string }
  | { readonly kind: "glob"; readonly value: string }
  | { readonly kind: "regex"; readonly value: string }
  | { readonly kind: "json"; readonly value: string }
  | { readonly kind: "blank" }
  | { readonly kind: "any" };

/**
 * Matcher kinds that carry a pattern value
 */
export type ValuedFieldMatcher = Extract<FieldMatcher, { value: string }>;

/**
 * DSL-level matcher: the raw pattern (used for query encoding) and the
 * field matcher it resolves to
 */
export interface RequestFieldMatcher {
  readonly pattern: string;
  readonly fieldMatcher: FieldMatcher;
}

/**
 * Argument accepted wherever the DSL takes a matcher; strings are exact matches
 */
export type MatcherInput = string | RequestFieldMatcher;

/**
 * Request descriptor: one matcher per request field plus expected headers
 */
export interface RequestMatcher {
  readonly path: FieldMatcher;
  readonly method: FieldMatcher;
  readonly destination: FieldMatcher;
  readonly scheme: FieldMatcher;
  readonly query: FieldMatcher;
  readonly body: FieldMatcher;
  readonly headers: Readonly<Record<string, readonly string[]>>;
}

/**
 * Canned response returned by Hoverfly for a matched request
 */
export interface Response {
  readonly status: number;
  readonly body: string;
  readonly encodedBody: boolean;
  readonly headers: Readonly<Record<string, readonly string[]>>;
  readonly templated: boolean;
}

/**
 * A request matcher and the response Hoverfly serves for it
 */
export interface RequestResponsePair {
  readonly request: RequestMatcher;
  readonly response: Response;
}

/**
 * Artificial latency applied by Hoverfly to requests whose URL matches `urlPattern`
 */
export interface DelaySettings {
  readonly urlPattern: string;
  /** Delay in milliseconds */
  readonly delay: number;
  /** Restricts the delay to one HTTP method */
  readonly httpMethod?: string;
}

/**
 * Simulation loaded into Hoverfly
 */
export interface Simulation {
  readonly pairs: readonly RequestResponsePair[];
  readonly delays: readonly DelaySettings[];
  readonly schemaVersion: string;
}

// ============================================================================
// Simulation Document (Hoverfly v3 JSON)
// ============================================================================

/**
 * Serialized field matcher; `{}` is a blank matcher, `null` matches anything
 */
export interface FieldMatcherDocument {
  exactMatch?: string;
  globMatch?: string;
  regexMatch?: string;
  jsonMatch?: string;
}

export interface RequestDocument {
  path: FieldMatcherDocument | null;
  method: FieldMatcherDocument | null;
  destination: FieldMatcherDocument | null;
  scheme: FieldMatcherDocument | null;
  query: FieldMatcherDocument | null;
  body: FieldMatcherDocument | null;
  headers: Record<string, string[]>;
}

export interface ResponseDocument {
  status: number;
  body: string;
  encodedBody: boolean;
  headers: Record<string, string[]>;
  templated: boolean;
}

export interface DelayDocument {
  urlPattern: string;
  delay: number;
  httpMethod?: string;
}

export interface SimulationDocument {
  data: {
    pairs: { request: RequestDocument; response: ResponseDocument }[];
    globalActions: {
      delays: DelayDocument[];
    };
  };
  meta: {
    schemaVersion: string;
  };
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Options for the Hoverfly admin API client
 */
export interface HoverflyClientOptions {
  /** Admin API base URL (default: http://localhost:8888) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 5000) */
  timeout?: number;
}

/**
 * Options for connecting to, or starting, a Hoverfly instance
 */
export interface HoverflyConfigOptions {
  host?: string;
  /** Admin API port (default: 8888, 0 picks a free port) */
  adminPort?: number;
  /** Proxy port (default: 8500, 0 picks a free port) */
  proxyPort?: number;
  /** Connect to an already running instance instead of spawning one */
  remote?: boolean;
  binaryPath?: string;
  startupTimeout?: number;
  requestTimeout?: number;
  captureHeaders?: string[];
  webserver?: boolean;
  sslCertificatePath?: string;
  sslKeyPath?: string;
  destination?: string;
  logLevel?: LogLevel;
}

/**
 * Resolved Hoverfly configuration (defaults applied)
 */
export interface HoverflyConfig {
  host: string;
  adminPort: number;
  proxyPort: number;
  remote: boolean;
  binaryPath: string;
  startupTimeout: number;
  requestTimeout: number;
  captureHeaders?: string[];
  webserver: boolean;
  sslCertificatePath?: string;
  sslKeyPath?: string;
  destination?: string;
  logLevel: LogLevel;
}
