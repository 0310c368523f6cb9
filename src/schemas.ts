/**
 * Zod schemas for runtime validation
 */
import { z } from "zod";

// ============================================================================
// Basic Schemas
// ============================================================================

/**
 * HTTP method schema
 */
export const HttpMethodSchema = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"]);

/**
 * Hoverfly mode schema
 */
export const HoverflyModeSchema = z.enum([
  "simulate",
  "capture",
  "spy",
  "synthesize",
  "modify",
  "diff",
]);

/**
 * Log level schema
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Port schema (0 means "pick a free port")
 */
export const PortSchema = z.number().int().min(0).max(65535);

/**
 * HTTP status code schema
 */
export const StatusCodeSchema = z.number().int().min(100).max(599);

/**
 * Delay schema (milliseconds)
 */
export const DelayMsSchema = z.number().int().nonnegative();

// ============================================================================
// Simulation Document Schemas
// ============================================================================

/**
 * Field matcher schema (Hoverfly v3)
 */
export const FieldMatcherDocumentSchema = z.object({
  exactMatch: z.string().optional(),
  globMatch: z.string().optional(),
  regexMatch: z.string().optional(),
  jsonMatch: z.string().optional(),
});

const RequestFieldSchema = FieldMatcherDocumentSchema.nullable()
  .optional()
  .transform((value) => value ?? null);

const HeadersSchema = z.record(z.string(), z.array(z.string()));

/**
 * Request matcher schema
 */
export const RequestDocumentSchema = z.object({
  path: RequestFieldSchema,
  method: RequestFieldSchema,
  destination: RequestFieldSchema,
  scheme: RequestFieldSchema,
  query: RequestFieldSchema,
  body: RequestFieldSchema,
  headers: HeadersSchema.nullable()
    .optional()
    .transform((value) => value ?? {}),
});

/**
 * Response schema
 */
export const ResponseDocumentSchema = z.object({
  status: StatusCodeSchema,
  body: z.string().optional().default(""),
  encodedBody: z.boolean().optional().default(false),
  headers: HeadersSchema.nullable()
    .optional()
    .transform((value) => value ?? {}),
  templated: z.boolean().optional().default(false),
});

/**
 * Delay settings schema
 */
export const DelayDocumentSchema = z.object({
  urlPattern: z.string().min(1, "Delay urlPattern cannot be empty"),
  delay: DelayMsSchema,
  httpMethod: z.string().optional(),
});

/**
 * Full simulation document schema
 */
export const SimulationDocumentSchema = z.object({
  data: z.object({
    pairs: z
      .array(
        z.object({
          request: RequestDocumentSchema,
          response: ResponseDocumentSchema,
        })
      )
      .optional()
      .default([]),
    globalActions: z
      .object({
        delays: z.array(DelayDocumentSchema).optional().default([]),
      })
      .optional()
      .default({}),
  }),
  meta: z.object({
    schemaVersion: z.string().min(1),
  }),
});

/**
 * Admin API mode response schema
 */
export const ModeResponseSchema = z.object({
  mode: HoverflyModeSchema,
});

// ============================================================================
// Client Options Schemas
// ============================================================================

/**
 * HoverflyClient options schema
 */
export const HoverflyClientOptionsSchema = z.object({
  baseUrl: z.string().url().optional().default("http://localhost:8888"),
  timeout: z.number().int().positive().optional().default(5000),
});

/**
 * Hoverfly instance configuration schema
 */
export const HoverflyConfigSchema = z
  .object({
    host: z.string().min(1).optional().default("localhost"),
    adminPort: PortSchema.optional().default(8888),
    proxyPort: PortSchema.optional().default(8500),
    remote: z.boolean().optional().default(false),
    binaryPath: z.string().min(1).optional().default("hoverfly"),
    startupTimeout: z.number().int().positive().optional().default(10000),
    requestTimeout: z.number().int().positive().optional().default(5000),
    captureHeaders: z.array(z.string().min(1)).optional(),
    webserver: z.boolean().optional().default(false),
    sslCertificatePath: z.string().min(1).optional(),
    sslKeyPath: z.string().min(1).optional(),
    destination: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional().default("info"),
  })
  .refine((config) => (config.sslCertificatePath === undefined) === (config.sslKeyPath === undefined), {
    message: "sslCertificatePath and sslKeyPath must be set together",
    path: ["sslKeyPath"],
  })
  .refine((config) => config.adminPort === 0 || config.adminPort !== config.proxyPort, {
    message: "adminPort and proxyPort must differ",
    path: ["proxyPort"],
  });
