/**
 * Hoverfly configuration resolution
 *
 * @example
 * ```typescript
 * // HOVERFLY_ADMIN_PORT=9888 in the environment
 * const config = loadHoverflyConfig({ proxyPort: 0 });
 * config.adminPort; // 9888
 * config.proxyPort; // 0 (a free port is picked at start)
 * ```
 */
import type { HoverflyConfig, HoverflyConfigOptions } from "../types.js";
import { HoverflyConfigSchema } from "../schemas.js";
import { validateOrThrow } from "../utils/validation.js";

type Environment = Record<string, string | undefined>;

function numberFrom(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === "" ? undefined : Number(value);
}

/**
 * Read configuration from `HOVERFLY_*` environment variables
 */
export function configFromEnv(env: Environment): Record<string, unknown> {
  const entries: [string, unknown][] = [
    ["host", env.HOVERFLY_HOST],
    ["adminPort", numberFrom(env.HOVERFLY_ADMIN_PORT)],
    ["proxyPort", numberFrom(env.HOVERFLY_PROXY_PORT)],
    ["binaryPath", env.HOVERFLY_BINARY],
    ["logLevel", env.HOVERFLY_LOG_LEVEL],
  ];
  return Object.fromEntries(entries.filter(([, value]) => value !== undefined));
}

/**
 * Resolve configuration: explicit options override environment variables,
 * which override defaults
 *
 * @throws {ValidationError} If the merged configuration is invalid
 */
export function loadHoverflyConfig(
  options: HoverflyConfigOptions = {},
  env: Environment = process.env
): HoverflyConfig {
  const explicit = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );
  return validateOrThrow(
    HoverflyConfigSchema,
    { ...configFromEnv(env), ...explicit },
    "hoverfly config"
  );
}

/**
 * Admin API base URL for a configuration
 */
export function adminUrlOf(config: Pick<HoverflyConfig, "host" | "adminPort">): string {
  return `http://${config.host}:${config.adminPort}`;
}

/**
 * Proxy URL for a configuration
 */
export function proxyUrlOf(config: Pick<HoverflyConfig, "host" | "proxyPort">): string {
  return `http://${config.host}:${config.proxyPort}`;
}
