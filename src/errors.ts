/**
 * Custom error classes for the Hoverfly test client
 */

/**
 * Base error class for all Hoverfly test client errors
 */
export class HoverflyClientError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "HoverflyClientError";
    Object.setPrototypeOf(this, HoverflyClientError.prototype);
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends HoverflyClientError {
  constructor(
    message: string,
    public readonly errors?: unknown[]
  ) {
    super(message, { errors });
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when the Hoverfly admin API returns an error response
 */
export class HoverflyApiError extends HoverflyClientError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody?: string
  ) {
    super(message, { statusCode, responseBody });
    this.name = "HoverflyApiError";
    Object.setPrototypeOf(this, HoverflyApiError.prototype);
  }
}

/**
 * Error thrown when network request fails
 */
export class NetworkError extends HoverflyClientError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message, { cause: cause?.message });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Error thrown when request times out
 */
export class TimeoutError extends HoverflyClientError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, { timeoutMs });
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown when a query component cannot be encoded as UTF-8.
 *
 * The charset is fixed, so this only fires for malformed strings such as lone
 * surrogates. It is not meant to be caught.
 */
export class QueryEncodingError extends HoverflyClientError {
  constructor(public readonly input: string) {
    super(`Unable to UTF-8 encode query component: ${JSON.stringify(input)}`, { input });
    this.name = "QueryEncodingError";
    Object.setPrototypeOf(this, QueryEncodingError.prototype);
  }
}

/**
 * Error thrown when a simulation cannot be loaded from its source
 */
export class SimulationSourceError extends HoverflyClientError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly cause?: Error
  ) {
    super(message, { source, cause: cause?.message });
    this.name = "SimulationSourceError";
    Object.setPrototypeOf(this, SimulationSourceError.prototype);
  }
}

/**
 * Error thrown when the Hoverfly binary is not installed
 */
export class HoverflyNotInstalledError extends HoverflyClientError {
  constructor(message = "Hoverfly is not installed") {
    super(message);
    this.name = "HoverflyNotInstalledError";
    Object.setPrototypeOf(this, HoverflyNotInstalledError.prototype);
  }
}

/**
 * Error thrown when Hoverfly fails to start
 */
export class HoverflyStartError extends HoverflyClientError {
  constructor(
    message: string,
    public readonly exitCode?: number
  ) {
    super(message, { exitCode });
    this.name = "HoverflyStartError";
    Object.setPrototypeOf(this, HoverflyStartError.prototype);
  }
}

/**
 * Error thrown when a proxy or admin port is already bound
 */
export class PortInUseError extends HoverflyStartError {
  constructor(public readonly port: number) {
    super(`Port is already in use: ${port}`);
    this.name = "PortInUseError";
    Object.setPrototypeOf(this, PortInUseError.prototype);
  }
}
