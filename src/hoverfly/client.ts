/**
 * Hoverfly Admin API client
 */
import type { HoverflyClientOptions, HoverflyMode, Simulation } from "../types.js";
import { HoverflyApiError, NetworkError, TimeoutError } from "../errors.js";
import { HoverflyClientOptionsSchema, HoverflyModeSchema, ModeResponseSchema } from "../schemas.js";
import { validateOrThrow } from "../utils/validation.js";
import { parseSimulationDocument, toSimulationDocument } from "../simulation/document.js";

/**
 * Client for interacting with the Hoverfly Admin API
 */
export class HoverflyClient {
  private readonly baseUrl: string;
  private readonly timeout: number;

  /**
   * Create a new Hoverfly admin client
   * @param options - Client configuration options
   */
  constructor(options: HoverflyClientOptions = {}) {
    const validated = validateOrThrow(HoverflyClientOptionsSchema, options, "HoverflyClient options");
    this.baseUrl = validated.baseUrl.replace(/\/+$/, "");
    this.timeout = validated.timeout;
  }

  /**
   * Make an HTTP request to the Admin API with timeout
   * @param path - API endpoint path
   * @param options - Fetch options
   * @returns Response object
   * @throws NetworkError, TimeoutError, HoverflyApiError
   */
  async request(path: string, options: RequestInit = {}): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          ...options.headers,
        },
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new HoverflyApiError(
          `Hoverfly API request failed: ${response.status} ${response.statusText}`,
          response.status,
          body
        );
      }

      return response;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof HoverflyApiError) {
        throw error;
      }

      if (error instanceof Error && error.name === "AbortError") {
        throw new TimeoutError(`Request to ${path} timed out after ${this.timeout}ms`, this.timeout);
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      throw new NetworkError(`Network request to ${path} failed: ${cause.message}`, cause);
    }
  }

  /**
   * Check whether the admin API answers
   * @returns false on any error
   */
  async getHealth(): Promise<boolean> {
    try {
      await this.request("/api/health");
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Replace the loaded simulation
   */
  async setSimulation(simulation: Simulation): Promise<void> {
    await this.request("/api/v2/simulation", {
      method: "PUT",
      body: JSON.stringify(toSimulationDocument(simulation)),
    });
  }

  /**
   * Export the loaded simulation
   * @throws {ValidationError} If Hoverfly returns a malformed document
   */
  async getSimulation(): Promise<Simulation> {
    const response = await this.request("/api/v2/simulation");
    return parseSimulationDocument(await response.json());
  }

  async deleteSimulation(): Promise<void> {
    await this.request("/api/v2/simulation", { method: "DELETE" });
  }

  /**
   * Switch mode
   * @param mode - Target mode
   * @param options.headersWhitelist - Request headers to record in capture mode
   */
  async setMode(mode: HoverflyMode, options: { headersWhitelist?: string[] } = {}): Promise<void> {
    const validated = validateOrThrow(HoverflyModeSchema, mode, "mode");
    const body = options.headersWhitelist
      ? { mode: validated, arguments: { headersWhitelist: options.headersWhitelist } }
      : { mode: validated };
    await this.request("/api/v2/hoverfly/mode", {
      method: "PUT",
      body: JSON.stringify(body),
    });
  }

  async getMode(): Promise<HoverflyMode> {
    const response = await this.request("/api/v2/hoverfly/mode");
    return validateOrThrow(ModeResponseSchema, await response.json(), "mode response").mode;
  }

  /**
   * Restrict proxying to hosts matching `destination`
   */
  async setDestination(destination: string): Promise<void> {
    await this.request("/api/v2/hoverfly/destination", {
      method: "PUT",
      body: JSON.stringify({ destination }),
    });
  }

  /**
   * Get Hoverfly configuration information (version, mode, destination, ...)
   */
  async getConfigInfo(): Promise<Record<string, unknown>> {
    const response = await this.request("/api/v2/hoverfly");
    const info: unknown = await response.json();
    if (typeof info !== "object" || info === null || Array.isArray(info)) {
      throw new HoverflyApiError("Invalid configuration response from Hoverfly", response.status);
    }
    return Object.fromEntries(Object.entries(info));
  }
}
