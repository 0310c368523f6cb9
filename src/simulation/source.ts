/**
 * Simulation sources: where a simulation imported into Hoverfly comes from
 *
 * @example
 * ```typescript
 * await hoverfly.importSimulation(dslSource(service("www.my-test.com").get("/").willReturn(success())));
 * await hoverfly.importSimulation(fileSource("./simulations/bookings.json"));
 * ```
 */
import { readFile } from "fs/promises";
import type { Simulation } from "../types.js";
import { SimulationSourceError } from "../errors.js";
import { validateFilePath } from "../utils/validation.js";
import type { StubServiceBuilder } from "../dsl/stub-service-builder.js";
import { buildSimulation, emptySimulation, parseSimulationDocument } from "./document.js";

export interface SimulationSource {
  /** Human-readable origin, used in logs and errors */
  readonly description: string;
  load(): Promise<Simulation>;
}

function parseJsonText(text: string, description: string): Simulation {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SimulationSourceError(
      `Simulation from ${description} is not valid JSON`,
      description,
      error instanceof Error ? error : undefined
    );
  }
  return parseSimulationDocument(parsed);
}

/**
 * Simulation built with the DSL
 */
export function dslSource(...services: StubServiceBuilder[]): SimulationSource {
  return {
    description: "dsl",
    load: async () => buildSimulation(...services),
  };
}

export function simulationSource(simulation: Simulation): SimulationSource {
  return {
    description: "simulation",
    load: async () => simulation,
  };
}

export function emptySource(): SimulationSource {
  return {
    description: "empty",
    load: async () => emptySimulation(),
  };
}

/**
 * Simulation document given as a JSON string
 */
export function jsonSource(json: string): SimulationSource {
  return {
    description: "json",
    load: async () => parseJsonText(json, "json"),
  };
}

/**
 * Simulation document read from disk
 * @param path - File path; ".." segments are rejected
 * @param options.baseDir - Directory relative paths resolve against (default: cwd)
 */
export function fileSource(path: string, options?: { baseDir?: string }): SimulationSource {
  const description = `file ${path}`;
  return {
    description,
    load: async () => {
      const resolved = validateFilePath(path, options);
      let content: string;
      try {
        content = await readFile(resolved, "utf-8");
      } catch (error) {
        throw new SimulationSourceError(
          `Unable to read simulation file ${resolved}`,
          description,
          error instanceof Error ? error : undefined
        );
      }
      return parseJsonText(content, description);
    },
  };
}

/**
 * Simulation document fetched over HTTP
 */
export function urlSource(href: string): SimulationSource {
  const description = `url ${href}`;
  return {
    description,
    load: async () => {
      let response: Response;
      try {
        response = await fetch(href);
      } catch (error) {
        throw new SimulationSourceError(
          `Unable to fetch simulation from ${href}`,
          description,
          error instanceof Error ? error : undefined
        );
      }
      if (!response.ok) {
        throw new SimulationSourceError(
          `Unable to fetch simulation from ${href}: ${response.status} ${response.statusText}`,
          description
        );
      }
      return parseJsonText(await response.text(), description);
    },
  };
}
