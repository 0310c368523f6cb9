/**
 * Simulation assembly and conversion to and from the Hoverfly v3 JSON document
 */
import type {
  DelaySettings,
  RequestDocument,
  RequestMatcher,
  RequestResponsePair,
  Simulation,
  SimulationDocument,
} from "../types.js";
import { SimulationDocumentSchema } from "../schemas.js";
import { validateOrThrow } from "../utils/validation.js";
import { fromFieldMatcherDocument, toFieldMatcherDocument } from "../dsl/field-matcher.js";
import type { StubServiceBuilder } from "../dsl/stub-service-builder.js";
import { RequestResponsePairSet, canonicalize } from "./pair-set.js";

export const SCHEMA_VERSION = "v3";

function copyHeaders(
  headers: Readonly<Record<string, readonly string[]>>
): Record<string, string[]> {
  return Object.fromEntries(
    Object.entries(headers).map(([name, values]): [string, string[]] => [name, [...values]])
  );
}

function freezeHeaders(
  headers: Record<string, string[]>
): Readonly<Record<string, readonly string[]>> {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(headers).map(([name, values]): [string, readonly string[]] => [
        name,
        Object.freeze([...values]),
      ])
    )
  );
}

/**
 * Merge the pairs and delays of several services into one simulation.
 * Pairs are deduplicated across services; delays keep service order.
 */
export function buildSimulation(...services: StubServiceBuilder[]): Simulation {
  const pairs = new RequestResponsePairSet();
  const delays: DelaySettings[] = [];

  for (const stub of services) {
    for (const pair of stub.getRequestResponsePairs()) {
      pairs.add(pair);
    }
    delays.push(...stub.getDelaySettings());
  }

  return Object.freeze({
    pairs: Object.freeze(pairs.values()),
    delays: Object.freeze(delays),
    schemaVersion: SCHEMA_VERSION,
  });
}

export function emptySimulation(): Simulation {
  return buildSimulation();
}

function toRequestDocument(request: RequestMatcher): RequestDocument {
  return {
    path: toFieldMatcherDocument(request.path),
    method: toFieldMatcherDocument(request.method),
    destination: toFieldMatcherDocument(request.destination),
    scheme: toFieldMatcherDocument(request.scheme),
    query: toFieldMatcherDocument(request.query),
    body: toFieldMatcherDocument(request.body),
    headers: copyHeaders(request.headers),
  };
}

/**
 * Convert a simulation to the JSON document Hoverfly imports
 */
export function toSimulationDocument(simulation: Simulation): SimulationDocument {
  return {
    data: {
      pairs: simulation.pairs.map(({ request, response }) => ({
        request: toRequestDocument(request),
        response: {
          status: response.status,
          body: response.body,
          encodedBody: response.encodedBody,
          headers: copyHeaders(response.headers),
          templated: response.templated,
        },
      })),
      globalActions: {
        delays: simulation.delays.map((delay) => ({ ...delay })),
      },
    },
    meta: {
      schemaVersion: simulation.schemaVersion,
    },
  };
}

/**
 * Validate a JSON document and convert it to a simulation
 * @throws {ValidationError} If the document does not match the schema
 */
export function parseSimulationDocument(input: unknown): Simulation {
  const document = validateOrThrow(SimulationDocumentSchema, input, "simulation document");

  const pairs = new RequestResponsePairSet(
    document.data.pairs.map(({ request, response }): RequestResponsePair => {
      const requestMatcher: RequestMatcher = {
        path: fromFieldMatcherDocument(request.path),
        method: fromFieldMatcherDocument(request.method),
        destination: fromFieldMatcherDocument(request.destination),
        scheme: fromFieldMatcherDocument(request.scheme),
        query: fromFieldMatcherDocument(request.query),
        body: fromFieldMatcherDocument(request.body),
        headers: freezeHeaders(request.headers),
      };
      return Object.freeze({
        request: Object.freeze(requestMatcher),
        response: Object.freeze({ ...response, headers: freezeHeaders(response.headers) }),
      });
    })
  );

  return Object.freeze({
    pairs: Object.freeze(pairs.values()),
    delays: Object.freeze(
      document.data.globalActions.delays.map((delay): DelaySettings => Object.freeze({ ...delay }))
    ),
    schemaVersion: document.meta.schemaVersion,
  });
}

/**
 * Structural equality; pair order is not significant, delay order is
 */
export function simulationsEqual(a: Simulation, b: Simulation): boolean {
  if (a.schemaVersion !== b.schemaVersion || a.pairs.length !== b.pairs.length) {
    return false;
  }
  const pairs = new RequestResponsePairSet(a.pairs);
  return (
    b.pairs.every((pair) => pairs.has(pair)) &&
    canonicalize(a.delays) === canonicalize(b.delays)
  );
}
