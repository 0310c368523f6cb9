/**
 * Stub service builder: the request/response pairs and delays of one destination
 *
 * @example
 * ```typescript
 * const bookings = service("https://www.my-test.com")
 *   .get("/api/bookings/1")
 *   .willReturn(success(jsonBody({ bookingId: "1" })))
 *   .post("/api/bookings")
 *   .body('{"flightId":"1"}')
 *   .willReturn(created("http://localhost/api/bookings/1"))
 *   .andDelay(100)
 *   .forMethod("POST");
 * ```
 */
import type { DelaySettings, FieldMatcher, MatcherInput, RequestFieldMatcher, RequestResponsePair } from "../types.js";
import { RequestResponsePairSet } from "../simulation/pair-set.js";
import { anyMatcher, exactlyMatches, patternOf } from "./field-matcher.js";
import { toRequestFieldMatcher } from "./matchers.js";
import { RequestMatcherBuilder, type PairRegistrar } from "./request-matcher-builder.js";
import { StubServiceDelaySettingsBuilder, type DelayRegistrar } from "./delay-settings.js";

const SEPARATOR = "://";

/**
 * Groups request matchers for a single base URL
 */
export class StubServiceBuilder implements PairRegistrar, DelayRegistrar {
  private readonly destination: FieldMatcher;
  private readonly scheme: FieldMatcher;
  private readonly requestResponsePairs = new RequestResponsePairSet();
  private readonly delaySettings: DelaySettings[] = [];

  /**
   * @param baseUrl - `scheme://host`, a bare host (any scheme), or a destination matcher
   */
  constructor(baseUrl: string | RequestFieldMatcher) {
    if (typeof baseUrl !== "string") {
      this.destination = baseUrl.fieldMatcher;
      this.scheme = anyMatcher();
      return;
    }

    const index = baseUrl.indexOf(SEPARATOR);
    if (index === -1) {
      this.destination = exactlyMatches(baseUrl);
      this.scheme = anyMatcher();
    } else {
      this.scheme = exactlyMatches(baseUrl.slice(0, index));
      this.destination = exactlyMatches(baseUrl.slice(index + SEPARATOR.length));
    }
  }

  get(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("GET"), path);
  }

  put(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("PUT"), path);
  }

  post(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("POST"), path);
  }

  delete(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("DELETE"), path);
  }

  patch(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("PATCH"), path);
  }

  head(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("HEAD"), path);
  }

  options(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(exactlyMatches("OPTIONS"), path);
  }

  anyMethod(path: MatcherInput): RequestMatcherBuilder<this> {
    return this.requestMatcher(anyMatcher(), path);
  }

  /**
   * Pairs registered so far, without duplicates
   */
  getRequestResponsePairs(): readonly RequestResponsePair[] {
    return Object.freeze(this.requestResponsePairs.values());
  }

  getDelaySettings(): readonly DelaySettings[] {
    return Object.freeze([...this.delaySettings]);
  }

  /**
   * Destination pattern as written (`*` for any)
   */
  getDestination(): string {
    return patternOf(this.destination);
  }

  getDestinationMatcher(): FieldMatcher {
    return this.destination;
  }

  addRequestResponsePair(pair: RequestResponsePair): this {
    this.requestResponsePairs.add(pair);
    return this;
  }

  /**
   * Append a delay; `null` and `undefined` are ignored
   */
  addDelaySetting(delay: DelaySettings | null | undefined): this {
    if (delay) {
      this.delaySettings.push(Object.freeze({ ...delay }));
    }
    return this;
  }

  /**
   * Start a service-wide delay of `ms` milliseconds
   */
  andDelay(ms: number): StubServiceDelaySettingsBuilder<this> {
    return new StubServiceDelaySettingsBuilder(ms, this);
  }

  private requestMatcher(method: FieldMatcher, path: MatcherInput): RequestMatcherBuilder<this> {
    return new RequestMatcherBuilder(
      this,
      method,
      this.scheme,
      this.destination,
      toRequestFieldMatcher(path).fieldMatcher
    );
  }
}

/**
 * Start describing a simulated service
 */
export function service(baseUrl: string | RequestFieldMatcher): StubServiceBuilder {
  return new StubServiceBuilder(baseUrl);
}
