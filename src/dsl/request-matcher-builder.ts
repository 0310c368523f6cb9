/**
 * Builder for a single request matcher and the response paired with it
 */
import type {
  DelaySettings,
  FieldMatcher,
  MatcherInput,
  RequestFieldMatcher,
  RequestMatcher,
  RequestResponsePair,
} from "../types.js";
import { anyMatcher, blankMatcher, exactlyMatches, isExact } from "./field-matcher.js";
import { any, toRequestFieldMatcher } from "./matchers.js";
import { buildQueryMatcher, createQueryMatcherMultimap } from "./query-params.js";
import { isHttpBodyConverter, type HttpBodyConverter } from "./body-converter.js";
import { responseDelaySettings } from "./delay-settings.js";
import type { ResponseBuilder } from "./response-builder.js";

/**
 * Receives the finished pairs of a request matcher builder
 */
export interface PairRegistrar {
  addRequestResponsePair(pair: RequestResponsePair): unknown;
  addDelaySetting(delay: DelaySettings | null | undefined): unknown;
}

/**
 * Created by the method entry points of `StubServiceBuilder`; `willReturn`
 * hands the pair back to that builder and returns it for chaining.
 *
 * Unset fields match blank values. Query and body can instead match anything
 * via {@link anyQueryParams} and {@link anyBody}.
 */
export class RequestMatcherBuilder<P extends PairRegistrar> {
  private readonly queryPatterns = createQueryMatcherMultimap();
  private readonly headers = new Map<string, string>();
  private query: FieldMatcher = blankMatcher();
  private bodyMatcher: FieldMatcher = blankMatcher();
  private isFuzzyMatchedQuery = false;

  constructor(
    private readonly owner: P,
    private readonly method: FieldMatcher,
    private readonly scheme: FieldMatcher,
    private readonly destination: FieldMatcher,
    private readonly path: FieldMatcher
  ) {}

  /**
   * Match the request body exactly, or with a custom matcher
   */
  body(body: string | RequestFieldMatcher | HttpBodyConverter): this {
    if (typeof body === "string") {
      this.bodyMatcher = exactlyMatches(body);
    } else if (isHttpBodyConverter(body)) {
      this.bodyMatcher = exactlyMatches(body.body());
    } else {
      this.bodyMatcher = body.fieldMatcher;
    }
    return this;
  }

  anyBody(): this {
    this.bodyMatcher = anyMatcher();
    return this;
  }

  /**
   * Expect a header value; a second call with the same key replaces the first
   */
  header(key: string, value: string): this {
    this.headers.set(key, value);
    return this;
  }

  /**
   * Expect a query parameter.
   *
   * Without values the key may carry any value. Every value adds one
   * `key=value` pair, so repeated keys are supported. A non-exact key or
   * value turns the whole query into a glob match.
   *
   * @example
   * ```typescript
   * .queryParam("tag", "a", "b")        // exact "tag=a&tag=b"
   * .queryParam("id", matches("*"))     // glob "id=*"
   * ```
   */
  queryParam(key: MatcherInput, ...values: MatcherInput[]): this {
    if (values.length === 0) {
      return this.queryParam(key, any());
    }

    const keyMatcher = toRequestFieldMatcher(key);
    for (const value of values) {
      const valueMatcher = toRequestFieldMatcher(value);
      if (!isExact(keyMatcher.fieldMatcher) || !isExact(valueMatcher.fieldMatcher)) {
        this.isFuzzyMatchedQuery = true;
      }
      this.queryPatterns.add(keyMatcher, valueMatcher);
    }
    return this;
  }

  /**
   * Accept any query string. Discards parameters added so far; parameters
   * added afterwards take precedence again.
   */
  anyQueryParams(): this {
    this.queryPatterns.clear();
    this.isFuzzyMatchedQuery = false;
    this.query = anyMatcher();
    return this;
  }

  /**
   * Pair this matcher with a response and register it with the service
   * @returns The owning service builder for further matchers
   */
  willReturn(responseBuilder: ResponseBuilder): P {
    const request = this.build();
    const pair: RequestResponsePair = { request, response: responseBuilder.build() };
    this.owner.addRequestResponsePair(Object.freeze(pair));

    const delay = responseBuilder.getDelay();
    if (delay !== undefined) {
      this.owner.addDelaySetting(responseDelaySettings(request, delay));
    }
    return this.owner;
  }

  /**
   * Build the request matcher without registering it
   */
  build(): RequestMatcher {
    const query = this.queryPatterns.isEmpty()
      ? this.query
      : buildQueryMatcher(this.queryPatterns, this.isFuzzyMatchedQuery);

    const request: RequestMatcher = {
      path: this.path,
      method: this.method,
      destination: this.destination,
      scheme: this.scheme,
      query,
      body: this.bodyMatcher,
      headers: Object.fromEntries(
        Array.from(this.headers, ([key, value]): [string, readonly string[]] => [
          key,
          Object.freeze([value]),
        ])
      ),
    };
    return Object.freeze(request);
  }
}
