/**
 * Delay settings builders
 */
import type { DelaySettings, FieldMatcher, HttpMethod, RequestMatcher } from "../types.js";
import { DelayMsSchema } from "../schemas.js";
import { validateOrThrow } from "../utils/validation.js";
import { globToRegexSource, patternOf } from "./field-matcher.js";

/**
 * Owner of a delay list scoped to one destination
 */
export interface DelayRegistrar {
  getDestinationMatcher(): FieldMatcher;
  addDelaySetting(delay: DelaySettings | null | undefined): unknown;
}

/**
 * Service-wide delay, created by `StubServiceBuilder.andDelay()`
 */
export class StubServiceDelaySettingsBuilder<P extends DelayRegistrar> {
  private readonly delay: number;

  constructor(
    delay: number,
    private readonly owner: P
  ) {
    this.delay = validateOrThrow(DelayMsSchema, delay, "andDelay");
  }

  /**
   * Delay every request to the service
   */
  forAll(): P {
    this.owner.addDelaySetting({
      urlPattern: urlPatternOf(this.owner.getDestinationMatcher()),
      delay: this.delay,
    });
    return this.owner;
  }

  /**
   * Delay requests to the service using one HTTP method
   */
  forMethod(method: HttpMethod): P {
    this.owner.addDelaySetting({
      urlPattern: urlPatternOf(this.owner.getDestinationMatcher()),
      delay: this.delay,
      httpMethod: method,
    });
    return this.owner;
  }
}

/**
 * Hoverfly reads delay url patterns as regular expressions. Globs are
 * translated; exact values are used verbatim.
 */
export function urlPatternOf(matcher: FieldMatcher): string {
  switch (matcher.kind) {
    case "glob":
      return globToRegexSource(matcher.value);
    case "any":
      return ".*";
    default:
      return patternOf(matcher);
  }
}

/**
 * Delay setting for a single request, derived from a response delay.
 *
 * The URL pattern is the destination pattern followed by the path pattern;
 * the method is only constrained when it is matched exactly.
 */
export function responseDelaySettings(request: RequestMatcher, delay: number): DelaySettings {
  const urlPattern = `${urlPatternOf(request.destination)}${urlPatternOf(request.path)}`;
  if (request.method.kind === "exact") {
    return { urlPattern, delay, httpMethod: request.method.value };
  }
  return { urlPattern, delay };
}
