/**
 * Response builder and common response creators
 *
 * @example
 * ```typescript
 * service("www.my-test.com")
 *   .post("/api/bookings")
 *   .willReturn(created("http://localhost/api/bookings/1").withDelay(200));
 * ```
 */
import type { Response } from "../types.js";
import { DelayMsSchema, StatusCodeSchema } from "../schemas.js";
import { validateOrThrow } from "../utils/validation.js";
import { isHttpBodyConverter, type HttpBodyConverter } from "./body-converter.js";

const CONTENT_TYPE = "Content-Type";

/**
 * Fluent builder for a {@link Response}
 */
export class ResponseBuilder {
  private statusCode = 200;
  private bodyText = "";
  private isEncodedBody = false;
  private isTemplated = false;
  private readonly headers = new Map<string, string[]>();
  private delayMs: number | undefined;

  status(code: number): this {
    this.statusCode = validateOrThrow(StatusCodeSchema, code, "status");
    return this;
  }

  /**
   * Set the body; a converter also sets the Content-Type header
   */
  body(body: string | HttpBodyConverter): this {
    if (isHttpBodyConverter(body)) {
      this.bodyText = body.body();
      this.headers.set(CONTENT_TYPE, [body.contentType()]);
    } else {
      this.bodyText = body;
    }
    return this;
  }

  /**
   * Mark the body as base64 encoded
   */
  encodedBody(encoded = true): this {
    this.isEncodedBody = encoded;
    return this;
  }

  /**
   * Append header values; repeated calls accumulate
   */
  header(name: string, ...values: string[]): this {
    const existing = this.headers.get(name) ?? [];
    this.headers.set(name, [...existing, ...values]);
    return this;
  }

  /**
   * Let Hoverfly render the body as a template
   */
  templated(enabled = true): this {
    this.isTemplated = enabled;
    return this;
  }

  /**
   * Delay this response by `ms` milliseconds
   */
  withDelay(ms: number): this {
    this.delayMs = validateOrThrow(DelayMsSchema, ms, "withDelay");
    return this;
  }

  getDelay(): number | undefined {
    return this.delayMs;
  }

  build(): Response {
    const response: Response = {
      status: this.statusCode,
      body: this.bodyText,
      encodedBody: this.isEncodedBody,
      headers: Object.fromEntries(
        Array.from(this.headers, ([name, values]): [string, readonly string[]] => [
          name,
          Object.freeze([...values]),
        ])
      ),
      templated: this.isTemplated,
    };
    return Object.freeze(response);
  }
}

export function response(): ResponseBuilder {
  return new ResponseBuilder();
}

/**
 * 200 OK, optionally with a body and content type
 */
export function success(body?: string, contentType?: string): ResponseBuilder {
  const builder = response().status(200);
  if (body !== undefined) {
    builder.body(body);
  }
  if (contentType !== undefined) {
    builder.header(CONTENT_TYPE, contentType);
  }
  return builder;
}

/**
 * 201 Created with an optional Location header
 */
export function created(location?: string): ResponseBuilder {
  const builder = response().status(201);
  if (location) {
    builder.header("Location", location);
  }
  return builder;
}

export function accepted(): ResponseBuilder {
  return response().status(202);
}

export function noContent(): ResponseBuilder {
  return response().status(204);
}

export function badRequest(): ResponseBuilder {
  return response().status(400);
}

export function unauthorised(): ResponseBuilder {
  return response().status(401);
}

export function forbidden(): ResponseBuilder {
  return response().status(403);
}

export function notFound(): ResponseBuilder {
  return response().status(404);
}

export function serverError(): ResponseBuilder {
  return response().status(500);
}
