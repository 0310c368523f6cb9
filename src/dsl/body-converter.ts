/**
 * Body converters turn a value into a request or response body plus its content type
 */
import { ValidationError } from "../errors.js";

export interface HttpBodyConverter {
  body(): string;
  contentType(): string;
}

export const APPLICATION_JSON = "application/json";
export const APPLICATION_XML = "application/xml";

/**
 * Serialize a value to JSON
 * @throws {ValidationError} If the value has no JSON representation (e.g. `undefined`)
 */
export function jsonBody(value: unknown): HttpBodyConverter {
  const serialized: unknown = JSON.stringify(value);
  if (typeof serialized !== "string") {
    throw new ValidationError("jsonBody: value cannot be serialized to JSON");
  }
  return {
    body: () => serialized,
    contentType: () => APPLICATION_JSON,
  };
}

export function xmlBody(xml: string): HttpBodyConverter {
  return {
    body: () => xml,
    contentType: () => APPLICATION_XML,
  };
}

export function isHttpBodyConverter(value: unknown): value is HttpBodyConverter {
  return (
    typeof value === "object" &&
    value !== null &&
    "body" in value &&
    "contentType" in value &&
    typeof value.body === "function" &&
    typeof value.contentType === "function"
  );
}
