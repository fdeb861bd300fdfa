import { InvalidArgumentError } from "../errors/QboError";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

/**
 * HTTP verbs the API is called with
 */
export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Query parameters appended to a request path.
 * `undefined` values are skipped.
 */
export type QueryParams = Record<
  string,
  string | number | boolean | undefined
>;

/**
 * HTTP-client agnostic representation of a response, before normalization.
 *
 * `body` is a string or Buffer as received, or a value the transport already
 * decoded.
 */
export interface RawResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * Normalize a verb to one of {@link HTTP_METHODS}, case-insensitively
 *
 * @throws InvalidArgumentError for any other verb
 */
export function toHttpMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  if (!isHttpMethod(upper)) {
    throw new InvalidArgumentError(`Unhandled request method '${value}'`);
  }
  return upper;
}
