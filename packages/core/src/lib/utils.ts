/**
 * Utility functions shared by the core and transport packages
 */

export type JsonObject = Record<string, unknown>;

/**
 * True for `{...}` values: not null, not an array, not a Buffer
 */
export function isPlainObject(value: unknown): value is JsonObject {
  return (
    value !== null &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    !Buffer.isBuffer(value)
  );
}

/**
 * Gets a header value from a headers object (case-insensitive)
 * HTTP headers are case-insensitive per RFC 7230, but JavaScript objects are case-sensitive
 *
 * @param headers Headers object
 * @param headerName Header name to find (case-insensitive)
 * @returns Header value or undefined
 */
export function getHeader(
  headers: Record<string, string | string[] | undefined>,
  headerName: string,
): string | undefined {
  const lowerHeaderName = headerName.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerHeaderName) {
      return Array.isArray(value) ? value[0] : value;
    }
  }

  return undefined;
}

/**
 * Merges header overrides over defaults. An override replaces every case
 * variant of the same header in the defaults.
 *
 * @returns New headers object
 */
export function mergeHeaders(
  defaults: Record<string, string>,
  overrides: Record<string, string> = {},
): Record<string, string> {
  const merged: Record<string, string> = {};
  const overridden = new Set(
    Object.keys(overrides).map((key) => key.toLowerCase()),
  );

  for (const [key, value] of Object.entries(defaults)) {
    if (!overridden.has(key.toLowerCase())) {
      merged[key] = value;
    }
  }

  return { ...merged, ...overrides };
}

const SENSITIVE_HEADER_FRAGMENTS = ["auth", "key", "token", "secret"];

/**
 * Copy of the headers with credentials-bearing values replaced by `[REDACTED]`
 */
export function redactHeaders(
  headers: Record<string, string>,
): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase();
    redacted[key] = SENSITIVE_HEADER_FRAGMENTS.some((fragment) =>
      lowerKey.includes(fragment),
    )
      ? "[REDACTED]"
      : value;
  }
  return redacted;
}

/**
 * Body as text, for parsing and logging. Buffers are decoded as UTF-8.
 */
export function bodyToText(body: unknown): string {
  if (typeof body === "string") return body;
  if (Buffer.isBuffer(body)) return body.toString("utf8");
  if (body instanceof ArrayBuffer) return Buffer.from(body).toString("utf8");
  if (body === undefined || body === null) return "";
  return JSON.stringify(body);
}
