import { ResponseParseError, ResponseShapeError } from "../errors/QboError";
import { singularEntityName } from "../lib/entity";
import { LOG_TAG, Logger, noopLogger } from "../lib/logger";
import { bodyToText, getHeader, isPlainObject } from "../lib/utils";
import { RawResponse } from "../types/http";
import { classifyEnvelope } from "./envelope";

/**
 * Outcome of normalizing a response.
 *
 * `degraded` means parsing or unwrapping failed. Its `value` is the decoded
 * body when decoding succeeded, `null` when it did not.
 */
export type NormalizedResult =
  | { status: "ok"; value: unknown }
  | { status: "degraded"; value: unknown; error: Error };

export interface NormalizeOptions {
  /**
   * Entity label, e.g. `"customers"` or `"Customer"`. Without it the whole
   * decoded body is returned.
   */
  entity?: string;
  logger?: Logger;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Decode a response body. JSON content types are parsed, everything else
 * (PDFs, plain text) is returned unchanged.
 */
export function parseResponseBody(response: RawResponse): unknown {
  const contentType = getHeader(response.headers, "content-type") ?? "";
  if (!contentType.toLowerCase().includes("json")) {
    return response.body;
  }

  const { body } = response;
  if (typeof body === "string" || Buffer.isBuffer(body) || body instanceof ArrayBuffer) {
    return JSON.parse(bodyToText(body));
  }
  // Already decoded by the transport
  return body;
}

/**
 * Pull the entity out of a decoded body.
 *
 * @throws ResponseShapeError when the body is not a JSON object or an envelope is malformed
 */
export function extractEntity(
  data: unknown,
  entity: string,
  logger: Logger = noopLogger,
): unknown {
  const entityName = singularEntityName(entity);
  const envelope = classifyEnvelope(data);

  switch (envelope.kind) {
    case "query": {
      const { queryResponse } = envelope;
      // Empty result set
      if (Object.keys(queryResponse).length === 0) return null;
      return entityName in queryResponse
        ? queryResponse[entityName]
        : queryResponse;
    }

    case "attachable": {
      const first: unknown = envelope.items[0];
      if (first === undefined || first === null) return null;
      if (!isPlainObject(first)) {
        throw new ResponseShapeError("AttachableResponse entry is not an object");
      }
      return entityName in first ? first[entityName] : first;
    }

    case "entity": {
      const { body } = envelope;
      if (entityName in body) return body[entityName];
      logger.debug(
        `${LOG_TAG} entity name not in response body: entity=${JSON.stringify(entity)} entity_name=${JSON.stringify(entityName)} body=${JSON.stringify(body)}`,
      );
      return body;
    }

    case "unknown":
      throw new ResponseShapeError(
        `expected a JSON object for entity ${entityName}, got ${Array.isArray(envelope.body) ? "array" : typeof envelope.body}`,
      );
  }
}

/**
 * Decode a raw response and, when an entity is given and the body decodes to
 * a JSON object, unwrap the entity from its envelope. Any other body is
 * returned as decoded.
 *
 * Never throws. Decoding and unwrapping failures are logged at debug level and
 * reported as a `degraded` result, since the API wraps data inconsistently
 * across endpoints and callers are expected to cope with partial data.
 */
export function normalizeResponse(
  response: RawResponse,
  options: NormalizeOptions = {},
): NormalizedResult {
  const logger = options.logger ?? noopLogger;
  let data: unknown = null;

  try {
    data = parseResponseBody(response);
    // Only JSON objects carry an envelope; arrays, text and binary pass through
    if (options.entity === undefined || !isPlainObject(data)) {
      return { status: "ok", value: data };
    }
    return { status: "ok", value: extractEntity(data, options.entity, logger) };
  } catch (error) {
    const cause = toError(error);
    logger.debug(
      `${LOG_TAG} response parsing error: entity=${JSON.stringify(options.entity ?? null)} body=${JSON.stringify(bodyToText(response.body))} exception=${cause.name}: ${cause.message}`,
    );
    return { status: "degraded", value: data, error: cause };
  }
}

export interface UnwrapOptions {
  /**
   * Throw {@link ResponseParseError} on a degraded result instead of returning
   * its partial value
   */
  strict?: boolean;
}

export function unwrapNormalizedResult(
  result: NormalizedResult,
  options: UnwrapOptions = {},
): unknown {
  if (result.status === "degraded" && options.strict) {
    throw new ResponseParseError(
      `Could not normalize response: ${result.error.message}`,
      result.value,
      result.error,
    );
  }
  return result.value;
}
