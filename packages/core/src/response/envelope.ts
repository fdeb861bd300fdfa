import { ResponseShapeError } from "../errors/QboError";
import { isPlainObject, JsonObject } from "../lib/utils";

/**
 * The ways the API wraps the data of a response.
 *
 * - `query`: list queries, `{ QueryResponse: { Customer: [...], maxResults } }`
 * - `attachable`: attachment uploads, `{ AttachableResponse: [{ Attachable: {...} }] }`
 * - `entity`: single-entity reads and writes, `{ Customer: {...}, time }`
 * - `unknown`: anything that is not a JSON object
 */
export type ResponseEnvelope =
  | { kind: "query"; body: JsonObject; queryResponse: JsonObject }
  | { kind: "attachable"; body: JsonObject; items: unknown[] }
  | { kind: "entity"; body: JsonObject }
  | { kind: "unknown"; body: unknown };

/**
 * Identify the envelope of a decoded response body by the key it carries.
 *
 * @throws ResponseShapeError when a known envelope key holds a value of the wrong type
 */
export function classifyEnvelope(data: unknown): ResponseEnvelope {
  if (!isPlainObject(data)) {
    return { kind: "unknown", body: data };
  }

  if ("QueryResponse" in data) {
    const queryResponse = data.QueryResponse;
    if (!isPlainObject(queryResponse)) {
      throw new ResponseShapeError("QueryResponse is not an object");
    }
    return { kind: "query", body: data, queryResponse };
  }

  if ("AttachableResponse" in data) {
    const items = data.AttachableResponse;
    if (!Array.isArray(items)) {
      throw new ResponseShapeError("AttachableResponse is not an array");
    }
    return { kind: "attachable", body: data, items };
  }

  return { kind: "entity", body: data };
}
