/**
 * @qbo-connect/axios - Axios transport for the QuickBooks Online API
 *
 * Builds authorized axios connections (OAuth1 or OAuth2) and dispatches
 * requests whose responses are unwrapped by @qbo-connect/core.
 */

export { QboClient } from "./QboClient";
export type {
  QboClientConfig,
  RequestOptions,
  RawRequestOptions,
} from "./QboClient";

export {
  buildConnection,
  authorizedJsonConnection,
  authorizedMultipartConnection,
  JSON_HEADERS,
  MULTIPART_HEADERS,
} from "./connection";
export type {
  ConnectionOptions,
  AuthorizedConnectionOptions,
} from "./connection";

export {
  addAuthorizationInterceptor,
  addErrorInterceptor,
  addDetailedLoggerInterceptors,
  toHeaderRecord,
} from "./interceptors";

// Re-export commonly used types and errors from core
export {
  ConfigurationError,
  InvalidArgumentError,
  ResponseParseError,
  QboError,
  QboHttpError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  TooManyRequestsError,
  InternalServerError,
  ServiceUnavailableError,
  LOG_TAG,
  createConsoleLogger,
  noopLogger,
} from "@qbo-connect/core";
export type {
  Logger,
  QboCredentials,
  HttpMethod,
  QueryParams,
  RawResponse,
  NormalizedResult,
} from "@qbo-connect/core";
