// Auth selection
export { selectAuthScheme } from "./auth/selectAuthScheme";

// Errors
export {
  QboError,
  ConfigurationError,
  InvalidArgumentError,
  ResponseShapeError,
  ResponseParseError,
  QboHttpError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  TooManyRequestsError,
  InternalServerError,
  ServiceUnavailableError,
  createHttpError,
  extractFault,
  formatFault,
} from "./errors/QboError";
export type {
  QboFault,
  QboFaultDetail,
  QboErrorOptions,
  QboHttpErrorOptions,
} from "./errors/QboError";

// Response normalization
export {
  normalizeResponse,
  parseResponseBody,
  extractEntity,
  unwrapNormalizedResult,
} from "./response/ResponseNormalizer";
export type {
  NormalizedResult,
  NormalizeOptions,
  UnwrapOptions,
} from "./response/ResponseNormalizer";
export { classifyEnvelope } from "./response/envelope";
export type { ResponseEnvelope } from "./response/envelope";

// Logging
export { LOG_TAG, noopLogger, createConsoleLogger } from "./lib/logger";
export type { Logger } from "./lib/logger";

// Paths and entity names
export {
  APP_CONNECTION_URL,
  companyBaseUrl,
  finalizePath,
  isAbsoluteUrl,
} from "./lib/path";
export type {
  QboEndpoint,
  CompanyBaseUrlOptions,
  FinalizePathOptions,
} from "./lib/path";
export { singularEntityName } from "./lib/entity";

// Header helpers (needed by transport packages)
export {
  getHeader,
  mergeHeaders,
  redactHeaders,
  bodyToText,
  isPlainObject,
} from "./lib/utils";
export type { JsonObject } from "./lib/utils";

// Types
export { HTTP_METHODS, toHttpMethod } from "./types/http";
export type {
  HttpMethod,
  QueryParams,
  RawResponse,
} from "./types/http";
export type {
  QboCredentials,
  OAuth1Credentials,
  OAuth2Credentials,
  AuthScheme,
} from "./types/credentials";

// Configuration
export { loadConfigFromEnv, resolveClientConfig } from "./types/config";
export type { QboConfig } from "./types/config";
