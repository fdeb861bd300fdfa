import axios, { AxiosInstance, AxiosRequestConfig } from "axios";

import {
  Logger,
  QboCredentials,
  mergeHeaders,
  noopLogger,
  selectAuthScheme,
} from "@qbo-connect/core";
import {
  addAuthorizationInterceptor,
  addDetailedLoggerInterceptors,
  addErrorInterceptor,
} from "./interceptors";

/**
 * Default headers of a JSON connection. The API only answers with JSON when
 * asked to; any `+json` media type works for `Accept`.
 */
export const JSON_HEADERS: Readonly<Record<string, string>> = {
  Accept: "application/json;charset=UTF-8",
  "Content-Type": "application/json",
};

export const MULTIPART_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "multipart/form-data",
};

export interface ConnectionOptions {
  /**
   * Headers merged over the connection defaults (case-insensitive)
   */
  headers?: Record<string, string>;

  /**
   * Destination of the detailed request/response log
   */
  logger?: Logger;

  /**
   * Attach the detailed logger as the outermost interceptor
   */
  log?: boolean;

  /**
   * Transport adapter. Default: axios's Node.js "http" adapter
   */
  adapter?: AxiosRequestConfig["adapter"];
}

export interface AuthorizedConnectionOptions extends ConnectionOptions {
  credentials: QboCredentials;
}

/**
 * Creates an axios instance bound to `url`.
 *
 * Bodies are received as raw bytes (`responseType: "arraybuffer"` with no
 * response transform) so that decoding is left to the response normalizer.
 * `configure` runs before the detailed logger is attached, which keeps the
 * logger outermost.
 *
 * @example
 * ```typescript
 * const connection = buildConnection(
 *   "https://oauth.platform.intuit.com",
 *   { headers: { Accept: "application/json" } },
 *   (instance) => addErrorInterceptor(instance),
 * );
 * const response = await connection.post("/oauth2/v1/tokens/bearer", form);
 * ```
 */
export function buildConnection(
  url: string,
  options: ConnectionOptions = {},
  configure?: (axiosInstance: AxiosInstance) => void,
): AxiosInstance {
  const axiosInstance = axios.create({
    baseURL: url,
    headers: { ...options.headers },
    responseType: "arraybuffer",
    transformResponse: [(data: unknown) => data],
    adapter: options.adapter ?? "http",
  });

  configure?.(axiosInstance);

  if (options.log) {
    addDetailedLoggerInterceptors(axiosInstance, options.logger ?? noopLogger);
  }

  return axiosInstance;
}

/**
 * JSON connection: auth, error raising, then axios's request transform
 * (strings pass through, objects are JSON- or URL-encoded by content type).
 *
 * @throws ConfigurationError when no credentials are set
 */
export function authorizedJsonConnection(
  url: string,
  options: AuthorizedConnectionOptions,
): AxiosInstance {
  const authScheme = selectAuthScheme(options.credentials);

  return buildConnection(
    url,
    { ...options, headers: mergeHeaders(JSON_HEADERS, options.headers) },
    (axiosInstance) => {
      addAuthorizationInterceptor(axiosInstance, authScheme);
      addErrorInterceptor(axiosInstance);
    },
  );
}

/**
 * Multipart connection: same chain as {@link authorizedJsonConnection}, with
 * object bodies serialized as multipart/form-data by axios
 *
 * @throws ConfigurationError when no credentials are set
 */
export function authorizedMultipartConnection(
  url: string,
  options: Omit<AuthorizedConnectionOptions, "headers">,
): AxiosInstance {
  const authScheme = selectAuthScheme(options.credentials);

  return buildConnection(
    url,
    { ...options, headers: { ...MULTIPART_HEADERS } },
    (axiosInstance) => {
      addAuthorizationInterceptor(axiosInstance, authScheme);
      addErrorInterceptor(axiosInstance);
    },
  );
}
