import { createHmac } from "node:crypto";

import axios, {
  AxiosHeaders,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";
import OAuth from "oauth-1.0a";

import {
  AuthScheme,
  LOG_TAG,
  Logger,
  OAuth1Credentials,
  QboHttpError,
  bodyToText,
  createHttpError,
  getHeader,
  isPlainObject,
  normalizeResponse,
  redactHeaders,
} from "@qbo-connect/core";

/**
 * Flatten axios headers (AxiosHeaders or a plain object) into a string record
 */
export function toHeaderRecord(headers: unknown): Record<string, string> {
  const source = headers instanceof AxiosHeaders ? headers.toJSON(true) : headers;
  const record: Record<string, string> = {};
  if (!isPlainObject(source)) return record;

  for (const [key, value] of Object.entries(source)) {
    if (typeof value === "string") {
      record[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      record[key] = String(value);
    } else if (Array.isArray(value)) {
      record[key] = value.join(", ");
    }
  }
  return record;
}

function isTextual(contentType: string | undefined): boolean {
  return !contentType || /json|text|xml|x-www-form-urlencoded/i.test(contentType);
}

function describeBody(body: unknown, contentType: string | undefined): string {
  if (Buffer.isBuffer(body) && !isTextual(contentType)) {
    return `[binary body, ${body.length} bytes]`;
  }
  if (typeof FormData !== "undefined" && body instanceof FormData) {
    return "[multipart body]";
  }
  return bodyToText(body);
}

/**
 * Signs requests with OAuth1 HMAC-SHA1 over the full request URL.
 * Form-encoded object bodies take part in the signature.
 */
function createOAuth1Signer(
  credentials: OAuth1Credentials,
): (instance: AxiosInstance, config: InternalAxiosRequestConfig) => string {
  const oauth = new OAuth({
    consumer: {
      key: credentials.consumerKey,
      secret: credentials.consumerSecret,
    },
    signature_method: "HMAC-SHA1",
    hash_function: (baseString, key) =>
      createHmac("sha1", key).update(baseString).digest("base64"),
  });
  const token = { key: credentials.token, secret: credentials.tokenSecret };

  return (instance, config) => {
    const contentType = getHeader(toHeaderRecord(config.headers), "content-type");
    const signsBody =
      isPlainObject(config.data) &&
      contentType?.includes("application/x-www-form-urlencoded");

    const authorization = oauth.authorize(
      {
        url: instance.getUri(config),
        method: (config.method ?? "GET").toUpperCase(),
        data: signsBody ? config.data : undefined,
      },
      token,
    );
    return oauth.toHeader(authorization).Authorization;
  };
}

/**
 * Add the authorization request interceptor for the selected scheme
 *
 * @returns Function that removes the interceptor
 */
export function addAuthorizationInterceptor(
  axiosInstance: AxiosInstance,
  authScheme: AuthScheme,
): () => void {
  let authorize: (config: InternalAxiosRequestConfig) => string;

  if (authScheme.scheme === "oauth1") {
    const sign = createOAuth1Signer(authScheme);
    authorize = (config) => sign(axiosInstance, config);
  } else {
    const bearer = `Bearer ${authScheme.accessToken}`;
    authorize = () => bearer;
  }

  const interceptorId = axiosInstance.interceptors.request.use(
    (config: InternalAxiosRequestConfig) => {
      config.headers.set("Authorization", authorize(config));
      return config;
    },
  );

  return () => axiosInstance.interceptors.request.eject(interceptorId);
}

/**
 * Decoded error body: the parsed JSON when it parses, the text otherwise
 */
function decodeErrorBody(response: AxiosResponse<unknown>): unknown {
  const headers = toHeaderRecord(response.headers);
  const result = normalizeResponse({
    status: response.status,
    headers,
    body: response.data,
  });
  const value = result.status === "ok" ? result.value : response.data;
  return Buffer.isBuffer(value) ? bodyToText(value) : value;
}

/**
 * Add the response interceptor turning non-success statuses into typed
 * {@link QboHttpError}s. Errors without a response (network failures,
 * timeouts) pass through unchanged.
 *
 * @returns Function that removes the interceptor
 */
export function addErrorInterceptor(axiosInstance: AxiosInstance): () => void {
  const interceptorId = axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => response,
    (error: unknown) => {
      if (!axios.isAxiosError(error) || !error.response) {
        return Promise.reject(error);
      }

      const { response, config } = error;
      return Promise.reject(
        createHttpError({
          status: response.status,
          statusText: response.statusText,
          body: decodeErrorBody(response),
          method: config?.method?.toUpperCase(),
          url: config ? axiosInstance.getUri(config) : undefined,
          intuitTid: getHeader(toHeaderRecord(response.headers), "intuit_tid"),
          cause: error,
        }),
      );
    },
  );

  return () => axiosInstance.interceptors.response.eject(interceptorId);
}

/**
 * Add request/response logging. Register it after every other interceptor so
 * it sees requests first and responses last.
 *
 * Request and response lines go to `info`, headers and bodies to `debug`,
 * failures to `warn`. Credential headers are redacted.
 *
 * @returns Function that removes both interceptors
 */
export function addDetailedLoggerInterceptors(
  axiosInstance: AxiosInstance,
  logger: Logger,
  tag: string = LOG_TAG,
): () => void {
  const requestId = axiosInstance.interceptors.request.use(
    (config: InternalAxiosRequestConfig) => {
      const headers = toHeaderRecord(config.headers);
      logger.info(
        `${tag} ${(config.method ?? "GET").toUpperCase()} ${axiosInstance.getUri(config)}`,
      );
      logger.debug(`${tag} request headers: ${JSON.stringify(redactHeaders(headers))}`);
      if (config.data !== undefined) {
        logger.debug(
          `${tag} request body: ${describeBody(config.data, getHeader(headers, "content-type"))}`,
        );
      }
      return config;
    },
  );

  const responseId = axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      const headers = toHeaderRecord(response.headers);
      logger.info(`${tag} HTTP ${response.status}`);
      logger.debug(`${tag} response headers: ${JSON.stringify(headers)}`);
      logger.debug(
        `${tag} response body: ${describeBody(response.data, getHeader(headers, "content-type"))}`,
      );
      return response;
    },
    (error: unknown) => {
      if (error instanceof QboHttpError) {
        logger.warn(`${tag} HTTP ${error.status}: ${error.message}`);
      } else {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`${tag} request failed: ${message}`);
      }
      return Promise.reject(error);
    },
  );

  return () => {
    axiosInstance.interceptors.request.eject(requestId);
    axiosInstance.interceptors.response.eject(responseId);
  };
}
