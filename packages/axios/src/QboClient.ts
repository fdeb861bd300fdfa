import { AxiosInstance, AxiosRequestConfig } from "axios";

import {
  APP_CONNECTION_URL,
  ConfigurationError,
  HttpMethod,
  Logger,
  QboConfig,
  QueryParams,
  RawResponse,
  companyBaseUrl,
  createConsoleLogger,
  finalizePath,
  noopLogger,
  normalizeResponse,
  resolveClientConfig,
  toHttpMethod,
  unwrapNormalizedResult,
} from "@qbo-connect/core";
import {
  AuthorizedConnectionOptions,
  authorizedJsonConnection,
  authorizedMultipartConnection,
} from "./connection";
import { toHeaderRecord } from "./interceptors";

export interface QboClientConfig extends QboConfig {
  /**
   * Transport adapter for both connections. Default: axios's "http" adapter
   */
  adapter?: AxiosRequestConfig["adapter"];
}

export interface RequestOptions {
  /**
   * Entity label to unwrap from the response envelope, e.g. "customers"
   */
  entity?: string;

  /**
   * JSON-serializable body, sent for POST and PUT only
   */
  payload?: unknown;

  params?: QueryParams;
}

export interface RawRequestOptions {
  path: string;
  payload?: unknown;
  params?: QueryParams;
}

function carriesBody(method: HttpMethod): boolean {
  return method === "POST" || method === "PUT";
}

/**
 * QuickBooks Online API client.
 *
 * Connections are built once, at construction, and hold no state beyond
 * their interceptor chain, so a client can serve concurrent requests.
 *
 * @example
 * ```typescript
 * const client = new QboClient({
 *   credentials: { accessToken: "..." },
 *   realmId: "123145",
 * });
 *
 * const customers = await client.request("GET", "query", {
 *   entity: "customers",
 *   params: { query: "select * from Customer" },
 * });
 * ```
 */
export class QboClient {
  public readonly baseURL: string;
  public readonly connection: AxiosInstance;

  /**
   * Authorized multipart/form-data connection on the same base URL, for
   * callers uploading attachments (e.g. `upload?minorversion=65`). Its
   * responses are raw; pass them to `normalizeResponse` to unwrap them.
   */
  public readonly multipartConnection: AxiosInstance;
  private readonly logger: Logger;
  private readonly strictParsing: boolean;
  private readonly minorVersion?: number;

  /**
   * @throws ConfigurationError when credentials or the realm are missing
   */
  constructor(config: QboClientConfig = {}) {
    const resolved = resolveClientConfig(config);

    const baseURL = resolved.baseURL ?? companyBaseUrl(resolved);
    if (!baseURL) {
      throw new ConfigurationError(
        "realmId is required for the accounting endpoint. Set it in config, QBO_REALM_ID, or pass baseURL.",
      );
    }

    this.baseURL = baseURL;
    this.logger =
      resolved.logger ?? (resolved.log ? createConsoleLogger() : noopLogger);
    this.strictParsing = resolved.strictParsing ?? false;
    this.minorVersion = resolved.minorVersion;

    const connectionOptions: AuthorizedConnectionOptions = {
      credentials: resolved.credentials ?? {},
      headers: resolved.headers,
      logger: this.logger,
      log: resolved.log ?? false,
      adapter: resolved.adapter,
    };
    this.connection = authorizedJsonConnection(baseURL, connectionOptions);
    this.multipartConnection = authorizedMultipartConnection(baseURL, connectionOptions);
  }

  /**
   * Issue a request and normalize the response.
   *
   * With `entity` the payload is unwrapped from its envelope; without it the
   * whole decoded body is returned. Non-JSON bodies come back as received.
   * A body that cannot be parsed or unwrapped yields partial data, or a
   * ResponseParseError when `strictParsing` is set.
   *
   * @param method - GET, POST, PUT or DELETE, any case
   * @throws InvalidArgumentError for any other verb
   * @throws QboHttpError (or a subclass) for a non-success status
   */
  async request(
    method: string,
    path: string,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const response = await this.rawRequest(method, {
      path,
      payload: options.payload,
      params: options.params,
    });

    const result = normalizeResponse(response, {
      entity: options.entity,
      logger: this.logger,
    });
    return unwrapNormalizedResult(result, { strict: this.strictParsing });
  }

  /**
   * Issue a request and return the response undecoded
   */
  async rawRequest(method: string, options: RawRequestOptions): Promise<RawResponse> {
    const verb = toHttpMethod(method);
    const url = finalizePath(options.path, {
      params: options.params,
      minorVersion: this.minorVersion,
    });

    const response = await this.connection.request<unknown>({
      method: verb,
      url,
      data: carriesBody(verb) ? JSON.stringify(options.payload ?? null) : undefined,
    });

    return {
      status: response.status,
      headers: toHeaderRecord(response.headers),
      body: response.data,
    };
  }

  /**
   * Revoke the OAuth1 app connection
   */
  async disconnect(): Promise<unknown> {
    return this.request("GET", `${APP_CONNECTION_URL}/disconnect`);
  }

  /**
   * Renew the OAuth1 access token
   */
  async reconnect(): Promise<unknown> {
    return this.request("GET", `${APP_CONNECTION_URL}/reconnect`);
  }
}
