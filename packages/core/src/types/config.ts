import { ConfigurationError } from "../errors/QboError";
import { Logger } from "../lib/logger";
import { QboEndpoint } from "../lib/path";
import { QboCredentials } from "./credentials";

/**
 * Configuration shared by every transport integration
 */
export interface QboConfig {
  /**
   * OAuth1 or OAuth2 credentials.
   * Fields left unset are read from the QBO_* environment variables.
   */
  credentials?: QboCredentials;

  /**
   * Company ID, required for the accounting endpoint unless `baseURL` is given.
   * If not provided, reads from QBO_REALM_ID
   */
  realmId?: string;

  /**
   * API family. Default: "accounting"
   */
  endpoint?: QboEndpoint;

  /**
   * Use production hosts instead of the sandbox. Default: false
   */
  production?: boolean;

  /**
   * Explicit base URL, overrides `endpoint`, `production` and `realmId`
   * @internal
   */
  baseURL?: string;

  /**
   * Value of the `minorversion` query parameter added to company requests
   */
  minorVersion?: number;

  /**
   * Header overrides merged over the connection defaults
   */
  headers?: Record<string, string>;

  /**
   * Receives request/response logs and parsing diagnostics.
   * Default: no-op, or the console when `log` is true
   */
  logger?: Logger;

  /**
   * Attach the detailed request/response logger to connections.
   * If not provided, reads from QBO_API_LOG
   */
  log?: boolean;

  /**
   * Throw ResponseParseError instead of returning partial data when a
   * response cannot be parsed or unwrapped. Default: false
   */
  strictParsing?: boolean;
}

type Env = Record<string, string | undefined>;

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function envInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function envString(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

/**
 * Read configuration from QBO_* environment variables
 *
 * @example
 * ```typescript
 * // QBO_ACCESS_TOKEN=... QBO_REALM_ID=123 node app.js
 * const config = loadConfigFromEnv();
 * ```
 */
export function loadConfigFromEnv(env: Env = process.env): QboConfig {
  const credentials: QboCredentials = {
    consumerKey: envString(env.QBO_CONSUMER_KEY),
    consumerSecret: envString(env.QBO_CONSUMER_SECRET),
    token: envString(env.QBO_TOKEN),
    tokenSecret: envString(env.QBO_TOKEN_SECRET),
    accessToken: envString(env.QBO_ACCESS_TOKEN),
  };

  return {
    credentials,
    realmId: envString(env.QBO_REALM_ID),
    production: envFlag(env.QBO_PRODUCTION),
    minorVersion: envInteger("QBO_MINOR_VERSION", env.QBO_MINOR_VERSION),
    log: envFlag(env.QBO_API_LOG),
  };
}

function definedCredentials(credentials: QboCredentials): QboCredentials {
  return Object.fromEntries(
    Object.entries(credentials).filter(([, value]) => value !== undefined),
  );
}

/**
 * Fill the fields the caller left unset from the environment.
 *
 * Credentials are taken as a whole: when the caller passes any credential
 * field, none are read from the environment.
 */
export function resolveClientConfig<T extends QboConfig>(
  config: T,
  env: Env = process.env,
): T & QboConfig {
  const fromEnv = loadConfigFromEnv(env);
  const callerCredentials = definedCredentials(config.credentials ?? {});
  const credentials =
    Object.keys(callerCredentials).length > 0
      ? callerCredentials
      : definedCredentials(fromEnv.credentials ?? {});

  return {
    ...config,
    credentials,
    realmId: config.realmId ?? fromEnv.realmId,
    production: config.production ?? fromEnv.production,
    minorVersion: config.minorVersion ?? fromEnv.minorVersion,
    log: config.log ?? fromEnv.log,
  };
}
