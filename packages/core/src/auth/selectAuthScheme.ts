import { ConfigurationError } from "../errors/QboError";
import {
  AuthScheme,
  OAuth1Credentials,
  QboCredentials,
} from "../types/credentials";

const OAUTH1_FIELDS: ReadonlyArray<keyof OAuth1Credentials> = [
  "consumerKey",
  "consumerSecret",
  "token",
  "tokenSecret",
];

function isSet(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Choose the authorization scheme for a connection.
 *
 * `token` selects OAuth1 and requires the other three OAuth1 fields;
 * otherwise `accessToken` selects OAuth2 bearer auth. With neither set the
 * connection cannot be built.
 *
 * @throws ConfigurationError when no credential is set or the OAuth1 set is incomplete
 */
export function selectAuthScheme(credentials: QboCredentials): AuthScheme {
  const { consumerKey, consumerSecret, token, tokenSecret } = credentials;

  if (isSet(token)) {
    if (!isSet(consumerKey) || !isSet(consumerSecret) || !isSet(tokenSecret)) {
      const missing = OAUTH1_FIELDS.filter((field) => !isSet(credentials[field]));
      throw new ConfigurationError(
        `OAuth1 credentials are incomplete, missing: ${missing.join(", ")}`,
      );
    }
    return { scheme: "oauth1", consumerKey, consumerSecret, token, tokenSecret };
  }

  if (isSet(credentials.accessToken)) {
    return { scheme: "oauth2", accessToken: credentials.accessToken };
  }

  throw new ConfigurationError("Must set either the token or access_token");
}
