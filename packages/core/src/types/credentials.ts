/**
 * OAuth1 credentials. All four fields are required together.
 */
export interface OAuth1Credentials {
  consumerKey: string;
  consumerSecret: string;
  token: string;
  tokenSecret: string;
}

/**
 * OAuth2 credentials
 */
export interface OAuth2Credentials {
  accessToken: string;
}

/**
 * Credentials as supplied by the caller.
 *
 * Exactly one of the two shapes should be populated. When `token` is set the
 * OAuth1 shape wins, see {@link selectAuthScheme}.
 */
export type QboCredentials = Readonly<
  Partial<OAuth1Credentials> & Partial<OAuth2Credentials>
>;

/**
 * Authorization scheme chosen for a connection
 */
export type AuthScheme =
  | ({ scheme: "oauth1" } & Readonly<OAuth1Credentials>)
  | ({ scheme: "oauth2" } & Readonly<OAuth2Credentials>);
