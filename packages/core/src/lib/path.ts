import { QueryParams } from "../types/http";

/**
 * OAuth1 app-connection management endpoint
 */
export const APP_CONNECTION_URL = "https://appcenter.intuit.com/api/v1/connection";

export type QboEndpoint = "accounting" | "payments";

const ENDPOINT_URLS: Record<QboEndpoint, { production: string; sandbox: string }> = {
  accounting: {
    production: "https://quickbooks.api.intuit.com/v3/company",
    sandbox: "https://sandbox-quickbooks.api.intuit.com/v3/company",
  },
  payments: {
    production: "https://api.intuit.com/quickbooks/v4/payments",
    sandbox: "https://sandbox.api.intuit.com/quickbooks/v4/payments",
  },
};

export interface CompanyBaseUrlOptions {
  endpoint?: QboEndpoint;
  production?: boolean;
  realmId?: string;
}

/**
 * Base URL requests are issued against.
 * Returns `undefined` for the accounting endpoint when no realm is known.
 */
export function companyBaseUrl(options: CompanyBaseUrlOptions): string | undefined {
  const endpoint = options.endpoint ?? "accounting";
  const urls = ENDPOINT_URLS[endpoint];
  const base = options.production ? urls.production : urls.sandbox;

  if (endpoint === "payments") return base;
  if (!options.realmId) return undefined;
  return `${base}/${encodeURIComponent(options.realmId)}`;
}

export function isAbsoluteUrl(path: string): boolean {
  return /^https?:\/\//i.test(path);
}

export interface FinalizePathOptions {
  params?: QueryParams;
  minorVersion?: number;
}

/**
 * Append URL-encoded query parameters to a request path.
 * `minorversion` is only added to paths relative to the company base URL.
 */
export function finalizePath(path: string, options: FinalizePathOptions = {}): string {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(options.params ?? {})) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }

  if (
    options.minorVersion !== undefined &&
    !isAbsoluteUrl(path) &&
    !search.has("minorversion")
  ) {
    search.append("minorversion", String(options.minorVersion));
  }

  const query = search.toString();
  if (!query) return path;
  return `${path}${path.includes("?") ? "&" : "?"}${query}`;
}
