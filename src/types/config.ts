/**
 * Client Configuration Types
 *
 * Immutable API configuration and per-session credentials.
 */

/**
 * URL scheme used for API calls.
 */
export type Protocol = "http" | "https";

/**
 * API endpoint configuration. Shared by every request a client builds.
 */
export interface ApiConfig {
  /** API host, e.g. "api.example.com" */
  readonly host: string;
  /** Path prefix for every endpoint, e.g. "/v1" */
  readonly basePath: string;
  /** OAuth2 authorize endpoint URL; required for the authorize flows */
  readonly authorizeUrl?: string;
  /** OAuth2 token endpoint URL; required for token exchange */
  readonly accessTokenUrl?: string;
  /** Query field carrying the access token; some providers use "oauth_token" */
  readonly accessTokenField: string;
  /** Scheme for API calls */
  readonly protocol: Protocol;
  /** Used to build the default User-Agent */
  readonly apiName: string;
  /** Request timeout in milliseconds, forwarded to the transport */
  readonly timeout?: number;
  /** Verify TLS certificates. Turning this off is for legacy endpoints only. */
  readonly rejectUnauthorized: boolean;
  /** Append an HMAC `sig` parameter when a client secret is known */
  readonly signRequests: boolean;
  /** Overrides the default User-Agent */
  readonly userAgent?: string;
}

/**
 * Client credentials and session state.
 */
export interface Credentials {
  /** Client identifier */
  clientId?: string;
  /** Client secret; also the signing key */
  clientSecret?: string;
  /** Access token obtained from an exchange */
  accessToken?: string;
  /** Registered redirect URI */
  redirectUri?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
  basePath: "",
  accessTokenField: "access_token",
  protocol: "https",
  apiName: "Generic API",
  rejectUnauthorized: true,
  signRequests: true,
} as const;

/**
 * Default User-Agent for an API name.
 */
export function defaultUserAgent(config: Pick<ApiConfig, "apiName" | "userAgent">): string {
  return config.userAgent ?? `${config.apiName} Node.js Client`;
}
