/**
 * Token Types
 */

/**
 * Result of a successful token exchange. The caller persists it.
 */
export interface AccessTokenResult {
  /** The access token issued by the token endpoint */
  accessToken: string;
  /** User record returned alongside the token, passed through untouched */
  user: unknown;
}

/**
 * Grant sent to the token endpoint.
 */
export type ExchangeGrant =
  | { type: "authorization_code"; code: string }
  | {
      type: "password";
      username: string;
      password: string;
      scope?: readonly string[];
    }
  | { type: "user_id"; userId: string };

/**
 * `grant_type` form values.
 */
export type GrantType = "authorization_code" | "password";
