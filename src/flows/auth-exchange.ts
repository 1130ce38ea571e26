/**
 * Token Exchange Flows
 *
 * Authorization-code, resource-owner password and user-id grants against
 * the token endpoint, plus the authorize URL the user is sent to.
 */

import { z } from "zod";
import type {
  AccessTokenResult,
  ApiConfig,
  Credentials,
  ExchangeGrant,
  GrantType,
} from "../types";
import { defaultUserAgent } from "../types";
import { AuthExchangeError, ConfigurationError, createAuthExchangeError } from "../error";
import { encodeQuery, FORM_URLENCODED } from "../core/encoder";
import type { HttpTransport } from "../core/transport";
import { noOpLogger, type Logger } from "../telemetry";

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    user: z.unknown(),
  })
  .passthrough();

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function grantTypeOf(grant: ExchangeGrant): GrantType {
  return grant.type === "password" ? "password" : "authorization_code";
}

export class AuthExchange {
  private readonly config: ApiConfig;
  private readonly credentials: Readonly<Credentials>;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(
    config: ApiConfig,
    credentials: Readonly<Credentials>,
    transport: HttpTransport,
    logger: Logger = noOpLogger
  ) {
    this.config = config;
    this.credentials = credentials;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * URL to send the user to. Scopes are space-joined.
   */
  buildAuthorizeUrl(scope?: readonly string[]): string {
    const { clientId, redirectUri } = this.credentials;
    const authorizeUrl = this.requireEndpoint(this.config.authorizeUrl, "authorizeUrl");
    if (clientId === undefined) {
      throw new ConfigurationError(
        "A client ID is required to build the authorize URL",
        "MissingRequired"
      );
    }

    const params: Record<string, string> = {
      client_id: clientId,
      response_type: "code",
    };
    if (redirectUri !== undefined) {
      params["redirect_uri"] = redirectUri;
    }
    if (scope && scope.length > 0) {
      params["scope"] = scope.join(" ");
    }

    return `${authorizeUrl}?${encodeQuery(params)}`;
  }

  /**
   * Request the authorize URL and return where the server sends the user
   * to log in.
   */
  async getAuthorizeLoginUrl(scope?: readonly string[]): Promise<string> {
    const url = this.buildAuthorizeUrl(scope);
    const response = await this.transport.send({
      method: "GET",
      url,
      headers: { "User-Agent": defaultUserAgent(this.config) },
      timeout: this.config.timeout,
    });

    if (REDIRECT_STATUSES.has(response.status) && response.headers["location"]) {
      return new URL(response.headers["location"], url).toString();
    }

    if (response.status !== 200) {
      throw new AuthExchangeError(
        `The server returned a non-200 response for URL ${url}`,
        "Rejected",
        { status: response.status }
      );
    }

    const location = response.headers["content-location"];
    if (!location) {
      throw new AuthExchangeError(
        `The server did not return a login location for URL ${url}`,
        "InvalidResponse",
        { status: response.status }
      );
    }
    return new URL(location, url).toString();
  }

  /**
   * Exchange a grant for an access token.
   */
  async exchange(grant: ExchangeGrant): Promise<AccessTokenResult> {
    const url = this.requireEndpoint(this.config.accessTokenUrl, "accessTokenUrl");
    const grantType = grantTypeOf(grant);
    const startedAt = Date.now();

    const response = await this.transport.send({
      method: "POST",
      url,
      headers: {
        "Content-Type": FORM_URLENCODED,
        "User-Agent": defaultUserAgent(this.config),
      },
      body: this.exchangeBody(grant),
      timeout: this.config.timeout,
    });

    const body = response.body.toString("utf8");
    const context = {
      grantType,
      status: response.status,
      durationMs: Date.now() - startedAt,
    };

    if (response.status !== 200) {
      const error = createAuthExchangeError(response.status, body);
      this.logger.warn("Token exchange rejected", { ...context, errorCode: error.code });
      throw error;
    }

    const result = this.parseTokenResponse(body, response.status);
    this.logger.info("Token exchange succeeded", context);
    return result;
  }

  async exchangeCode(code: string): Promise<AccessTokenResult> {
    return this.exchange({ type: "authorization_code", code });
  }

  async exchangeUserId(userId: string): Promise<AccessTokenResult> {
    return this.exchange({ type: "user_id", userId });
  }

  async exchangePassword(
    username: string,
    password: string,
    scope?: readonly string[]
  ): Promise<AccessTokenResult> {
    return this.exchange({ type: "password", username, password, scope });
  }

  private requireEndpoint(value: string | undefined, name: string): string {
    if (value === undefined) {
      throw new ConfigurationError(`${name} is not configured`, "MissingRequired");
    }
    return value;
  }

  private exchangeBody(grant: ExchangeGrant): string {
    const { clientId, clientSecret, redirectUri } = this.credentials;
    const params: Record<string, string> = {};

    if (clientId !== undefined) params["client_id"] = clientId;
    if (clientSecret !== undefined) params["client_secret"] = clientSecret;
    if (redirectUri !== undefined) params["redirect_uri"] = redirectUri;
    params["grant_type"] = grantTypeOf(grant);

    switch (grant.type) {
      case "authorization_code":
        params["code"] = grant.code;
        break;
      case "password":
        params["username"] = grant.username;
        params["password"] = grant.password;
        if (grant.scope && grant.scope.length > 0) {
          params["scope"] = grant.scope.join(" ");
        }
        break;
      case "user_id":
        params["user_id"] = grant.userId;
        break;
    }

    return encodeQuery(params);
  }

  private parseTokenResponse(body: string, status: number): AccessTokenResult {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new AuthExchangeError("Invalid token response", "InvalidResponse", {
        status,
        cause: error,
      });
    }

    const result = tokenResponseSchema.safeParse(data);
    if (!result.success || !("user" in result.data)) {
      throw new AuthExchangeError(
        "Token response is missing access_token or user",
        "InvalidResponse",
        { status }
      );
    }

    return {
      accessToken: result.data.access_token,
      user: result.data.user,
    };
  }
}
