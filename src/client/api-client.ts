/**
 * API Client
 *
 * Facade over request building, token exchange and the transport.
 */

import type {
  AccessTokenResult,
  ApiConfig,
  Credentials,
  HttpMethod,
  ParameterInput,
  PrepareOptions,
  SignedRequest,
  TextParameters,
} from "../types";
import { defaultUserAgent, toParameterSet } from "../types";
import { RequestBuilder, type UrlOptions } from "../request";
import { AuthExchange } from "../flows";
import {
  UndiciHttpTransport,
  type HttpResponse,
  type HttpTransport,
} from "../core/transport";
import { noOpLogger, type Logger } from "../telemetry";

/**
 * Optional collaborators for a client.
 */
export interface ApiClientOptions {
  /** Defaults to an undici transport honouring config timeout and TLS settings */
  transport?: HttpTransport;
  logger?: Logger;
}

export class ApiClient {
  private readonly _config: ApiConfig;
  private readonly _credentials: Credentials;
  private readonly _transport: HttpTransport;
  /** Set only when the client built its own transport */
  private readonly _ownedTransport?: UndiciHttpTransport;
  private readonly _logger: Logger;
  private readonly _requests: RequestBuilder;
  private readonly _auth: AuthExchange;

  constructor(config: ApiConfig, credentials: Credentials = {}, options: ApiClientOptions = {}) {
    this._config = config;
    this._credentials = { ...credentials };
    if (options.transport) {
      this._transport = options.transport;
    } else {
      this._ownedTransport = new UndiciHttpTransport({
        timeout: config.timeout,
        rejectUnauthorized: config.rejectUnauthorized,
      });
      this._transport = this._ownedTransport;
    }
    this._logger = (options.logger ?? noOpLogger).child({ api: config.apiName });
    this._requests = new RequestBuilder(this._config, this._credentials, this._logger);
    this._auth = new AuthExchange(
      this._config,
      this._credentials,
      this._transport,
      this._logger
    );
  }

  config(): ApiConfig {
    return this._config;
  }

  /**
   * Snapshot of the current credentials.
   */
  credentials(): Readonly<Credentials> {
    return { ...this._credentials };
  }

  /**
   * Attach an access token for subsequent requests. Takes priority over the
   * client id in the auth query and the signature.
   */
  setAccessToken(accessToken: string | undefined): void {
    this._credentials.accessToken = accessToken;
  }

  /**
   * Release the transport this client created. An injected transport is
   * left to its owner.
   */
  async close(): Promise<void> {
    await this._ownedTransport?.close();
  }

  // ---------------------------------------------------------------------------
  // Authorization
  // ---------------------------------------------------------------------------

  getAuthorizeUrl(scope?: readonly string[]): string {
    return this._auth.buildAuthorizeUrl(scope);
  }

  async getAuthorizeLoginUrl(scope?: readonly string[]): Promise<string> {
    return this._auth.getAuthorizeLoginUrl(scope);
  }

  async exchangeCodeForAccessToken(code: string): Promise<AccessTokenResult> {
    return this._auth.exchangeCode(code);
  }

  async exchangeUserIdForAccessToken(userId: string): Promise<AccessTokenResult> {
    return this._auth.exchangeUserId(userId);
  }

  async exchangePasswordForAccessToken(
    username: string,
    password: string,
    scope?: readonly string[]
  ): Promise<AccessTokenResult> {
    return this._auth.exchangePassword(username, password, scope);
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  /**
   * Signed URL for a GET request, for callers that fetch it themselves.
   */
  urlForGet(path: string, params: TextParameters = {}, options?: UrlOptions): string {
    return this._requests.buildUrl(path, params, options);
  }

  async prepareRequest(
    method: HttpMethod,
    path: string,
    params?: ParameterInput,
    options?: PrepareOptions
  ): Promise<SignedRequest> {
    return this._requests.prepare(method, path, toParameterSet(params), options);
  }

  async get(
    path: string,
    params?: ParameterInput,
    options?: PrepareOptions
  ): Promise<HttpResponse> {
    return this.prepareAndMakeRequest("GET", path, params, options);
  }

  async post(
    path: string,
    params?: ParameterInput,
    options?: PrepareOptions
  ): Promise<HttpResponse> {
    return this.prepareAndMakeRequest("POST", path, params, options);
  }

  async prepareAndMakeRequest(
    method: HttpMethod,
    path: string,
    params?: ParameterInput,
    options?: PrepareOptions
  ): Promise<HttpResponse> {
    const request = await this.prepareRequest(method, path, params, options);
    return this.makeRequest(request);
  }

  /**
   * Send a prepared request. Transport errors propagate unchanged.
   */
  async makeRequest(request: SignedRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = { ...request.headers };
    const hasUserAgent = Object.keys(headers).some(
      (key) => key.toLowerCase() === "user-agent"
    );
    if (!hasUserAgent) {
      headers["User-Agent"] = defaultUserAgent(this._config);
    }

    const startedAt = Date.now();
    const response = await this._transport.send({
      method: request.method,
      url: request.url,
      headers,
      body: request.body,
      timeout: this._config.timeout,
    });

    this._logger.debug("API response received", {
      method: request.method,
      endpoint: new URL(request.url).pathname,
      status: response.status,
      durationMs: Date.now() - startedAt,
    });

    return response;
  }
}

/**
 * Create a client.
 */
export function createClient(
  config: ApiConfig,
  credentials?: Credentials,
  options?: ApiClientOptions
): ApiClient {
  return new ApiClient(config, credentials, options);
}
