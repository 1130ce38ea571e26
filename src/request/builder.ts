/**
 * Request Builder
 *
 * Turns an endpoint call into a SignedRequest: picks the body encoding,
 * attaches the auth query and, when a client secret is known, an HMAC
 * `sig` parameter.
 */

import type {
  ApiConfig,
  Credentials,
  HttpMethod,
  ParameterSet,
  PrepareOptions,
  SignedRequest,
  TextParameters,
  TextValue,
} from "../types";
import { defaultUserAgent } from "../types";
import { sign } from "../core/signer";
import {
  encodeFormBody,
  encodeMultipart,
  encodeQuery,
  splitParameters,
} from "../core/encoder";
import { noOpLogger, type Logger } from "../telemetry";

/**
 * Options accepted when building a bare URL.
 */
export type UrlOptions = Pick<PrepareOptions, "includeSecret" | "signRequest">;

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

export class RequestBuilder {
  private readonly config: ApiConfig;
  private readonly credentials: Readonly<Credentials>;
  private readonly logger: Logger;

  /**
   * Credentials are read on every call, so a token attached later is used.
   */
  constructor(config: ApiConfig, credentials: Readonly<Credentials>, logger: Logger = noOpLogger) {
    this.config = config;
    this.credentials = credentials;
    this.logger = logger;
  }

  /**
   * Build a request for an endpoint.
   *
   * Requests carrying files are sent as multipart with the auth query only.
   * They are never signed, and the client secret stays out of their URL.
   */
  async prepare(
    method: HttpMethod,
    path: string,
    params: ParameterSet = {},
    options: PrepareOptions = {}
  ): Promise<SignedRequest> {
    const { fields, files } = splitParameters(params);
    const includeSecret = options.includeSecret ?? false;
    let headers: Record<string, string> = { ...options.headers };
    let body: string | Buffer | undefined;
    let url: string;
    let signed = false;
    let encoding: "none" | "form" | "multipart" = "none";

    if (Object.keys(files).length > 0) {
      const encoded = await encodeMultipart(fields, files);
      body = encoded.body;
      headers = { ...headers, ...encoded.headers };
      url = this.joinUrl(path, [this.authQuery(false)]);
      encoding = "multipart";
    } else {
      const signature = this.signatureQuery(path, fields, includeSecret, options.signRequest);
      url = this.joinUrl(path, [this.authQuery(includeSecret), encodeQuery(fields), signature]);
      signed = signature.length > 0;

      if (method === "POST") {
        const encoded = encodeFormBody(fields);
        body = encoded.body;
        headers = { ...headers, ...encoded.headers };
        encoding = "form";
      }
    }

    if (!hasHeader(headers, "User-Agent")) {
      headers["User-Agent"] = defaultUserAgent(this.config);
    }

    this.logger.debug("Prepared API request", {
      endpoint: path,
      method,
      encoding,
      signed,
    });

    return Object.freeze({
      url,
      method,
      body,
      headers: Object.freeze(headers),
    });
  }

  /**
   * Signed URL for a GET request with text parameters.
   */
  buildUrl(path: string, params: TextParameters = {}, options: UrlOptions = {}): string {
    const includeSecret = options.includeSecret ?? false;
    const signature = this.signatureQuery(path, params, includeSecret, options.signRequest);
    return this.joinUrl(path, [this.authQuery(includeSecret), encodeQuery(params), signature]);
  }

  /**
   * Auth query segment, without the leading separator.
   */
  private authQuery(includeSecret: boolean): string {
    const { accessToken, clientId, clientSecret } = this.credentials;

    if (accessToken !== undefined) {
      return encodeQuery({ [this.config.accessTokenField]: accessToken });
    }

    if (clientId !== undefined) {
      const query: Record<string, string> = { client_id: clientId };
      if (includeSecret && clientSecret !== undefined) {
        query["client_secret"] = clientSecret;
      }
      return encodeQuery(query);
    }

    return "";
  }

  /**
   * `sig=…` segment, or "" when the request is not signed.
   * Signs a working copy; the caller's parameters are left untouched.
   */
  private signatureQuery(
    path: string,
    params: TextParameters,
    includeSecret: boolean,
    signRequest = true
  ): string {
    const { accessToken, clientId, clientSecret } = this.credentials;

    if (!this.config.signRequests || !signRequest || clientSecret === undefined) {
      return "";
    }

    const working: Record<string, TextValue> = { ...params };
    if (accessToken !== undefined) {
      working["access_token"] = accessToken;
    } else if (clientId !== undefined) {
      working["client_id"] = clientId;
    }
    if (includeSecret) {
      working["client_secret"] = clientSecret;
    }

    return `sig=${sign(path, working, clientSecret)}`;
  }

  private joinUrl(path: string, querySegments: string[]): string {
    const { protocol, host, basePath } = this.config;
    const query = querySegments.filter((segment) => segment.length > 0).join("&");
    const base = `${protocol}://${host}${basePath}${path}`;
    return query.length > 0 ? `${base}?${query}` : base;
  }
}
