/**
 * Request Types
 */

/**
 * HTTP methods the API accepts.
 */
export type HttpMethod = "GET" | "POST";

/**
 * Fully built request, ready for a transport.
 */
export interface SignedRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly body?: string | Buffer;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Per-call options for request preparation.
 */
export interface PrepareOptions {
  /**
   * Put the client secret in the auth query and the signature.
   * Only for server-to-server calls never exposed to a browser.
   */
  includeSecret?: boolean;
  /** Set to false to skip the signature for this call */
  signRequest?: boolean;
  /** Extra headers; a caller-supplied User-Agent is kept */
  headers?: Record<string, string>;
}
