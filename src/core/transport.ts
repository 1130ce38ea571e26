/**
 * HTTP Transport
 *
 * HTTP client interface and implementations. Request building never calls
 * a transport itself; callers hand it the prepared request.
 */

import { Agent, errors, request, type Dispatcher } from "undici";
import { TransportError } from "../error";
import type { HttpMethod } from "../types";

/**
 * HTTP request definition.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Buffer;
  /** Milliseconds; falls back to the transport default */
  timeout?: number;
}

/**
 * HTTP response definition. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * HTTP transport interface (for dependency injection).
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Options for the undici transport.
 */
export interface UndiciTransportOptions {
  /** Default timeout in milliseconds */
  timeout?: number;
  /** Verify TLS certificates (default true) */
  rejectUnauthorized?: boolean;
  /** Dispatcher to send through, e.g. a MockAgent in tests */
  dispatcher?: Dispatcher;
}

const TLS_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Default transport built on undici. Redirects are not followed.
 */
export class UndiciHttpTransport implements HttpTransport {
  private readonly defaultTimeout: number;
  private readonly dispatcher?: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options?: UndiciTransportOptions) {
    this.defaultTimeout = options?.timeout ?? 30000;

    if (options?.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else if (options?.rejectUnauthorized === false) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
      this.ownsDispatcher = true;
    } else {
      this.ownsDispatcher = false;
    }
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const timeout = req.timeout ?? this.defaultTimeout;

    try {
      const response = await request(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        dispatcher: this.dispatcher,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const body = Buffer.from(await response.body.arrayBuffer());

      return {
        status: response.statusCode,
        headers: this.normalizeHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.mapError(error, timeout);
    }
  }

  /**
   * Close the dispatcher this transport created, if any.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher && this.dispatcher) {
      await this.dispatcher.close();
    }
  }

  private normalizeHeaders(
    headers: Record<string, string | string[] | undefined>
  ): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === "string") {
        normalized[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        normalized[key.toLowerCase()] = value.join(", ");
      }
    }
    return normalized;
  }

  private mapError(error: unknown, timeout: number): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    if (
      error instanceof errors.HeadersTimeoutError ||
      error instanceof errors.BodyTimeoutError ||
      error instanceof errors.ConnectTimeoutError
    ) {
      return new TransportError(`Request timeout after ${timeout}ms`, "Timeout", {
        cause: error,
      });
    }

    const cause = error instanceof Error ? error.cause : undefined;
    const code = errorCode(error) ?? errorCode(cause);
    const message = error instanceof Error ? error.message : String(error);

    if (code === "ENOTFOUND" || code === "EAI_AGAIN") {
      return new TransportError(`DNS resolution failed: ${message}`, "DnsResolutionFailed", {
        cause: error,
      });
    }
    if (code !== undefined && (TLS_ERROR_CODES.has(code) || code.startsWith("ERR_TLS"))) {
      return new TransportError(`TLS error: ${message}`, "TlsError", { cause: error });
    }
    if (code === "ECONNREFUSED" || code === "ECONNRESET") {
      return new TransportError(`Connection failed: ${message}`, "ConnectionFailed", {
        cause: error,
      });
    }

    return new TransportError(message, "ConnectionFailed", { cause: error });
  }
}

/**
 * Mock HTTP transport for testing.
 */
export class MockHttpTransport implements HttpTransport {
  private responses: Array<HttpResponse | Error> = [];
  private requestHistory: HttpRequest[] = [];

  /**
   * Queue a response to return.
   */
  queueResponse(response: HttpResponse): this {
    this.responses.push(response);
    return this;
  }

  /**
   * Queue a JSON response.
   */
  queueJsonResponse(
    status: number,
    body: unknown,
    headers: Record<string, string> = {}
  ): this {
    return this.queueResponse({
      status,
      headers: { "content-type": "application/json", ...headers },
      body: Buffer.from(JSON.stringify(body)),
    });
  }

  /**
   * Queue an error to throw from send().
   */
  queueError(error: Error): this {
    this.responses.push(error);
    return this;
  }

  /**
   * Get request history.
   */
  getRequests(): HttpRequest[] {
    return [...this.requestHistory];
  }

  /**
   * Get last request.
   */
  getLastRequest(): HttpRequest | undefined {
    return this.requestHistory[this.requestHistory.length - 1];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requestHistory.push(request);

    const next = this.responses.shift();
    if (!next) {
      throw new Error("No mock response available");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
