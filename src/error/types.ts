/**
 * Client Error Types
 *
 * Error class hierarchy for request building, token exchange and transport.
 */

/**
 * Base client error class.
 */
export class ApiClientError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ApiClientError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, ApiClientError.prototype);
  }
}

/**
 * Configuration error - invalid setup or missing credentials.
 */
export class ConfigurationError extends ApiClientError {
  constructor(
    message: string,
    code: "InvalidConfig" | "MissingRequired" = "InvalidConfig"
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Token endpoint rejected an exchange, or answered with something unreadable.
 *
 * The message is the server's own `error_message` whenever one was sent.
 */
export class AuthExchangeError extends ApiClientError {
  public readonly description: string;
  public readonly status?: number;

  constructor(
    description: string,
    code: "Rejected" | "InvalidResponse" = "Rejected",
    options?: { status?: number; cause?: unknown }
  ) {
    super(description, `AuthExchange.${code}`, { cause: options?.cause });
    this.name = "AuthExchangeError";
    this.description = description;
    this.status = options?.status;
    Object.setPrototypeOf(this, AuthExchangeError.prototype);
  }

  override toString(): string {
    return this.description;
  }
}

/**
 * Request body could not be assembled.
 */
export class EncodingError extends ApiClientError {
  public readonly field?: string;

  constructor(
    message: string,
    code: "ReadFailed" | "InvalidField" = "ReadFailed",
    options?: { field?: string; cause?: unknown }
  ) {
    super(message, `Encoding.${code}`, { cause: options?.cause });
    this.name = "EncodingError";
    this.field = options?.field;
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/**
 * Network/transport error.
 */
export class TransportError extends ApiClientError {
  constructor(
    message: string,
    code: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed" | "TlsError",
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    const retryable = options?.retryable ?? code !== "TlsError";
    super(message, `Transport.${code}`, { retryable, cause: options?.cause });
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Type guard for errors raised by this package.
 */
export function isApiClientError(error: unknown): error is ApiClientError {
  return error instanceof ApiClientError;
}

/**
 * Check if error is retryable. Nothing in this package retries; callers decide.
 */
export function isRetryable(error: ApiClientError): boolean {
  return error.retryable;
}
