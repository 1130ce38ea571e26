/**
 * Signed OAuth2 API Client
 *
 * Token exchange, request signing and request encoding for OAuth2-protected
 * HTTP APIs.
 *
 * @packageDocumentation
 */

// Types
export type {
  Protocol,
  ApiConfig,
  Credentials,
  TextValue,
  TextField,
  FileContent,
  FileField,
  ParameterValue,
  ParameterSet,
  TextParameters,
  ParameterInput,
  HttpMethod,
  SignedRequest,
  PrepareOptions,
  AccessTokenResult,
  ExchangeGrant,
  GrantType,
} from "./types";
export {
  DEFAULT_CONFIG,
  defaultUserAgent,
  textField,
  fileField,
  toParameterSet,
} from "./types";

// Errors
export type { TokenErrorBody } from "./error";
export {
  ApiClientError,
  ConfigurationError,
  AuthExchangeError,
  EncodingError,
  TransportError,
  isApiClientError,
  isRetryable,
  parseTokenErrorBody,
  createAuthExchangeError,
} from "./error";

// Core components
export type {
  EncodedBody,
  SplitParameters,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  UndiciTransportOptions,
} from "./core";
export {
  // Signer
  sign,
  signingBaseString,

  // Encoder
  MULTIPART_BOUNDARY,
  FORM_URLENCODED,
  splitParameters,
  encodeQuery,
  encodeFormBody,
  readFileContent,
  encodeMultipart,

  // Transport
  UndiciHttpTransport,
  MockHttpTransport,
} from "./core";

// Request building
export type { UrlOptions } from "./request";
export { RequestBuilder } from "./request";

// Flows
export { AuthExchange } from "./flows";

// Client
export type { ApiClientOptions } from "./client";
export {
  ApiClient,
  createClient,
  ApiConfigBuilder,
  configBuilder,
  configFromEnv,
  validateConfig,
} from "./client";

// Telemetry
export type { LogLevel, ApiLogContext, Logger, LogEntry } from "./telemetry";
export {
  noOpLogger,
  InMemoryLogger,
  ConsoleLogger,
} from "./telemetry";
