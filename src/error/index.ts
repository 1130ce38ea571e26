/**
 * Error Module
 */

export {
  ApiClientError,
  ConfigurationError,
  AuthExchangeError,
  EncodingError,
  TransportError,
  isApiClientError,
  isRetryable,
} from "./types";

export type { TokenErrorBody } from "./mapping";
export {
  parseTokenErrorBody,
  createAuthExchangeError,
} from "./mapping";
