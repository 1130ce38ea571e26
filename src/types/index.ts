/**
 * Type Definitions
 */

export type { Protocol, ApiConfig, Credentials } from "./config";
export { DEFAULT_CONFIG, defaultUserAgent } from "./config";

export type {
  TextValue,
  TextField,
  FileContent,
  FileField,
  ParameterValue,
  ParameterSet,
  TextParameters,
  ParameterInput,
} from "./params";
export { textField, fileField, toParameterSet } from "./params";

export type { HttpMethod, SignedRequest, PrepareOptions } from "./request";

export type { AccessTokenResult, ExchangeGrant, GrantType } from "./token";
