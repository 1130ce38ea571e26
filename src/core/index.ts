/**
 * Core Components
 */

export { sign, signingBaseString } from "./signer";

export type { EncodedBody, SplitParameters } from "./encoder";
export {
  MULTIPART_BOUNDARY,
  FORM_URLENCODED,
  splitParameters,
  encodeQuery,
  encodeFormBody,
  readFileContent,
  encodeMultipart,
} from "./encoder";

export type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  UndiciTransportOptions,
} from "./transport";
export {
  UndiciHttpTransport,
  MockHttpTransport,
} from "./transport";
