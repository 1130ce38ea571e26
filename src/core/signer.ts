/**
 * Request Signer
 *
 * HMAC-SHA256 signature over an endpoint path and its sorted parameters.
 * The remote verifier recomputes the same base string, so the format here
 * is fixed: `{path}|k1=v1|k2=v2` with keys in UTF-8 byte order.
 *
 * Keys and values are joined as plain text. A value containing `|` or `=`
 * can collide with another parameter layout; the API accepts that.
 */

import * as crypto from "crypto";
import type { TextParameters } from "../types";

function compareUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

/**
 * Build the signing base string.
 */
export function signingBaseString(
  endpointPath: string,
  params: TextParameters
): string {
  const keys = Object.keys(params).sort(compareUtf8);
  const segments = keys.map((key) => `|${key}=${String(params[key])}`);
  return `${endpointPath}${segments.join("")}`;
}

/**
 * Sign an endpoint path and parameters with a shared secret.
 *
 * @returns lowercase hex digest
 */
export function sign(
  endpointPath: string,
  params: TextParameters,
  secret: string
): string {
  return crypto
    .createHmac("sha256", Buffer.from(secret, "utf8"))
    .update(Buffer.from(signingBaseString(endpointPath, params), "utf8"))
    .digest("hex");
}
