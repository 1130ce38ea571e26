/**
 * Token Endpoint Error Mapping
 *
 * Turn token endpoint failures into AuthExchangeError.
 */

import { z } from "zod";
import { AuthExchangeError } from "./types";

/**
 * Error body sent by the token endpoint.
 */
export interface TokenErrorBody {
  error_type?: string;
  error_message?: string;
  code?: number;
}

const tokenErrorBodySchema = z
  .object({
    error_type: z.string().optional(),
    error_message: z.string().optional(),
    code: z.number().optional(),
  })
  .passthrough();

/**
 * Parse an error body. Returns null when the body is not a JSON object.
 */
export function parseTokenErrorBody(body: string): TokenErrorBody | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  const result = tokenErrorBodySchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Create error from a non-200 token endpoint response.
 */
export function createAuthExchangeError(
  status: number,
  body: string
): AuthExchangeError {
  const errorBody = parseTokenErrorBody(body);
  const message = errorBody?.error_message;

  if (message) {
    return new AuthExchangeError(message, "Rejected", { status });
  }

  return new AuthExchangeError(
    `Token endpoint returned HTTP ${status}`,
    errorBody ? "Rejected" : "InvalidResponse",
    { status }
  );
}
