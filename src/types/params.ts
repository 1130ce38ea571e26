/**
 * Request Parameter Types
 *
 * A parameter is either a text field or a file to upload.
 */

import type { Readable } from "stream";

/**
 * Scalar value of a text field.
 */
export type TextValue = string | number | boolean;

/**
 * Plain text form/query field.
 */
export interface TextField {
  readonly kind: "text";
  readonly value: TextValue;
}

/**
 * Bytes of an uploaded file. Streams are read once, fully.
 */
export type FileContent = Buffer | Uint8Array | Readable;

/**
 * File part of a multipart upload. The field name is the key it is stored under.
 */
export interface FileField {
  readonly kind: "file";
  readonly fileName: string;
  readonly content: FileContent;
}

/**
 * Any request parameter.
 */
export type ParameterValue = TextField | FileField;

/**
 * Request parameters keyed by field name.
 */
export type ParameterSet = Readonly<Record<string, ParameterValue>>;

/**
 * Text-only parameters, as signed and URL-encoded.
 */
export type TextParameters = Readonly<Record<string, TextValue>>;

/**
 * Shorthand accepted by the client: bare scalars become text fields.
 */
export type ParameterInput = Readonly<Record<string, TextValue | ParameterValue>>;

export function textField(value: TextValue): TextField {
  return { kind: "text", value };
}

export function fileField(fileName: string, content: FileContent): FileField {
  return { kind: "file", fileName, content };
}

/**
 * Normalize shorthand input into a ParameterSet.
 */
export function toParameterSet(input: ParameterInput = {}): ParameterSet {
  const params: Record<string, ParameterValue> = {};
  for (const [key, value] of Object.entries(input)) {
    params[key] = typeof value === "object" ? value : textField(value);
  }
  return params;
}
