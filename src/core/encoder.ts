/**
 * Parameter Encoding
 *
 * Query string, URL-encoded body and multipart/form-data serialization.
 */

import FormData from "form-data";
import { Readable } from "stream";
import { EncodingError } from "../error";
import type {
  FileContent,
  FileField,
  ParameterSet,
  TextParameters,
  TextValue,
} from "../types";

/**
 * Boundary used for every multipart body. Test fixtures may rely on it.
 *
 * Being fixed, it must not occur inside a text value; encodeMultipart
 * rejects such values. File content is not scanned.
 */
export const MULTIPART_BOUNDARY = "MuL7Ip4rt80uND4rYF0o";

export const FORM_URLENCODED = "application/x-www-form-urlencoded";

/**
 * Encoded body with the headers describing it.
 */
export interface EncodedBody<T extends string | Buffer> {
  body: T;
  headers: Record<string, string>;
}

/**
 * Text and file fields of a ParameterSet, in insertion order.
 */
export interface SplitParameters {
  fields: TextParameters;
  files: Readonly<Record<string, FileField>>;
}

/**
 * Partition parameters into text fields and file fields.
 */
export function splitParameters(params: ParameterSet): SplitParameters {
  const fields: Record<string, TextValue> = {};
  const files: Record<string, FileField> = {};

  for (const [key, param] of Object.entries(params)) {
    switch (param.kind) {
      case "text":
        fields[key] = param.value;
        break;
      case "file":
        files[key] = param;
        break;
    }
  }

  return { fields, files };
}

/**
 * URL query encoding of text parameters. Empty input gives "".
 */
export function encodeQuery(params: TextParameters): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.append(key, String(value));
  }
  return search.toString();
}

/**
 * URL-encoded POST body.
 */
export function encodeFormBody(params: TextParameters): EncodedBody<string> {
  return {
    body: encodeQuery(params),
    headers: { "Content-Type": FORM_URLENCODED },
  };
}

/**
 * Read file content into memory. Streams are drained exactly once.
 */
export async function readFileContent(
  content: FileContent,
  field?: string
): Promise<Buffer> {
  if (!(content instanceof Readable)) {
    return Buffer.from(content);
  }

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of content) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EncodingError(
      `Failed to read file${field ? ` for field "${field}"` : ""}: ${reason}`,
      "ReadFailed",
      { field, cause: error }
    );
  }
  return Buffer.concat(chunks);
}

/**
 * Multipart body with text parts first, then file parts.
 *
 * File parts carry a Content-Type guessed from the file name, falling back
 * to application/octet-stream.
 */
export async function encodeMultipart(
  fields: TextParameters,
  files: Readonly<Record<string, FileField>>
): Promise<EncodedBody<Buffer>> {
  const form = new FormData();
  form.setBoundary(MULTIPART_BOUNDARY);

  for (const [name, value] of Object.entries(fields)) {
    const text = String(value);
    if (text.includes(MULTIPART_BOUNDARY)) {
      throw new EncodingError(
        `Text field "${name}" contains the multipart boundary`,
        "InvalidField",
        { field: name }
      );
    }
    form.append(name, text);
  }

  for (const [name, file] of Object.entries(files)) {
    if (file.fileName.length === 0) {
      throw new EncodingError(
        `File field "${name}" has no file name`,
        "InvalidField",
        { field: name }
      );
    }
    const content = await readFileContent(file.content, name);
    // form-data reduces `filename` to its basename; `filepath` keeps directories.
    form.append(name, content, { filepath: file.fileName });
  }

  const body = form.getBuffer();

  return {
    body,
    headers: {
      "Content-Type": `multipart/form-data; boundary=${form.getBoundary()}`,
      "Content-Length": String(body.length),
    },
  };
}
