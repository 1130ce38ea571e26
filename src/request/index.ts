/**
 * Request Building
 */

export { RequestBuilder } from "./builder";
export type { UrlOptions } from "./builder";
