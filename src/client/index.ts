/**
 * Client Module
 */

export { ApiClient, createClient } from "./api-client";
export type { ApiClientOptions } from "./api-client";
export {
  ApiConfigBuilder,
  configBuilder,
  configFromEnv,
  validateConfig,
} from "./builder";
