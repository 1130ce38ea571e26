/**
 * Client Configuration Builder
 *
 * Fluent builder for ApiConfig, with zod validation and environment loading.
 */

import { z } from "zod";
import { DEFAULT_CONFIG, type ApiConfig, type Protocol } from "../types";
import { ConfigurationError } from "../error";

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  host: z.string().min(1).regex(/^[^/?#\s]+$/, "must be a bare host name"),
  basePath: z.string().regex(/^(\/[^?#]*)?$/, "must be empty or start with '/'"),
  authorizeUrl: z.string().url().optional(),
  accessTokenUrl: z.string().url().optional(),
  accessTokenField: z.string().min(1),
  protocol: z.enum(["http", "https"]),
  apiName: z.string().min(1),
  timeout: z.number().int().positive().optional(),
  rejectUnauthorized: z.boolean(),
  signRequests: z.boolean(),
  userAgent: z.string().min(1).optional(),
});

/**
 * Validates a configuration.
 */
export function validateConfig(config: ApiConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(", ")}`);
  }
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigurationError(`${name} must be a boolean, got "${value}"`);
  }
}

function parseProtocol(name: string, value: string): Protocol {
  if (value === "http" || value === "https") {
    return value;
  }
  throw new ConfigurationError(`${name} must be "http" or "https", got "${value}"`);
}

/**
 * API configuration builder.
 */
export class ApiConfigBuilder {
  private _host?: string;
  private _basePath: string = DEFAULT_CONFIG.basePath;
  private _authorizeUrl?: string;
  private _accessTokenUrl?: string;
  private _accessTokenField: string = DEFAULT_CONFIG.accessTokenField;
  private _protocol: Protocol = DEFAULT_CONFIG.protocol;
  private _apiName: string = DEFAULT_CONFIG.apiName;
  private _timeout?: number;
  private _rejectUnauthorized: boolean = DEFAULT_CONFIG.rejectUnauthorized;
  private _signRequests: boolean = DEFAULT_CONFIG.signRequests;
  private _userAgent?: string;

  host(host: string): this {
    this._host = host;
    return this;
  }

  basePath(basePath: string): this {
    this._basePath = basePath;
    return this;
  }

  authorizeUrl(url: string): this {
    this._authorizeUrl = url;
    return this;
  }

  accessTokenUrl(url: string): this {
    this._accessTokenUrl = url;
    return this;
  }

  /**
   * Query field for the access token, e.g. "oauth_token".
   */
  accessTokenField(field: string): this {
    this._accessTokenField = field;
    return this;
  }

  protocol(protocol: Protocol): this {
    this._protocol = protocol;
    return this;
  }

  apiName(name: string): this {
    this._apiName = name;
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this._timeout = timeout;
    return this;
  }

  /**
   * Disable only for legacy endpoints with broken certificates.
   */
  rejectUnauthorized(value: boolean): this {
    this._rejectUnauthorized = value;
    return this;
  }

  signRequests(value: boolean): this {
    this._signRequests = value;
    return this;
  }

  userAgent(userAgent: string): this {
    this._userAgent = userAgent;
    return this;
  }

  /**
   * Build and validate configuration.
   */
  build(): ApiConfig {
    if (!this._host) {
      throw new ConfigurationError("API host is required", "MissingRequired");
    }

    const config: ApiConfig = {
      host: this._host,
      basePath: this._basePath,
      authorizeUrl: this._authorizeUrl,
      accessTokenUrl: this._accessTokenUrl,
      accessTokenField: this._accessTokenField,
      protocol: this._protocol,
      apiName: this._apiName,
      timeout: this._timeout,
      rejectUnauthorized: this._rejectUnauthorized,
      signRequests: this._signRequests,
      userAgent: this._userAgent,
    };

    validateConfig(config);
    return Object.freeze(config);
  }
}

/**
 * Create a configuration builder.
 */
export function configBuilder(): ApiConfigBuilder {
  return new ApiConfigBuilder();
}

/**
 * Create configuration from environment variables named `{prefix}_HOST`,
 * `{prefix}_BASE_PATH` and so on.
 */
export function configFromEnv(
  prefix = "API",
  env: NodeJS.ProcessEnv = process.env
): ApiConfig {
  const builder = new ApiConfigBuilder();
  const read = (name: string): string | undefined => {
    const value = env[`${prefix}_${name}`];
    return value === undefined || value === "" ? undefined : value;
  };

  const host = read("HOST");
  if (host !== undefined) builder.host(host);

  const basePath = read("BASE_PATH");
  if (basePath !== undefined) builder.basePath(basePath);

  const authorizeUrl = read("AUTHORIZE_URL");
  if (authorizeUrl !== undefined) builder.authorizeUrl(authorizeUrl);

  const accessTokenUrl = read("ACCESS_TOKEN_URL");
  if (accessTokenUrl !== undefined) builder.accessTokenUrl(accessTokenUrl);

  const accessTokenField = read("ACCESS_TOKEN_FIELD");
  if (accessTokenField !== undefined) builder.accessTokenField(accessTokenField);

  const protocol = read("PROTOCOL");
  if (protocol !== undefined) builder.protocol(parseProtocol(`${prefix}_PROTOCOL`, protocol));

  const apiName = read("API_NAME");
  if (apiName !== undefined) builder.apiName(apiName);

  const timeout = read("TIMEOUT_MS");
  if (timeout !== undefined) {
    const parsed = Number(timeout);
    if (!Number.isInteger(parsed)) {
      throw new ConfigurationError(`${prefix}_TIMEOUT_MS must be an integer, got "${timeout}"`);
    }
    builder.timeout(parsed);
  }

  const rejectUnauthorized = read("REJECT_UNAUTHORIZED");
  if (rejectUnauthorized !== undefined) {
    builder.rejectUnauthorized(
      parseBoolean(`${prefix}_REJECT_UNAUTHORIZED`, rejectUnauthorized)
    );
  }

  const signRequests = read("SIGN_REQUESTS");
  if (signRequests !== undefined) {
    builder.signRequests(parseBoolean(`${prefix}_SIGN_REQUESTS`, signRequests));
  }

  const userAgent = read("USER_AGENT");
  if (userAgent !== undefined) builder.userAgent(userAgent);

  return builder.build();
}
