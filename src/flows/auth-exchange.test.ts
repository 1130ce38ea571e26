/**
 * Tests for token exchange flows
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AuthExchange } from "./auth-exchange";
import { MockHttpTransport } from "../core/transport";
import { AuthExchangeError, ConfigurationError, TransportError } from "../error";
import { DEFAULT_CONFIG } from "../types";
import type { ApiConfig, Credentials } from "../types";
import { InMemoryLogger } from "../telemetry";

const AUTHORIZE_URL = "https://auth.example.com/oauth/authorize";
const TOKEN_URL = "https://auth.example.com/oauth/access_token";
const CALLBACK = "https%3A%2F%2Fapp.example.com%2Fcallback";

const config: ApiConfig = {
  ...DEFAULT_CONFIG,
  host: "api.example.com",
  basePath: "/v1",
  apiName: "Test API",
  authorizeUrl: AUTHORIZE_URL,
  accessTokenUrl: TOKEN_URL,
  timeout: 5000,
};

const credentials: Credentials = {
  clientId: "client-123",
  clientSecret: "test-secret",
  redirectUri: "https://app.example.com/callback",
};

const CLIENT_FIELDS = `client_id=client-123&client_secret=test-secret&redirect_uri=${CALLBACK}`;

describe("AuthExchange", () => {
  let transport: MockHttpTransport;
  let logger: InMemoryLogger;
  let auth: AuthExchange;

  beforeEach(() => {
    transport = new MockHttpTransport();
    logger = new InMemoryLogger();
    auth = new AuthExchange(config, credentials, transport, logger);
  });

  describe("buildAuthorizeUrl", () => {
    it("should include client id, response type, redirect URI and scope", () => {
      expect(auth.buildAuthorizeUrl(["basic", "comments"])).toBe(
        `${AUTHORIZE_URL}?client_id=client-123&response_type=code&redirect_uri=${CALLBACK}` +
          "&scope=basic+comments"
      );
    });

    it("should leave out empty scope and missing redirect URI", () => {
      const bare = new AuthExchange(config, { clientId: "client-123" }, transport);
      expect(bare.buildAuthorizeUrl([])).toBe(
        `${AUTHORIZE_URL}?client_id=client-123&response_type=code`
      );
    });

    it("should require a client id", () => {
      const anonymous = new AuthExchange(config, {}, transport);
      expect(() => anonymous.buildAuthorizeUrl()).toThrow(ConfigurationError);
    });

    it("should require the authorize endpoint", () => {
      const unconfigured = new AuthExchange(
        { ...config, authorizeUrl: undefined },
        credentials,
        transport
      );
      expect(() => unconfigured.buildAuthorizeUrl()).toThrow("authorizeUrl is not configured");
    });
  });

  describe("getAuthorizeLoginUrl", () => {
    it("should resolve a redirect location against the authorize URL", async () => {
      transport.queueResponse({
        status: 302,
        headers: { location: "/accounts/login/?next=x" },
        body: Buffer.alloc(0),
      });

      await expect(auth.getAuthorizeLoginUrl()).resolves.toBe(
        "https://auth.example.com/accounts/login/?next=x"
      );
      expect(transport.getLastRequest()).toEqual({
        method: "GET",
        url: `${AUTHORIZE_URL}?client_id=client-123&response_type=code&redirect_uri=${CALLBACK}`,
        headers: { "User-Agent": "Test API Node.js Client" },
        timeout: 5000,
      });
    });

    it("should return the content location of a 200 response", async () => {
      transport.queueResponse({
        status: 200,
        headers: { "content-location": "https://auth.example.com/login" },
        body: Buffer.from("<html></html>"),
      });

      await expect(auth.getAuthorizeLoginUrl()).resolves.toBe("https://auth.example.com/login");
    });

    it("should fail on other statuses", async () => {
      transport.queueResponse({ status: 500, headers: {}, body: Buffer.from("oops") });

      const url = `${AUTHORIZE_URL}?client_id=client-123&response_type=code&redirect_uri=${CALLBACK}`;
      await expect(auth.getAuthorizeLoginUrl()).rejects.toMatchObject({
        name: "AuthExchangeError",
        description: `The server returned a non-200 response for URL ${url}`,
        status: 500,
      });
    });

    it("should fail when a 200 response has no location", async () => {
      transport.queueResponse({ status: 200, headers: {}, body: Buffer.alloc(0) });

      await expect(auth.getAuthorizeLoginUrl()).rejects.toMatchObject({
        code: "AuthExchange.InvalidResponse",
      });
    });
  });

  describe("exchange", () => {
    it("should post an authorization code grant", async () => {
      transport.queueJsonResponse(200, {
        access_token: "tok-1",
        user: { id: "42", username: "alice" },
      });

      const result = await auth.exchangeCode("abc");

      expect(result).toEqual({ accessToken: "tok-1", user: { id: "42", username: "alice" } });
      expect(transport.getLastRequest()).toEqual({
        method: "POST",
        url: TOKEN_URL,
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": "Test API Node.js Client",
        },
        body: `${CLIENT_FIELDS}&grant_type=authorization_code&code=abc`,
        timeout: 5000,
      });
    });

    it("should post a password grant with scope", async () => {
      transport.queueJsonResponse(200, { access_token: "tok-2", user: null });

      const result = await auth.exchangePassword("alice", "pa ss", ["basic", "likes"]);

      expect(result).toEqual({ accessToken: "tok-2", user: null });
      expect(transport.getLastRequest()?.body).toBe(
        `${CLIENT_FIELDS}&grant_type=password&username=alice&password=pa+ss&scope=basic+likes`
      );
    });

    it("should post a user id under the authorization code grant type", async () => {
      transport.queueJsonResponse(200, { access_token: "tok-3", user: { id: "42" } });

      await auth.exchangeUserId("42");

      expect(transport.getLastRequest()?.body).toBe(
        `${CLIENT_FIELDS}&grant_type=authorization_code&user_id=42`
      );
    });

    it("should surface the server's error message", async () => {
      transport.queueJsonResponse(400, { error_message: "bad code" });

      const result = auth.exchangeCode("bad");

      await expect(result).rejects.toBeInstanceOf(AuthExchangeError);
      await expect(result).rejects.toMatchObject({
        description: "bad code",
        message: "bad code",
        status: 400,
        code: "AuthExchange.Rejected",
      });
    });

    it("should use a generic message for unreadable error bodies", async () => {
      transport.queueResponse({ status: 502, headers: {}, body: Buffer.from("Bad Gateway") });

      await expect(auth.exchangeCode("abc")).rejects.toMatchObject({
        description: "Token endpoint returned HTTP 502",
        code: "AuthExchange.InvalidResponse",
      });
    });

    it("should reject a 200 response that is not JSON", async () => {
      transport.queueResponse({ status: 200, headers: {}, body: Buffer.from("{not json") });

      await expect(auth.exchangeCode("abc")).rejects.toMatchObject({
        description: "Invalid token response",
        code: "AuthExchange.InvalidResponse",
      });
    });

    it("should reject a response without user or token", async () => {
      transport.queueJsonResponse(200, { access_token: "tok-1" });
      transport.queueJsonResponse(200, { user: { id: "42" } });

      await expect(auth.exchangeCode("abc")).rejects.toMatchObject({
        description: "Token response is missing access_token or user",
      });
      await expect(auth.exchangeCode("abc")).rejects.toMatchObject({
        description: "Token response is missing access_token or user",
      });
    });

    it("should pass transport errors through unchanged", async () => {
      const failure = new TransportError("Connection failed: refused", "ConnectionFailed");
      transport.queueError(failure);

      await expect(auth.exchangeCode("abc")).rejects.toBe(failure);
    });

    it("should require the token endpoint", async () => {
      const unconfigured = new AuthExchange(
        { ...config, accessTokenUrl: undefined },
        credentials,
        transport
      );

      await expect(unconfigured.exchangeCode("abc")).rejects.toBeInstanceOf(ConfigurationError);
      expect(transport.getRequests()).toHaveLength(0);
    });

    it("should log outcomes without credentials", async () => {
      transport.queueJsonResponse(200, { access_token: "tok-1", user: {} });
      transport.queueJsonResponse(400, { error_message: "bad code" });

      await auth.exchangeCode("abc");
      await expect(auth.exchangeCode("bad")).rejects.toBeInstanceOf(AuthExchangeError);

      const [info] = logger.getLogsByLevel("info");
      const [warn] = logger.getLogsByLevel("warn");
      expect(info?.message).toBe("Token exchange succeeded");
      expect(info?.context).toMatchObject({ grantType: "authorization_code", status: 200 });
      expect(warn?.context).toMatchObject({ status: 400, errorCode: "AuthExchange.Rejected" });
      expect(JSON.stringify(logger.getLogs())).not.toContain("tok-1");
    });
  });
});
