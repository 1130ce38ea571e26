/**
 * Tests for RequestBuilder
 */

import { describe, it, expect } from "vitest";
import { RequestBuilder } from "./builder";
import { MULTIPART_BOUNDARY } from "../core/encoder";
import { DEFAULT_CONFIG, fileField, textField } from "../types";
import type { ApiConfig, Credentials } from "../types";
import { InMemoryLogger } from "../telemetry";

const config: ApiConfig = {
  ...DEFAULT_CONFIG,
  host: "api.example.com",
  basePath: "/v1",
  apiName: "Test API",
};

const USER_AGENT = "Test API Node.js Client";

function builder(credentials: Credentials, overrides: Partial<ApiConfig> = {}): RequestBuilder {
  return new RequestBuilder({ ...config, ...overrides }, credentials);
}

describe("RequestBuilder.buildUrl", () => {
  it("should attach the access token without a trailing separator", () => {
    expect(builder({ accessToken: "tok" }).buildUrl("/tags/test")).toBe(
      "https://api.example.com/v1/tags/test?access_token=tok"
    );
  });

  it("should return the bare URL without credentials or params", () => {
    expect(builder({}).buildUrl("/tags/test")).toBe("https://api.example.com/v1/tags/test");
  });

  it("should start the query with the params when there is no auth segment", () => {
    expect(builder({}).buildUrl("/tags/search", { q: "a b" })).toBe(
      "https://api.example.com/v1/tags/search?q=a+b"
    );
  });

  it("should use the configured access token field", () => {
    expect(
      builder({ accessToken: "tok" }, { accessTokenField: "oauth_token" }).buildUrl("/me")
    ).toBe("https://api.example.com/v1/me?oauth_token=tok");
  });

  it("should honour protocol and an empty base path", () => {
    expect(
      builder({ clientId: "client-123" }, { protocol: "http", basePath: "" }).buildUrl("/me")
    ).toBe("http://api.example.com/me?client_id=client-123");
  });

  it("should sign token requests with the client secret", () => {
    const url = builder({ accessToken: "tok-1", clientSecret: "test-secret" }).buildUrl(
      "/tags/search",
      { q: "sunset" }
    );

    expect(url).toBe(
      "https://api.example.com/v1/tags/search?access_token=tok-1&q=sunset" +
        "&sig=34dfd1451e6da888463df63598b72d3bd026e644e229910e5cee04e680f23533"
    );
  });

  it("should include and sign the client secret when requested", () => {
    const url = builder({ clientId: "client-123", clientSecret: "test-secret" }).buildUrl(
      "/users/self",
      {},
      { includeSecret: true }
    );

    expect(url).toBe(
      "https://api.example.com/v1/users/self?client_id=client-123&client_secret=test-secret" +
        "&sig=64f7ac415646513eff4636e5c4e15951b1476eeb0f47e6262ffe89cbf8967835"
    );
  });

  it("should leave the client secret out by default", () => {
    const url = builder({ clientId: "client-123", clientSecret: "test-secret" }).buildUrl(
      "/users/self"
    );

    expect(url.startsWith("https://api.example.com/v1/users/self?client_id=client-123&sig=")).toBe(
      true
    );
    expect(url).not.toContain("client_secret");
  });

  it("should skip the signature when signing is turned off", () => {
    const credentials = { accessToken: "tok-1", clientSecret: "test-secret" };
    const expected = "https://api.example.com/v1/tags/search?access_token=tok-1&q=sunset";

    expect(builder(credentials, { signRequests: false }).buildUrl("/tags/search", { q: "sunset" })).toBe(
      expected
    );
    expect(
      builder(credentials).buildUrl("/tags/search", { q: "sunset" }, { signRequest: false })
    ).toBe(expected);
  });

  it("should not modify the params", () => {
    const params = { q: "sunset" };
    builder({ accessToken: "tok-1", clientSecret: "test-secret" }).buildUrl(
      "/tags/search",
      params,
      { includeSecret: true }
    );

    expect(params).toEqual({ q: "sunset" });
  });
});

describe("RequestBuilder.prepare", () => {
  it("should build a GET request with no body", async () => {
    const request = await builder({ accessToken: "tok" }).prepare("GET", "/tags/test");

    expect(request).toEqual({
      url: "https://api.example.com/v1/tags/test?access_token=tok",
      method: "GET",
      body: undefined,
      headers: { "User-Agent": USER_AGENT },
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.headers)).toBe(true);
  });

  it("should URL-encode POST params into the body", async () => {
    const request = await builder({ accessToken: "tok-1" }).prepare("POST", "/media/1/comments", {
      text: textField("nice photo"),
    });

    expect(request.url).toBe(
      "https://api.example.com/v1/media/1/comments?access_token=tok-1&text=nice+photo"
    );
    expect(request.body).toBe("text=nice+photo");
    expect(request.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
      "User-Agent": USER_AGENT,
    });
  });

  it("should sign prepared requests like buildUrl", async () => {
    const request = await builder({ accessToken: "tok-1", clientSecret: "test-secret" }).prepare(
      "GET",
      "/tags/search",
      { q: textField("sunset") }
    );

    expect(request.url).toBe(
      "https://api.example.com/v1/tags/search?access_token=tok-1&q=sunset" +
        "&sig=34dfd1451e6da888463df63598b72d3bd026e644e229910e5cee04e680f23533"
    );
  });

  it("should send files as unsigned multipart with the auth query only", async () => {
    const request = await builder({ clientId: "client-123", clientSecret: "test-secret" }).prepare(
      "POST",
      "/media/upload",
      {
        caption: textField("hi"),
        photo: fileField("photo.jpg", Buffer.from("JPEG")),
      }
    );

    expect(request.url).toBe("https://api.example.com/v1/media/upload?client_id=client-123");
    expect(Buffer.isBuffer(request.body)).toBe(true);

    const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    expect(
      body
        .toString("utf8")
        .startsWith(
          `--${MULTIPART_BOUNDARY}\r\nContent-Disposition: form-data; name="caption"\r\n\r\nhi\r\n`
        )
    ).toBe(true);
    expect(request.headers).toEqual({
      "Content-Type": `multipart/form-data; boundary=${MULTIPART_BOUNDARY}`,
      "Content-Length": String(body.length),
      "User-Agent": USER_AGENT,
    });
  });

  it("should keep the client secret out of multipart URLs", async () => {
    const request = await builder({ clientId: "client-123", clientSecret: "test-secret" }).prepare(
      "POST",
      "/media/upload",
      { photo: fileField("photo.jpg", Buffer.from("JPEG")) },
      { includeSecret: true }
    );

    expect(request.url).toBe("https://api.example.com/v1/media/upload?client_id=client-123");
  });

  it("should keep a caller supplied User-Agent in any case", async () => {
    const request = await builder({ accessToken: "tok" }).prepare("GET", "/tags/test", {}, {
      headers: { "user-agent": "custom/1.0", Accept: "application/json" },
    });

    expect(request.headers).toEqual({ "user-agent": "custom/1.0", Accept: "application/json" });
  });

  it("should use the configured User-Agent", async () => {
    const request = await builder({}, { userAgent: "my-app/2.0" }).prepare("GET", "/tags/test");

    expect(request.headers).toEqual({ "User-Agent": "my-app/2.0" });
  });

  it("should not modify the caller's params or headers", async () => {
    const params = { text: textField("nice") };
    const headers = { Accept: "application/json" };

    await builder({ accessToken: "tok", clientSecret: "test-secret" }).prepare(
      "POST",
      "/media/1/comments",
      params,
      { headers, includeSecret: true }
    );

    expect(params).toEqual({ text: { kind: "text", value: "nice" } });
    expect(headers).toEqual({ Accept: "application/json" });
  });

  it("should read credentials at call time", async () => {
    const credentials: Credentials = { clientId: "client-123" };
    const requests = new RequestBuilder(config, credentials);

    expect(requests.buildUrl("/me")).toBe("https://api.example.com/v1/me?client_id=client-123");
    credentials.accessToken = "tok-2";
    expect(requests.buildUrl("/me")).toBe("https://api.example.com/v1/me?access_token=tok-2");
  });

  it("should log the prepared request without credentials", async () => {
    const logger = new InMemoryLogger();
    const requests = new RequestBuilder(
      config,
      { accessToken: "tok-1", clientSecret: "test-secret" },
      logger
    );

    await requests.prepare("POST", "/media/1/comments", { text: textField("nice") });

    const [entry] = logger.getLogsByLevel("debug");
    expect(entry?.message).toBe("Prepared API request");
    expect(entry?.context).toEqual({
      endpoint: "/media/1/comments",
      method: "POST",
      encoding: "form",
      signed: true,
    });
  });
});
