/**
 * @file schemas.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from "vitest";
import { DecodeError, ValidationError } from "../../../src/domain/errors/domain-errors.js";
import {
  AccessTokenRequestSchema,
  AccessTokenResponseSchema,
  ConnectRequestSchema,
  DisconnectRequestSchema,
  FilterSchema,
  checkRequest,
  decodeResponse,
  parseConnectResponse,
} from "../../../src/protocol/schemas.js";

const publicKey = new Uint8Array(32).fill(7);
const publicKeyBase64 = Buffer.from(publicKey).toString("base64");

// ============================================================================
// Request Schemas
// ============================================================================

describe("ConnectRequestSchema", () => {
  it("should encode byte fields as base64", () => {
    const body = checkRequest(ConnectRequestSchema, {
      host: "nl",
      domain: "hide.me",
      accessToken: new Uint8Array([1, 2, 3]),
      publicKey,
    });

    expect(body).toEqual({
      host: "nl",
      domain: "hide.me",
      accessToken: "AQID",
      publicKey: publicKeyBase64,
    });
  });

  it("should accept a missing access token", () => {
    const body = checkRequest(ConnectRequestSchema, { host: "nl", domain: "hide.me", publicKey });
    expect(body.accessToken).toBeUndefined();
  });

  it("should reject a public key of the wrong length", () => {
    expect(() =>
      checkRequest(ConnectRequestSchema, { host: "nl", domain: "hide.me", publicKey: new Uint8Array(31) })
    ).toThrow("publicKey: Public key must be 32 bytes");
  });

  it("should reject an empty host", () => {
    expect(() => checkRequest(ConnectRequestSchema, { host: "", domain: "hide.me", publicKey })).toThrow(
      "host: Host is required"
    );
  });

  it("should reject a host with slashes", () => {
    expect(() => checkRequest(ConnectRequestSchema, { host: "nl/x", domain: "hide.me", publicKey })).toThrow(
      "host: Host must not contain whitespace or slashes"
    );
  });

  it("should reject an empty domain", () => {
    expect(() => checkRequest(ConnectRequestSchema, { host: "nl", domain: "", publicKey })).toThrow(
      "domain: Domain is required"
    );
  });

  it("should throw ValidationError with the issues as details", () => {
    try {
      checkRequest(ConnectRequestSchema, { host: "", domain: "", publicKey });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(Array.isArray(error.details)).toBe(true);
        expect(error.message).toBe("host: Host is required");
      }
    }
  });
});

describe("DisconnectRequestSchema", () => {
  it("should encode the session token", () => {
    const body = checkRequest(DisconnectRequestSchema, {
      host: "nl",
      domain: "hide.me",
      sessionToken: Buffer.from("session"),
    });
    expect(body.sessionToken).toBe("c2Vzc2lvbg==");
  });

  it("should reject an empty session token", () => {
    expect(() =>
      checkRequest(DisconnectRequestSchema, { host: "nl", domain: "hide.me", sessionToken: new Uint8Array(0) })
    ).toThrow("sessionToken: Session token is required");
  });
});

describe("AccessTokenRequestSchema", () => {
  it("should accept an access token alone", () => {
    const body = checkRequest(AccessTokenRequestSchema, {
      host: "nl",
      domain: "hide.me",
      accessToken: new Uint8Array([1, 2, 3]),
    });
    expect(body.accessToken).toBe("AQID");
  });

  it("should accept username and password", () => {
    const body = checkRequest(AccessTokenRequestSchema, {
      host: "nl",
      domain: "hide.me",
      username: "test-user",
      password: "test-secret",
    });
    expect(body).toEqual({ host: "nl", domain: "hide.me", username: "test-user", password: "test-secret" });
  });

  it("should require a token or both credentials", () => {
    expect(() => checkRequest(AccessTokenRequestSchema, { host: "nl", domain: "hide.me" })).toThrow(
      "Access token or username and password are required"
    );
    expect(() =>
      checkRequest(AccessTokenRequestSchema, { host: "nl", domain: "hide.me", username: "test-user" })
    ).toThrow("Access token or username and password are required");
  });
});

// ============================================================================
// Filter Schema
// ============================================================================

describe("FilterSchema", () => {
  it("should apply defaults", () => {
    expect(FilterSchema.parse({})).toEqual({
      ads: false,
      trackers: false,
      malware: false,
      malicious: false,
      pg: 0,
      safeSearch: false,
      risk: [],
      illegal: [],
      categories: [],
      whitelist: [],
      blacklist: [],
    });
  });

  it("should accept domains with wildcards", () => {
    const filter = FilterSchema.parse({ blacklist: ["*.ads.example", "Tracker.example"] });
    expect(filter.blacklist).toEqual(["*.ads.example", "Tracker.example"]);
  });

  it("should reject unknown fields", () => {
    expect(FilterSchema.safeParse({ adverts: true }).success).toBe(false);
  });

  it("should reject an unsupported parental guidance age", () => {
    expect(FilterSchema.safeParse({ pg: 13 }).success).toBe(false);
  });

  it("should reject invalid domains", () => {
    expect(FilterSchema.safeParse({ whitelist: ["bad domain"] }).success).toBe(false);
  });

  it("should reject a domain listed on both sides", () => {
    const result = FilterSchema.safeParse({ whitelist: ["example.org"], blacklist: ["EXAMPLE.org"] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.message).toBe("Domain is both whitelisted and blacklisted: EXAMPLE.org");
      expect(result.error.issues[0]?.path).toEqual(["blacklist"]);
    }
  });
});

// ============================================================================
// Responses
// ============================================================================

describe("parseConnectResponse", () => {
  const response = {
    publicKey: publicKeyBase64,
    presharedKey: "AQID",
    endpoint: { ip: "203.0.113.9", port: 432 },
    persistentKeepaliveInterval: 25,
    allowedIps: ["0.0.0.0/0", "::/0"],
    dns: ["10.128.0.1"],
    gateway: ["10.128.0.1"],
    sessionToken: "c2Vzc2lvbg==",
    staleAccessToken: true,
  };

  it("should decode a complete response", () => {
    const parsed = parseConnectResponse(Buffer.from(JSON.stringify(response)));

    expect(parsed.publicKey).toEqual(Buffer.from(publicKey));
    expect(parsed.presharedKey).toEqual(Buffer.from([1, 2, 3]));
    expect(parsed.endpoint).toEqual({ ip: "203.0.113.9", port: 432 });
    expect(parsed.persistentKeepaliveInterval).toBe(25);
    expect(parsed.allowedIps).toEqual(["0.0.0.0/0", "::/0"]);
    expect(parsed.dns).toEqual(["10.128.0.1"]);
    expect(parsed.gateway).toEqual(["10.128.0.1"]);
    expect(parsed.sessionToken.toString("utf8")).toBe("session");
    expect(parsed.staleAccessToken).toBe(true);
  });

  it("should default optional fields", () => {
    const parsed = parseConnectResponse(
      Buffer.from(
        JSON.stringify({
          publicKey: publicKeyBase64,
          endpoint: { ip: "203.0.113.10", port: 432 },
          sessionToken: "c2Vzc2lvbg==",
        })
      )
    );

    expect(parsed.presharedKey).toBeUndefined();
    expect(parsed.persistentKeepaliveInterval).toBe(0);
    expect(parsed.allowedIps).toEqual([]);
    expect(parsed.staleAccessToken).toBe(false);
  });

  it("should reject a body that is not JSON", () => {
    expect(() => parseConnectResponse(Buffer.from("<html>"))).toThrow(DecodeError);
    expect(() => parseConnectResponse(Buffer.from("<html>"))).toThrow("Response body is not valid JSON");
  });

  it("should reject a response without session token", () => {
    const { sessionToken: _sessionToken, ...incomplete } = response;
    expect(() => parseConnectResponse(Buffer.from(JSON.stringify(incomplete)))).toThrow(/^Unexpected response: /);
  });

  it("should reject an endpoint that is not an IP", () => {
    const bad = { ...response, endpoint: { ip: "nl.hideservers.net", port: 432 } };
    expect(() => parseConnectResponse(Buffer.from(JSON.stringify(bad)))).toThrow(DecodeError);
  });
});

describe("decodeResponse", () => {
  it("should decode the access token string", () => {
    expect(decodeResponse(AccessTokenResponseSchema, Buffer.from('"AQID"'))).toBe("AQID");
  });

  it("should reject a non-string token", () => {
    expect(() => decodeResponse(AccessTokenResponseSchema, Buffer.from("42"))).toThrow(DecodeError);
  });
});
