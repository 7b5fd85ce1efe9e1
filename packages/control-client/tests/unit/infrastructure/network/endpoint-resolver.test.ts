/**
 * @file endpoint-resolver.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import { ResolutionError } from "../../../../src/domain/errors/domain-errors.js";
import { EndpointResolver } from "../../../../src/infrastructure/network/endpoint-resolver.js";
import { createTestLogger, silentLogger } from "../../../helpers/test-logger.js";

type LookupFn = (host: string, signal: AbortSignal) => Promise<string[]>;

describe("EndpointResolver", () => {
  let lookup: Mock<LookupFn>;

  beforeEach(() => {
    lookup = vi.fn<LookupFn>();
  });

  function createResolver(host: string, port = 432): EndpointResolver {
    return new EndpointResolver({ host, port }, { hostLookup: { lookup }, logger: silentLogger() });
  }

  describe("before resolution", () => {
    it("should have no remote and no server name", () => {
      const resolver = createResolver("nl.hideservers.net");
      expect(resolver.remote).toBeNull();
      expect(resolver.serverName).toBe("");
    });
  });

  describe("literal addresses", () => {
    it("should use an IPv4 literal without lookup", async () => {
      const resolver = createResolver("203.0.113.9");

      const outcome = await resolver.resolve();

      expect(outcome.source).toBe("literal");
      expect(outcome.remote.toString()).toBe("203.0.113.9:432");
      expect(outcome.serverName).toBe("hideservers.net");
      expect(resolver.serverName).toBe("hideservers.net");
      expect(lookup).not.toHaveBeenCalled();
    });

    it("should use an IPv6 literal without lookup", async () => {
      const resolver = createResolver("2001:db8::5", 4321);

      const outcome = await resolver.resolve();

      expect(outcome.remote.toString()).toBe("[2001:db8::5]:4321");
      expect(lookup).not.toHaveBeenCalled();
    });
  });

  describe("host names", () => {
    it("should take the first address of the lookup", async () => {
      lookup.mockResolvedValue(["198.51.100.7", "198.51.100.8"]);
      const resolver = createResolver("nl.hideservers.net");

      const outcome = await resolver.resolve();

      expect(outcome.source).toBe("dns");
      expect(outcome.remote.toString()).toBe("198.51.100.7:432");
      expect(outcome.serverName).toBe("nl.hideservers.net");
      expect(resolver.remote?.ip).toBe("198.51.100.7");
      expect(lookup).toHaveBeenCalledWith("nl.hideservers.net", expect.any(AbortSignal));
    });

    it("should replace the remote on a later successful lookup", async () => {
      lookup.mockResolvedValueOnce(["198.51.100.7"]).mockResolvedValueOnce(["198.51.100.9"]);
      const resolver = createResolver("nl.hideservers.net");

      await resolver.resolve();
      const outcome = await resolver.resolve();

      expect(outcome.remote.ip).toBe("198.51.100.9");
    });

    it("should keep the previous remote when the lookup fails", async () => {
      const { logger, lines } = createTestLogger();
      lookup.mockResolvedValueOnce(["198.51.100.7"]).mockRejectedValueOnce(new Error("SERVFAIL"));
      const resolver = new EndpointResolver({ host: "nl.hideservers.net", port: 432 }, { hostLookup: { lookup }, logger });

      const first = await resolver.resolve();
      const second = await resolver.resolve();

      expect(second.source).toBe("previous");
      expect(second.remote).toBe(first.remote);
      expect(second.serverName).toBe("nl.hideservers.net");
      expect(lines.map((line) => line.msg)).toEqual(["Resolved", "Lookup failed", "Using previous lookup response"]);
    });

    it("should fail when the first lookup fails", async () => {
      const cause = new Error("SERVFAIL");
      lookup.mockRejectedValue(cause);
      const resolver = createResolver("nl.hideservers.net");

      const error = await resolver.resolve().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error).toMatchObject({ message: "lookup failed for nl.hideservers.net", cause });
      expect(resolver.remote).toBeNull();
    });

    it("should fail on an empty answer", async () => {
      lookup.mockResolvedValueOnce(["198.51.100.7"]).mockResolvedValueOnce([]);
      const resolver = createResolver("nl.hideservers.net");
      await resolver.resolve();

      await expect(resolver.resolve()).rejects.toThrow("dns lookup failed for nl.hideservers.net");
      expect(resolver.remote?.ip).toBe("198.51.100.7");
    });

    it("should fail when the answer is not an IP address", async () => {
      lookup.mockResolvedValue(["not-an-ip"]);
      const resolver = createResolver("nl.hideservers.net");

      await expect(resolver.resolve()).rejects.toThrow("no IP found for nl.hideservers.net");
      expect(resolver.remote).toBeNull();
    });

    it("should pass the caller's abort to the lookup", async () => {
      lookup.mockImplementation(async (_host, signal) => {
        signal.throwIfAborted();
        return ["198.51.100.7"];
      });
      const resolver = createResolver("nl.hideservers.net");
      const controller = new AbortController();
      controller.abort(new Error("stopped"));

      await expect(resolver.resolve(controller.signal)).rejects.toBeInstanceOf(ResolutionError);
    });
  });
});
