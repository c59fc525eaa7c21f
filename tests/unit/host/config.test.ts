import { describe, it, expect } from "vitest";
import { loadConfig } from "../../../apps/host/src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 2347,
      host: "0.0.0.0",
      debug: false,
      pinTimeoutMs: 30_000,
      pinMaxAttempts: 3,
      cacheMaxEntries: 500,
      cacheMaxBytes: 50 * 1024 * 1024,
      retryDelayMs: 2000,
    });
    expect(config.libraryPath).toBe(process.cwd());
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      MEDIALINK_PORT: "9000",
      MEDIALINK_HOST: "127.0.0.1",
      MEDIALINK_DEBUG: "1",
      MEDIALINK_LIBRARY: "/srv/photos",
      MEDIALINK_PIN_TIMEOUT_MS: "5000",
      MEDIALINK_PIN_ATTEMPTS: "5",
      MEDIALINK_CACHE_ENTRIES: "10",
      MEDIALINK_CACHE_BYTES: "1024",
      MEDIALINK_RETRY_DELAY_MS: "0",
    });

    expect(config).toEqual({
      port: 9000,
      host: "127.0.0.1",
      debug: true,
      libraryPath: "/srv/photos",
      pinTimeoutMs: 5000,
      pinMaxAttempts: 5,
      cacheMaxEntries: 10,
      cacheMaxBytes: 1024,
      retryDelayMs: 0,
    });
  });

  it("ignores values that are not non-negative integers", () => {
    const config = loadConfig({ MEDIALINK_PORT: "abc", MEDIALINK_CACHE_ENTRIES: "-3" });

    expect(config.port).toBe(2347);
    expect(config.cacheMaxEntries).toBe(500);
  });

  it("allows at least one PIN attempt", () => {
    expect(loadConfig({ MEDIALINK_PIN_ATTEMPTS: "0" }).pinMaxAttempts).toBe(1);
  });
});
