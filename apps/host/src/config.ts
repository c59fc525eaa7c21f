/**
 * Host configuration
 */

import { DEFAULT_PORT } from "../../../packages/protocol/src/constants.js";

export type HostConfig = {
  port: number;
  host: string;
  debug: boolean;
  libraryPath: string;
  pinTimeoutMs: number;
  pinMaxAttempts: number;
  cacheMaxEntries: number;
  cacheMaxBytes: number;
  retryDelayMs: number; // 0 disables the automatic return from Error to Searching
};

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  return {
    port: intFromEnv(env.MEDIALINK_PORT, DEFAULT_PORT),
    host: env.MEDIALINK_HOST || "0.0.0.0",
    debug: env.MEDIALINK_DEBUG === "1",
    libraryPath: env.MEDIALINK_LIBRARY || process.cwd(),
    pinTimeoutMs: intFromEnv(env.MEDIALINK_PIN_TIMEOUT_MS, 30_000),
    pinMaxAttempts: Math.max(1, intFromEnv(env.MEDIALINK_PIN_ATTEMPTS, 3)),
    cacheMaxEntries: intFromEnv(env.MEDIALINK_CACHE_ENTRIES, 500),
    cacheMaxBytes: intFromEnv(env.MEDIALINK_CACHE_BYTES, 50 * 1024 * 1024),
    retryDelayMs: intFromEnv(env.MEDIALINK_RETRY_DELAY_MS, 2000),
  };
}

export const config = loadConfig();
