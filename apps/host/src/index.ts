#!/usr/bin/env node
/**
 * MediaLink Host Entry Point
 */

import { resolve } from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { MediaLinkHost } from "./host.js";
import { FileSystemAssetStore } from "./assets/fileSystemAssetStore.js";
import { config } from "./config.js";
import { logger } from "./observability/logger.js";
import type { SessionState } from "./session/stateMachine.js";

const argv = yargs(hideBin(process.argv))
  .scriptName("medialink-host")
  .usage("Usage: $0 [options]")
  .strict()
  .option("port", {
    type: "number",
    desc: "Port to listen on",
    default: config.port,
  })
  .option("host", {
    type: "string",
    desc: "Interface to bind",
    default: config.host,
  })
  .option("library", {
    type: "string",
    desc: "Directory to serve",
    default: config.libraryPath,
  })
  .option("dial", {
    type: "string",
    desc: "Connect out to a peer at host:port instead of waiting",
  })
  .option("debug", {
    type: "boolean",
    desc: "Verbose frame and state logging",
    default: config.debug,
  })
  .help()
  .parseSync();

logger.setDebug(argv.debug);

const host = new MediaLinkHost({
  assetStore: new FileSystemAssetStore(resolve(argv.library)),
  config: {
    ...config,
    port: argv.port,
    host: argv.host,
    debug: argv.debug,
    libraryPath: argv.library,
  },
});

host.session.on("pin", ({ code, secondsRemaining }: { code: string; secondsRemaining: number }) => {
  console.log(`\n  PIN: ${code}  (expires in ${secondsRemaining}s)\n`);
});

host.session.on("pinCountdown", (secondsRemaining: number) => {
  if (secondsRemaining > 0 && secondsRemaining % 10 === 0) {
    console.log(`  PIN expires in ${secondsRemaining}s`);
  }
});

host.session.on("state", (state: SessionState) => {
  console.log(`Session: ${describeState(state)}`);
});

function describeState(state: SessionState): string {
  switch (state.kind) {
    case "awaitingPin":
      return `waiting for ${state.peerName} to enter the PIN`;
    case "verifying":
      return `checking PIN from ${state.peerName}`;
    case "connected":
      return `paired with ${state.peerName}`;
    case "syncing":
      return `syncing library ${Math.round(state.progress * 100)}%`;
    case "ready":
      return `ready: ${state.assetCounts.totalCount} assets for ${state.peerName}`;
    case "error":
      return `error: ${state.message}`;
    default:
      return state.kind;
  }
}

function parseDial(target: string): { host: string; port: number } {
  const separator = target.lastIndexOf(":");
  const port = parseInt(target.slice(separator + 1), 10);
  if (separator <= 0 || Number.isNaN(port)) {
    throw new Error(`Invalid --dial target: ${target} (expected host:port)`);
  }
  return { host: target.slice(0, separator), port };
}

// Graceful shutdown
const shutdown = (signal: string) => {
  console.log(`\n Received ${signal}, shutting down gracefully...`);
  host.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    }
  );
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

async function main(): Promise<void> {
  await host.start();
  if (argv.dial) {
    const target = parseDial(argv.dial);
    await host.dial(target.host, target.port);
  }
}

main().catch((err: unknown) => {
  console.error(" Failed to start host:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
