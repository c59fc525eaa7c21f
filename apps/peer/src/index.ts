#!/usr/bin/env node
/**
 * MediaLink Peer CLI Entry Point
 */

import { hostname } from "os";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { PeerCLI } from "./cli.js";
import { DEFAULT_PORT } from "../../../packages/protocol/src/constants.js";

const argv = yargs(hideBin(process.argv))
  .scriptName("medialink-peer")
  .usage("Usage: $0 [options]")
  .strict()
  .option("host", {
    type: "string",
    desc: "Host address to connect to",
    default: "localhost",
  })
  .option("port", {
    type: "number",
    desc: "Host port (or local port with --listen)",
    default: DEFAULT_PORT,
  })
  .option("name", {
    type: "string",
    desc: "Name shown on the host while pairing",
    default: hostname(),
  })
  .option("listen", {
    type: "boolean",
    desc: "Wait for the host to dial in instead of connecting",
    default: false,
  })
  .option("timeout", {
    type: "number",
    desc: "Request timeout in milliseconds",
  })
  .help()
  .parseSync();

const cli = new PeerCLI({ name: argv.name, timeoutMs: argv.timeout });

const started = argv.listen ? cli.listen(argv.port) : cli.connect(argv.host, argv.port);

started.catch((err: unknown) => {
  console.error("Failed to start:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
