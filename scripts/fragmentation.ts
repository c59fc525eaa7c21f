#!/usr/bin/env tsx
/**
 * Fragmentation Testing Script
 *
 * Drives a running host through a full pairing with frames cut at awkward
 * byte boundaries. This tests:
 * - Header parsing across arbitrary packet boundaries
 * - Recovery after a header with an unknown command code
 * - Several frames in a single TCP packet
 *
 * Usage: tsx scripts/fragmentation.ts [host] [port]
 */

import { Socket } from "net";
import { encodeFrame, encodeHeader } from "../packages/protocol/src/frame.js";
import { Command, DEFAULT_PORT, HEADER_SIZE, commandName } from "../packages/protocol/src/constants.js";
import type { Frame } from "../packages/protocol/src/types.js";
import { FrameReader } from "../packages/transport/src/connection/frameReader.js";

// Configuration
const CONFIG = {
  host: process.argv[2] || "127.0.0.1",
  port: parseInt(process.argv[3] || String(DEFAULT_PORT), 10),
  replyTimeoutMs: 2000,
};

class FragmentationTest {
  private socket: Socket = new Socket();
  private received: Frame[] = [];
  private testsPassed: number = 0;
  private testsFailed: number = 0;
  private pin: string | null = null;

  private reader = new FrameReader({
    frame: (frame) => this.received.push(frame),
    invalidHeader: (error) => console.log(`  (host sent a bad header: ${error.message})`),
  });

  /**
   * Run all fragmentation tests
   */
  async run(): Promise<void> {
    console.log("Fragmentation Test Starting...\n");

    await this.connect();

    await this.testByteByByteConnect();
    await this.testBadHeaderThenSplitVerify();
    await this.testMultipleFramesCombined();
    await this.testRandomFragmentation();

    this.printResults();
  }

  private connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.on("data", (chunk: Buffer) => this.reader.push(chunk));
      this.socket.once("error", reject);
      this.socket.connect(CONFIG.port, CONFIG.host, () => {
        this.socket.off("error", reject);
        console.log(`Connected to ${CONFIG.host}:${CONFIG.port}\n`);
        resolve();
      });
    });
  }

  /**
   * Test 1: CONNECT one byte at a time, expect PIN_CHALLENGE
   */
  private async testByteByByteConnect(): Promise<void> {
    console.log("Test 1: Byte-by-byte CONNECT");

    const frame = encodeFrame(Command.CONNECT, "frag-test");
    console.log(`  Sending ${frame.length} bytes one at a time...`);
    for (let i = 0; i < frame.length; i++) {
      this.socket.write(frame.subarray(i, i + 1));
      await this.sleep(2);
    }

    const challenge = await this.waitFor(Command.PIN_CHALLENGE);
    this.pin = challenge?.info ?? null;
    this.record(challenge !== null, `PIN_CHALLENGE received (${this.pin})`);
  }

  /**
   * Test 2: a header with an unknown command, then VERIFY_PIN split at the
   * header boundary, expect PIN_OK
   */
  private async testBadHeaderThenSplitVerify(): Promise<void> {
    console.log("Test 2: Bad header, then VERIFY_PIN split at the header boundary");

    if (!this.pin) {
      this.record(false, "no PIN to verify");
      return;
    }

    const bad = Buffer.alloc(HEADER_SIZE);
    bad[0] = 0xff;
    this.socket.write(bad);
    await this.sleep(20);

    const verify = encodeHeader(Command.VERIFY_PIN, 0, this.pin);
    this.socket.write(verify.subarray(0, 9));
    await this.sleep(20);
    this.socket.write(verify.subarray(9));

    const ok = await this.waitFor(Command.PIN_OK);
    this.record(ok !== null, "PIN_OK received after skipping the bad header");
  }

  /**
   * Test 3: three requests in one write
   */
  private async testMultipleFramesCombined(): Promise<void> {
    console.log("Test 3: Multiple frames in one write");

    const combined = Buffer.concat([
      encodeFrame(Command.LIST_ASSETS),
      encodeFrame(Command.GET_THUMBNAIL, "no-such-asset"),
      encodeFrame(Command.LIST_ASSETS),
    ]);
    console.log(`  Sending 3 frames (${combined.length} bytes) in one write...`);
    this.socket.write(combined);

    const first = await this.waitFor(Command.ASSETS_LIST);
    const second = await this.waitFor(Command.ASSETS_LIST);
    this.record(first !== null && second !== null, "two ASSETS_LIST frames received");
  }

  /**
   * Test 4: DISCONNECT in random slices, expect the host to close
   */
  private async testRandomFragmentation(): Promise<void> {
    console.log("Test 4: Random fragmentation");

    const frame = encodeFrame(Command.DISCONNECT);
    const closed = new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), CONFIG.replyTimeoutMs);
      this.socket.once("end", () => {
        clearTimeout(timer);
        resolve(true);
      });
    });

    let offset = 0;
    while (offset < frame.length) {
      const end = Math.min(offset + Math.floor(Math.random() * 10) + 1, frame.length);
      this.socket.write(frame.subarray(offset, end));
      offset = end;
      await this.sleep(Math.random() * 10);
    }

    this.record(await closed, "host closed the connection");
    this.socket.end();
  }

  /**
   * Wait for the next frame with this command, consuming it
   */
  private async waitFor(command: Command): Promise<Frame | null> {
    const deadline = Date.now() + CONFIG.replyTimeoutMs;
    while (Date.now() < deadline) {
      const index = this.received.findIndex((frame) => frame.command === command);
      if (index >= 0) {
        const [frame] = this.received.splice(index, 1);
        return frame ?? null;
      }
      await this.sleep(10);
    }
    console.log(`  (timed out waiting for ${commandName(command)})`);
    return null;
  }

  private record(passed: boolean, detail: string): void {
    if (passed) {
      console.log(`  PASSED - ${detail}\n`);
      this.testsPassed++;
    } else {
      console.log(`  FAILED - ${detail}\n`);
      this.testsFailed++;
    }
  }

  /**
   * Print test results
   */
  private printResults(): void {
    console.log("Fragmentation Test Results:");
    console.log(`  Passed:       ${this.testsPassed}`);
    console.log(`  Failed:       ${this.testsFailed}`);
    console.log();

    if (this.testsFailed > 0) {
      console.log("Some tests failed - check frame parsing logic");
      process.exit(1);
    }
    console.log("All fragmentation tests passed");
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// Run the test
new FragmentationTest().run().catch((err: unknown) => {
  console.error("Fragmentation test failed:", err);
  process.exit(1);
});
