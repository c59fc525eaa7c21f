/**
 * Protocol Type Definitions
 */

import type { Command } from "./constants.js";
import type { InvalidHeaderError } from "./errors.js";

/**
 * Decoded 59-byte header
 */
export type FrameHeader = {
  command: Command;
  payloadSize: number; // Byte count of the payload that follows
  info: string; // Auxiliary text, trailing NULs removed
};

/**
 * A complete frame: header fields plus exactly payloadSize bytes
 */
export type Frame = {
  command: Command;
  info: string;
  payload: Buffer;
};

/**
 * decodeHeader never throws; a bad header is a value
 */
export type HeaderDecodeResult =
  | { valid: true; header: FrameHeader }
  | { valid: false; error: InvalidHeaderError };

/**
 * Payload with a size known up front, produced lazily
 */
export type PayloadStream = {
  size: number;
  chunks: AsyncIterable<Buffer>;
};

export type FramePayload = Buffer | PayloadStream;
