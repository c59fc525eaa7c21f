/**
 * Frame Encoding and Decoding
 *
 * Implements the binary protocol:
 * | command (1B) | payload size (8B) | info (50B) | payload (payload size) |
 *
 * Payload size is an unsigned 64-bit Little Endian integer. Info is UTF-8,
 * NUL padded to the full field width.
 */

import {
  HEADER_SIZE,
  INFO_FIELD_SIZE,
  COMMAND_FIELD_SIZE,
  SIZE_FIELD_SIZE,
  Command,
  isCommand,
} from "./constants.js";
import type { HeaderDecodeResult } from "./types.js";
import { InvalidHeaderError } from "./errors.js";

const INFO_OFFSET = COMMAND_FIELD_SIZE + SIZE_FIELD_SIZE;
const MAX_PAYLOAD_SIZE = BigInt(Number.MAX_SAFE_INTEGER);

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Encode text as UTF-8, cut to at most maxBytes without splitting a code point
 */
export function truncateUtf8(text: string, maxBytes: number): Buffer {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= maxBytes) {
    return bytes;
  }

  // Step back over continuation bytes (10xxxxxx) so the cut lands on a lead byte
  let end = maxBytes;
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end);
}

/**
 * Encode a 59-byte header
 *
 * @param command - Command code
 * @param payloadSize - Byte count of the payload that follows
 * @param info - Auxiliary text (device name, PIN, asset id, notification)
 */
export function encodeHeader(
  command: Command,
  payloadSize: number,
  info: string = ""
): Buffer {
  if (!Number.isSafeInteger(payloadSize) || payloadSize < 0) {
    throw new RangeError(`Invalid payload size: ${payloadSize}`);
  }

  // Buffer.alloc zero-fills, which provides the NUL padding
  const buffer = Buffer.alloc(HEADER_SIZE);
  buffer.writeUInt8(command, 0);
  buffer.writeBigUInt64LE(BigInt(payloadSize), COMMAND_FIELD_SIZE);
  truncateUtf8(info, INFO_FIELD_SIZE).copy(buffer, INFO_OFFSET);

  return buffer;
}

/**
 * Decode a 59-byte header
 *
 * Never throws: an unknown command byte or an unrepresentable size is
 * returned as an invalid result so the reader can skip it.
 */
export function decodeHeader(buffer: Buffer): HeaderDecodeResult {
  if (buffer.length < HEADER_SIZE) {
    return {
      valid: false,
      error: new InvalidHeaderError({ kind: "tooShort", length: buffer.length }, HEADER_SIZE),
    };
  }

  const code = buffer.readUInt8(0);
  if (!isCommand(code)) {
    return {
      valid: false,
      error: new InvalidHeaderError({ kind: "unknownCommand", code }, HEADER_SIZE),
    };
  }

  const size = buffer.readBigUInt64LE(COMMAND_FIELD_SIZE);
  if (size > MAX_PAYLOAD_SIZE) {
    return {
      valid: false,
      error: new InvalidHeaderError({ kind: "sizeOutOfRange", size }, HEADER_SIZE),
    };
  }

  return {
    valid: true,
    header: {
      command: code,
      payloadSize: Number(size),
      info: decodeInfo(buffer.subarray(INFO_OFFSET, HEADER_SIZE)),
    },
  };
}

/**
 * Trim trailing NULs and decode; bytes that are not valid UTF-8 yield ""
 */
function decodeInfo(field: Buffer): string {
  let end = field.length;
  while (end > 0 && field[end - 1] === 0) {
    end--;
  }

  try {
    return utf8Decoder.decode(field.subarray(0, end));
  } catch {
    return "";
  }
}

/**
 * Encode a complete frame for transmission
 *
 * The payload is copied through unmodified.
 */
export function encodeFrame(
  command: Command,
  info: string = "",
  payload?: Buffer
): Buffer {
  const body = payload ?? Buffer.alloc(0);
  return Buffer.concat([encodeHeader(command, body.length, info), body]);
}
