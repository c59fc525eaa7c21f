/**
 * Protocol Constants
 *
 * Defines command codes and frame layout parameters.
 */

// Frame structure sizes
export const COMMAND_FIELD_SIZE = 1;
export const SIZE_FIELD_SIZE = 8; // u64, little endian
export const INFO_FIELD_SIZE = 50; // UTF-8, NUL padded
export const HEADER_SIZE = COMMAND_FIELD_SIZE + SIZE_FIELD_SIZE + INFO_FIELD_SIZE; // 59

// Payloads are read and written in slices no larger than this
export const CHUNK_SIZE = 64 * 1024;

// Listening side
export const DEFAULT_PORT = 2347;
export const SERVICE_TYPE = "_medialink._tcp";
export const SERVICE_DOMAIN = "local.";

// Command codes (1 byte). Values are part of the wire contract.
export enum Command {
  CONNECT = 1,
  PIN_CHALLENGE = 2,
  VERIFY_PIN = 3,
  PIN_OK = 4,
  PIN_FAIL = 5,
  LIST_ASSETS = 6,
  ASSETS_LIST = 7,
  GET_THUMBNAIL = 8,
  THUMBNAIL_DATA = 9,
  GET_FULL_FILE = 10,
  FILE_DATA = 11,
  DISCONNECT = 12,
  NOTIFICATION = 13,
}

export function isCommand(code: number): code is Command {
  return typeof Command[code] === "string";
}

export function commandName(code: number): string {
  return isCommand(code) ? Command[code] : `UNKNOWN(${code})`;
}
