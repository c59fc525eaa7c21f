import { describe, it, expect } from "vitest";
import {
  encodeHeader,
  decodeHeader,
  encodeFrame,
  truncateUtf8,
} from "../../../packages/protocol/src/frame.js";
import {
  Command,
  HEADER_SIZE,
  commandName,
  isCommand,
} from "../../../packages/protocol/src/constants.js";

describe("encodeHeader", () => {
  it("lays out command, little-endian size and NUL-padded info", () => {
    const header = encodeHeader(Command.CONNECT, 0, "Workstation-7");

    expect(header.length).toBe(HEADER_SIZE);
    expect(header[0]).toBe(1);
    expect(header.readBigUInt64LE(1)).toBe(0n);
    expect(header.subarray(9, 22).toString("utf8")).toBe("Workstation-7");
    expect(header.subarray(22).every((byte) => byte === 0)).toBe(true);
  });

  it("writes the size least significant byte first", () => {
    const header = encodeHeader(Command.FILE_DATA, 0x0102030405, "x");

    expect(header.readBigUInt64LE(1)).toBe(0x0102030405n);
    expect(header[1]).toBe(0x05);
    expect(header[2]).toBe(0x04);
    expect(header[5]).toBe(0x01);
    expect(header[6]).toBe(0x00);
  });

  it("rejects sizes that are negative or fractional", () => {
    expect(() => encodeHeader(Command.FILE_DATA, -1)).toThrow(RangeError);
    expect(() => encodeHeader(Command.FILE_DATA, 1.5)).toThrow(RangeError);
  });

  it("truncates long info to 50 bytes", () => {
    const decoded = decodeHeader(encodeHeader(Command.NOTIFICATION, 0, "a".repeat(60)));

    expect(decoded.valid && decoded.header.info).toBe("a".repeat(50));
  });
});

describe("truncateUtf8", () => {
  it("never cuts a multi-byte character in half", () => {
    const cut = truncateUtf8("a" + "é".repeat(25), 50);

    expect(cut.length).toBe(49);
    expect(cut.toString("utf8")).toBe("a" + "é".repeat(24));
  });

  it("keeps text that already fits", () => {
    expect(truncateUtf8("é".repeat(25), 50).toString("utf8")).toBe("é".repeat(25));
  });
});

describe("decodeHeader", () => {
  it("reads back what encodeHeader wrote", () => {
    const result = decodeHeader(encodeHeader(Command.GET_THUMBNAIL, 1234, "asset-42"));

    expect(result).toEqual({
      valid: true,
      header: { command: Command.GET_THUMBNAIL, payloadSize: 1234, info: "asset-42" },
    });
  });

  it("reports a short buffer", () => {
    const result = decodeHeader(Buffer.alloc(10));

    expect(result.valid).toBe(false);
    expect(!result.valid && result.error.message).toBe(
      "Header too short: expected 59 bytes, got 10"
    );
  });

  it.each([0, 14, 255])("reports unknown command code %i", (code) => {
    const buffer = Buffer.alloc(HEADER_SIZE);
    buffer[0] = code;

    const result = decodeHeader(buffer);

    expect(!result.valid && result.error.message).toBe(`Unknown command code: ${code}`);
    expect(!result.valid && result.error.reason).toEqual({ kind: "unknownCommand", code });
  });

  it("reports a size past the safe integer range", () => {
    const buffer = encodeHeader(Command.FILE_DATA, 0);
    buffer.writeBigUInt64LE(0xffffffffffffffffn, 1);

    const result = decodeHeader(buffer);

    expect(!result.valid && result.error.name).toBe("InvalidHeaderError");
    expect(!result.valid && result.error.message).toBe(
      "Payload size out of range: 18446744073709551615"
    );
  });

  it("decodes info that is not valid UTF-8 as empty", () => {
    const buffer = encodeHeader(Command.CONNECT, 0);
    buffer[9] = 0xff;
    buffer[10] = 0xfe;

    const result = decodeHeader(buffer);

    expect(result.valid && result.header.info).toBe("");
  });
});

describe("encodeFrame", () => {
  it("appends the payload unchanged after the header", () => {
    const payload = Buffer.from([0, 1, 2, 3, 250]);
    const frame = encodeFrame(Command.THUMBNAIL_DATA, "id-1", payload);

    expect(frame.length).toBe(HEADER_SIZE + 5);
    expect(frame.readBigUInt64LE(1)).toBe(5n);
    expect(frame.subarray(HEADER_SIZE)).toEqual(payload);
  });

  it("produces a bare header without a payload", () => {
    expect(encodeFrame(Command.DISCONNECT).length).toBe(HEADER_SIZE);
  });
});

describe("command codes", () => {
  it("names known and unknown codes", () => {
    expect(commandName(7)).toBe("ASSETS_LIST");
    expect(commandName(13)).toBe("NOTIFICATION");
    expect(commandName(99)).toBe("UNKNOWN(99)");
  });

  it("accepts exactly 1 through 13", () => {
    expect(isCommand(0)).toBe(false);
    expect(isCommand(1)).toBe(true);
    expect(isCommand(13)).toBe(true);
    expect(isCommand(14)).toBe(false);
  });
});
