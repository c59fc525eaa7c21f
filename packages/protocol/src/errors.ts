/**
 * Protocol errors. Decoding reports these as values; only payload decoding throws.
 */

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export type InvalidHeaderReason =
  | { kind: "tooShort"; length: number }
  | { kind: "unknownCommand"; code: number }
  | { kind: "sizeOutOfRange"; size: bigint };

function describeHeaderProblem(reason: InvalidHeaderReason, headerSize: number): string {
  switch (reason.kind) {
    case "tooShort":
      return `Header too short: expected ${headerSize} bytes, got ${reason.length}`;
    case "unknownCommand":
      return `Unknown command code: ${reason.code}`;
    case "sizeOutOfRange":
      return `Payload size out of range: ${reason.size}`;
  }
}

export class InvalidHeaderError extends ProtocolError {
  readonly reason: InvalidHeaderReason;

  constructor(reason: InvalidHeaderReason, headerSize: number) {
    super(describeHeaderProblem(reason, headerSize));
    this.name = "InvalidHeaderError";
    this.reason = reason;
  }
}

/**
 * A payload that arrived whole but cannot be understood (bad JSON, schema
 * mismatch, inconsistent aggregates)
 */
export class InvalidPayloadError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPayloadError";
  }
}
