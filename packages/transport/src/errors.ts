/**
 * Transport Error Classes
 *
 * Any TransportError is fatal to the connection it was raised on.
 */

export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

export class ConnectionClosedError extends TransportError {
  constructor(reason?: string) {
    super(reason ? `Connection closed: ${reason}` : "Connection closed");
    this.name = "ConnectionClosedError";
  }
}

export class PayloadSizeMismatchError extends TransportError {
  constructor(declared: number, actual: number) {
    super(`Payload stream produced ${actual} bytes, header declared ${declared}`);
    this.name = "PayloadSizeMismatchError";
  }
}

export class WriteAbortedError extends TransportError {
  constructor() {
    super("Write aborted");
    this.name = "WriteAbortedError";
  }
}
