import { Duplex } from "stream";
import { Connection } from "../../packages/transport/src/connection/connection.js";
import type { ConnectionOptions } from "../../packages/transport/src/connection/connection.js";

/**
 * One end of an in-process byte pipe. Writes on one end are read on the
 * other; ending or destroying one end ends the other's readable side, the
 * way a TCP FIN or reset would.
 */
export class MemorySocket extends Duplex {
  peer: MemorySocket | null = null;

  _read(): void {
    // Data is pushed by the peer's writes
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    if (!peer || peer.destroyed) {
      callback(new Error("peer socket is gone"));
      return;
    }
    peer.push(chunk);
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    if (peer && !peer.destroyed) {
      peer.push(null);
    }
    callback();
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    if (peer && !peer.destroyed) {
      peer.push(null);
    }
    callback(error);
  }
}

/**
 * A socket that never completes a write on its own. Each write stays
 * pending until release(), the way a slow reader leaves a TCP buffer full.
 */
export class HeldSocket extends Duplex {
  writes: Buffer[] = [];
  private held: Array<(error?: Error | null) => void> = [];

  constructor() {
    super({ writableHighWaterMark: 16 * 1024 });
  }

  _read(): void {
    // Nothing is ever read back
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.writes.push(chunk);
    this.held.push(callback);
  }

  release(): void {
    this.held.shift()?.();
  }
}

export function createSocketPair(): [MemorySocket, MemorySocket] {
  const a = new MemorySocket();
  const b = new MemorySocket();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

export function createConnectionPair(options: ConnectionOptions = {}): {
  host: Connection;
  peer: Connection;
} {
  const [hostSocket, peerSocket] = createSocketPair();
  return {
    host: new Connection(hostSocket, "host-1", options),
    peer: new Connection(peerSocket, "peer-1", options),
  };
}

/**
 * Resolve with the arguments of the next emission of an event
 */
export function nextEvent<T>(emitter: NodeJS.EventEmitter, event: string): Promise<T> {
  return new Promise((resolve) => {
    emitter.once(event, (value: T) => resolve(value));
  });
}
