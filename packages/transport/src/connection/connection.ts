import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { encodeHeader } from "../../../protocol/src/frame.js";
import type { FramePayload } from "../../../protocol/src/types.js";
import { CHUNK_SIZE } from "../../../protocol/src/constants.js";
import type { Command } from "../../../protocol/src/constants.js";
import type { InvalidHeaderError } from "../../../protocol/src/errors.js";
import { FrameReader } from "./frameReader.js";
import { releasePayload } from "../payload.js";
import {
  TransportError,
  ConnectionClosedError,
  PayloadSizeMismatchError,
  WriteAbortedError,
} from "../errors.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  DRAINING = "DRAINING",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export type ConnectionError = {
  type: "transport";
  reason: string;
  fatal: boolean;
};

export type ConnectionCloseStats = {
  reason?: string;
  bytesSent: number;
  bytesReceived: number;
};

export type ConnectionOptions = {
  chunkSize?: number;
};

export type SendOptions = {
  // Aborting drops a queued frame, or tears the connection down mid-payload
  signal?: AbortSignal;
};

/**
 * Connection represents one peer's byte stream, listening or dialing side alike.
 *
 * Responsibilities:
 * - Incremental frame parsing (via FrameReader), skipping bad headers
 * - Chunked outbound writes with backpressure
 * - One frame at a time on the wire: a frame's header and all of its
 *   chunks are written before the next frame starts
 * - State machine enforcement (INIT → OPEN ⟷ DRAINING → CLOSING → CLOSED)
 *
 * Does NOT:
 * - Interpret commands
 * - Retry anything; every transport failure is fatal to the connection
 *
 * Events: open, frame, invalidHeader, drain, error, close, state
 */
export class Connection extends EventEmitter {
  private socket: Duplex;
  private state: ConnectionState = ConnectionState.INIT;
  public readonly connectionId: string;
  private readonly chunkSize: number;

  private reader: FrameReader;
  private writeChain: Promise<void> = Promise.resolve();
  private closePromise: Promise<void> | null = null;
  private closeReason: string | undefined;

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private framesSent: number = 0;
  private framesReceived: number = 0;

  constructor(socket: Duplex, connectionId: string, options: ConnectionOptions = {}) {
    super();
    this.socket = socket;
    this.connectionId = connectionId;
    this.chunkSize = Math.max(1, Math.min(options.chunkSize ?? CHUNK_SIZE, CHUNK_SIZE));
    this.reader = new FrameReader({
      frame: (frame) => {
        this.framesReceived++;
        this.emit("frame", frame);
      },
      invalidHeader: (error: InvalidHeaderError) => {
        this.emit("invalidHeader", error);
      },
    });
    this.wireSocket();
    this.transition(ConnectionState.OPEN);
    this.emit("open", connectionId);
  }

  /**
   * Bind socket events to Connection behavior
   */
  private wireSocket(): void {
    this.socket.on("data", (chunk: Buffer) => {
      if (this.state === ConnectionState.CLOSED) return;
      this.bytesReceived += chunk.length;
      this.reader.push(chunk);
    });

    this.socket.on("drain", () => {
      if (this.state === ConnectionState.DRAINING) {
        this.transition(ConnectionState.OPEN);
        this.emit("drain");
      }
    });

    // Peer finished sending. A partial frame at this point is simply lost.
    this.socket.on("end", () => {
      this.closeReason ??= this.reader.hasPartialFrame()
        ? "peer closed mid-frame"
        : "peer closed";
      this.close().catch((err: unknown) => this.reportError(err, true));
    });

    this.socket.on("close", () => {
      this.handleClose();
    });

    this.socket.on("error", (err: Error) => {
      this.closeReason ??= err.message;
      this.reportError(err, true);
      this.destroy(err.message);
    });
  }

  /**
   * Queue a frame for sending
   *
   * Resolves once every byte of the frame has been handed to the socket.
   * Rejects with a TransportError if the connection closes first.
   *
   * @param command - Command code
   * @param info - Auxiliary header text
   * @param payload - Buffer, or a stream of known size
   */
  send(
    command: Command,
    info: string = "",
    payload?: FramePayload,
    options: SendOptions = {}
  ): Promise<void> {
    const { signal } = options;
    if (this.closePromise || !this.isWritable() || signal?.aborted) {
      const error = signal?.aborted
        ? new WriteAbortedError()
        : new ConnectionClosedError(this.closeReason);
      return releasePayload(payload).then(() => {
        throw error;
      });
    }

    const task = this.writeChain.then(() => this.writeFrame(command, info, payload, signal));
    // The chain only orders writes; each caller observes its own failure
    this.writeChain = task.catch(() => undefined);
    return task;
  }

  private async writeFrame(
    command: Command,
    info: string,
    payload: FramePayload | undefined,
    signal: AbortSignal | undefined
  ): Promise<void> {
    // Aborted while queued: nothing of this frame is on the wire yet
    if (signal?.aborted) {
      await releasePayload(payload);
      throw new WriteAbortedError();
    }

    if (payload === undefined) {
      await this.writeChunk(encodeHeader(command, 0, info));
      this.framesSent++;
      return;
    }

    try {
      await this.writeChunk(
        encodeHeader(command, Buffer.isBuffer(payload) ? payload.length : payload.size, info)
      );
    } catch (err) {
      await releasePayload(payload);
      throw err;
    }

    // Past the header the peer expects the whole payload, so an abort can
    // only end the connection
    const onAbort = () => this.destroy("write aborted");
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      if (Buffer.isBuffer(payload)) {
        await this.writeBuffer(payload, signal);
      } else {
        await this.writeStream(payload.size, payload.chunks, signal);
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
    this.framesSent++;
  }

  private async writeBuffer(payload: Buffer, signal: AbortSignal | undefined): Promise<void> {
    for (let offset = 0; offset < payload.length; offset += this.chunkSize) {
      if (signal?.aborted) {
        throw new WriteAbortedError();
      }
      await this.writeChunk(payload.subarray(offset, offset + this.chunkSize));
    }
  }

  private async writeStream(
    declared: number,
    chunks: AsyncIterable<Buffer>,
    signal: AbortSignal | undefined
  ): Promise<void> {
    let written = 0;

    try {
      for await (const chunk of chunks) {
        if (signal?.aborted) {
          throw new WriteAbortedError();
        }
        if (written + chunk.length > declared) {
          throw new PayloadSizeMismatchError(declared, written + chunk.length);
        }
        for (let offset = 0; offset < chunk.length; offset += this.chunkSize) {
          const slice = chunk.subarray(offset, offset + this.chunkSize);
          await this.writeChunk(slice);
          written += slice.length;
        }
      }
      if (written !== declared) {
        throw new PayloadSizeMismatchError(declared, written);
      }
    } catch (err) {
      // The peer is now expecting bytes that will never come; framing is lost
      const reason = err instanceof Error ? err.message : String(err);
      this.destroy(reason);
      throw err instanceof TransportError ? err : new TransportError(reason);
    }
  }

  private async writeChunk(chunk: Buffer): Promise<void> {
    if (!this.isWritable()) {
      throw new ConnectionClosedError(this.closeReason);
    }

    this.bytesSent += chunk.length;
    const canWrite = this.socket.write(chunk);

    if (!canWrite) {
      if (this.state === ConnectionState.OPEN) {
        this.transition(ConnectionState.DRAINING);
      }
      await this.waitForDrain();
    }
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onDrain = () => {
        this.socket.off("close", onClose);
        resolve();
      };
      const onClose = () => {
        this.socket.off("drain", onDrain);
        reject(new ConnectionClosedError(this.closeReason));
      };
      this.socket.once("drain", onDrain);
      this.socket.once("close", onClose);
    });
  }

  /**
   * Close the connection gracefully
   *
   * Frames already queued are written first; no new frames are accepted.
   */
  close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    if (this.state === ConnectionState.CLOSED) {
      return Promise.resolve();
    }

    this.closePromise = this.writeChain.then(
      () =>
        new Promise<void>((resolve) => {
          if (
            this.state === ConnectionState.CLOSING ||
            this.state === ConnectionState.CLOSED
          ) {
            resolve();
            return;
          }
          this.transition(ConnectionState.CLOSING);
          this.socket.end(() => resolve());
        })
    );
    return this.closePromise;
  }

  /**
   * Tear the connection down immediately
   *
   * Outstanding writes reject with ConnectionClosedError.
   */
  destroy(reason?: string): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.closeReason ??= reason;
    if (this.state !== ConnectionState.CLOSING) {
      this.transition(ConnectionState.CLOSING);
    }
    this.socket.destroy();
  }

  /**
   * Handle socket close event
   */
  private handleClose(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      reason: this.closeReason,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    } satisfies ConnectionCloseStats);
  }

  private reportError(err: unknown, fatal: boolean): void {
    this.emit("error", {
      type: "transport",
      reason: err instanceof Error ? err.message : String(err),
      fatal,
    } satisfies ConnectionError);
  }

  private isWritable(): boolean {
    return (
      this.state === ConnectionState.OPEN ||
      this.state === ConnectionState.DRAINING
    );
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    // Enforce state machine rules
    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [ConnectionState.OPEN],
      [ConnectionState.OPEN]: [
        ConnectionState.DRAINING,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.DRAINING]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
      bufferSize: this.reader.bufferedBytes(),
    };
  }
}
