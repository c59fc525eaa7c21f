import { EventEmitter } from "events";
import type { AddressInfo } from "net";
import { Command, commandName } from "../../../packages/protocol/src/constants.js";
import type { Frame } from "../../../packages/protocol/src/types.js";
import { decodeAssetList } from "../../../packages/protocol/src/assetList.js";
import type { AssetListResponse } from "../../../packages/protocol/src/assetList.js";
import { ConnectionManager } from "../../../packages/transport/src/connection/connectionManager.js";
import type {
  Connection,
  ConnectionCloseStats,
  ConnectionError,
} from "../../../packages/transport/src/connection/connection.js";
import { TransportError, ConnectionClosedError } from "../../../packages/transport/src/errors.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

type Waiter = {
  commands: Command[];
  info: string | null; // null matches any info
  resolve: (frame: Frame | null) => void;
  timer: NodeJS.Timeout;
};

/**
 * MediaLinkPeer - the other end of a host session
 *
 * Responses are matched to requests by command and info field; a request
 * that sees no incoming bytes for its timeout resolves to null (thumbnails,
 * files) or rejects (pairing, asset list).
 *
 * Events: connected, pinChallenge (code), notification (text),
 * disconnected (reason), error
 */
export class MediaLinkPeer extends EventEmitter {
  private connectionManager: ConnectionManager;
  private connection: Connection | null = null;
  private waiters: Waiter[] = [];

  constructor() {
    super();
    this.connectionManager = new ConnectionManager();
    this.connectionManager.on("connection", (connection: Connection) =>
      this.bind(connection)
    );
    this.connectionManager.on("error", (err: TransportError) => this.emit("error", err));
  }

  /**
   * Connect to a host
   */
  async connect(host: string, port: number): Promise<void> {
    await this.connectionManager.dial(host, port);
  }

  /**
   * Wait for a host to dial in
   */
  listen(port: number, host: string = "0.0.0.0"): Promise<AddressInfo> {
    return this.connectionManager.listen(port, host);
  }

  /**
   * Use an already-open byte stream (in-process hosts, tests)
   */
  attach(connection: Connection): void {
    this.bind(connection);
  }

  /**
   * Announce ourselves; the host answers with a PIN challenge
   */
  async pair(name: string): Promise<void> {
    await this.require().send(Command.CONNECT, name);
  }

  /**
   * Send the PIN read off the host's screen
   *
   * Resolves true on PIN_OK, false on PIN_FAIL.
   */
  async verifyPin(code: string, timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS): Promise<boolean> {
    const frame = await this.request(Command.VERIFY_PIN, code, {
      commands: [Command.PIN_OK, Command.PIN_FAIL],
      info: null,
      timeoutMs,
    });
    if (!frame) {
      throw new TransportError("No answer to VERIFY_PIN");
    }
    return frame.command === Command.PIN_OK;
  }

  async listAssets(timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS): Promise<AssetListResponse> {
    const frame = await this.request(Command.LIST_ASSETS, "", {
      commands: [Command.ASSETS_LIST],
      info: null,
      timeoutMs,
    });
    if (!frame) {
      throw new TransportError("No answer to LIST_ASSETS");
    }
    return decodeAssetList(frame.payload);
  }

  /**
   * Thumbnail bytes, or null if the host has none (it stays silent)
   */
  async getThumbnail(
    assetId: string,
    timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
  ): Promise<Buffer | null> {
    const frame = await this.request(Command.GET_THUMBNAIL, assetId, {
      commands: [Command.THUMBNAIL_DATA],
      info: assetId,
      timeoutMs,
    });
    return frame?.payload ?? null;
  }

  async getFile(
    assetId: string,
    timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
  ): Promise<Buffer | null> {
    const frame = await this.request(Command.GET_FULL_FILE, assetId, {
      commands: [Command.FILE_DATA],
      info: assetId,
      timeoutMs,
    });
    return frame?.payload ?? null;
  }

  /**
   * Say goodbye and close
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;

    await connection.send(Command.DISCONNECT);
    await connection.close();
  }

  async stop(): Promise<void> {
    this.connection = null;
    this.settleAll();
    await this.connectionManager.stop();
  }

  isConnected(): boolean {
    return this.connection !== null;
  }

  private bind(connection: Connection): void {
    this.connection = connection;

    connection.on("frame", (frame: Frame) => {
      if (this.connection === connection) {
        this.handleFrame(connection, frame);
      }
    });

    connection.on("error", (error: ConnectionError) => {
      this.emit("error", new TransportError(error.reason));
    });

    connection.on("close", (stats: ConnectionCloseStats) => {
      if (this.connection !== connection) return;
      this.connection = null;
      this.settleAll();
      this.emit("disconnected", stats.reason);
    });

    this.emit("connected");
  }

  private handleFrame(connection: Connection, frame: Frame): void {
    if (this.settle(frame)) return;

    switch (frame.command) {
      case Command.PIN_CHALLENGE:
        this.emit("pinChallenge", frame.info);
        break;

      case Command.NOTIFICATION:
        this.emit("notification", frame.info);
        break;

      case Command.DISCONNECT:
        connection.close().catch((err: unknown) => this.emit("error", err));
        break;

      default:
        this.emit("unexpected", commandName(frame.command), frame.info);
    }
  }

  /**
   * Send a request and wait for the first frame that answers it.
   * The waiter is registered before the request is written.
   */
  private async request(
    command: Command,
    info: string,
    expect: Pick<Waiter, "commands" | "info"> & { timeoutMs: number }
  ): Promise<Frame | null> {
    const connection = this.require();

    let resolveReply: (frame: Frame | null) => void = () => undefined;
    const reply = new Promise<Frame | null>((resolve) => {
      resolveReply = resolve;
    });
    // The timeout counts from the last byte received, so a long transfer
    // that keeps arriving is not cut off
    let seen = connection.getStats().bytesReceived;
    const arm = (): NodeJS.Timeout =>
      setTimeout(() => {
        const received = connection.getStats().bytesReceived;
        if (received > seen && this.waiters.includes(waiter)) {
          seen = received;
          waiter.timer = arm();
          return;
        }
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolveReply(null);
      }, expect.timeoutMs);
    const waiter: Waiter = {
      commands: expect.commands,
      info: expect.info,
      resolve: (frame) => resolveReply(frame),
      timer: arm(),
    };
    this.waiters.push(waiter);

    try {
      await connection.send(command, info);
    } catch (err) {
      clearTimeout(waiter.timer);
      this.waiters = this.waiters.filter((w) => w !== waiter);
      throw err;
    }

    return reply;
  }

  /**
   * Hand a frame to the oldest matching request
   */
  private settle(frame: Frame): boolean {
    const waiter = this.waiters.find(
      (w) =>
        w.commands.includes(frame.command) && (w.info === null || w.info === frame.info)
    );
    if (!waiter) return false;

    this.waiters = this.waiters.filter((w) => w !== waiter);
    clearTimeout(waiter.timer);
    waiter.resolve(frame);
    return true;
  }

  private settleAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  private require(): Connection {
    if (!this.connection) {
      throw new ConnectionClosedError("not connected");
    }
    return this.connection;
  }
}
