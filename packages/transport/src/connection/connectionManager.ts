import { createServer, connect } from "net";
import type { Server, Socket, AddressInfo } from "net";
import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { Connection } from "./connection.js";
import type { ConnectionOptions } from "./connection.js";
import { TransportError } from "../errors.js";

export type ConnectionOrigin = "inbound" | "outbound";

/**
 * ConnectionManager owns the single active peer connection.
 *
 * Responsibilities:
 * - Accept inbound sockets (listen) or open outbound ones (dial)
 * - Enforce one live connection: a newer socket supersedes and destroys
 *   the current one
 * - Assign connection IDs
 *
 * Events:
 * - connection (connection, origin)
 * - superseded (connection)
 * - connectionClosed (connectionId)
 * - error (TransportError): the listening server failed after startup
 */
export class ConnectionManager extends EventEmitter {
  private server: Server | null = null;
  private active: Connection | null = null;
  private nextId: number = 1;

  constructor(private readonly options: ConnectionOptions = {}) {
    super();
  }

  /**
   * Start accepting inbound connections
   */
  listen(port: number, host: string): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new TransportError("Already listening"));
    }

    const server = createServer((socket) => {
      this.adopt(socket, "inbound");
    });

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(new TransportError(`Listen failed: ${err.message}`));
      };
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        // Accept failures (EMFILE and the like) leave the server up
        server.on("error", (err: Error) => {
          this.emit("error", new TransportError(`Listener error: ${err.message}`));
        });
        this.server = server;
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new TransportError("Listener has no TCP address"));
          return;
        }
        resolve(address);
      });
    });
  }

  /**
   * Open an outbound connection to a resolved address
   */
  dial(host: string, port: number): Promise<Connection> {
    return new Promise((resolve, reject) => {
      const socket: Socket = connect(port, host);

      const onError = (err: Error) => {
        reject(new TransportError(`Dial ${host}:${port} failed: ${err.message}`));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(this.adopt(socket, "outbound"));
      });
    });
  }

  /**
   * Make a socket the active connection, superseding any existing one
   */
  adopt(socket: Duplex, origin: ConnectionOrigin): Connection {
    const previous = this.active;
    if (previous) {
      this.active = null;
      previous.destroy("superseded by a new connection");
      this.emit("superseded", previous);
    }

    const connectionId = this.generateId();
    const connection = new Connection(socket, connectionId, this.options);
    this.active = connection;

    // Wire up cleanup
    connection.on("close", () => {
      if (this.active === connection) {
        this.active = null;
      }
      this.emit("connectionClosed", connectionId);
    });

    this.emit("connection", connection, origin);

    return connection;
  }

  /**
   * Get the active connection, if any
   */
  getActive(): Connection | null {
    return this.active;
  }

  /**
   * Stop listening and drop the active connection
   */
  stop(): Promise<void> {
    this.active?.destroy("shutting down");
    this.active = null;

    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  isListening(): boolean {
    return this.server !== null;
  }

  /**
   * Generate a unique connection ID
   */
  private generateId(): string {
    return `conn-${this.nextId++}`;
  }
}
