import type { AddressInfo } from "net";
import { SERVICE_TYPE, SERVICE_DOMAIN } from "../../../packages/protocol/src/constants.js";
import { ConnectionManager } from "../../../packages/transport/src/connection/connectionManager.js";
import type { TransportError } from "../../../packages/transport/src/errors.js";
import type { ConnectionOrigin } from "../../../packages/transport/src/connection/connectionManager.js";
import type {
  Connection,
  ConnectionCloseStats,
} from "../../../packages/transport/src/connection/connection.js";
import type { AssetStore } from "./assets/assetStore.js";
import { ThumbnailCache } from "./catalog/thumbnailCache.js";
import { ThumbnailService } from "./catalog/thumbnailService.js";
import { PinGate } from "./pin/pinGate.js";
import { Session } from "./session/session.js";
import type { HostConfig } from "./config.js";
import { config as defaultConfig } from "./config.js";
import { logger as defaultLogger } from "./observability/logger.js";
import type { Logger } from "./observability/logger.js";
import { metrics as defaultMetrics } from "./observability/metrics.js";
import type { Metrics } from "./observability/metrics.js";

export type MediaLinkHostOptions = {
  assetStore: AssetStore;
  config?: HostConfig;
  logger?: Logger;
  metrics?: Metrics;
};

/**
 * MediaLink Host
 *
 * Core responsibilities:
 * - Accept peer connections (or dial a peer that advertised itself)
 * - Hand each live connection to the Session
 * - Own the PIN gate and thumbnail catalog for the Session
 */
export class MediaLinkHost {
  readonly session: Session;
  readonly thumbnails: ThumbnailService;

  private connectionManager: ConnectionManager;
  private readonly config: HostConfig;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: MediaLinkHostOptions) {
    this.config = options.config ?? defaultConfig;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;

    const cache = new ThumbnailCache({
      maxEntries: this.config.cacheMaxEntries,
      maxBytes: this.config.cacheMaxBytes,
    });
    this.thumbnails = new ThumbnailService(options.assetStore, cache, this.metrics);

    this.session = new Session({
      pinGate: new PinGate({
        timeoutMs: this.config.pinTimeoutMs,
        maxAttempts: this.config.pinMaxAttempts,
      }),
      thumbnails: this.thumbnails,
      assetStore: options.assetStore,
      logger: this.logger,
      metrics: this.metrics,
      retryDelayMs: this.config.retryDelayMs,
    });

    this.connectionManager = new ConnectionManager();
    this.connectionManager.on("connection", (connection: Connection, origin: ConnectionOrigin) =>
      this.handleConnection(connection, origin)
    );
    this.connectionManager.on("superseded", (connection: Connection) => {
      this.logger.info(`[${connection.connectionId}] Superseded by a newer connection`);
    });
    this.connectionManager.on("error", (err: TransportError) => {
      this.logger.error("Listener error", err);
    });
  }

  /**
   * Start listening and enter Searching
   */
  async start(): Promise<AddressInfo> {
    const address = await this.connectionManager.listen(this.config.port, this.config.host);
    this.logger.info(`MediaLink host listening on ${address.address}:${address.port}`);
    this.logger.info(`Advertise as ${SERVICE_TYPE}.${SERVICE_DOMAIN} on port ${address.port}`);
    if (this.config.debug) {
      this.logger.info("Debug mode enabled (MEDIALINK_DEBUG=1)");
    }
    this.session.start();
    return address;
  }

  /**
   * Connect out to a peer at a resolved address
   */
  async dial(host: string, port: number): Promise<Connection> {
    if (this.session.getState().kind === "idle") {
      this.session.start();
    }
    return this.connectionManager.dial(host, port);
  }

  disconnect(): void {
    this.session.disconnect();
  }

  retry(): void {
    this.session.retry();
  }

  /**
   * Stop the host
   */
  async stop(): Promise<void> {
    this.logger.info("Shutting down MediaLink host...");

    // Print metrics before shutdown
    this.metrics.print();

    this.session.stop();
    this.thumbnails.clear();
    await this.connectionManager.stop();
    this.logger.info("Host stopped");
  }

  /**
   * Attach a new connection to the session
   */
  private handleConnection(connection: Connection, origin: ConnectionOrigin): void {
    this.metrics.connectionOpened();
    this.logger.connection(connection.connectionId, "Connected", { origin });

    connection.on("close", (stats: ConnectionCloseStats) => {
      this.metrics.connectionClosed();
      this.metrics.bytesSent(stats.bytesSent);
      this.metrics.bytesReceived(stats.bytesReceived);

      this.logger.connection(connection.connectionId, "Closed", {
        reason: stats.reason,
        sent: `${stats.bytesSent}B`,
        received: `${stats.bytesReceived}B`,
      });
    });

    this.session.attach(connection);
  }

  /**
   * Get host stats
   */
  getStats() {
    const active = this.connectionManager.getActive();
    return {
      listening: this.connectionManager.isListening(),
      session: this.session.getState().kind,
      connection: active ? active.getStats() : null,
    };
  }
}
