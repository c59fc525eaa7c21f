import { EventEmitter } from "events";
import type { Connection, ConnectionCloseStats, ConnectionError } from "../../../../packages/transport/src/connection/connection.js";
import { ConnectionState } from "../../../../packages/transport/src/connection/connection.js";
import type { Frame } from "../../../../packages/protocol/src/types.js";
import type { InvalidHeaderError } from "../../../../packages/protocol/src/errors.js";
import { countAssets } from "../../../../packages/protocol/src/assetList.js";
import type { AssetCounts } from "../../../../packages/protocol/src/assetList.js";
import type { PinGate } from "../pin/pinGate.js";
import type { AssetStore } from "../assets/assetStore.js";
import type { ThumbnailService } from "../catalog/thumbnailService.js";
import { logger as defaultLogger } from "../observability/logger.js";
import type { Logger } from "../observability/logger.js";
import { metrics as defaultMetrics } from "../observability/metrics.js";
import type { Metrics } from "../observability/metrics.js";
import { handleListAssets } from "../handlers/listAssets.js";
import { handleGetThumbnail } from "../handlers/getThumbnail.js";
import { handleGetFullFile } from "../handlers/getFullFile.js";
import type { HandlerContext } from "../handlers/context.js";
import { reduceSession, hasPeer, UNKNOWN_PEER_NAME } from "./stateMachine.js";
import type {
  SessionState,
  SessionEvent,
  SideEffect,
  OutgoingFrame,
} from "./stateMachine.js";

export type SessionDeps = {
  pinGate: PinGate;
  thumbnails: ThumbnailService;
  assetStore: AssetStore;
  logger?: Logger;
  metrics?: Metrics;
  retryDelayMs?: number; // 0 leaves the Error state until retry() is called
};

export type SessionSnapshot = {
  state: SessionState;
  peerName: string | null;
  assetCounts: AssetCounts | null;
  syncProgress: number;
  pinCode: string | null;
  pinSecondsRemaining: number;
};

/**
 * Session is the single owner of protocol state for the host.
 *
 * Every input (frames, PIN timer, sync progress, transport failure, local
 * commands) goes through dispatch(), which runs the pure reducer one event
 * at a time. Effects that finish synchronously feed their outcome back into
 * the same dispatch cycle; slow ones (asset store work) run on their own and
 * only their writes are ordered by the connection's write queue.
 *
 * Events (for the presentation layer):
 * - state (state, previous): the settled state after a dispatch cycle
 * - pin ({ code, secondsRemaining }): a new PIN to display
 * - pinCountdown (secondsRemaining)
 * - teardown (reason)
 */
export class Session extends EventEmitter {
  private state: SessionState = { kind: "idle" };
  private connection: Connection | null = null;
  private abort: AbortController | null = null;
  private retryTimer: NodeJS.Timeout | null = null;

  private queue: SessionEvent[] = [];
  private dispatching: boolean = false;

  private readonly pinGate: PinGate;
  private readonly thumbnails: ThumbnailService;
  private readonly assetStore: AssetStore;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly retryDelayMs: number;

  constructor(deps: SessionDeps) {
    super();
    this.pinGate = deps.pinGate;
    this.thumbnails = deps.thumbnails;
    this.assetStore = deps.assetStore;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;
    this.retryDelayMs = deps.retryDelayMs ?? 0;

    this.pinGate.on("expired", () => {
      this.logger.info(`[${this.connectionLabel()}] PIN expired, issuing a new one`);
      this.dispatch({ type: "pinExpired" });
    });
    this.pinGate.on("countdown", (secondsRemaining: number) => {
      this.emit("pinCountdown", secondsRemaining);
    });
  }

  start(): void {
    this.dispatch({ type: "start" });
  }

  stop(): void {
    this.clearRetry();
    this.dispatch({ type: "stop" });
  }

  /**
   * Leave the Error state and go back to Searching
   */
  retry(): void {
    this.clearRetry();
    this.dispatch({ type: "retry" });
  }

  /**
   * Host-initiated disconnect: tell the peer, then tear down
   */
  disconnect(): void {
    this.dispatch({ type: "localDisconnect" });
  }

  /**
   * Bind a freshly accepted or dialed connection to this session
   *
   * A connection that is already bound is torn down first; only one peer
   * session exists at a time.
   */
  attach(connection: Connection): void {
    if (this.connection) {
      this.dispatch({ type: "connectionClosed" });
    }
    if (this.state.kind === "error") {
      this.retry();
    }
    if (this.state.kind === "idle") {
      this.logger.warn(`[${connection.connectionId}] Connection arrived before start()`);
    }

    this.connection = connection;
    this.abort = new AbortController();

    connection.on("frame", (frame: Frame) => {
      if (this.connection !== connection) return;
      this.metrics.frameReceived();
      this.logger.frame(connection.connectionId, "←", {
        command: frame.command,
        info: frame.info,
        payloadSize: frame.payload.length,
      });
      this.dispatch({
        type: "frame",
        frame: { command: frame.command, info: frame.info },
      });
    });

    connection.on("invalidHeader", (error: InvalidHeaderError) => {
      this.logger.warn(`[${connection.connectionId}] Skipping header: ${error.message}`);
    });

    connection.on("state", (state: ConnectionState) => {
      if (state === ConnectionState.DRAINING) {
        this.logger.backpressure(connection.connectionId, "detected");
      }
    });

    connection.on("drain", () => {
      this.logger.backpressure(connection.connectionId, "relieved");
    });

    connection.on("error", (error: ConnectionError) => {
      this.logger.error(`[${connection.connectionId}] Error: ${error.reason}`, {
        type: error.type,
        fatal: error.fatal,
      });
      if (error.fatal && this.connection === connection) {
        this.dispatch({ type: "transportFailed", message: error.reason });
      }
    });

    connection.on("close", (stats: ConnectionCloseStats) => {
      if (this.connection !== connection) return;
      this.logger.connection(connection.connectionId, "Peer gone", {
        reason: stats.reason,
      });
      this.dispatch({ type: "connectionClosed" });
    });
  }

  getState(): SessionState {
    return this.state;
  }

  getSnapshot(): SessionSnapshot {
    const state = this.state;
    return {
      state,
      peerName: hasPeer(state) ? state.peerName : null,
      assetCounts: state.kind === "ready" ? state.assetCounts : null,
      syncProgress:
        state.kind === "syncing" ? state.progress : state.kind === "ready" ? 1 : 0,
      pinCode: this.pinGate.getActiveCode(),
      pinSecondsRemaining: this.pinGate.getSecondsRemaining(),
    };
  }

  /**
   * Feed one event through the reducer
   *
   * Re-entrant calls (from effects) are queued and handled in order within
   * the current cycle.
   */
  dispatch(event: SessionEvent): void {
    this.queue.push(event);
    if (this.dispatching) return;

    this.dispatching = true;
    const before = this.state;
    try {
      let next: SessionEvent | undefined;
      while ((next = this.queue.shift()) !== undefined) {
        this.step(next);
      }
    } finally {
      this.dispatching = false;
    }

    if (!sameState(before, this.state)) {
      this.emit("state", this.state, before);
    }
  }

  private step(event: SessionEvent): void {
    const previous = this.state;
    const { state, frames, effects } = reduceSession(previous, event);
    this.state = state;

    if (previous.kind !== state.kind) {
      this.logger.stateTransition(this.connectionLabel(), previous.kind, state.kind, event.type);
    }

    // Frames go out before effects run, so a teardown closes only after them
    const connection = this.connection;
    for (const frame of frames) {
      this.sendFrame(connection, frame);
    }
    for (const effect of effects) {
      this.runEffect(effect);
    }
  }

  private runEffect(effect: SideEffect): void {
    switch (effect.type) {
      case "issuePin": {
        const code = this.pinGate.generate();
        this.emit("pin", {
          code,
          secondsRemaining: this.pinGate.getSecondsRemaining(),
        });
        this.dispatch({ type: "pinIssued", code });
        break;
      }

      case "checkPin": {
        const result = this.pinGate.verify(effect.candidate);
        this.logger.pairing(
          this.connectionLabel(),
          hasPeer(this.state) ? this.state.peerName : UNKNOWN_PEER_NAME,
          result.kind
        );
        if (result.kind === "success") {
          this.metrics.pairingSucceeded();
        } else {
          this.metrics.pairingFailed();
        }
        this.dispatch({ type: "pinChecked", result });
        break;
      }

      case "cancelPin":
        this.pinGate.cancel();
        break;

      case "beginSync": {
        const signal = this.abort?.signal;
        if (!signal) break;
        this.runSync(signal).catch((err: unknown) => {
          if (signal.aborted) return;
          this.logger.error(`[${this.connectionLabel()}] Sync failed`, err);
          this.dispatch({
            type: "syncFailed",
            message: err instanceof Error ? err.message : String(err),
          });
        });
        break;
      }

      case "listAssets":
        this.serve("LIST_ASSETS", (ctx) => handleListAssets(ctx));
        break;

      case "serveThumbnail":
        this.serve("GET_THUMBNAIL", (ctx) => handleGetThumbnail(ctx, effect.assetId));
        break;

      case "serveFile":
        this.serve("GET_FULL_FILE", (ctx) => handleGetFullFile(ctx, effect.assetId));
        break;

      case "endSession":
        this.teardown();
        break;

      case "scheduleRetry":
        this.scheduleRetry();
        break;

      case "log":
        this.logger[effect.level](`[${this.connectionLabel()}] ${effect.message}`);
        break;
    }
  }

  private sendFrame(connection: Connection | null, frame: OutgoingFrame): void {
    if (!connection) {
      this.logger.debug(`Dropping frame with no connection`, { command: frame.command });
      return;
    }

    this.logger.frame(connection.connectionId, "→", { ...frame, payloadSize: 0 });
    connection
      .send(frame.command, frame.info)
      .then(() => this.metrics.frameSent())
      .catch((err: unknown) => {
        this.logger.warn(`[${connection.connectionId}] Frame not delivered`, err);
      });
  }

  /**
   * Run a request handler against the current connection
   */
  private serve(label: string, handler: (ctx: HandlerContext) => Promise<void>): void {
    const connection = this.connection;
    const signal = this.abort?.signal;
    if (!connection || !signal) return;

    const ctx: HandlerContext = {
      connection,
      signal,
      assetStore: this.assetStore,
      thumbnails: this.thumbnails,
      logger: this.logger,
      metrics: this.metrics,
    };

    handler(ctx).catch((err: unknown) => {
      this.logger.warn(`[${connection.connectionId}] ${label} response not delivered`, err);
    });
  }

  /**
   * Size the library and report progress in whole-percent steps
   */
  private async runSync(signal: AbortSignal): Promise<void> {
    const records = await this.assetStore.listAssets();
    if (signal.aborted) return;

    this.dispatch({ type: "syncProgress", progress: 0 });

    const sized: { type: (typeof records)[number]["type"]; sizeBytes: number }[] = [];
    let reported = 0;
    for (const record of records) {
      const sizeBytes = await this.assetStore.sizeOf(record.id);
      if (signal.aborted) return;

      sized.push({ type: record.type, sizeBytes });
      const percent = Math.floor((sized.length / records.length) * 100);
      if (percent > reported) {
        reported = percent;
        this.dispatch({ type: "syncProgress", progress: percent / 100 });
      }
    }

    this.dispatch({ type: "syncComplete", counts: countAssets(sized) });
  }

  /**
   * Release everything tied to the current peer
   */
  private teardown(): void {
    this.pinGate.cancel();
    // Stops request payloads: queued ones are dropped, one mid-transfer ends the socket
    this.abort?.abort();
    this.abort = null;

    const connection = this.connection;
    this.connection = null;
    if (!connection) return;

    this.logger.connection(connection.connectionId, "Session ended");
    this.emit("teardown", connection.connectionId);
    // Protocol frames already queued (PIN_FAIL, DISCONNECT, ...) go out first
    connection.close().catch((err: unknown) => {
      this.logger.warn(`[${connection.connectionId}] Close failed`, err);
    });
  }

  private scheduleRetry(): void {
    if (this.retryDelayMs <= 0) return;

    this.clearRetry();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.dispatch({ type: "retry" });
    }, this.retryDelayMs);
  }

  private clearRetry(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private connectionLabel(): string {
    return this.connection?.connectionId ?? "session";
  }
}

function sameState(a: SessionState, b: SessionState): boolean {
  return a === b || JSON.stringify(a) === JSON.stringify(b);
}
