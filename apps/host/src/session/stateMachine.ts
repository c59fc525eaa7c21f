/**
 * Session State Machine
 *
 * Every protocol decision the host makes lives in reduceSession, a pure
 * function from (state, event) to the next state, the frames to send, and
 * the side effects to run. The Session runtime executes effects and feeds
 * their outcomes back in as events.
 *
 *   idle → searching → awaitingPin → verifying → connected → syncing → ready
 *                ↑            ↑___________|                              |
 *                |__________________ teardown ___________________________|
 */

import { Command, commandName } from "../../../../packages/protocol/src/constants.js";
import type { AssetCounts } from "../../../../packages/protocol/src/assetList.js";
import type { PinVerification } from "../pin/pinGate.js";

export const UNKNOWN_PEER_NAME = "Unknown peer";

export const Notifications = {
  pinExpired: "PIN expired",
  pinRenewed: "PIN expired. Sending new PIN...",
  lockedOut: "Too many failed attempts",
  libraryUnavailable: "Library unavailable",
  wrongPin: (attemptsRemaining: number) =>
    `Wrong PIN. ${attemptsRemaining} ${attemptsRemaining === 1 ? "attempt" : "attempts"} remaining.`,
} as const;

export type SessionState =
  | { kind: "idle" }
  | { kind: "searching" }
  | { kind: "awaitingPin"; peerName: string }
  | { kind: "verifying"; peerName: string }
  | { kind: "connected"; peerName: string }
  | { kind: "syncing"; peerName: string; progress: number }
  | { kind: "ready"; peerName: string; assetCounts: AssetCounts }
  | { kind: "error"; message: string };

export type IncomingFrame = {
  command: Command;
  info: string;
};

export type OutgoingFrame = {
  command: Command;
  info: string;
};

export type SessionEvent =
  | { type: "start" }
  | { type: "stop" }
  | { type: "retry" }
  | { type: "frame"; frame: IncomingFrame }
  | { type: "pinIssued"; code: string }
  | { type: "pinChecked"; result: PinVerification }
  | { type: "pinExpired" }
  | { type: "syncProgress"; progress: number }
  | { type: "syncComplete"; counts: AssetCounts }
  | { type: "syncFailed"; message: string }
  | { type: "connectionClosed" }
  | { type: "transportFailed"; message: string }
  | { type: "localDisconnect" };

export type SideEffect =
  | { type: "issuePin" }
  | { type: "checkPin"; candidate: string }
  | { type: "cancelPin" }
  | { type: "beginSync" }
  | { type: "listAssets" }
  | { type: "serveThumbnail"; assetId: string }
  | { type: "serveFile"; assetId: string }
  | { type: "endSession" }
  | { type: "scheduleRetry" }
  | { type: "log"; level: "debug" | "info" | "warn"; message: string };

export type Transition = {
  state: SessionState;
  frames: OutgoingFrame[];
  effects: SideEffect[];
};

type PeerState = Extract<SessionState, { peerName: string }>;

function stay(state: SessionState, ...effects: SideEffect[]): Transition {
  return { state, frames: [], effects };
}

function ignore(state: SessionState, what: string): Transition {
  return stay(state, {
    type: "log",
    level: "warn",
    message: `Ignoring ${what} in state ${state.kind}`,
  });
}

function frame(command: Command, info: string = ""): OutgoingFrame {
  return { command, info };
}

export function hasPeer(state: SessionState): state is PeerState {
  return "peerName" in state;
}

/**
 * Paired and allowed to browse the library
 */
export function isAuthenticated(state: SessionState): boolean {
  return (
    state.kind === "connected" ||
    state.kind === "syncing" ||
    state.kind === "ready"
  );
}

/**
 * Compute the next state, outgoing frames and side effects for an event
 */
export function reduceSession(state: SessionState, event: SessionEvent): Transition {
  switch (event.type) {
    case "start":
      return state.kind === "idle"
        ? stay({ kind: "searching" })
        : ignore(state, "start");

    case "stop":
      return stay({ kind: "idle" }, { type: "endSession" });

    case "retry":
      return state.kind === "error"
        ? stay({ kind: "searching" })
        : ignore(state, "retry");

    case "frame":
      return reduceFrame(state, event.frame);

    case "pinIssued":
      if (state.kind !== "awaitingPin" && state.kind !== "verifying") {
        return stay(state, { type: "cancelPin" });
      }
      return {
        state,
        frames: [frame(Command.PIN_CHALLENGE, event.code)],
        effects: [],
      };

    case "pinChecked":
      if (state.kind !== "verifying") {
        return ignore(state, "PIN result");
      }
      return reducePinResult(state, event.result);

    case "pinExpired":
      if (state.kind !== "awaitingPin" && state.kind !== "verifying") {
        return stay(state);
      }
      return {
        state: { kind: "awaitingPin", peerName: state.peerName },
        frames: [frame(Command.NOTIFICATION, Notifications.pinRenewed)],
        effects: [{ type: "issuePin" }],
      };

    case "syncProgress":
      if (state.kind !== "connected" && state.kind !== "syncing") {
        return stay(state);
      }
      return stay({
        kind: "syncing",
        peerName: state.peerName,
        progress: Math.min(1, Math.max(0, event.progress)),
      });

    case "syncComplete":
      if (state.kind !== "connected" && state.kind !== "syncing") {
        return stay(state);
      }
      return stay(
        { kind: "ready", peerName: state.peerName, assetCounts: event.counts },
        { type: "log", level: "info", message: `Ready: ${event.counts.totalCount} assets` }
      );

    case "syncFailed":
      if (state.kind !== "connected" && state.kind !== "syncing") {
        return stay(state);
      }
      return {
        state: { kind: "error", message: event.message },
        frames: [
          frame(Command.NOTIFICATION, Notifications.libraryUnavailable),
          frame(Command.DISCONNECT),
        ],
        effects: [{ type: "endSession" }, { type: "scheduleRetry" }],
      };

    case "connectionClosed":
      if (state.kind === "idle" || state.kind === "error") {
        return stay(state);
      }
      return stay({ kind: "searching" }, { type: "endSession" });

    case "transportFailed":
      if (state.kind === "idle" || state.kind === "error") {
        return stay(state);
      }
      return stay(
        { kind: "error", message: event.message },
        { type: "endSession" },
        { type: "scheduleRetry" }
      );

    case "localDisconnect":
      if (state.kind === "idle" || state.kind === "error") {
        return ignore(state, "disconnect");
      }
      return {
        state: { kind: "searching" },
        frames: [frame(Command.DISCONNECT)],
        effects: [{ type: "endSession" }],
      };
  }
}

function reduceFrame(state: SessionState, incoming: IncomingFrame): Transition {
  const { command, info } = incoming;

  switch (command) {
    case Command.CONNECT:
      if (state.kind !== "searching") {
        return ignore(state, "CONNECT");
      }
      return stay(
        { kind: "awaitingPin", peerName: info.trim() || UNKNOWN_PEER_NAME },
        { type: "issuePin" }
      );

    case Command.VERIFY_PIN:
      if (state.kind !== "awaitingPin") {
        return ignore(state, "VERIFY_PIN");
      }
      return stay(
        { kind: "verifying", peerName: state.peerName },
        { type: "checkPin", candidate: info }
      );

    case Command.LIST_ASSETS:
      if (!isAuthenticated(state)) {
        return ignore(state, "LIST_ASSETS");
      }
      return stay(state, { type: "listAssets" });

    case Command.GET_THUMBNAIL:
      if (!isAuthenticated(state) || info === "") {
        return ignore(state, "GET_THUMBNAIL");
      }
      return stay(state, { type: "serveThumbnail", assetId: info });

    case Command.GET_FULL_FILE:
      if (!isAuthenticated(state) || info === "") {
        return ignore(state, "GET_FULL_FILE");
      }
      return stay(state, { type: "serveFile", assetId: info });

    case Command.DISCONNECT:
      if (state.kind === "idle" || state.kind === "error") {
        return ignore(state, "DISCONNECT");
      }
      return stay(
        { kind: "searching" },
        { type: "log", level: "info", message: "Peer disconnected" },
        { type: "endSession" }
      );

    default:
      return ignore(state, commandName(command));
  }
}

function reducePinResult(
  state: Extract<SessionState, { kind: "verifying" }>,
  result: PinVerification
): Transition {
  switch (result.kind) {
    case "success":
      return {
        state: { kind: "connected", peerName: state.peerName },
        frames: [frame(Command.PIN_OK)],
        effects: [
          { type: "log", level: "info", message: `Paired with ${state.peerName}` },
          { type: "beginSync" },
        ],
      };

    case "wrongCode":
      return {
        state: { kind: "awaitingPin", peerName: state.peerName },
        frames: [
          frame(Command.PIN_FAIL),
          frame(Command.NOTIFICATION, Notifications.wrongPin(result.attemptsRemaining)),
        ],
        effects: [],
      };

    case "expired":
    case "lockedOut":
      return {
        state: { kind: "searching" },
        frames: [
          frame(Command.PIN_FAIL),
          frame(
            Command.NOTIFICATION,
            result.kind === "expired" ? Notifications.pinExpired : Notifications.lockedOut
          ),
          frame(Command.DISCONNECT),
        ],
        effects: [{ type: "endSession" }],
      };
  }
}
