import { describe, it, expect } from "vitest";
import {
  reduceSession,
  isAuthenticated,
  Notifications,
  UNKNOWN_PEER_NAME,
} from "../../../apps/host/src/session/stateMachine.js";
import type { SessionState, SessionEvent } from "../../../apps/host/src/session/stateMachine.js";
import { Command } from "../../../packages/protocol/src/constants.js";

const counts = { totalCount: 2, photosCount: 1, videosCount: 1, totalSizeBytes: 300 };

const frame = (command: Command, info: string = ""): SessionEvent => ({
  type: "frame",
  frame: { command, info },
});

const awaiting: SessionState = { kind: "awaitingPin", peerName: "Workstation-7" };
const verifying: SessionState = { kind: "verifying", peerName: "Workstation-7" };
const ready: SessionState = { kind: "ready", peerName: "Workstation-7", assetCounts: counts };

describe("reduceSession", () => {
  describe("lifecycle", () => {
    it("starts searching from idle", () => {
      expect(reduceSession({ kind: "idle" }, { type: "start" })).toEqual({
        state: { kind: "searching" },
        frames: [],
        effects: [],
      });
    });

    it("stops from any state and ends the session", () => {
      const result = reduceSession(ready, { type: "stop" });

      expect(result.state).toEqual({ kind: "idle" });
      expect(result.effects).toEqual([{ type: "endSession" }]);
    });

    it("retries only from error", () => {
      expect(reduceSession({ kind: "error", message: "x" }, { type: "retry" }).state).toEqual({
        kind: "searching",
      });
      expect(reduceSession(awaiting, { type: "retry" }).state).toBe(awaiting);
    });
  });

  describe("pairing", () => {
    it("moves to awaitingPin on CONNECT and asks for a PIN", () => {
      const result = reduceSession({ kind: "searching" }, frame(Command.CONNECT, "Workstation-7"));

      expect(result.state).toEqual(awaiting);
      expect(result.effects).toEqual([{ type: "issuePin" }]);
      expect(result.frames).toEqual([]);
    });

    it("falls back to a placeholder for an empty peer name", () => {
      const result = reduceSession({ kind: "searching" }, frame(Command.CONNECT, "   "));

      expect(result.state).toEqual({ kind: "awaitingPin", peerName: UNKNOWN_PEER_NAME });
    });

    it("ignores CONNECT once a peer is present", () => {
      const result = reduceSession(ready, frame(Command.CONNECT, "Intruder"));

      expect(result.state).toBe(ready);
      expect(result.frames).toEqual([]);
      expect(result.effects).toEqual([
        { type: "log", level: "warn", message: "Ignoring CONNECT in state ready" },
      ]);
    });

    it("sends the issued PIN as a challenge", () => {
      expect(reduceSession(awaiting, { type: "pinIssued", code: "4815" }).frames).toEqual([
        { command: Command.PIN_CHALLENGE, info: "4815" },
      ]);
    });

    it("cancels a PIN issued after the peer went away", () => {
      const result = reduceSession({ kind: "searching" }, { type: "pinIssued", code: "4815" });

      expect(result.frames).toEqual([]);
      expect(result.effects).toEqual([{ type: "cancelPin" }]);
    });

    it("checks a PIN only while awaiting one", () => {
      const result = reduceSession(awaiting, frame(Command.VERIFY_PIN, "4815"));

      expect(result.state).toEqual(verifying);
      expect(result.effects).toEqual([{ type: "checkPin", candidate: "4815" }]);
      expect(reduceSession(ready, frame(Command.VERIFY_PIN, "4815")).state).toBe(ready);
    });

    it("pairs on success and starts syncing", () => {
      const result = reduceSession(verifying, {
        type: "pinChecked",
        result: { kind: "success" },
      });

      expect(result.state).toEqual({ kind: "connected", peerName: "Workstation-7" });
      expect(result.frames).toEqual([{ command: Command.PIN_OK, info: "" }]);
      expect(result.effects).toContainEqual({ type: "beginSync" });
    });

    it("reports the attempts left after a wrong code", () => {
      const two = reduceSession(verifying, {
        type: "pinChecked",
        result: { kind: "wrongCode", attemptsRemaining: 2 },
      });
      const one = reduceSession(verifying, {
        type: "pinChecked",
        result: { kind: "wrongCode", attemptsRemaining: 1 },
      });

      expect(two.state).toEqual(awaiting);
      expect(two.frames).toEqual([
        { command: Command.PIN_FAIL, info: "" },
        { command: Command.NOTIFICATION, info: "Wrong PIN. 2 attempts remaining." },
      ]);
      expect(one.frames[1].info).toBe("Wrong PIN. 1 attempt remaining.");
    });

    it("disconnects after a lockout", () => {
      const result = reduceSession(verifying, {
        type: "pinChecked",
        result: { kind: "lockedOut" },
      });

      expect(result.state).toEqual({ kind: "searching" });
      expect(result.frames).toEqual([
        { command: Command.PIN_FAIL, info: "" },
        { command: Command.NOTIFICATION, info: Notifications.lockedOut },
        { command: Command.DISCONNECT, info: "" },
      ]);
      expect(result.effects).toEqual([{ type: "endSession" }]);
    });

    it("disconnects when the PIN had already expired", () => {
      const result = reduceSession(verifying, {
        type: "pinChecked",
        result: { kind: "expired" },
      });

      expect(result.frames[1]).toEqual({ command: Command.NOTIFICATION, info: "PIN expired" });
      expect(result.state).toEqual({ kind: "searching" });
    });

    it("re-challenges when the PIN timer runs out", () => {
      const result = reduceSession(awaiting, { type: "pinExpired" });

      expect(result.state).toEqual(awaiting);
      expect(result.frames).toEqual([
        { command: Command.NOTIFICATION, info: "PIN expired. Sending new PIN..." },
      ]);
      expect(result.effects).toEqual([{ type: "issuePin" }]);
    });
  });

  describe("library requests", () => {
    it("refuses requests before pairing", () => {
      for (const command of [Command.LIST_ASSETS, Command.GET_THUMBNAIL, Command.GET_FULL_FILE]) {
        const result = reduceSession(awaiting, frame(command, "a1"));
        expect(result.state).toBe(awaiting);
        expect(result.effects).toHaveLength(1);
        expect(result.effects[0].type).toBe("log");
      }
    });

    it("serves requests once paired", () => {
      expect(reduceSession(ready, frame(Command.LIST_ASSETS)).effects).toEqual([
        { type: "listAssets" },
      ]);
      expect(reduceSession(ready, frame(Command.GET_THUMBNAIL, "a1")).effects).toEqual([
        { type: "serveThumbnail", assetId: "a1" },
      ]);
      expect(reduceSession(ready, frame(Command.GET_FULL_FILE, "a1")).effects).toEqual([
        { type: "serveFile", assetId: "a1" },
      ]);
    });

    it("ignores a request without an asset id", () => {
      expect(reduceSession(ready, frame(Command.GET_THUMBNAIL)).effects[0]).toEqual({
        type: "log",
        level: "warn",
        message: "Ignoring GET_THUMBNAIL in state ready",
      });
    });

    it("ignores commands only a host sends", () => {
      expect(reduceSession(ready, frame(Command.ASSETS_LIST)).effects[0]).toEqual({
        type: "log",
        level: "warn",
        message: "Ignoring ASSETS_LIST in state ready",
      });
    });
  });

  describe("sync", () => {
    const connected: SessionState = { kind: "connected", peerName: "Workstation-7" };

    it("tracks clamped progress and lands in ready", () => {
      const syncing = reduceSession(connected, { type: "syncProgress", progress: 1.5 }).state;
      expect(syncing).toEqual({ kind: "syncing", peerName: "Workstation-7", progress: 1 });

      expect(reduceSession(syncing, { type: "syncComplete", counts }).state).toEqual(ready);
    });

    it("fails into error, tells the peer and schedules a retry", () => {
      const result = reduceSession(connected, { type: "syncFailed", message: "disk gone" });

      expect(result.state).toEqual({ kind: "error", message: "disk gone" });
      expect(result.frames).toEqual([
        { command: Command.NOTIFICATION, info: "Library unavailable" },
        { command: Command.DISCONNECT, info: "" },
      ]);
      expect(result.effects).toEqual([{ type: "endSession" }, { type: "scheduleRetry" }]);
    });

    it("drops sync results that arrive after teardown", () => {
      const searching: SessionState = { kind: "searching" };

      expect(reduceSession(searching, { type: "syncComplete", counts }).state).toBe(searching);
    });
  });

  describe("teardown", () => {
    it("returns to searching when the peer disconnects", () => {
      const result = reduceSession(ready, frame(Command.DISCONNECT));

      expect(result.state).toEqual({ kind: "searching" });
      expect(result.effects).toContainEqual({ type: "endSession" });
    });

    it("says goodbye on a local disconnect", () => {
      const result = reduceSession(ready, { type: "localDisconnect" });

      expect(result.frames).toEqual([{ command: Command.DISCONNECT, info: "" }]);
      expect(result.effects).toEqual([{ type: "endSession" }]);
    });

    it("goes to error on a transport failure", () => {
      const result = reduceSession(awaiting, { type: "transportFailed", message: "reset" });

      expect(result.state).toEqual({ kind: "error", message: "reset" });
      expect(result.effects).toEqual([{ type: "endSession" }, { type: "scheduleRetry" }]);
    });

    it("stays put when a connection closes in error", () => {
      const error: SessionState = { kind: "error", message: "x" };

      expect(reduceSession(error, { type: "connectionClosed" }).state).toBe(error);
    });
  });
});

describe("isAuthenticated", () => {
  it("holds for connected, syncing and ready only", () => {
    expect(isAuthenticated(awaiting)).toBe(false);
    expect(isAuthenticated(verifying)).toBe(false);
    expect(isAuthenticated({ kind: "connected", peerName: "p" })).toBe(true);
    expect(isAuthenticated({ kind: "syncing", peerName: "p", progress: 0.5 })).toBe(true);
    expect(isAuthenticated(ready)).toBe(true);
  });
});
