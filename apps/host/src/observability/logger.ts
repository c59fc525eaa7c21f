/**
 * Leveled logging for the host, with a debug switch for per-frame detail
 */

import { config } from "../config.js";
import { commandName } from "../../../../packages/protocol/src/constants.js";
import type { Command } from "../../../../packages/protocol/src/constants.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export type FrameSummary = {
  command: Command;
  info: string;
  payloadSize: number;
};

/**
 * Where formatted lines end up
 */
export type LogSink = (level: LogLevel, line: string) => void;

export const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.ERROR:
      console.error(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export class Logger {
  private debugEnabled: boolean;
  private readonly sink: LogSink;

  constructor(debugEnabled: boolean = config.debug, sink: LogSink = consoleSink) {
    this.debugEnabled = debugEnabled;
    this.sink = sink;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const metaStr = meta === undefined ? "" : ` ${serialize(meta)}`;
    this.sink(level, `[${new Date().toISOString()}] [${level}] ${message}${metaStr}`);
  }

  /**
   * Debug logs (only when MEDIALINK_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      this.write(LogLevel.DEBUG, message, meta);
    }
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  /**
   * Connection lifecycle; metadata is only shown in debug mode
   */
  connection(connectionId: string, event: string, meta?: unknown): void {
    const message = `[${connectionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Outcome of a PIN check
   */
  pairing(connectionId: string, peerName: string, outcome: string): void {
    const message = `[${connectionId}] Pairing ${peerName}: ${outcome}`;
    if (outcome === "success") {
      this.info(message);
    } else {
      this.warn(message);
    }
  }

  /**
   * Log frame details (debug only)
   */
  frame(connectionId: string, direction: "→" | "←", frame: FrameSummary): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] ${direction} ${commandName(frame.command)}`, {
      info: frame.info,
      payloadSize: `${frame.payloadSize}B`,
    });
  }

  /**
   * Log session state transition (debug only)
   */
  stateTransition(connectionId: string, from: string, to: string, cause?: string): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] State: ${from} → ${to}`, cause ? { cause } : undefined);
  }

  /**
   * Log backpressure event (debug only)
   */
  backpressure(connectionId: string, event: "detected" | "relieved"): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] Backpressure ${event}`);
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }
}

function serialize(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message });
  }
  return JSON.stringify(meta);
}

export const logger = new Logger();
