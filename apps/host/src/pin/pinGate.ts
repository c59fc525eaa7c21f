import { EventEmitter } from "events";
import { randomInt } from "crypto";

export const PIN_LENGTH = 4;

export type PinVerification =
  | { kind: "success" }
  | { kind: "wrongCode"; attemptsRemaining: number }
  | { kind: "expired" }
  | { kind: "lockedOut" };

export type PinGateOptions = {
  timeoutMs?: number;
  maxAttempts?: number;
  randomDigit?: () => number; // 0-9
};

type ActivePin = {
  code: string;
  createdAt: number;
  deadline: number;
  failedAttempts: number;
  expiryTimer: NodeJS.Timeout;
  countdownTimer: NodeJS.Timeout;
};

/**
 * PinGate owns the pairing code: generation, countdown and verification.
 *
 * At most one PIN is active. Generating a new one cancels the previous one;
 * a superseded code verifies as expired and does not count as an attempt.
 *
 * Events:
 * - expired (code): the deadline passed with the PIN still active
 * - countdown (secondsRemaining): once per second while a PIN is active
 */
export class PinGate extends EventEmitter {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly randomDigit: () => number;
  private active: ActivePin | null = null;
  // Codes replaced by generate() since the gate was last settled
  private superseded: Set<string> = new Set();

  constructor(options: PinGateOptions = {}) {
    super();
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.randomDigit = options.randomDigit ?? (() => randomInt(0, 10));
  }

  /**
   * Draw a new code and start its countdown
   */
  generate(): string {
    if (this.active) {
      this.superseded.add(this.active.code);
    }
    this.dropActive();

    let code = "";
    for (let i = 0; i < PIN_LENGTH; i++) {
      code += String(this.randomDigit());
    }

    const createdAt = Date.now();
    this.active = {
      code,
      createdAt,
      deadline: createdAt + this.timeoutMs,
      failedAttempts: 0,
      expiryTimer: setTimeout(() => this.expire(code), this.timeoutMs),
      countdownTimer: setInterval(() => {
        this.emit("countdown", this.getSecondsRemaining());
      }, 1000),
    };

    return code;
  }

  /**
   * Check a candidate code against the active PIN
   */
  verify(candidate: string): PinVerification {
    const active = this.active;
    if (!active || Date.now() >= active.deadline) {
      this.cancel();
      return { kind: "expired" };
    }

    if (candidate === active.code) {
      this.cancel();
      return { kind: "success" };
    }

    if (this.superseded.has(candidate)) {
      return { kind: "expired" };
    }

    active.failedAttempts++;
    if (active.failedAttempts >= this.maxAttempts) {
      this.cancel();
      return { kind: "lockedOut" };
    }

    return {
      kind: "wrongCode",
      attemptsRemaining: this.maxAttempts - active.failedAttempts,
    };
  }

  /**
   * Drop the active PIN, if any. Safe to call repeatedly.
   */
  cancel(): void {
    this.superseded.clear();
    this.dropActive();
  }

  isActive(): boolean {
    return this.active !== null;
  }

  getActiveCode(): string | null {
    return this.active?.code ?? null;
  }

  /**
   * Whole seconds left before the active PIN expires, 0 without one
   */
  getSecondsRemaining(): number {
    if (!this.active) return 0;
    return Math.max(0, Math.ceil((this.active.deadline - Date.now()) / 1000));
  }

  private dropActive(): void {
    if (!this.active) return;

    clearTimeout(this.active.expiryTimer);
    clearInterval(this.active.countdownTimer);
    this.active = null;
  }

  private expire(code: string): void {
    // A timer belonging to a replaced PIN has nothing to expire
    if (this.active?.code !== code) return;

    this.superseded.add(code);
    this.dropActive();
    this.emit("expired", code);
  }
}
