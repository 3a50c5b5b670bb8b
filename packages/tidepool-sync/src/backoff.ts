import { positiveNumber } from "./util.js";

export type BackoffOptions = {
  /** Delay before the first retry. Default 100. */
  baseDelayMs?: number;
  /** Default 2. */
  factor?: number;
  /** Default 30 000. */
  maxDelayMs?: number;
  /** Give up after this many retries. Unlimited when omitted. */
  maxAttempts?: number;
};

/** Exponential retry delays: base, base·factor, base·factor², … capped at `maxDelayMs`. */
export class Backoff {
  private readonly baseDelayMs: number;
  private readonly factor: number;
  private readonly maxDelayMs: number;
  private readonly maxAttempts: number;
  private attempt = 0;

  constructor(opts: BackoffOptions = {}) {
    this.baseDelayMs = positiveNumber(opts.baseDelayMs ?? 100, "baseDelayMs");
    this.factor = opts.factor ?? 2;
    if (!Number.isFinite(this.factor) || this.factor < 1) throw new Error(`invalid factor: ${this.factor}`);
    this.maxDelayMs = positiveNumber(opts.maxDelayMs ?? 30_000, "maxDelayMs");
    if (this.maxDelayMs < this.baseDelayMs) throw new Error("maxDelayMs must be at least baseDelayMs");
    this.maxAttempts = opts.maxAttempts ?? Number.POSITIVE_INFINITY;
    if (!(this.maxAttempts > 0)) throw new Error(`invalid maxAttempts: ${this.maxAttempts}`);
  }

  get attempts(): number {
    return this.attempt;
  }

  /** Delay before the next attempt, or `null` once attempts are exhausted. */
  next(): number | null {
    if (this.attempt >= this.maxAttempts) return null;
    const delay = Math.min(this.maxDelayMs, this.baseDelayMs * this.factor ** this.attempt);
    this.attempt += 1;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }
}
