import type { Logger } from "@tidepool/store";
import { componentLogger } from "@tidepool/store";
import { sleepUntil } from "@tidepool/sync";

import type { RoundReport } from "./reconcile.js";

export type RoundRunner = {
  runRound(): Promise<RoundReport>;
};

export type ReconciliationSchedulerOptions = {
  engine: RoundRunner;
  /** Default 10 minutes. */
  intervalMs?: number;
  signal?: AbortSignal;
  onReport?: (report: RoundReport) => void;
  logger?: Logger;
};

export const DEFAULT_RECONCILIATION_INTERVAL_MS = 10 * 60 * 1000;

/** Runs reconciliation rounds on a timer, one at a time. */
export class ReconciliationScheduler {
  private readonly engine: RoundRunner;
  private readonly intervalMs: number;
  private readonly onReport: ((report: RoundReport) => void) | undefined;
  private readonly log: Logger;
  private readonly controller = new AbortController();
  private loop: Promise<void> | null = null;
  private inFlight: Promise<RoundReport | null> | null = null;

  constructor(opts: ReconciliationSchedulerOptions) {
    this.engine = opts.engine;
    this.intervalMs = opts.intervalMs ?? DEFAULT_RECONCILIATION_INTERVAL_MS;
    if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
      throw new Error(`invalid intervalMs: ${this.intervalMs}`);
    }
    this.onReport = opts.onReport;
    this.log = componentLogger(opts.logger, "reconciliation-scheduler");
    const signal = opts.signal;
    if (signal) {
      if (signal.aborted) this.controller.abort();
      else signal.addEventListener("abort", () => this.controller.abort(), { once: true });
    }
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  start(): void {
    if (this.loop || this.stopped) return;
    this.loop = this.run();
    this.log.info({ intervalMs: this.intervalMs }, "scheduler started");
  }

  /** Runs a round now unless one is already running, in which case resolves null. */
  runNow(): Promise<RoundReport | null> {
    if (this.inFlight) return Promise.resolve(null);
    const round = this.execute().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = round;
    return round;
  }

  /** Stops the timer and waits for a running round to finish. */
  async stop(): Promise<void> {
    this.controller.abort();
    await this.loop;
    await this.inFlight;
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      const elapsed = await sleepUntil(this.intervalMs, signal);
      if (!elapsed) break;
      await this.runNow();
    }
    this.log.info("scheduler stopped");
  }

  private async execute(): Promise<RoundReport | null> {
    try {
      const report = await this.engine.runRound();
      this.onReport?.(report);
      return report;
    } catch (err) {
      this.log.error({ err: err instanceof Error ? err.message : String(err) }, "reconciliation round failed");
      return null;
    }
  }
}
