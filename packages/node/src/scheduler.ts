/**
 * @guild-ledger/node — Periodic tasks.
 *
 * Each background job runs on its own fixed-interval timer. A tick that
 * is still running when the next one is due is skipped, so a slow sweep
 * never overlaps itself. Errors are logged and the timer keeps going.
 */

import type { Logger } from "pino";

export interface PeriodicTaskOptions<T> {
  readonly name: string;
  readonly intervalMs: number;
  readonly run: () => Promise<T>;
  readonly logger: Logger;
}

export class PeriodicTask<T = unknown> {
  readonly name: string;
  readonly intervalMs: number;
  private readonly _run: () => Promise<T>;
  private readonly _logger: Logger;
  private _timer: NodeJS.Timeout | null = null;
  private _inFlight: Promise<void> | null = null;

  constructor(options: PeriodicTaskOptions<T>) {
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this._run = options.run;
    this._logger = options.logger.child({ task: options.name });
  }

  get running(): boolean {
    return this._timer !== null;
  }

  start(): void {
    if (this._timer !== null) {
      return;
    }
    this._timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this._logger.info({ intervalMs: this.intervalMs }, "Task scheduled");
  }

  /**
   * Run one tick now. Resolves false when a tick was already in flight.
   */
  async tick(): Promise<boolean> {
    if (this._inFlight !== null) {
      this._logger.debug("Previous tick still running, skipped");
      return false;
    }
    const started = Date.now();
    const current = Promise.resolve()
      .then(() => this._run())
      .then(
      (result) => {
        this._logger.debug({ result, durationMs: Date.now() - started }, "Tick complete");
      },
      (err: unknown) => {
        this._logger.error({ err }, "Tick failed");
      },
    );
    this._inFlight = current;
    try {
      await current;
    } finally {
      this._inFlight = null;
    }
    return true;
  }

  /**
   * Cancel the timer and wait for a running tick to finish.
   */
  async stop(): Promise<void> {
    if (this._timer !== null) {
      clearInterval(this._timer);
      this._timer = null;
    }
    if (this._inFlight !== null) {
      await this._inFlight;
    }
  }
}
