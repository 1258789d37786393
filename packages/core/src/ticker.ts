/**
 * Cancellable recurring timer.
 *
 * Drives both the engine's poll loop and the device heartbeat. Each start()
 * gets its own AbortController; stop() aborts it and clears the interval, so
 * no further ticks are scheduled. A tick that is already running is not
 * interrupted; callers that need to observe cancellation read the signal
 * passed to the tick function.
 *
 * Ticks never overlap: if the previous run is still in flight when the
 * interval fires, that tick is skipped.
 */

import type { Logger } from "pino";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TickFn = (signal: AbortSignal) => Promise<void> | void;

export interface TickerOptions {
  /** Name used in log lines */
  name: string;
  intervalMs: number;
  /** Run the first tick synchronously on start instead of after one interval */
  immediate?: boolean;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Ticker
// ---------------------------------------------------------------------------

export class Ticker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly fn: TickFn,
    private readonly options: TickerOptions,
  ) {
    this.log = options.logger.child({ component: "ticker", ticker: options.name });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start ticking. Calling start() on a running ticker is a no-op. */
  start(): void {
    if (this.timer) return;

    const controller = new AbortController();
    this.controller = controller;
    this.timer = setInterval(() => {
      this.tick(controller.signal);
    }, this.options.intervalMs);

    if (this.options.immediate) {
      this.tick(controller.signal);
    }
  }

  /** Cancel future ticks. The tick in flight (if any) keeps running. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    this.controller = null;
  }

  /** Resolves once the tick in flight (if any) has settled. */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  private tick(signal: AbortSignal): void {
    if (signal.aborted) return;
    if (this.inFlight) {
      this.log.debug("Previous tick still running, skipping");
      return;
    }

    const run = (async () => {
      try {
        await this.fn(signal);
      } catch (err) {
        this.log.error(
          { error: err instanceof Error ? err.message : String(err) },
          "Tick failed",
        );
      }
    })();

    this.inFlight = run;
    void run.finally(() => {
      if (this.inFlight === run) this.inFlight = null;
    });
  }
}
