/**
 * Periodic "still waiting" signal for the span of one generation.
 * Fires once on start, then every `intervalMs` until stopped.
 */
export class WaitingTicker {
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(
    private readonly intervalMs: number,
    private readonly onTick: () => void
  ) {}

  start(): void {
    if (this.timer || this.stopped) {
      return;
    }
    this.onTick();
    this.timer = setInterval(this.onTick, this.intervalMs);
    // Never keep the process alive just to report waiting
    this.timer.unref();
  }

  /**
   * Cancel further ticks. Returns true only for the call that stopped a
   * running ticker.
   */
  stop(): boolean {
    if (this.stopped) {
      return false;
    }
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      return true;
    }
    return false;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
