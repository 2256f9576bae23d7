// src/utils/movingAverage.ts

/**
 * Time-windowed moving rate: values ticked within the last `windowMillis`
 * are summed and divided by the covered time span, giving a per-second rate.
 * Used by the fetcher for TPS and bytes/sec reporting.
 */
export class MovingAverage {
  private readonly values: Array<[number, number]> = [];
  private total = 0;

  /**
   * @param windowMillis Width of the averaging window.
   * @param now Timestamp (ms) of the zero-valued seed sample.
   */
  constructor(
    private readonly windowMillis: number,
    now: number = Date.now(),
  ) {
    this.values.push([now, 0]);
  }

  /** Records `value` at the current wall-clock time and returns the updated rate. */
  tickNow(value: number): number {
    return this.tick(Date.now(), value);
  }

  /**
   * Records `value` at `timestampMillis`, evicts samples older than the window
   * (always keeping at least two) and returns the updated rate.
   */
  tick(timestampMillis: number, value: number): number {
    this.values.push([timestampMillis, value]);
    this.total += value;
    while (this.values.length > 2) {
      const [tsFront, valueFront] = this.values[0];
      if (timestampMillis - tsFront <= this.windowMillis) break;
      this.values.shift();
      this.total -= valueFront;
    }
    return this.avg();
  }

  /** Per-second rate over the retained samples; 0 until two samples exist. */
  avg(): number {
    if (this.values.length < 2) return 0;
    const elapsed = this.values[this.values.length - 1][0] - this.values[0][0];
    if (elapsed <= 0) return 0;
    return (this.total * 1000) / elapsed;
  }

  sum(): number {
    return this.total;
  }
}
