/**
 * Call spacing for fair-use external services
 *
 * Nominatim and Overpass both ask clients to stay near one request per
 * second. `Throttle.wait()` resolves once at least `intervalMs` has passed
 * since the previous call was released. Clock and sleep are injectable so
 * tests run without real delays.
 */

export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class Throttle {
  private lastRelease: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly sleepFn: SleepFn = sleep,
    private readonly clock: ClockFn = Date.now
  ) {}

  async wait(): Promise<void> {
    if (this.lastRelease !== null) {
      const elapsed = this.clock() - this.lastRelease;
      if (elapsed < this.intervalMs) {
        await this.sleepFn(this.intervalMs - elapsed);
      }
    }
    this.lastRelease = this.clock();
  }
}
