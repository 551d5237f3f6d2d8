/**
 * Sliding window of recent enrichment call outcomes. Reports degradation
 * once the failure ratio over a warmed-up window exceeds the threshold.
 */

export interface FailureSnapshot {
  samples: number
  failures: number
  failureRate: number
}

export class FailureMonitor {
  private readonly window: boolean[] = []

  constructor(
    private readonly threshold: number,
    private readonly windowSize: number,
  ) {}

  record(success: boolean): void {
    this.window.push(success)
    if (this.window.length > this.windowSize) this.window.shift()
  }

  snapshot(): FailureSnapshot {
    const failures = this.window.filter(ok => !ok).length
    const samples = this.window.length
    return { samples, failures, failureRate: samples === 0 ? 0 : failures / samples }
  }

  /** Needs at least half a window of samples before it will trip. */
  isDegraded(): boolean {
    const { samples, failureRate } = this.snapshot()
    return samples >= Math.ceil(this.windowSize / 2) && failureRate > this.threshold
  }

  reset(): void {
    this.window.length = 0
  }
}
