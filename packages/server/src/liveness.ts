/** Probe reports unhealthy once the last poll attempt is older than this. */
export const LIVENESS_THRESHOLD_MINUTES = 5;

export function epochMinute(nowMs: number = Date.now()): number {
  return Math.floor(nowMs / 60_000);
}

export function isHealthy(elapsedMinutes: number): boolean {
  return elapsedMinutes <= LIVENESS_THRESHOLD_MINUTES;
}

/**
 * Epoch minute of the last poll attempt, shared by the cycle driver (writer)
 * and the probe (reader).
 *
 * Both run on the same event loop, so reads never observe a partial write.
 * Starts at 0, which keeps the probe unhealthy until the first cycle ends.
 */
export class LivenessTracker {
  private lastAttempt = 0;

  get lastAttemptMinute(): number {
    return this.lastAttempt;
  }

  /** Record an attempt. Older minutes never move the value backwards. */
  recordAttempt(nowMinute: number): void {
    if (nowMinute > this.lastAttempt) {
      this.lastAttempt = nowMinute;
    }
  }

  minutesSince(nowMinute: number): number {
    return nowMinute - this.lastAttempt;
  }
}
