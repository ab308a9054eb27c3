/**
 * Remaining-time estimate for bounded progress bars.
 *
 * Uses the average rate since the first step. Nothing is reported until
 * the bar has been moving for ETA_SETTLE_MS, since early rates swing wildly.
 */

export const ETA_SETTLE_MS = 500;

export class EtaEstimator {
  private startedAt: number | null = null;
  private startPosition = 0;
  private lastPosition = 0;

  /**
   * @param now - monotonic milliseconds
   * @returns seconds remaining, or null when no estimate is available yet
   */
  update(now: number, position: number, total: number): number | null {
    if (position >= total) {
      return null;
    }
    if (this.startedAt === null || position < this.lastPosition) {
      this.startedAt = now;
      this.startPosition = position;
      this.lastPosition = position;
      return null;
    }
    this.lastPosition = position;
    const elapsed = now - this.startedAt;
    const done = position - this.startPosition;
    if (elapsed < ETA_SETTLE_MS || done <= 0) {
      return null;
    }
    return ((elapsed / done) * (total - position)) / 1000;
  }
}
