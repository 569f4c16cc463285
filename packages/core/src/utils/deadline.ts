/**
 * Wall-clock budget for a retrieval pass
 *
 * Checked at loop boundaries only; in-flight requests are bounded by their
 * own per-request timeout instead of being interrupted.
 */

export type Clock = () => number;

export class Deadline {
  readonly startedAt: number;
  readonly budgetMs: number;
  private readonly now: Clock;
  private fired = false;

  constructor(budgetMs: number, now: Clock = Date.now) {
    this.now = now;
    this.budgetMs = budgetMs;
    this.startedAt = now();
  }

  elapsedMs(): number {
    return Math.max(0, this.now() - this.startedAt);
  }

  remainingMs(): number {
    return Math.max(0, this.budgetMs - this.elapsedMs());
  }

  /**
   * True once the budget is spent. Latches, so a later `hasFired()` reports
   * that the pass was cut short.
   */
  expired(): boolean {
    if (this.fired) {
      return true;
    }
    if (this.elapsedMs() >= this.budgetMs) {
      this.fired = true;
    }
    return this.fired;
  }

  hasFired(): boolean {
    return this.fired;
  }
}
