/**
 * Performance monitor for scheduler ticks.
 * Provides rolling averages and budget warnings.
 */

export interface PerfSnapshot {
  ticks: number;
  avgTickMs: number;
  lastTickMs: number;
  executed: number;
  dropped: number;
  overBudgetTicks: number;
  queueLength: number;
  overBudget: boolean;
}

export class PerfMonitor {
  private tickTimes: number[] = [];
  private tickCount = 0;
  private lastTickMs = 0;
  private executedTotal = 0;
  private droppedTotal = 0;
  private overBudgetCount = 0;
  private queueLength = 0;
  private readonly sampleWindow = 60; // ticks for rolling average

  constructor(private readonly budgetMs: number) {}

  /** Record one finished tick. */
  recordTick(elapsedMs: number, executed: number, dropped: number, queueLength: number): void {
    this.tickTimes.push(elapsedMs);
    if (this.tickTimes.length > this.sampleWindow) {
      this.tickTimes.shift();
    }
    this.tickCount++;
    this.lastTickMs = elapsedMs;
    this.executedTotal += executed;
    this.droppedTotal += dropped;
    this.queueLength = queueLength;
    if (elapsedMs > this.budgetMs) this.overBudgetCount++;
  }

  snapshot(): PerfSnapshot {
    const sum = this.tickTimes.reduce((a, b) => a + b, 0);
    const avg = this.tickTimes.length > 0 ? sum / this.tickTimes.length : 0;
    return {
      ticks: this.tickCount,
      avgTickMs: Math.round(avg * 100) / 100,
      lastTickMs: this.lastTickMs,
      executed: this.executedTotal,
      dropped: this.droppedTotal,
      overBudgetTicks: this.overBudgetCount,
      queueLength: this.queueLength,
      overBudget: avg > this.budgetMs,
    };
  }

  /** Reset all counters. */
  reset(): void {
    this.tickTimes.length = 0;
    this.tickCount = 0;
    this.lastTickMs = 0;
    this.executedTotal = 0;
    this.droppedTotal = 0;
    this.overBudgetCount = 0;
    this.queueLength = 0;
  }
}
