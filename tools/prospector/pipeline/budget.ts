/** Wall-clock budget for one invocation; stage timeouts never exceed what is left. */
export class BudgetManager {
  private readonly startedAt = Date.now();

  constructor(private readonly maxTotalMs: number) {}

  remainingTotalMs(): number {
    const used = Date.now() - this.startedAt;
    return Math.max(0, this.maxTotalMs - used);
  }

  effectiveStepTimeout(configuredStepMs: number): number {
    return Math.min(configuredStepMs, this.remainingTotalMs());
  }
}
