/** Per-Review spending and attempt accounting for model calls */
export class CostBudget {
  private spentUsd = 0;
  private attemptCount = 0;

  constructor(
    readonly limitUsd: number,
    readonly maxAttempts: number
  ) {}

  get spent(): number {
    return this.spentUsd;
  }

  get remaining(): number {
    return Math.max(0, this.limitUsd - this.spentUsd);
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get exhausted(): boolean {
    return this.spentUsd >= this.limitUsd;
  }

  get attemptsExhausted(): boolean {
    return this.attemptCount >= this.maxAttempts;
  }

  canAfford(estimateUsd: number): boolean {
    return !this.exhausted && this.spentUsd + estimateUsd <= this.limitUsd;
  }

  recordAttempt(): void {
    this.attemptCount++;
  }

  charge(costUsd: number): void {
    this.spentUsd += Math.max(0, costUsd);
  }
}
