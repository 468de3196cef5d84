// Circuit Breaker
// Counts failures for one workflow run; once open it stays open until a new instance is built

export class CircuitBreaker {
  private failureCount = 0;

  constructor(public readonly maxFailures: number) {
    if (!Number.isInteger(maxFailures) || maxFailures < 1) {
      throw new RangeError(`maxFailures must be a positive integer, got ${maxFailures}`);
    }
  }

  recordFailure(): void {
    this.failureCount += 1;
  }

  isOpen(): boolean {
    return this.failureCount >= this.maxFailures;
  }

  getFailureCount(): number {
    return this.failureCount;
  }
}
