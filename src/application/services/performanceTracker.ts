// Performance Tracker
// Last duration of each named operation; anything over the threshold is reported as slow

import { LoggerPort } from '../../domain/ports/logger';

export const DEFAULT_SLOW_THRESHOLD_MS = 100;

export interface OperationTiming {
  name: string;
  durationMs: number;
}

export interface PerformanceTrackerOptions {
  slowThresholdMs?: number;
  now?: () => number;
}

export class PerformanceTracker {
  readonly slowThresholdMs: number;

  private metrics = new Map<string, number>();
  private now: () => number;

  constructor(
    private logger: LoggerPort,
    options: PerformanceTrackerOptions = {}
  ) {
    this.slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run the work and record how long it took, whether it resolved or threw
   */
  async track<T>(name: string, work: () => Promise<T> | T): Promise<T> {
    const startTime = this.now();
    try {
      return await work();
    } finally {
      const durationMs = this.now() - startTime;
      this.metrics.set(name, durationMs);
      this.logger.logPerformance(`[PerformanceTracker] ${name}`, durationMs);
    }
  }

  getMetrics(): Record<string, { durationMs: number }> {
    const metrics: Record<string, { durationMs: number }> = {};
    for (const [name, durationMs] of this.metrics) {
      metrics[name] = { durationMs };
    }
    return metrics;
  }

  getSlowOperations(): OperationTiming[] {
    return [...this.metrics]
      .filter(([, durationMs]) => durationMs > this.slowThresholdMs)
      .map(([name, durationMs]) => ({ name, durationMs }));
  }
}
