import { ClockPort } from '@/domain/ports/clock';

export const FIXED_TIMESTAMP = '2025-12-24T10:00:00.123Z';

/**
 * Returns the given timestamps in order, repeating the last one
 */
export class FixedClock implements ClockPort {
  private calls = 0;

  constructor(private timestamps: string[] = [FIXED_TIMESTAMP]) {}

  now(): string {
    const index = Math.min(this.calls, this.timestamps.length - 1);
    this.calls += 1;
    return this.timestamps[index];
  }
}
