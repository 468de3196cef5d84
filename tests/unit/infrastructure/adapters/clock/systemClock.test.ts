import { parseTimestamp, SystemClock, toDirectoryTimestamp } from '@/infrastructure/adapters/clock/systemClock';

describe('SystemClock', () => {
  it('should produce a UTC timestamp with a Z suffix', () => {
    const timestamp = new SystemClock().now();

    expect(timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('should produce timestamps that parse back to the same instant', () => {
    const timestamp = new SystemClock().now();

    expect(parseTimestamp(timestamp).toISOString()).toBe(timestamp);
  });
});

describe('parseTimestamp', () => {
  it('should accept timestamps without fractional seconds', () => {
    expect(parseTimestamp('2025-01-02T03:04:05Z').getTime()).toBe(Date.UTC(2025, 0, 2, 3, 4, 5));
  });

  it('should reject the empty string', () => {
    expect(() => parseTimestamp('')).toThrow('Invalid timestamp format: empty string');
  });

  it('should reject offset forms', () => {
    expect(() => parseTimestamp('2025-01-02T03:04:05+00:00')).toThrow(
      "Invalid timestamp format: '2025-01-02T03:04:05+00:00' is not a UTC timestamp with Z suffix"
    );
  });

  it('should reject impossible dates that match the pattern', () => {
    expect(() => parseTimestamp('2025-13-45T99:00:00Z')).toThrow("Invalid timestamp format: '2025-13-45T99:00:00Z'");
  });
});

describe('toDirectoryTimestamp', () => {
  it('should replace colons and dots with dashes', () => {
    expect(toDirectoryTimestamp('2025-12-24T10:00:00.123Z')).toBe('2025-12-24T10-00-00-123Z');
  });
});
