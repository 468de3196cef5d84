// Timestamp generation and parsing
// ISO-8601, UTC, always with a Z suffix

import { ClockPort } from '../../../domain/ports/clock';

const ISO_UTC_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,9})?Z$/;

export class SystemClock implements ClockPort {
  now(): string {
    return new Date().toISOString();
  }
}

/**
 * Parse an ISO-8601 UTC timestamp. Offset forms are rejected.
 */
export function parseTimestamp(timestamp: string): Date {
  if (!timestamp) {
    throw new Error('Invalid timestamp format: empty string');
  }
  if (!ISO_UTC_PATTERN.test(timestamp)) {
    throw new Error(`Invalid timestamp format: '${timestamp}' is not a UTC timestamp with Z suffix`);
  }
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid timestamp format: '${timestamp}'`);
  }
  return parsed;
}

/**
 * Timestamp form safe to embed in a directory name (no ':' or '.')
 */
export function toDirectoryTimestamp(timestamp: string): string {
  return timestamp.replace(/[:.]/g, '-');
}

export const systemClock: ClockPort = new SystemClock();
