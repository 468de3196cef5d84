// Port: Clock
// Source of ISO-8601 UTC timestamps

export interface ClockPort {
  /**
   * Current time as an ISO-8601 UTC string with a Z suffix
   */
  now(): string;
}
