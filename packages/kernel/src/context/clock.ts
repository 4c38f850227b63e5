/**
 * Clock interface for injectable time source.
 * Allows deterministic testing of build timestamps and durations.
 */
export interface Clock {
  now(): Date;
}

/**
 * Default clock using system time.
 */
export const defaultClock: Clock = {
  now: () => new Date(),
};
