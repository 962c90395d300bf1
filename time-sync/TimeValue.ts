/**
 * Time Value Arithmetic
 *
 * Ordering is lexicographic on (seconds, microseconds). Differences are exact
 * integer microsecond counts; nothing here goes through floating-point seconds.
 */

import { TimeValue, MicrosecondsDiff } from './types';
import { MICROSECONDS_PER_SECOND, TIME_VALUE_SEPARATOR } from './constants';

/**
 * Build a TimeValue from its two integer components
 */
export function createTimeValue(seconds: number, microseconds: number): TimeValue {
  return { seconds, microseconds };
}

/**
 * Build a TimeValue from a total microsecond count, normalizing the remainder into [0, 1_000_000)
 */
export function fromMicroseconds(totalMicroseconds: number): TimeValue {
  const seconds = Math.floor(totalMicroseconds / MICROSECONDS_PER_SECOND);
  return {
    seconds,
    microseconds: totalMicroseconds - seconds * MICROSECONDS_PER_SECOND
  };
}

/**
 * Carry out-of-range microseconds into the seconds field.
 * Records with e.g. usec = 1_500_000 compare correctly only after this.
 */
export function normalizeTimeValue(tv: TimeValue): TimeValue {
  if (tv.microseconds >= 0 && tv.microseconds < MICROSECONDS_PER_SECOND) {
    return { ...tv };
  }
  const carry = Math.floor(tv.microseconds / MICROSECONDS_PER_SECOND);
  return {
    seconds: tv.seconds + carry,
    microseconds: tv.microseconds - carry * MICROSECONDS_PER_SECOND
  };
}

/**
 * Three-way comparison: negative if a < b, zero if equal, positive if a > b
 */
export function compareTimeValues(a: TimeValue, b: TimeValue): number {
  if (a.seconds !== b.seconds) {
    return a.seconds < b.seconds ? -1 : 1;
  }
  if (a.microseconds !== b.microseconds) {
    return a.microseconds < b.microseconds ? -1 : 1;
  }
  return 0;
}

export function isBefore(a: TimeValue, b: TimeValue): boolean {
  return compareTimeValues(a, b) < 0;
}

export function timeValuesEqual(a: TimeValue, b: TimeValue): boolean {
  return a.seconds === b.seconds && a.microseconds === b.microseconds;
}

/**
 * Signed microseconds from b to a: (a.seconds - b.seconds) * 1e6 + (a.usec - b.usec)
 * Throws RangeError once the result leaves the safe-integer range.
 */
export function microsecondsDifference(a: TimeValue, b: TimeValue): MicrosecondsDiff {
  const diff = (a.seconds - b.seconds) * MICROSECONDS_PER_SECOND + (a.microseconds - b.microseconds);
  if (!Number.isSafeInteger(diff)) {
    throw new RangeError(
      `Time difference ${formatTimeValue(a)} - ${formatTimeValue(b)} is not representable in integer microseconds`
    );
  }
  return diff;
}

/**
 * Format as "sec:usec" for log lines
 */
export function formatTimeValue(tv: TimeValue): string {
  return `${tv.seconds}${TIME_VALUE_SEPARATOR}${tv.microseconds}`;
}
