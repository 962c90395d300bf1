/**
 * Time Value Constants
 *
 * Tracker and reference logs stamp every record with whole seconds plus a
 * microsecond remainder. All arithmetic stays in integer microseconds.
 */

export const MICROSECONDS_PER_SECOND = 1_000_000;

// Largest gap the reference tooling could represent (signed 32-bit microseconds).
// Kept for documentation and tests; differences here are exact far beyond it.
export const INT32_MICROSECONDS_MAX = 2_147_483_647;

// Separator used when printing a TimeValue in log lines ("sec:usec")
export const TIME_VALUE_SEPARATOR = ':';
