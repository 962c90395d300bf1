/**
 * Type definitions for time value arithmetic
 */

// Signed whole seconds of a timestamp
export type Seconds = number;

// Signed microsecond remainder, conventionally in [0, 1_000_000)
export type Microseconds = number;

// Signed integer count of microseconds between two timestamps
export type MicrosecondsDiff = number;

// Timestamp as written by the tracker and reference logs
export interface TimeValue {
  seconds: Seconds;
  microseconds: Microseconds;
}
