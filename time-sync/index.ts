/**
 * Time Value Module - Public API
 *
 * Integer second/microsecond timestamps shared by the tracker reader,
 * the interpolation engine and the reference-record reader.
 */

export {
  createTimeValue,
  fromMicroseconds,
  normalizeTimeValue,
  compareTimeValues,
  isBefore,
  timeValuesEqual,
  microsecondsDifference,
  formatTimeValue
} from './TimeValue';

export {
  MICROSECONDS_PER_SECOND,
  INT32_MICROSECONDS_MAX,
  TIME_VALUE_SEPARATOR
} from './constants';

export type {
  TimeValue,
  Seconds,
  Microseconds,
  MicrosecondsDiff
} from './types';
