/**
 * Types for the tracker sample reader.
 */

import { Keyframe } from '../shared/types';

/**
 * Outcome of pulling one record from the tracker stream.
 *
 * 'malformed' is reported separately only so it can be logged; the
 * interpolation engine treats it exactly like 'end'.
 */
export type TrackerReadResult =
    | { kind: 'sample'; keyframe: Keyframe }
    | { kind: 'end' }
    | { kind: 'malformed'; line: string; reason: string };

/** Anything that can hand the engine tracker keyframes in time order. */
export interface TrackerSampleSource {
    read(): TrackerReadResult;
    readonly readCount: number;
}
