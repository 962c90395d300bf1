/**
 * Types for the sequential interpolation engine.
 */

import { Pose } from '../shared/types';

/**
 * Per-query outcome. Only SUCCESSFUL carries a pose; the others are
 * expected, reportable conditions rather than errors.
 */
export enum InterpolationStatus {
    BEFORE_RECORDED_DATA = 'before-recorded-data',
    SUCCESSFUL = 'successful',
    OUT_OF_DATA = 'out-of-data',
    OTHER_UNEXPECTED_FAILURE = 'other-unexpected-failure',
}

export type InterpolationResult =
    | { status: InterpolationStatus.SUCCESSFUL; pose: Pose }
    | {
          status:
              | InterpolationStatus.BEFORE_RECORDED_DATA
              | InterpolationStatus.OUT_OF_DATA
              | InterpolationStatus.OTHER_UNEXPECTED_FAILURE;
      };

/** Engine lifecycle; EXHAUSTED is terminal. */
export enum EngineState {
    CONSTRUCTING = 'constructing',
    READY = 'ready',
    EXHAUSTED = 'exhausted',
}
