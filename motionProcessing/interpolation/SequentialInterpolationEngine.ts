/**
 * SequentialInterpolationEngine - Interpolates tracker poses at query timestamps.
 *
 * Feed it non-decreasing timestamps and it slides a two-keyframe window
 * forward over the tracker stream, pulling a new sample only once a query
 * has passed the current window's end. No backward seeking: a query that
 * precedes the current window start after an advance is a caller error
 * and simply reports BEFORE_RECORDED_DATA.
 */

import { Keyframe, TimeValue } from '../shared/types';
import { formatTimeValue, isBefore } from '../../time-sync';
import { TrackerInitializationError } from '../../shared/errors';
import { PerformanceLogger } from '../shared/PerformanceLogger';
import { TrackerSampleSource } from '../tracker/types';
import { InterpolationWindow } from './InterpolationWindow';
import { EngineState, InterpolationResult, InterpolationStatus } from './types';

const LOG_CATEGORY = 'InterpolationEngine';

export class SequentialInterpolationEngine {
    private state = EngineState.CONSTRUCTING;
    private readonly window: InterpolationWindow;

    /**
     * Reads the two initial keyframes. Throws TrackerInitializationError if
     * either is missing or unreadable, or if they are out of order.
     */
    constructor(private readonly reader: TrackerSampleSource) {
        const first = this.readInitialKeyframe(0);
        const second = this.readInitialKeyframe(1);
        if (isBefore(second.time, first.time)) {
            throw new TrackerInitializationError(1, `timestamp ${formatTimeValue(second.time)} precedes ${formatTimeValue(first.time)}`);
        }
        this.window = new InterpolationWindow(first, second);
        this.state = EngineState.READY;
    }

    getState(): EngineState {
        return this.state;
    }

    isOutOfData(): boolean {
        return this.state === EngineState.EXHAUSTED;
    }

    getStartTime(): TimeValue {
        return { ...this.window.start.time };
    }

    getEndTime(): TimeValue {
        return { ...this.window.end.time };
    }

    /**
     * Interpolated pose at `tv`, or the status explaining why there is none.
     */
    query(tv: TimeValue): InterpolationResult {
        if (this.window.isBeforeStart(tv)) {
            return { status: InterpolationStatus.BEFORE_RECORDED_DATA };
        }

        // Might need to be advanced several times
        while (this.window.needsAdvancing(tv)) {
            if (!this.advance()) {
                return { status: InterpolationStatus.OUT_OF_DATA };
            }
        }

        if (this.isOutOfData()) {
            return { status: InterpolationStatus.OUT_OF_DATA };
        }

        const pose = this.window.interpolate(tv);
        if (pose === null) {
            return { status: InterpolationStatus.OTHER_UNEXPECTED_FAILURE };
        }
        return { status: InterpolationStatus.SUCCESSFUL, pose };
    }

    /**
     * Move the window along one record. False (and EXHAUSTED) once the reader
     * has nothing more; never touches the reader again after that.
     */
    private advance(): boolean {
        if (this.state === EngineState.EXHAUSTED) {
            return false;
        }

        const result = this.reader.read();
        if (result.kind === 'end') {
            PerformanceLogger.info(LOG_CATEGORY, `Tracker data exhausted after ${this.reader.readCount} reads`);
            this.state = EngineState.EXHAUSTED;
            return false;
        }
        if (result.kind === 'malformed') {
            PerformanceLogger.warn(LOG_CATEGORY, `Treating malformed tracker record as end of data: ${result.reason}`, { line: result.line });
            this.state = EngineState.EXHAUSTED;
            return false;
        }

        if (!this.window.shift(result.keyframe)) {
            PerformanceLogger.warn(
                LOG_CATEGORY,
                `Tracker timestamp ${formatTimeValue(result.keyframe.time)} precedes ${formatTimeValue(this.window.end.time)}; treating as end of data`
            );
            this.state = EngineState.EXHAUSTED;
            return false;
        }
        return true;
    }

    private readInitialKeyframe(index: number): Keyframe {
        const result = this.reader.read();
        switch (result.kind) {
            case 'sample':
                return result.keyframe;
            case 'end':
                throw new TrackerInitializationError(index, 'no more records');
            case 'malformed':
                throw new TrackerInitializationError(index, result.reason);
        }
    }
}
