/**
 * InterpolationWindow - The two keyframes currently bracketing queries.
 *
 * Holds start/end plus the derived span (µs) and position delta. The cache
 * is private and recomputed inside every mutation, so it can never be
 * observed stale. Invariant: start.time <= end.time.
 */

import { Keyframe, Pose, TimeValue, Vector3D } from '../shared/types';
import { isBefore, timeValuesEqual, microsecondsDifference } from '../../time-sync';
import { QuaternionService } from '../shared/QuaternionService';
import { subtractVectors, addScaledVector, copyVector } from '../shared/utils';

const copyPose = (pose: Pose): Pose => ({
    position: copyVector(pose.position),
    orientation: { ...pose.orientation }
});

export class InterpolationWindow {
    private startFrame: Keyframe;
    private endFrame: Keyframe;

    // Cached interval data
    private span = 0;
    private delta: Vector3D = { x: 0, y: 0, z: 0 };

    constructor(start: Keyframe, end: Keyframe) {
        if (isBefore(end.time, start.time)) {
            throw new RangeError('Window end precedes window start');
        }
        this.startFrame = start;
        this.endFrame = end;
        this.updateCachedIntervalData();
    }

    get start(): Readonly<Keyframe> {
        return this.startFrame;
    }

    get end(): Readonly<Keyframe> {
        return this.endFrame;
    }

    get spanMicroseconds(): number {
        return this.span;
    }

    get positionDelta(): Readonly<Vector3D> {
        return this.delta;
    }

    isBeforeStart(tv: TimeValue): boolean {
        return isBefore(tv, this.startFrame.time);
    }

    needsAdvancing(tv: TimeValue): boolean {
        return isBefore(this.endFrame.time, tv);
    }

    /**
     * Promote end to start and take `next` as the new end.
     * Returns false, leaving the window untouched, if `next` would precede the current end.
     */
    shift(next: Keyframe): boolean {
        if (isBefore(next.time, this.endFrame.time)) {
            return false;
        }
        this.startFrame = this.endFrame;
        this.endFrame = next;
        this.updateCachedIntervalData();
        return true;
    }

    /**
     * Pose at `tv`, or null when `tv` lies outside [start, end].
     * Boundary timestamps return the keyframe pose verbatim.
     */
    interpolate(tv: TimeValue): Pose | null {
        if (timeValuesEqual(tv, this.startFrame.time)) {
            return copyPose(this.startFrame.pose);
        }
        if (timeValuesEqual(tv, this.endFrame.time)) {
            return copyPose(this.endFrame.pose);
        }
        if (this.isBeforeStart(tv) || this.needsAdvancing(tv) || this.span <= 0) {
            return null;
        }

        const sinceStart = microsecondsDifference(tv, this.startFrame.time);
        const t = sinceStart / this.span;

        const start = this.startFrame.pose;
        return {
            position: addScaledVector(start.position, this.delta, t),
            orientation: QuaternionService.slerp(start.orientation, this.endFrame.pose.orientation, t)
        };
    }

    private updateCachedIntervalData(): void {
        this.span = microsecondsDifference(this.endFrame.time, this.startFrame.time);
        this.delta = subtractVectors(this.endFrame.pose.position, this.startFrame.pose.position);
    }
}
