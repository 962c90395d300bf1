import { Quaternion } from './types';
import { ANGLE, SLERP, IDENTITY_QUATERNION } from './constants';

/**
 * Centralized service for quaternion math used by interpolation.
 */
export class QuaternionService {

    /**
     * Creates identity quaternion (no rotation) for safe fallback scenarios.
     */
    static createIdentity(): Quaternion {
        return { ...IDENTITY_QUATERNION };
    }

    /**
     * Validates quaternion has all required finite numeric components.
     */
    static isValid(q: unknown): q is Quaternion {
        if (typeof q !== 'object' || q === null) {
            return false;
        }
        if (!('w' in q) || !('x' in q) || !('y' in q) || !('z' in q)) {
            return false;
        }
        return isFiniteNumber(q.w) && isFiniteNumber(q.x) && isFiniteNumber(q.y) && isFiniteNumber(q.z);
    }

    /**
     * Calculates quaternion magnitude (length).
     */
    static magnitude(q: Quaternion): number {
        return Math.sqrt(q.w * q.w + q.x * q.x + q.y * q.y + q.z * q.z);
    }

    /**
     * Normalizes quaternion to unit length with fallback to identity on invalid input.
     */
    static normalize(q: Quaternion): Quaternion {
        if (!QuaternionService.isValid(q)) {
            return QuaternionService.createIdentity();
        }

        const norm = QuaternionService.magnitude(q);
        if (norm < ANGLE.EPSILON || !isFinite(norm)) {
            return QuaternionService.createIdentity();
        }

        const invNorm = 1.0 / norm;
        return {
            w: q.w * invNorm,
            x: q.x * invNorm,
            y: q.y * invNorm,
            z: q.z * invNorm
        };
    }

    /**
     * Calculates dot product between two quaternions.
     */
    static dot(q1: Quaternion, q2: Quaternion): number {
        return q1.w * q2.w + q1.x * q2.x + q1.y * q2.y + q1.z * q2.z;
    }

    static negate(q: Quaternion): Quaternion {
        return {
            w: -q.w,
            x: -q.x,
            y: -q.y,
            z: -q.z
        };
    }

    /**
     * Shortest-arc spherical interpolation from q1 (t = 0) to q2 (t = 1).
     *
     * q2 is flipped into q1's hemisphere first, so antipodal inputs become
     * coincident. When the orientations are that close (or the sine of the half
     * angle vanishes) the components are blended linearly and renormalized.
     */
    static slerp(q1: Quaternion, q2: Quaternion, t: number): Quaternion {
        if (t <= 0) return { ...q1 };
        if (t >= 1) return { ...q2 };

        let target = q2;
        let cosHalfTheta = QuaternionService.dot(q1, q2);

        // Take shorter path
        if (cosHalfTheta < 0) {
            target = QuaternionService.negate(q2);
            cosHalfTheta = -cosHalfTheta;
        }

        if (cosHalfTheta > SLERP.LINEAR_FALLBACK_COS) {
            return QuaternionService.nlerp(q1, target, t);
        }

        const halfTheta = Math.acos(cosHalfTheta);
        const sinHalfTheta = Math.sin(halfTheta);
        if (Math.abs(sinHalfTheta) < ANGLE.EPSILON) {
            return QuaternionService.nlerp(q1, target, t);
        }

        const ratioA = Math.sin((1 - t) * halfTheta) / sinHalfTheta;
        const ratioB = Math.sin(t * halfTheta) / sinHalfTheta;

        return {
            w: q1.w * ratioA + target.w * ratioB,
            x: q1.x * ratioA + target.x * ratioB,
            y: q1.y * ratioA + target.y * ratioB,
            z: q1.z * ratioA + target.z * ratioB
        };
    }

    /**
     * Component-wise linear blend, renormalized.
     */
    static nlerp(q1: Quaternion, q2: Quaternion, t: number): Quaternion {
        return QuaternionService.normalize({
            w: lerp(q1.w, q2.w, t),
            x: lerp(q1.x, q2.x, t),
            y: lerp(q1.y, q2.y, t),
            z: lerp(q1.z, q2.z, t)
        });
    }

    /**
     * Rotation angle (radians) taking one orientation to the other; q and -q count as equal.
     */
    static angleBetween(q1: Quaternion, q2: Quaternion): number {
        const cos = Math.min(1, Math.abs(QuaternionService.dot(q1, q2)));
        return 2 * Math.acos(cos);
    }
}

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && isFinite(value);

/**
 * lerp helper function
 */
export const lerp = (a: number, b: number, t: number): number => (1 - t) * a + t * b;
