/**
 * QuaternionService Tests
 */

import { QuaternionService, lerp } from './QuaternionService';
import { Quaternion } from './types';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

function createRotationQuat(angleDeg: number, axis: 'x' | 'y' | 'z' = 'x'): Quaternion {
    const halfAngle = (angleDeg * Math.PI / 180) / 2;
    const sin = Math.sin(halfAngle);
    const cos = Math.cos(halfAngle);

    switch (axis) {
        case 'x': return { w: cos, x: sin, y: 0, z: 0 };
        case 'y': return { w: cos, x: 0, y: sin, z: 0 };
        case 'z': return { w: cos, x: 0, y: 0, z: sin };
    }
}

function expectQuatClose(actual: Quaternion, expected: Quaternion, digits = 9): void {
    expect(actual.w).toBeCloseTo(expected.w, digits);
    expect(actual.x).toBeCloseTo(expected.x, digits);
    expect(actual.y).toBeCloseTo(expected.y, digits);
    expect(actual.z).toBeCloseTo(expected.z, digits);
}

// ─────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────

describe('QuaternionService', () => {
    describe('normalize', () => {
        it('scales to unit length', () => {
            const q = QuaternionService.normalize({ w: 2, x: 0, y: 0, z: 0 });
            expect(q).toEqual({ w: 1, x: 0, y: 0, z: 0 });
        });

        it('falls back to identity for a zero quaternion', () => {
            expect(QuaternionService.normalize({ w: 0, x: 0, y: 0, z: 0 })).toEqual(QuaternionService.createIdentity());
        });

        it('falls back to identity for non-finite components', () => {
            expect(QuaternionService.normalize({ w: NaN, x: 0, y: 0, z: 0 })).toEqual(QuaternionService.createIdentity());
        });
    });

    describe('isValid', () => {
        it('accepts a quaternion-shaped object', () => {
            expect(QuaternionService.isValid({ w: 1, x: 0, y: 0, z: 0 })).toBe(true);
        });

        it('rejects missing or non-numeric components', () => {
            expect(QuaternionService.isValid({ w: 1, x: 0, y: 0 })).toBe(false);
            expect(QuaternionService.isValid({ w: '1', x: 0, y: 0, z: 0 })).toBe(false);
            expect(QuaternionService.isValid(null)).toBe(false);
        });
    });

    describe('slerp', () => {
        const identity: Quaternion = { w: 1, x: 0, y: 0, z: 0 };
        const quarterTurn = createRotationQuat(90, 'z');

        it('returns the endpoints exactly at t = 0 and t = 1', () => {
            expect(QuaternionService.slerp(identity, quarterTurn, 0)).toEqual(identity);
            expect(QuaternionService.slerp(identity, quarterTurn, 1)).toEqual(quarterTurn);
        });

        it('splits the arc evenly at t = 0.5 for orthogonal orientations', () => {
            const halfTurnX: Quaternion = { w: 0, x: 1, y: 0, z: 0 };
            expect(QuaternionService.dot(identity, halfTurnX)).toBe(0);

            const mid = QuaternionService.slerp(identity, halfTurnX, 0.5);
            expectQuatClose(mid, { w: Math.SQRT1_2, x: Math.SQRT1_2, y: 0, z: 0 });

            const toStart = QuaternionService.angleBetween(mid, identity);
            const toEnd = QuaternionService.angleBetween(mid, halfTurnX);
            expect(toStart).toBeCloseTo(toEnd, 9);
            expect(toStart).toBeCloseTo(Math.PI / 2, 9);
            expect(QuaternionService.magnitude(mid)).toBeCloseTo(1, 12);
        });

        it('interpolates rotation angle linearly', () => {
            const result = QuaternionService.slerp(identity, quarterTurn, 0.25);
            expectQuatClose(result, createRotationQuat(22.5, 'z'));
        });

        it('takes the shorter arc when the dot product is negative', () => {
            const negatedTarget = QuaternionService.negate(quarterTurn);
            const result = QuaternionService.slerp(identity, negatedTarget, 0.5);
            expectQuatClose(result, createRotationQuat(45, 'z'));
        });

        it('blends linearly for nearly identical orientations', () => {
            const tiny = createRotationQuat(0.001, 'y');
            const result = QuaternionService.slerp(identity, tiny, 0.5);
            expect(QuaternionService.magnitude(result)).toBeCloseTo(1, 12);
            expectQuatClose(result, createRotationQuat(0.0005, 'y'));
        });

        it('handles exactly opposite quaternions without dividing by zero', () => {
            const result = QuaternionService.slerp(identity, QuaternionService.negate(identity), 0.5);
            expectQuatClose(result, identity);
            expect(Number.isFinite(result.w)).toBe(true);
        });
    });

    describe('angleBetween', () => {
        it('treats q and -q as the same rotation', () => {
            const q = createRotationQuat(30, 'x');
            expect(QuaternionService.angleBetween(q, QuaternionService.negate(q))).toBeCloseTo(0, 6);
        });

        it('measures the rotation angle', () => {
            const a = createRotationQuat(10, 'y');
            const b = createRotationQuat(70, 'y');
            expect(QuaternionService.angleBetween(a, b)).toBeCloseTo(60 * Math.PI / 180, 9);
        });
    });

    it('lerp blends scalars', () => {
        expect(lerp(2, 6, 0.25)).toBe(3);
    });
});
