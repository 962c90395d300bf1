import { Vector3D } from './types';

/**
 * Component-wise difference a - b.
 */
export const subtractVectors = (a: Vector3D, b: Vector3D): Vector3D => ({
    x: a.x - b.x,
    y: a.y - b.y,
    z: a.z - b.z
});

/**
 * Returns origin + t * delta.
 */
export const addScaledVector = (origin: Vector3D, delta: Vector3D, t: number): Vector3D => ({
    x: origin.x + t * delta.x,
    y: origin.y + t * delta.y,
    z: origin.z + t * delta.z
});

export const copyVector = (v: Vector3D): Vector3D => ({ x: v.x, y: v.y, z: v.z });

/**
 * Parses a decimal field as a finite number, returning null for blank or non-numeric text.
 */
export const parseFiniteNumber = (text: string): number | null => {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
        return null;
    }
    const value = Number(trimmed);
    return isFinite(value) ? value : null;
};

/**
 * Parses a field as a signed integer, returning null for anything else.
 */
export const parseInteger = (text: string): number | null => {
    const value = parseFiniteNumber(text);
    return value !== null && Number.isSafeInteger(value) ? value : null;
};
