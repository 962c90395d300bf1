/**
 * Shared numeric and layout constants.
 */

export const IDENTITY_QUATERNION = { w: 1, x: 0, y: 0, z: 0 } as const;

/**
 * Mathematical precision constants for quaternion math.
 */
export enum ANGLE {
    EPSILON = 0.000001,
}

/**
 * Above this |cos(half angle)| the two orientations are treated as coincident
 * and blended linearly instead of spherically.
 */
export enum SLERP {
    LINEAR_FALLBACK_COS = 0.9995,
}

export const TIMESTAMP_HEADERS = ['sec', 'usec'] as const;

export const TRACKER_HEADERS = [...TIMESTAMP_HEADERS, 'x', 'y', 'z', 'qw', 'qx', 'qy', 'qz'] as const;

export const OUTPUT_PREFIX_HEADERS = ['refx', 'refy', 'refz', 'refqw', 'refqx', 'refqy', 'refqz'] as const;

/**
 * Column positions within a tracker record.
 */
export enum TRACKER_FIELD {
    SEC = 0,
    USEC = 1,
    TX = 2,
    TY = 3,
    TZ = 4,
    QW = 5,
    QX = 6,
    QY = 7,
    QZ = 8,
}

export const TRACKER_FIELD_COUNT = TRACKER_HEADERS.length;
export const TIMESTAMP_FIELD_COUNT = TIMESTAMP_HEADERS.length;

export const DEFAULT_OUTPUT_FILE = 'outData.csv';

export const ENV_FILE = '.env.local';

/**
 * Environment variables read by loadEnvironmentConfig.
 */
export const ENV_KEYS = {
    OUTPUT: 'POSE_INTERP_OUTPUT',
    SKIPPED_ROWS: 'POSE_INTERP_SKIPPED_ROWS',
    LOG_LEVEL: 'POSE_INTERP_LOG_LEVEL',
    LOG_FILE: 'POSE_INTERP_LOG_FILE',
} as const;
