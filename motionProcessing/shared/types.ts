import { TimeValue } from '../../time-sync';

export type { TimeValue };

/** Unit orientation in scalar-first form. */
export interface Quaternion {
    w: number;
    x: number;
    y: number;
    z: number;
}

export interface Vector3D {
    x: number;
    y: number;
    z: number;
}

/** Position plus orientation, as reported by the tracker or produced by interpolation. */
export interface Pose {
    position: Vector3D;
    orientation: Quaternion;
}

/** Timestamped pose sample from the tracker stream. */
export interface Keyframe {
    time: TimeValue;
    pose: Pose;
}

/** electron-log levels accepted by the logging configuration. */
export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

/**
 * What to do with a reference record whose timestamp precedes the tracker data.
 * OMIT drops the row; PLACEHOLDER writes it with empty pose fields.
 */
export enum SkippedRowPolicy {
    OMIT = 'omit',
    PLACEHOLDER = 'placeholder'
}

/**
 * Run-wide configuration for a synthesis pass.
 * Built once by createSynthesisConfig and passed down, never mutated.
 */
export interface SynthesisConfig {
    csv: {
        delimiter: string;
        quote: string;
    };
    trackerHeaders: readonly string[];
    timestampHeaders: readonly string[];
    outputPrefixHeaders: readonly string[];
    outputPath: string;
    skippedRows: SkippedRowPolicy;
    logging: {
        level: LogLevel;
        filePath: string | null;
    };
}

/** Why a run stopped reading reference records. */
export enum StopReason {
    END_OF_RECORDS = 'end-of-records',
    MALFORMED_RECORD = 'malformed-record',
    OUT_OF_DATA = 'out-of-data'
}

/** Counters reported at the end of a synthesis run. */
export interface SynthesisStats {
    /** Reference records read and queried. */
    recordsRead: number;
    /** Output rows, placeholders included. */
    rowsWritten: number;
    /** Queried records that produced no output row. */
    rowsSkipped: number;
    beforeRecordedData: number;
    unexpectedFailures: number;
    stopReason: StopReason;
}
