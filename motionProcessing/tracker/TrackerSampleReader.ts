/**
 * TrackerSampleReader - Turns tracker CSV records into keyframes.
 *
 * Record layout: sec, usec, x, y, z, qw, qx, qy, qz (scalar quaternion
 * component first). Trailing extra fields are ignored. Orientations are
 * normalized on read.
 */

import { LineSource, getFields, COMMA_CHAR } from '../../shared/csv';
import { createTimeValue } from '../../time-sync';
import { Keyframe } from '../shared/types';
import { TRACKER_FIELD, TRACKER_FIELD_COUNT } from '../shared/constants';
import { QuaternionService } from '../shared/QuaternionService';
import { parseFiniteNumber, parseInteger } from '../shared/utils';
import { TrackerReadResult, TrackerSampleSource } from './types';

export class TrackerSampleReader implements TrackerSampleSource {
    private reads = 0;

    constructor(
        private readonly source: LineSource,
        private readonly delimiter: string = COMMA_CHAR
    ) {}

    /** Number of records consumed from the underlying source so far. */
    get readCount(): number {
        return this.reads;
    }

    /**
     * Consume one record. Never retries: a short or unparsable record is
     * reported as 'malformed' and the caller decides what that means.
     */
    read(): TrackerReadResult {
        this.reads++;

        const line = this.source.readLine();
        if (line === null) {
            return { kind: 'end' };
        }

        const fields = getFields(line, TRACKER_FIELD_COUNT, this.delimiter);
        if (fields.length < TRACKER_FIELD_COUNT) {
            return {
                kind: 'malformed',
                line,
                reason: `expected ${TRACKER_FIELD_COUNT} fields, got ${fields.length}`
            };
        }

        return TrackerSampleReader.parseFields(fields, line);
    }

    /**
     * Convert exactly one record's fields into a keyframe.
     */
    static parseFields(fields: readonly string[], line: string): TrackerReadResult {
        const seconds = parseInteger(fields[TRACKER_FIELD.SEC]);
        const microseconds = parseInteger(fields[TRACKER_FIELD.USEC]);
        if (seconds === null || microseconds === null) {
            return { kind: 'malformed', line, reason: 'timestamp fields are not integers' };
        }

        const numbers: number[] = [];
        for (let i: number = TRACKER_FIELD.TX; i <= TRACKER_FIELD.QZ; i++) {
            const value = parseFiniteNumber(fields[i]);
            if (value === null) {
                return { kind: 'malformed', line, reason: `field ${i} ("${fields[i]}") is not a number` };
            }
            numbers.push(value);
        }

        const [x, y, z, qw, qx, qy, qz] = numbers;
        const keyframe: Keyframe = {
            time: createTimeValue(seconds, microseconds),
            pose: {
                position: { x, y, z },
                orientation: QuaternionService.normalize({ w: qw, x: qx, y: qy, z: qz })
            }
        };

        return { kind: 'sample', keyframe };
    }
}
