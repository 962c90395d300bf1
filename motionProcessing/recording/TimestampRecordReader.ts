/**
 * TimestampRecordReader - Reads the reference timestamp file record by record.
 *
 * Only the leading sec/usec fields are interpreted; whatever follows is
 * payload and travels through untouched.
 */

import { LineSource, getFields, COMMA_CHAR } from '../../shared/csv';
import { createTimeValue } from '../../time-sync';
import { TIMESTAMP_FIELD_COUNT } from '../shared/constants';
import { parseInteger } from '../shared/utils';
import { TimestampReadResult } from './types';

export class TimestampRecordReader {
    private reads = 0;

    constructor(
        private readonly source: LineSource,
        private readonly delimiter: string = COMMA_CHAR
    ) {}

    get readCount(): number {
        return this.reads;
    }

    next(): TimestampReadResult {
        const line = this.source.readLine();
        if (line === null) {
            return { kind: 'end' };
        }
        this.reads++;

        const fields = getFields(line, TIMESTAMP_FIELD_COUNT, this.delimiter);
        if (fields.length < TIMESTAMP_FIELD_COUNT) {
            return {
                kind: 'malformed',
                line,
                reason: `Got only ${fields.length} fields, wanted ${TIMESTAMP_FIELD_COUNT}`
            };
        }

        const seconds = parseInteger(fields[0]);
        const microseconds = parseInteger(fields[1]);
        if (seconds === null || microseconds === null) {
            return { kind: 'malformed', line, reason: 'timestamp fields are not integers' };
        }

        return { kind: 'record', time: createTimeValue(seconds, microseconds), line };
    }
}
