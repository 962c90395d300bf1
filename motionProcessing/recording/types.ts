/**
 * Types for the recording I/O module.
 */

import { TimeValue } from '../shared/types';

/**
 * Outcome of pulling one reference record from the timestamp stream.
 * `line` is kept verbatim; it is copied to the output after the pose columns.
 */
export type TimestampReadResult =
    | { kind: 'record'; time: TimeValue; line: string }
    | { kind: 'end' }
    | { kind: 'malformed'; line: string; reason: string };

/** Column layout shared by the header validator and the record readers. */
export interface CSVLayout {
    delimiter: string;
    quote: string;
}
