export { HeaderValidator } from './HeaderValidator';

export { TimestampRecordReader } from './TimestampRecordReader';

export {
    CSVExporter,
    FileRowSink,
    MemoryRowSink,
    type RowSink
} from './CSVExporter';

export type {
    TimestampReadResult,
    CSVLayout
} from './types';
