import { LineSource } from '../shared/csv';
import { formatTimeValue } from '../time-sync';
import { SequentialInterpolationEngine, InterpolationStatus } from './interpolation';
import { TrackerSampleReader } from './tracker';
import { HeaderValidator, TimestampRecordReader, CSVExporter } from './recording';
import { SynthesisConfig, SynthesisStats, StopReason, SkippedRowPolicy } from './shared/types';
import { PerformanceLogger } from './shared/PerformanceLogger';

const LOG_CATEGORY = 'Synthesis';

const TRACKER_SOURCE = 'tracker data file';
const TIMESTAMP_SOURCE = 'time reference data file';

export interface SynthesisInputs {
    tracker: LineSource;
    timestamps: LineSource;
    /** Called once both headings are validated and the engine has its first window. */
    openOutput: () => CSVExporter;
}

/**
 * Drives one synthesis pass: validates both inputs, primes the interpolation
 * engine, then queries it once per reference record and writes the results.
 *
 * Flow:
 * TimestampRecordReader → SequentialInterpolationEngine (pulls TrackerSampleReader) → CSVExporter
 */
export class MotionSynthesisCoordinator {
    constructor(private readonly config: SynthesisConfig) {}

    /**
     * Run to completion. Startup problems (headings, initial keyframes, output
     * file) throw; per-record conditions only show up in the returned stats.
     */
    run(inputs: SynthesisInputs): SynthesisStats {
        const { csv } = this.config;

        HeaderValidator.validate(inputs.tracker.readLine(), this.config.trackerHeaders, TRACKER_SOURCE, csv);
        const referenceHeader = HeaderValidator.validate(
            inputs.timestamps.readLine(),
            this.config.timestampHeaders,
            TIMESTAMP_SOURCE,
            csv
        );

        const trackerReader = new TrackerSampleReader(inputs.tracker, csv.delimiter);
        const engine = new SequentialInterpolationEngine(trackerReader);
        PerformanceLogger.debug(
            LOG_CATEGORY,
            `Initial window [ ${formatTimeValue(engine.getStartTime())} , ${formatTimeValue(engine.getEndTime())} ]`
        );

        const exporter = inputs.openOutput();
        try {
            exporter.writeHeader(referenceHeader);
            const stats = PerformanceLogger.time(LOG_CATEGORY, 'run', () =>
                this.processRecords(new TimestampRecordReader(inputs.timestamps, csv.delimiter), engine, exporter)
            );
            PerformanceLogger.info(
                LOG_CATEGORY,
                `Done (${stats.stopReason}): ${stats.recordsRead} records, ${stats.rowsWritten} rows written, ` +
                `${stats.rowsSkipped} skipped, ${trackerReader.readCount} tracker reads`
            );
            return stats;
        } finally {
            exporter.close();
        }
    }

    private processRecords(
        records: TimestampRecordReader,
        engine: SequentialInterpolationEngine,
        exporter: CSVExporter
    ): SynthesisStats {
        let recordsRead = 0;
        let rowsSkipped = 0;
        let beforeRecordedData = 0;
        let unexpectedFailures = 0;
        let stopReason: StopReason | null = null;

        while (stopReason === null) {
            const record = records.next();
            if (record.kind === 'end') {
                PerformanceLogger.info(LOG_CATEGORY, 'Out of time reference data, all done');
                stopReason = StopReason.END_OF_RECORDS;
                break;
            }
            if (record.kind === 'malformed') {
                PerformanceLogger.warn(LOG_CATEGORY, `Stopping at malformed time reference record: ${record.reason}`, { line: record.line });
                stopReason = StopReason.MALFORMED_RECORD;
                break;
            }

            recordsRead++;
            const result = engine.query(record.time);
            switch (result.status) {
                case InterpolationStatus.SUCCESSFUL:
                    if (exporter.rowsWritten === 0) {
                        PerformanceLogger.info(LOG_CATEGORY, 'Starting to write data rows');
                    }
                    exporter.writePose(result.pose, record.line);
                    break;

                case InterpolationStatus.BEFORE_RECORDED_DATA:
                    beforeRecordedData++;
                    PerformanceLogger.debug(
                        LOG_CATEGORY,
                        `${formatTimeValue(record.time)} not in [ ${formatTimeValue(engine.getStartTime())} , ${formatTimeValue(engine.getEndTime())} ]`
                    );
                    if (this.config.skippedRows === SkippedRowPolicy.PLACEHOLDER) {
                        exporter.writePlaceholder(record.line);
                    } else {
                        rowsSkipped++;
                    }
                    break;

                case InterpolationStatus.OUT_OF_DATA:
                    PerformanceLogger.info(LOG_CATEGORY, `Out of data from the tracker at ${formatTimeValue(record.time)}`);
                    stopReason = StopReason.OUT_OF_DATA;
                    break;

                case InterpolationStatus.OTHER_UNEXPECTED_FAILURE:
                    unexpectedFailures++;
                    rowsSkipped++;
                    PerformanceLogger.error(LOG_CATEGORY, `Interpolation failed for ${formatTimeValue(record.time)}`);
                    break;
            }
        }

        return {
            recordsRead,
            rowsWritten: exporter.rowsWritten,
            rowsSkipped,
            beforeRecordedData,
            unexpectedFailures,
            stopReason
        };
    }
}
