import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { quoteField, COMMA_CHAR, DOUBLEQUOTE_CHAR } from '../../shared/csv';
import { OutputFileError } from '../../shared/errors';
import { Pose } from '../shared/types';
import { OUTPUT_PREFIX_HEADERS } from '../shared/constants';
import { CSVLayout } from './types';

/** Destination for finished output lines. */
export interface RowSink {
    writeLine(line: string): void;
    close(): void;
}

/**
 * Synchronous file sink. Lines are written as they arrive; nothing is buffered
 * beyond what the OS does.
 */
export class FileRowSink implements RowSink {
    private fd: number | null;

    constructor(readonly filePath: string) {
        try {
            this.fd = fs.openSync(filePath, 'w');
        } catch (err) {
            throw new OutputFileError(filePath, err instanceof Error ? err.message : String(err));
        }
    }

    writeLine(line: string): void {
        if (this.fd === null) {
            throw new Error(`Output file ${this.filePath} is already closed`);
        }
        fs.writeSync(this.fd, `${line}\n`, null, 'utf-8');
    }

    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }
}

/** Collects lines in memory. */
export class MemoryRowSink implements RowSink {
    readonly lines: string[] = [];
    closed = false;

    writeLine(line: string): void {
        this.lines.push(line);
    }

    close(): void {
        this.closed = true;
    }
}

/**
 * Writes interpolated poses in front of the reference records they were computed for.
 *
 * Row layout: x,y,z,qw,qx,qy,qz,<reference record line>.
 */
export class CSVExporter {
    private rows = 0;

    constructor(
        private readonly sink: RowSink,
        private readonly prefixHeaders: readonly string[] = OUTPUT_PREFIX_HEADERS,
        private readonly layout: CSVLayout = { delimiter: COMMA_CHAR, quote: DOUBLEQUOTE_CHAR }
    ) {}

    /**
     * Open a file-backed exporter. `~` in the path is expanded to the home directory.
     */
    static toFile(outputPath: string, prefixHeaders?: readonly string[], layout?: CSVLayout): CSVExporter {
        const filePath = CSVExporter.expandHomePath(outputPath);
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            throw new OutputFileError(filePath, `directory ${dir} does not exist`);
        }
        return new CSVExporter(new FileRowSink(filePath), prefixHeaders, layout);
    }

    /** Data rows written so far (header excluded). */
    get rowsWritten(): number {
        return this.rows;
    }

    /**
     * Quoted pose headings followed by the reference file's own heading row.
     */
    writeHeader(referenceHeaderLine: string): void {
        const prefix = this.prefixHeaders.map(header => quoteField(header, this.layout.quote));
        this.sink.writeLine([...prefix, referenceHeaderLine].join(this.layout.delimiter));
    }

    writePose(pose: Pose, referenceLine: string): void {
        this.sink.writeLine(`${CSVExporter.formatPose(pose, this.layout.delimiter)}${this.layout.delimiter}${referenceLine}`);
        this.rows++;
    }

    /** Row with empty pose fields, for records that have no pose. */
    writePlaceholder(referenceLine: string): void {
        const empty = this.layout.delimiter.repeat(this.prefixHeaders.length);
        this.sink.writeLine(`${empty}${referenceLine}`);
        this.rows++;
    }

    close(): void {
        this.sink.close();
    }

    /**
     * Pose fields in output order, shortest round-trip number formatting.
     */
    static formatPose(pose: Pose, delimiter: string = COMMA_CHAR): string {
        const { position: p, orientation: q } = pose;
        return [p.x, p.y, p.z, q.w, q.x, q.y, q.z].map(String).join(delimiter);
    }

    /**
     * Expand ~ to home directory (Node.js doesn't do this automatically).
     */
    static expandHomePath(filePath: string): string {
        if (filePath === '~') {
            return os.homedir();
        }
        if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
            return path.join(os.homedir(), filePath.slice(2));
        }
        return filePath;
    }
}
