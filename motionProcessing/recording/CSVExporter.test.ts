/**
 * CSVExporter Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CSVExporter, MemoryRowSink } from './CSVExporter';
import { OutputFileError } from '../../shared/errors';
import { Pose } from '../shared/types';

const pose: Pose = {
    position: { x: 0.5, y: -2, z: 1e-7 },
    orientation: { w: 1, x: 0, y: 0, z: 0 }
};

describe('CSVExporter', () => {
    it('writes quoted pose headings before the reference heading row', () => {
        const sink = new MemoryRowSink();
        new CSVExporter(sink).writeHeader('sec,usec,image');
        expect(sink.lines).toEqual(['"refx","refy","refz","refqw","refqx","refqy","refqz",sec,usec,image']);
    });

    it('prefixes each reference record with the pose', () => {
        const sink = new MemoryRowSink();
        const exporter = new CSVExporter(sink);
        exporter.writePose(pose, '4,250,img.png');
        expect(sink.lines).toEqual(['0.5,-2,1e-7,1,0,0,0,4,250,img.png']);
        expect(exporter.rowsWritten).toBe(1);
    });

    it('writes seven empty fields for a placeholder row', () => {
        const sink = new MemoryRowSink();
        const exporter = new CSVExporter(sink);
        exporter.writePlaceholder('0,1');
        expect(sink.lines).toEqual([',,,,,,,0,1']);
        expect(exporter.rowsWritten).toBe(1);
    });

    it('formats numbers with shortest round-trip text', () => {
        expect(CSVExporter.formatPose({
            position: { x: 0.1 + 0.2, y: 10, z: -0 },
            orientation: { w: Math.SQRT1_2, x: 0, y: 0, z: Math.SQRT1_2 }
        })).toBe('0.30000000000000004,10,0,0.7071067811865476,0,0,0.7071067811865476');
    });

    it('closes its sink', () => {
        const sink = new MemoryRowSink();
        new CSVExporter(sink).close();
        expect(sink.closed).toBe(true);
    });

    it('expands a leading tilde', () => {
        expect(CSVExporter.expandHomePath('~/out.csv')).toBe(path.join(os.homedir(), 'out.csv'));
        expect(CSVExporter.expandHomePath('out.csv')).toBe('out.csv');
    });

    describe('file output', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-exporter-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('writes newline-terminated rows to disk', () => {
            const filePath = path.join(tmpDir, 'outData.csv');
            const exporter = CSVExporter.toFile(filePath);
            exporter.writeHeader('sec,usec');
            exporter.writePose(pose, '1,0');
            exporter.close();

            expect(fs.readFileSync(filePath, 'utf-8')).toBe(
                '"refx","refy","refz","refqw","refqx","refqy","refqz",sec,usec\n0.5,-2,1e-7,1,0,0,0,1,0\n'
            );
        });

        it('rejects a path in a missing directory', () => {
            expect(() => CSVExporter.toFile(path.join(tmpDir, 'missing', 'out.csv'))).toThrow(OutputFileError);
        });
    });
});
