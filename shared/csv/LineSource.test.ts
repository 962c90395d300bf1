/**
 * LineSource Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StringLineSource, FileLineSource } from './LineSource';
import { InputFileError } from '../errors';

function drain(source: { readLine(): string | null }): string[] {
  const lines: string[] = [];
  for (let line = source.readLine(); line !== null; line = source.readLine()) {
    lines.push(line);
  }
  return lines;
}

describe('StringLineSource', () => {
  it('serves cleaned lines in order', () => {
    const source = new StringLineSource('a,b\r\nc,d\r\n');
    expect(drain(source)).toEqual(['a,b', 'c,d']);
  });

  it('returns the final line when there is no trailing newline', () => {
    expect(drain(new StringLineSource('a\nb'))).toEqual(['a', 'b']);
  });

  it('keeps blank interior lines', () => {
    expect(drain(new StringLineSource('a\n\nb\n'))).toEqual(['a', '', 'b']);
  });

  it('is empty for empty text', () => {
    expect(new StringLineSource('').readLine()).toBeNull();
  });

  it('builds from a line array', () => {
    expect(drain(StringLineSource.fromLines(['x', 'y']))).toEqual(['x', 'y']);
  });

  it('stays exhausted after close', () => {
    const source = new StringLineSource('a\nb\n');
    source.close();
    expect(source.readLine()).toBeNull();
  });
});

describe('FileLineSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'line-source-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads lines from disk', () => {
    const file = path.join(dir, 'data.csv');
    fs.writeFileSync(file, 'sec,usec\r\n0,1\r\n2,3');
    const source = new FileLineSource(file);
    expect(drain(source)).toEqual(['sec,usec', '0,1', '2,3']);
    source.close();
  });

  it('joins lines that span read chunks', () => {
    const file = path.join(dir, 'long.csv');
    const longLine = 'x'.repeat(100_000);
    fs.writeFileSync(file, `${longLine}\nend\n`);
    const source = new FileLineSource(file);
    expect(drain(source)).toEqual([longLine, 'end']);
    source.close();
  });

  it('throws InputFileError for a missing file', () => {
    expect(() => new FileLineSource(path.join(dir, 'missing.csv'))).toThrow(InputFileError);
  });
});
