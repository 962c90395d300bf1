/**
 * LineSource - Ordered, forward-only supply of cleaned text lines.
 *
 * Readers own exactly one source and pull from it synchronously.
 * No seeking: every line is handed out once.
 */

import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { cleanLine } from './CSVFields';
import { InputFileError } from '../errors';

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export interface LineSource {
  /** Next cleaned line, or null once the source is exhausted */
  readLine(): string | null;
  close(): void;
}

// ─────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────

const READ_CHUNK_BYTES = 64 * 1024;

// ─────────────────────────────────────────────────────────────────
// In-memory source
// ─────────────────────────────────────────────────────────────────

/** Serves lines from a string; a final newline does not produce an extra empty line */
export class StringLineSource implements LineSource {
  private readonly lines: string[];
  private index = 0;

  constructor(text: string) {
    const lines = text.split('\n');
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    this.lines = lines;
  }

  static fromLines(lines: readonly string[]): StringLineSource {
    return new StringLineSource(lines.map((line) => `${line}\n`).join(''));
  }

  readLine(): string | null {
    if (this.index >= this.lines.length) {
      return null;
    }
    return cleanLine(this.lines[this.index++]);
  }

  close(): void {
    this.index = this.lines.length;
  }
}

// ─────────────────────────────────────────────────────────────────
// File source
// ─────────────────────────────────────────────────────────────────

/** Buffered synchronous line reader over a file descriptor */
export class FileLineSource implements LineSource {
  private fd: number | null;
  private readonly decoder = new StringDecoder('utf8');
  private readonly chunk = Buffer.alloc(READ_CHUNK_BYTES);
  private pending = '';
  private eof = false;

  constructor(public readonly filePath: string) {
    try {
      this.fd = fs.openSync(filePath, 'r');
    } catch (err) {
      throw new InputFileError(filePath, err instanceof Error ? err.message : String(err));
    }
  }

  readLine(): string | null {
    for (;;) {
      const newline = this.pending.indexOf('\n');
      if (newline !== -1) {
        const line = this.pending.slice(0, newline);
        this.pending = this.pending.slice(newline + 1);
        return cleanLine(line);
      }

      if (this.eof) {
        if (this.pending.length === 0) {
          return null;
        }
        const line = this.pending;
        this.pending = '';
        return cleanLine(line);
      }

      this.fill();
    }
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
    this.eof = true;
    this.pending = '';
  }

  private fill(): void {
    if (this.fd === null) {
      this.eof = true;
      return;
    }
    const bytesRead = fs.readSync(this.fd, this.chunk, 0, this.chunk.length, null);
    if (bytesRead === 0) {
      this.pending += this.decoder.end();
      this.eof = true;
      return;
    }
    this.pending += this.decoder.write(this.chunk.subarray(0, bytesRead));
  }
}
