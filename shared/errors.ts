/**
 * Fatal startup errors.
 *
 * Everything here aborts a run before interpolation begins. Per-query
 * conditions (before data, out of data) are status values, never errors.
 */

// ─────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────

export class InputFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly reason: string
  ) {
    super(`Could not open ${filePath}: ${reason}`);
    this.name = 'InputFileError';
  }
}

export class HeaderMismatchError extends Error {
  constructor(
    public readonly source: string,
    public readonly column: number,
    public readonly expected: string,
    public readonly found: string | null
  ) {
    super(
      found === null
        ? `Couldn't get heading ${column} (${expected}) from the first line of the ${source}`
        : `Heading mismatch in ${source}, column ${column}, expected ${expected}, found ${found}`
    );
    this.name = 'HeaderMismatchError';
  }
}

export class TrackerInitializationError extends Error {
  constructor(
    public readonly keyframeIndex: number,
    public readonly detail: string
  ) {
    super(`Could not read the ${keyframeIndex === 0 ? 'initial' : 'second'} data row from the tracker data: ${detail}`);
    this.name = 'TrackerInitializationError';
  }
}

export class OutputFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly reason: string
  ) {
    super(`Couldn't open the output data file ${filePath}: ${reason}`);
    this.name = 'OutputFileError';
  }
}
