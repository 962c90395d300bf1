/**
 * CSVFields - Line cleanup and bounded field splitting.
 *
 * Fields are split on a single delimiter character; quoting only matters
 * for header names, where one surrounding quote pair is stripped.
 */

// ─────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────

export const COMMA_CHAR = ',';
export const DOUBLEQUOTE_CHAR = '"';

// ─────────────────────────────────────────────────────────────────
// Lines
// ─────────────────────────────────────────────────────────────────

/** Drop any trailing CR/LF characters from a raw line */
export function cleanLine(raw: string): string {
  let end = raw.length;
  while (end > 0 && (raw[end - 1] === '\n' || raw[end - 1] === '\r')) {
    end--;
  }
  return end === raw.length ? raw : raw.slice(0, end);
}

// ─────────────────────────────────────────────────────────────────
// Fields
// ─────────────────────────────────────────────────────────────────

/**
 * Split at most `maxFields` leading fields off a line.
 *
 * Extra fields past `maxFields` are ignored. Splitting stops when the
 * cursor reaches the end of the line, so a trailing empty field
 * ("a,b,") is not reported and an empty line yields no fields.
 */
export function getFields(line: string, maxFields: number, delimiter: string = COMMA_CHAR): string[] {
  const fields: string[] = [];
  let begin = 0;

  while (fields.length < maxFields && begin < line.length) {
    const end = line.indexOf(delimiter, begin);
    if (end === -1) {
      fields.push(line.slice(begin));
      break;
    }
    fields.push(line.slice(begin, end));
    begin = end + delimiter.length;
  }

  return fields;
}

/** Remove one surrounding pair of quote characters, if present */
export function stripQuotes(field: string, quote: string = DOUBLEQUOTE_CHAR): string {
  if (field.length > 1 && field.startsWith(quote) && field.endsWith(quote)) {
    return field.slice(1, -1);
  }
  return field;
}

export function stripAllQuotes(fields: readonly string[], quote: string = DOUBLEQUOTE_CHAR): string[] {
  return fields.map((field) => stripQuotes(field, quote));
}

/** Wrap a value in quote characters */
export function quoteField(value: string, quote: string = DOUBLEQUOTE_CHAR): string {
  return `${quote}${value}${quote}`;
}
