/**
 * HeaderValidator - Checks the heading row of each input file.
 *
 * Headings are compared case-sensitively after one surrounding pair of
 * quotes is stripped. Columns past the expected ones are ignored.
 */

import { getFields, stripQuotes, COMMA_CHAR, DOUBLEQUOTE_CHAR } from '../../shared/csv';
import { HeaderMismatchError } from '../../shared/errors';
import { CSVLayout } from './types';

const DEFAULT_LAYOUT: CSVLayout = { delimiter: COMMA_CHAR, quote: DOUBLEQUOTE_CHAR };

export class HeaderValidator {

    /**
     * Validate a heading row and hand it back unchanged.
     * Throws HeaderMismatchError on a missing, short or mismatched row.
     */
    static validate(
        line: string | null,
        expected: readonly string[],
        source: string,
        layout: CSVLayout = DEFAULT_LAYOUT
    ): string {
        if (line === null) {
            throw new HeaderMismatchError(source, 0, expected[0], null);
        }

        const fields = getFields(line, expected.length, layout.delimiter);
        for (let column = 0; column < expected.length; column++) {
            if (column >= fields.length) {
                throw new HeaderMismatchError(source, column, expected[column], null);
            }
            const found = stripQuotes(fields[column], layout.quote);
            if (found !== expected[column]) {
                throw new HeaderMismatchError(source, column, expected[column], found);
            }
        }

        return line;
    }
}
