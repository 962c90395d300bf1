/**
 * HeaderValidator Tests
 */

import { HeaderValidator } from './HeaderValidator';
import { HeaderMismatchError } from '../../shared/errors';
import { TRACKER_HEADERS, TIMESTAMP_HEADERS } from '../shared/constants';

describe('HeaderValidator', () => {
    it('accepts the tracker heading row and returns it unchanged', () => {
        const line = 'sec,usec,x,y,z,qw,qx,qy,qz';
        expect(HeaderValidator.validate(line, TRACKER_HEADERS, 'tracker data file')).toBe(line);
    });

    it('strips one pair of surrounding quotes', () => {
        const line = '"sec","usec","x","y","z","qw","qx","qy","qz"';
        expect(HeaderValidator.validate(line, TRACKER_HEADERS, 'tracker data file')).toBe(line);
    });

    it('ignores columns past the expected ones', () => {
        const line = 'sec,usec,label,value';
        expect(HeaderValidator.validate(line, TIMESTAMP_HEADERS, 'time reference data file')).toBe(line);
    });

    it('reports the first mismatched column', () => {
        expect(() => HeaderValidator.validate('sec,usec,x,y,z,qx,qw,qy,qz', TRACKER_HEADERS, 'tracker data file')).toThrow(
            'Heading mismatch in tracker data file, column 5, expected qw, found qx'
        );
    });

    it('compares headings case-sensitively', () => {
        let caught: unknown;
        try {
            HeaderValidator.validate('SEC,usec', TIMESTAMP_HEADERS, 'time reference data file');
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(HeaderMismatchError);
        if (caught instanceof HeaderMismatchError) {
            expect(caught.column).toBe(0);
            expect(caught.expected).toBe('sec');
            expect(caught.found).toBe('SEC');
        }
    });

    it('rejects a row with too few headings', () => {
        expect(() => HeaderValidator.validate('sec,usec,x', TRACKER_HEADERS, 'tracker data file')).toThrow(
            "Couldn't get heading 3 (y) from the first line of the tracker data file"
        );
    });

    it('rejects a missing heading row', () => {
        expect(() => HeaderValidator.validate(null, TIMESTAMP_HEADERS, 'time reference data file')).toThrow(HeaderMismatchError);
    });

    it('honours a custom delimiter', () => {
        expect(HeaderValidator.validate("'sec';'usec'", TIMESTAMP_HEADERS, 'ref', { delimiter: ';', quote: "'" })).toBe("'sec';'usec'");
    });
});
