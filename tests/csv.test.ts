import { escapeCsv, parseCsv, parseCsvRows, toCsv } from '../src/utils/csv';

describe('CSV utilities', () => {
    describe('parseCsvRows', () => {
        it('should split simple rows and fields', () => {
            expect(parseCsvRows('a,b,c\n1,2,3\n')).toEqual([
                ['a', 'b', 'c'],
                ['1', '2', '3']
            ]);
        });

        it('should handle quoted commas, doubled quotes and embedded newlines', () => {
            const text = 'name,note\n"Shree Cement, Ltd","said ""hi""\nthen left"\n';

            expect(parseCsvRows(text)).toEqual([
                ['name', 'note'],
                ['Shree Cement, Ltd', 'said "hi"\nthen left']
            ]);
        });

        it('should accept CRLF endings, a BOM and a missing final newline', () => {
            expect(parseCsvRows('\uFEFFsymbol,price\r\nAAA,10\r\nBBB,20')).toEqual([
                ['symbol', 'price'],
                ['AAA', '10'],
                ['BBB', '20']
            ]);
        });
    });

    describe('parseCsv', () => {
        it('should key records by trimmed header and report line numbers', () => {
            const parsed = parseCsv(' symbol , price\nAAA,10\n\nBBB,20\n');

            expect(parsed.headers).toEqual(['symbol', 'price']);
            expect(parsed.rows).toEqual([
                { line: 2, record: { symbol: 'AAA', price: '10' } },
                { line: 4, record: { symbol: 'BBB', price: '20' } }
            ]);
        });

        it('should report the physical line a row starts on after a multi-line field', () => {
            const parsed = parseCsv('name,note\n"Alpha","first\r\nsecond"\nBeta,plain\n');

            expect(parsed.rows.map(r => r.line)).toEqual([2, 4]);
            expect(parsed.rows[1].record).toEqual({ name: 'Beta', note: 'plain' });
        });

        it('should fill missing trailing fields with empty strings', () => {
            const parsed = parseCsv('symbol,isin\nAAA\n');
            expect(parsed.rows[0].record).toEqual({ symbol: 'AAA', isin: '' });
        });

        it('should return nothing for empty input', () => {
            expect(parseCsv('')).toEqual({ headers: [], rows: [] });
        });
    });

    describe('escapeCsv', () => {
        it('should leave plain values untouched', () => {
            expect(escapeCsv('RELIANCE')).toBe('RELIANCE');
            expect(escapeCsv(12.5)).toBe('12.5');
        });

        it('should quote values containing separators or quotes', () => {
            expect(escapeCsv('Larsen, Toubro')).toBe('"Larsen, Toubro"');
            expect(escapeCsv('5" pipe')).toBe('"5"" pipe"');
            expect(escapeCsv('two\nlines')).toBe('"two\nlines"');
        });

        it('should render null and undefined as empty', () => {
            expect(escapeCsv(null)).toBe('');
            expect(escapeCsv(undefined)).toBe('');
        });
    });

    describe('toCsv', () => {
        it('should write a header line and one line per row', () => {
            expect(toCsv(['a', 'b'], [['x, y', 1], ['z', 2]])).toBe('a,b\n"x, y",1\nz,2\n');
        });

        it('should read back what it writes', () => {
            const text = toCsv(['company', 'note'], [['Acme "Best", Ltd', 'multi\nline']]);
            expect(parseCsv(text).rows[0].record).toEqual({ company: 'Acme "Best", Ltd', note: 'multi\nline' });
        });
    });
});
