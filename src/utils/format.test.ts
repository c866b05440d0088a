import { formatCount, formatDay, formatTimestamp } from './format';

describe('formatCount', () => {
    it('groups thousands and truncates fractions', () => {
        expect(formatCount(0)).toBe('0');
        expect(formatCount(999)).toBe('999');
        expect(formatCount(1234567)).toBe('1,234,567');
        expect(formatCount(1999.99)).toBe('1,999');
    });

    it('prints 0 for absent or non-finite values', () => {
        expect(formatCount(null)).toBe('0');
        expect(formatCount(undefined)).toBe('0');
        expect(formatCount(Number.NaN)).toBe('0');
    });
});

describe('date formatting', () => {
    it('formats days and timestamps, passing null through', () => {
        expect(formatDay(new Date(2020, 0, 22, 17, 0))).toBe('2020-01-22');
        expect(formatDay(null)).toBeNull();
        expect(formatTimestamp(new Date(Date.UTC(2020, 0, 22, 17, 0)))).toBe('2020-01-22T17:00:00.000Z');
        expect(formatTimestamp(null)).toBeNull();
    });
});
