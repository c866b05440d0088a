import { cleanText, parseObservationDate, toCoordinate, toCount } from './coercion';

const ymd = (date: Date | null): [number, number, number] | null =>
    date ? [date.getFullYear(), date.getMonth() + 1, date.getDate()] : null;

describe('parseObservationDate', () => {
    it('reads ISO dates and timestamps', () => {
        expect(ymd(parseObservationDate('2020-03-01'))).toEqual([2020, 3, 1]);
        expect(ymd(parseObservationDate('2020-03-01 10:15:00'))).toEqual([2020, 3, 1]);
    });

    it('reads US month/day layouts with one- or two-digit fields', () => {
        expect(ymd(parseObservationDate('03/22/2020'))).toEqual([2020, 3, 22]);
        expect(ymd(parseObservationDate('3/1/2020'))).toEqual([2020, 3, 1]);
        expect(ymd(parseObservationDate('3/1/2020 10:00'))).toEqual([2020, 3, 1]);
    });

    it('expands two-digit years into the 21st century', () => {
        const parsed = parseObservationDate('1/22/20 17:00');
        expect(ymd(parsed)).toEqual([2020, 1, 22]);
        expect(parsed?.getHours()).toBe(17);
    });

    it('returns null instead of throwing for unreadable input', () => {
        expect(parseObservationDate('not a date')).toBeNull();
        expect(parseObservationDate('')).toBeNull();
        expect(parseObservationDate('   ')).toBeNull();
        expect(parseObservationDate(undefined)).toBeNull();
        expect(parseObservationDate(null)).toBeNull();
        expect(parseObservationDate(42)).toBeNull();
    });

    it('passes plausible Date values through unchanged', () => {
        const date = new Date(2021, 5, 30);
        expect(parseObservationDate(date)).toBe(date);
        expect(parseObservationDate(new Date(Number.NaN))).toBeNull();
    });
});

describe('toCount', () => {
    it('truncates fractions and clamps negatives to zero', () => {
        expect(toCount('12')).toBe(12);
        expect(toCount(' 12.9 ')).toBe(12);
        expect(toCount(7)).toBe(7);
        expect(toCount('-5')).toBe(0);
    });

    it('fills missing and non-numeric values with zero', () => {
        expect(toCount(undefined)).toBe(0);
        expect(toCount(null)).toBe(0);
        expect(toCount('')).toBe(0);
        expect(toCount('n/a')).toBe(0);
        expect(toCount(Number.POSITIVE_INFINITY)).toBe(0);
    });

    it('reads decimal notation only', () => {
        expect(toCount('0x1A')).toBe(0);
        expect(toCount('0b11')).toBe(0);
        expect(toCount('0o7')).toBe(0);
        expect(toCount('Infinity')).toBe(0);
        expect(toCount('1e3')).toBe(1000);
        expect(toCount('+4')).toBe(4);
        expect(toCount('.5')).toBe(0);
    });
});

describe('toCoordinate', () => {
    it('keeps zero as a real coordinate', () => {
        expect(toCoordinate('0')).toBe(0);
        expect(toCoordinate('41.9')).toBe(41.9);
        expect(toCoordinate(-3.7)).toBe(-3.7);
    });

    it('returns null, never 0, for missing or non-numeric input', () => {
        expect(toCoordinate(undefined)).toBeNull();
        expect(toCoordinate('')).toBeNull();
        expect(toCoordinate('north')).toBeNull();
        expect(toCoordinate('0x10')).toBeNull();
        expect(toCoordinate('1,5')).toBeNull();
    });
});

describe('cleanText', () => {
    it('trims and collapses whitespace', () => {
        expect(cleanText('  United   Kingdom ')).toBe('United Kingdom');
        expect(cleanText(12)).toBe('12');
    });

    it('returns null for blank input', () => {
        expect(cleanText('   ')).toBeNull();
        expect(cleanText(undefined)).toBeNull();
        expect(cleanText(null)).toBeNull();
    });
});
