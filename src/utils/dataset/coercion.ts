// src/utils/dataset/coercion.ts
import { parse as dateParse, parseISO, isValid as isDateValid } from 'date-fns';
import { CellValue } from '../../types/dataset.types';

/**
 * Non-ISO layouts seen in the daily report files, tried in order after ISO-8601.
 * Two-digit fields also accept one digit ("3/1/2020"). Four-digit years come first; a two-digit year would otherwise be read as year 20 AD.
 */
const DATE_FORMATS = [
    'MM/dd/yyyy',
    'MM/dd/yyyy HH:mm',
    'MM/dd/yyyy HH:mm:ss',
    'MM/dd/yy',
    'MM/dd/yy HH:mm',
    'MM/dd/yy HH:mm:ss',
    'yyyy/MM/dd',
    'dd.MM.yyyy',
];

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

// Fixed reference so parsing does not depend on the current clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

const isPlausibleDate = (date: Date): boolean =>
    isDateValid(date) && date.getFullYear() >= MIN_YEAR && date.getFullYear() <= MAX_YEAR;

/**
 * Parses an observation date or timestamp.
 * Anything that cannot be read as a plausible calendar date yields `null`, never an exception.
 */
export const parseObservationDate = (value: CellValue | undefined): Date | null => {
    if (value instanceof Date) {
        return isPlausibleDate(value) ? value : null;
    }
    if (typeof value !== 'string') {
        return null;
    }
    const text = value.trim();
    if (!text) {
        return null;
    }

    const iso = parseISO(text);
    if (isPlausibleDate(iso)) {
        return iso;
    }
    for (const format of DATE_FORMATS) {
        const parsed = dateParse(text, format, REFERENCE_DATE);
        if (isPlausibleDate(parsed)) {
            return parsed;
        }
    }
    return null;
};

// Plain decimal notation with an optional exponent; `Number` alone would also take hex, binary and octal literals.
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const toFiniteNumber = (value: CellValue | undefined): number | null => {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value !== 'string') {
        return null;
    }
    const text = value.trim();
    if (!DECIMAL_PATTERN.test(text)) {
        return null;
    }
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Coerces a case count: fractional values are truncated, negatives clamp to 0,
 * and missing or non-numeric input becomes 0.
 */
export const toCount = (value: CellValue | undefined): number => {
    const parsed = toFiniteNumber(value);
    if (parsed === null) {
        return 0;
    }
    return Math.max(0, Math.trunc(parsed));
};

/**
 * Coerces a latitude/longitude. Unparseable input is `null`; 0 is a real coordinate.
 */
export const toCoordinate = (value: CellValue | undefined): number | null => toFiniteNumber(value);

/**
 * Trims and collapses internal whitespace runs. Returns `null` for missing or blank input.
 */
export const cleanText = (value: CellValue | undefined): string | null => {
    if (value === undefined || value === null) {
        return null;
    }
    const text = value instanceof Date ? value.toISOString() : String(value);
    const cleaned = text.trim().replace(/\s+/g, ' ');
    return cleaned === '' ? null : cleaned;
};
