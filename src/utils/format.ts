// src/utils/format.ts
import { format as formatDate } from 'date-fns';

const countFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Integer with thousands separators. Fractions are truncated; absent or non-finite values print as "0".
 */
export const formatCount = (value: number | null | undefined): string => {
    if (value === null || value === undefined || !Number.isFinite(value)) return '0';
    return countFormatter.format(Math.trunc(value));
};

export const formatDay = (value: Date | null): string | null =>
    value ? formatDate(value, 'yyyy-MM-dd') : null;

export const formatTimestamp = (value: Date | null): string | null =>
    value ? value.toISOString() : null;
