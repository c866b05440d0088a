// src/types/dataset.types.ts

/**
 * A single cell after CSV parsing or normalization. `null` marks a value that
 * was present but could not be interpreted (absent date, absent coordinate).
 */
export type CellValue = string | number | Date | null;

/**
 * One row of a table keyed by column name. A column absent from the row is
 * `undefined`, i.e. "missing" rather than zero.
 */
export type RawRecord = Record<string, CellValue | undefined>;

export interface RawTable {
    columns: string[];
    rows: RawRecord[];
}

export const COUNT_COLUMNS = ['confirmed', 'deaths', 'recovered'] as const;
export type CountColumn = typeof COUNT_COLUMNS[number];

export const CANONICAL_COLUMNS = [
    'country',
    'province_state',
    'date',
    'last_update',
    'confirmed',
    'deaths',
    'recovered',
    'lat',
    'lon',
] as const;
export type CanonicalColumn = typeof CANONICAL_COLUMNS[number];

/**
 * A normalized observation. Declared as a type alias (not an interface) so that
 * observation rows stay assignable to `RawRecord` and a normalized table can be
 * fed back through the normalizer.
 */
export type RawObservation = {
    country: string;
    province_state: string;
    date: Date | null;
    last_update: Date | null;
    confirmed: number;
    deaths: number;
    recovered: number;
    lat: number | null;
    lon: number | null;
};

export interface ObservationTable {
    /** Canonical columns present in the source, plus the synthesized ones. */
    columns: CanonicalColumn[];
    rows: RawObservation[];
}

export type CountTotals = Record<CountColumn, number>;

export type CountrySummary = { country: string } & CountTotals;

export type DateSeries = { date: Date } & CountTotals;

export type CountryDetail = {
    /** `null` only when none of the country's rows carry a date. */
    date: Date | null;
    province_state: string;
} & CountTotals;

export type MapPoint = {
    country: string;
    province_state: string;
    date: Date | null;
    lat: number;
    lon: number;
} & CountTotals;

export interface DashboardSummary {
    byCountry: CountrySummary[];
    byDate: DateSeries[];
}

/**
 * Cached aggregate kinds and the payload each one holds.
 */
export interface AggregateCacheEntries {
    raw: ObservationTable;
    by_country: CountrySummary[];
    by_date: DateSeries[];
}
export type AggregateKind = keyof AggregateCacheEntries;
