// src/api/v1/dashboard/dashboard.presenter.ts
import {
    CountryDetail,
    CountrySummary,
    CountTotals,
    DashboardSummary,
    DateSeries,
    MapPoint,
    ObservationTable,
    RawObservation,
} from '../../../types/dataset.types';
import { formatCount, formatDay, formatTimestamp } from '../../../utils/format';

type FormattedTotals = Record<keyof CountTotals, string>;

type Dated<T extends { date: Date | null }> = Omit<T, 'date'> & { date: string | null };

export type SerializedObservation = Omit<RawObservation, 'date' | 'last_update'> & {
    date: string | null;
    last_update: string | null;
};

export interface SummaryPayload {
    totals: CountTotals;
    formattedTotals: FormattedTotals;
    byCountry: CountrySummary[];
    timeseries: Dated<DateSeries>[];
    top: CountrySummary[];
}

export interface CountryDetailPayload {
    country: string;
    totals: CountTotals;
    formattedTotals: FormattedTotals;
    rows: Dated<CountryDetail>[];
}

export interface ObservationPage {
    total: number;
    limit: number;
    offset: number;
    columns: string[];
    rows: SerializedObservation[];
}

export const sumTotals = (rows: readonly CountTotals[]): CountTotals =>
    rows.reduce<CountTotals>(
        (acc, row) => ({
            confirmed: acc.confirmed + row.confirmed,
            deaths: acc.deaths + row.deaths,
            recovered: acc.recovered + row.recovered,
        }),
        { confirmed: 0, deaths: 0, recovered: 0 }
    );

export const formatTotals = (totals: CountTotals): FormattedTotals => ({
    confirmed: formatCount(totals.confirmed),
    deaths: formatCount(totals.deaths),
    recovered: formatCount(totals.recovered),
});

const serializeSeries = ({ date, ...totals }: DateSeries): Dated<DateSeries> => ({ date: formatDay(date), ...totals });

const serializeDetail = ({ date, ...rest }: CountryDetail): Dated<CountryDetail> => ({ date: formatDay(date), ...rest });

const serializePoint = ({ date, ...rest }: MapPoint): Dated<MapPoint> => ({ date: formatDay(date), ...rest });

/**
 * Landing payload. Totals are taken over the whole snapshot, not only the listed countries.
 */
export const presentSummary = (
    summary: DashboardSummary,
    top: CountrySummary[],
    countryLimit: number
): SummaryPayload => {
    const totals = sumTotals(summary.byCountry);
    return {
        totals,
        formattedTotals: formatTotals(totals),
        byCountry: summary.byCountry.slice(0, countryLimit),
        timeseries: summary.byDate.map(serializeSeries),
        top,
    };
};

export const presentCountryDetail = (country: string, rows: CountryDetail[]): CountryDetailPayload => {
    const totals = sumTotals(rows);
    return {
        country,
        totals,
        formattedTotals: formatTotals(totals),
        rows: rows.map(serializeDetail),
    };
};

export const presentMapPoints = (points: MapPoint[]): Dated<MapPoint>[] => points.map(serializePoint);

export const serializeObservation = ({ date, last_update, ...rest }: RawObservation): SerializedObservation => ({
    ...rest,
    date: formatDay(date),
    last_update: formatTimestamp(last_update),
});

export const presentObservationPage = (table: ObservationTable, limit: number, offset: number): ObservationPage => ({
    total: table.rows.length,
    limit,
    offset,
    columns: table.columns,
    rows: table.rows.slice(offset, offset + limit).map(serializeObservation),
});
