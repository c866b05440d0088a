// src/services/observationAggregator.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import {
    CountColumn,
    CountryDetail,
    CountrySummary,
    CountTotals,
    DateSeries,
    ObservationTable,
    RawObservation,
} from '../types/dataset.types';
import { cleanText } from '../utils/dataset/coercion';

export const DEFAULT_TOP_N = 10;

const emptyTotals = (): CountTotals => ({ confirmed: 0, deaths: 0, recovered: 0 });

const addCounts = (totals: CountTotals, row: RawObservation): void => {
    totals.confirmed += row.confirmed;
    totals.deaths += row.deaths;
    totals.recovered += row.recovered;
};

/**
 * Latest date present anywhere in the table, or `null` when no row carries a date.
 */
export function latestDate(rows: RawObservation[]): Date | null {
    let latest: Date | null = null;
    for (const row of rows) {
        if (row.date && (latest === null || row.date.getTime() > latest.getTime())) {
            latest = row.date;
        }
    }
    return latest;
}

/**
 * Derived views over a normalized observation table. All operations are pure
 * apart from the `topN` memo.
 */
@singleton()
export class ObservationAggregatorService {
    // keyed by summary-array identity; cached arrays must not be mutated
    private readonly topNMemo = new WeakMap<readonly CountrySummary[], Map<string, CountrySummary[]>>();

    /**
     * Per-country totals at the single global latest date, largest `confirmed` first.
     * A lagging country's feed is therefore under-reported (it has no rows at that date).
     * When no row carries a date the whole table is aggregated.
     */
    public bySnapshot(table: ObservationTable): CountrySummary[] {
        const latest = latestDate(table.rows);
        const latestTime = latest?.getTime();
        const groups = new Map<string, CountrySummary>();

        for (const row of table.rows) {
            if (latestTime !== undefined && row.date?.getTime() !== latestTime) continue;
            let group = groups.get(row.country);
            if (!group) {
                group = { country: row.country, ...emptyTotals() };
                groups.set(row.country, group);
            }
            addCounts(group, row);
        }

        return [...groups.values()].sort((a, b) =>
            b.confirmed - a.confirmed || a.country.localeCompare(b.country));
    }

    /**
     * Global totals per date, oldest first. Rows without a date are left out.
     */
    public byDate(table: ObservationTable): DateSeries[] {
        const groups = new Map<number, DateSeries>();

        for (const row of table.rows) {
            if (!row.date) continue;
            const key = row.date.getTime();
            let group = groups.get(key);
            if (!group) {
                group = { date: row.date, ...emptyTotals() };
                groups.set(key, group);
            }
            addCounts(group, row);
        }

        return [...groups.values()].sort((a, b) => a.date.getTime() - b.date.getTime());
    }

    /**
     * Totals per (date, province) for one country, matched case-insensitively.
     * An unknown country yields an empty list. Undated rows are dropped, unless the
     * table has no `date` column at all, in which case rows group by province alone.
     */
    public byCountryDetail(table: ObservationTable, country: string): CountryDetail[] {
        const wanted = cleanText(country)?.toLowerCase();
        if (!wanted) return [];

        const dated = table.columns.includes('date');
        const groups = new Map<string, CountryDetail>();

        for (const row of table.rows) {
            if (row.country.toLowerCase() !== wanted) continue;
            if (dated && !row.date) continue;
            const date = dated ? row.date : null;
            const key = `${date?.getTime() ?? ''}\u0000${row.province_state}`;
            let group = groups.get(key);
            if (!group) {
                group = { date, province_state: row.province_state, ...emptyTotals() };
                groups.set(key, group);
            }
            addCounts(group, row);
        }

        return [...groups.values()].sort((a, b) =>
            (a.date?.getTime() ?? 0) - (b.date?.getTime() ?? 0)
            || b.confirmed - a.confirmed
            || a.province_state.localeCompare(b.province_state));
    }

    /**
     * First `n` summaries ranked by `column`, descending. Repeated calls with the same
     * array, column and `n` return the same array instance.
     */
    public topN(summaries: readonly CountrySummary[], n: number = DEFAULT_TOP_N, column: CountColumn = 'confirmed'): CountrySummary[] {
        const limit = Math.max(0, Math.floor(n));
        const key = `${column}:${limit}`;

        let perTable = this.topNMemo.get(summaries);
        if (!perTable) {
            perTable = new Map();
            this.topNMemo.set(summaries, perTable);
        }
        const memoized = perTable.get(key);
        if (memoized) return memoized;

        // Array.prototype.sort is stable, so equal values keep the snapshot order.
        const ranked = [...summaries].sort((a, b) => b[column] - a[column]).slice(0, limit);
        perTable.set(key, ranked);
        return ranked;
    }
}
