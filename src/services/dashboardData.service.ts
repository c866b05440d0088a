// src/services/dashboardData.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { DatasetFetcherService } from './datasetFetcher.service';
import { DatasetReaderService } from './datasetReader.service';
import { ObservationNormalizerService } from './observationNormalizer.service';
import { AggregateCacheService } from './aggregateCache.service';
import { ObservationAggregatorService, latestDate } from './observationAggregator.service';
import {
    CountColumn,
    CountryDetail,
    CountrySummary,
    DashboardSummary,
    MapPoint,
    ObservationTable,
} from '../types/dataset.types';

/**
 * Read side of the dashboard: fetch, read, normalize and aggregate on first use,
 * then serve from the aggregate cache.
 */
@singleton()
export class DashboardDataService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(DatasetFetcherService) private fetcher: DatasetFetcherService,
        @inject(DatasetReaderService) private reader: DatasetReaderService,
        @inject(ObservationNormalizerService) private normalizer: ObservationNormalizerService,
        @inject(AggregateCacheService) private cache: AggregateCacheService,
        @inject(ObservationAggregatorService) private aggregator: ObservationAggregatorService
    ) {
        this.serviceLogger = this.loggingService.getLogger('app', { service: 'DashboardDataService' });
    }

    /**
     * Populates the data directory ahead of the first request.
     */
    public async prepare(): Promise<string> {
        const workingDir = await this.fetcher.ensureData();
        this.serviceLogger.info({ workingDir }, 'Dataset directory ready.');
        return workingDir;
    }

    public async getRaw(): Promise<ObservationTable> {
        return this.cache.getOrLoad('raw', async () => {
            const workingDir = await this.fetcher.ensureData();
            const table = await this.reader.readAll(workingDir);
            return this.normalizer.normalize(table);
        });
    }

    /**
     * Country snapshot and global time series. Both views are built from the same
     * table and published together, so a reader never sees one without the other.
     */
    public async getSummary(): Promise<DashboardSummary> {
        const cachedByCountry = this.cache.peek('by_country');
        const cachedByDate = this.cache.peek('by_date');
        if (cachedByCountry && cachedByDate) {
            return { byCountry: cachedByCountry, byDate: cachedByDate };
        }

        const table = await this.getRaw();
        const byCountry = this.aggregator.bySnapshot(table);
        const byDate = this.aggregator.byDate(table);
        this.cache.publish({ by_country: byCountry, by_date: byDate });
        this.serviceLogger.info({ countries: byCountry.length, dates: byDate.length }, 'Summary views built.');
        return { byCountry, byDate };
    }

    public async getCountryDetail(name: string): Promise<CountryDetail[]> {
        const table = await this.getRaw();
        return this.aggregator.byCountryDetail(table, name);
    }

    public async getTopN(
        n: number = this.configService.dataset.topNDefault,
        column: CountColumn = 'confirmed'
    ): Promise<CountrySummary[]> {
        const { byCountry } = await this.getSummary();
        return this.aggregator.topN(byCountry, n, column);
    }

    /**
     * Rows carrying both coordinates, restricted to the latest date when the table has dates.
     */
    public async getMapPoints(limit: number = this.configService.dataset.mapPointLimit): Promise<MapPoint[]> {
        const cap = Math.max(0, Math.floor(limit));
        const table = await this.getRaw();
        const latestTime = latestDate(table.rows)?.getTime();
        const points: MapPoint[] = [];

        for (const row of table.rows) {
            if (points.length >= cap) break;
            if (row.lat === null || row.lon === null) continue;
            if (latestTime !== undefined && row.date?.getTime() !== latestTime) continue;
            points.push({
                country: row.country,
                province_state: row.province_state,
                date: row.date,
                lat: row.lat,
                lon: row.lon,
                confirmed: row.confirmed,
                deaths: row.deaths,
                recovered: row.recovered,
            });
        }
        return points;
    }

    public reset(): void {
        this.cache.reset();
    }
}
