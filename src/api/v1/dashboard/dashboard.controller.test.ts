import 'reflect-metadata';
import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { container } from 'tsyringe';
import { Express } from 'express';
import { loadExpress } from '../../../loaders/express.loader';
import { ConfigService } from '../../../config/config.service';
import { LoggingService } from '../../../services/logging.service';
import { DashboardDataService } from '../../../services/dashboardData.service';
import { DatasetFetcherService } from '../../../services/datasetFetcher.service';
import { DatasetReaderService } from '../../../services/datasetReader.service';
import { ObservationNormalizerService } from '../../../services/observationNormalizer.service';
import { AggregateCacheService } from '../../../services/aggregateCache.service';
import { ObservationAggregatorService } from '../../../services/observationAggregator.service';
import { createTestServices, TestServices } from '../../../test/testServices';
import { createStubHttpClient, StubReply } from '../../../test/stubHttpClient';

const GEO_REPORT = [
    'Country_Region,Province_State,ObservationDate,Confirmed,Deaths,Lat,Long_',
    'Spain,Madrid,03/01/2020,40,2,40.4,-3.7',
    'Spain,Catalonia,02/29/2020,20,1,41.4,2.2',
].join('\n');

describe('dashboard routes', () => {
    let services: TestServices;

    const createApp = (reply: StubReply = { status: 404 }): Express => {
        const { configService, loggingService } = services;
        const stub = createStubHttpClient(reply);
        const dashboard = new DashboardDataService(
            configService,
            loggingService,
            new DatasetFetcherService(configService, loggingService, stub.client),
            new DatasetReaderService(configService, loggingService),
            new ObservationNormalizerService(loggingService),
            new AggregateCacheService(loggingService),
            new ObservationAggregatorService()
        );
        container.registerInstance(ConfigService, configService);
        container.registerInstance(LoggingService, loggingService);
        container.registerInstance(DashboardDataService, dashboard);
        return loadExpress();
    };

    const writeDataFile = (name: string, content: string): void => {
        fs.mkdirSync(services.dataDir, { recursive: true });
        fs.writeFileSync(path.join(services.dataDir, name), content);
    };

    beforeEach(() => {
        services = createTestServices();
    });

    afterEach(() => {
        container.reset();
        services.cleanup();
    });

    describe('with local data', () => {
        beforeEach(() => writeDataFile('geo.csv', GEO_REPORT));

        it('returns the per-province history of a known country', async () => {
            const response = await request(createApp()).get('/api/v1/dashboard/countries/spain');

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                country: 'spain',
                totals: { confirmed: 60, deaths: 3, recovered: 0 },
                formattedTotals: { confirmed: '60', deaths: '3', recovered: '0' },
                rows: [
                    { date: '2020-02-29', province_state: 'Catalonia', confirmed: 20, deaths: 1, recovered: 0 },
                    { date: '2020-03-01', province_state: 'Madrid', confirmed: 40, deaths: 2, recovered: 0 },
                ],
            });
        });

        it('answers 404 with an error body for an unknown country', async () => {
            const response = await request(createApp()).get('/api/v1/dashboard/countries/Atlantis');

            expect(response.status).toBe(404);
            expect(response.body).toEqual({
                status: 'error',
                statusCode: 404,
                message: 'No observations found for country "Atlantis".',
            });
        });

        it('ranks countries by the requested column', async () => {
            const response = await request(createApp()).get('/api/v1/dashboard/top?n=1&column=deaths');

            expect(response.status).toBe(200);
            expect(response.body).toEqual([{ country: 'Spain', confirmed: 40, deaths: 2, recovered: 0 }]);
        });

        it.each([
            ['/api/v1/dashboard/top?n=abc', 'n'],
            ['/api/v1/dashboard/top?n=-1', 'n'],
            ['/api/v1/dashboard/top?column=active', 'column'],
            ['/api/v1/dashboard/map-points?limit=-1', 'limit'],
            ['/api/v1/dashboard/map-points?limit=1.5', 'limit'],
            ['/api/v1/dashboard/observations?limit=0', 'limit'],
            ['/api/v1/dashboard/observations?limit=1001', 'limit'],
            ['/api/v1/dashboard/observations?offset=-1', 'offset'],
        ])('rejects %s with 400', async (url, field) => {
            const response = await request(createApp()).get(url);

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('Invalid input');
            expect(Object.keys(response.body.errors)).toContain(field);
        });

        it('pages the normalized observations', async () => {
            const response = await request(createApp()).get('/api/v1/dashboard/observations?limit=1&offset=1');

            expect(response.status).toBe(200);
            expect(response.body.total).toBe(2);
            expect(response.body.limit).toBe(1);
            expect(response.body.offset).toBe(1);
            expect(response.body.rows).toHaveLength(1);
            expect(response.body.rows[0].province_state).toBe('Catalonia');
            expect(response.body.rows[0].date).toBe('2020-02-29');
        });
    });

    it('answers 503 when the dataset cannot be downloaded', async () => {
        const response = await request(createApp({ status: 500 })).get('/api/v1/dashboard/summary');

        expect(response.status).toBe(503);
        expect(response.body).toEqual({
            status: 'error',
            statusCode: 503,
            message: 'Failed to fetch dataset from http://dataset.test/covid.zip: Request failed with status code 500',
        });
    });

    it('answers 404 for an unknown route', async () => {
        const response = await request(createApp()).get('/api/v1/nowhere');

        expect(response.status).toBe(404);
        expect(response.body).toEqual({ status: 'error', statusCode: 404, message: 'Not Found - /api/v1/nowhere' });
    });
});
