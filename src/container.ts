// src/container.ts
import 'reflect-metadata';
import axios, { AxiosInstance } from 'axios';
import { container } from 'tsyringe';

import { ConfigService } from './config/config.service';
import { HTTP_CLIENT } from './config/constants';
import { LoggingService } from './services/logging.service';

import { DatasetFetcherService } from './services/datasetFetcher.service';
import { DatasetReaderService } from './services/datasetReader.service';
import { ObservationNormalizerService } from './services/observationNormalizer.service';
import { AggregateCacheService } from './services/aggregateCache.service';
import { ObservationAggregatorService } from './services/observationAggregator.service';
import { DashboardDataService } from './services/dashboardData.service';

// --- Core ---
container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);

// Shared outbound HTTP client. Tests register an in-process stand-in under the same token.
container.register<AxiosInstance>(HTTP_CLIENT, {
    useValue: axios.create({ headers: { 'User-Agent': 'outbreak-stats-server' } }),
});

// --- Dataset pipeline ---
container.registerSingleton(DatasetFetcherService);
container.registerSingleton(DatasetReaderService);
container.registerSingleton(ObservationNormalizerService);
container.registerSingleton(AggregateCacheService);
container.registerSingleton(ObservationAggregatorService);
container.registerSingleton(DashboardDataService);

export default container;
