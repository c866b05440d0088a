// src/loaders/index.ts
import { Express } from 'express';
import { Server as HttpServer } from 'http';
import { container } from 'tsyringe';

import { loadExpress } from './express.loader';
import { DashboardDataService } from '../services/dashboardData.service';
import { LoggingService } from '../services/logging.service';

interface LoadersResult {
    app: Express;
    httpServer: HttpServer;
}

/**
 * Makes the dataset available, then builds the Express app and its HTTP server.
 *
 * @throws {FetchError} When the data directory is empty and the download fails.
 */
export const initLoaders = async (): Promise<LoadersResult> => {
    const logger = container.resolve(LoggingService).getLogger('app', { service: 'MainLoader' });

    logger.info('Preparing dataset directory...');
    await container.resolve(DashboardDataService).prepare();

    const app = loadExpress();
    const httpServer = new HttpServer(app);
    logger.info('Express application loaded.');

    return { app, httpServer };
};
