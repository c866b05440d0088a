// src/loaders/express.loader.ts
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { container } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { requestLoggerMiddleware } from '../middleware/requestLogger.middleware';
import createApiRouter from '../api';
import { errorHandlerMiddleware, notFoundHandler } from '../middleware/errorHandler.middleware';

/**
 * Builds the Express application: CORS, request logging, the versioned API and the error handlers.
 */
export const loadExpress = (): Express => {
    const configService = container.resolve(ConfigService);
    const app = express();

    const origins = configService.corsAllowedOrigins;
    app.use(cors({
        origin: origins.includes('*') ? '*' : origins,
        methods: ['GET', 'OPTIONS'],
        optionsSuccessStatus: 200,
    }));
    app.use(express.json());
    app.use(requestLoggerMiddleware);

    app.get('/', (req: Request, res: Response) => {
        res.status(200).send('Outbreak stats server is running');
    });

    app.use('/api', createApiRouter());

    app.use(notFoundHandler);
    app.use(errorHandlerMiddleware);
    return app;
};
