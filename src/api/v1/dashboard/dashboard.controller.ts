// src/api/v1/dashboard/dashboard.controller.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { Logger } from 'pino';
import { z } from 'zod';

import { ConfigService } from '../../../config/config.service';
import { DashboardDataService } from '../../../services/dashboardData.service';
import { LoggingService } from '../../../services/logging.service';
import { COUNT_COLUMNS } from '../../../types/dataset.types';
import { getErrorMessageAndStack } from '../../../utils/errorUtils';
import {
    presentCountryDetail,
    presentMapPoints,
    presentObservationPage,
    presentSummary,
} from './dashboard.presenter';

const MAX_PAGE_SIZE = 1000;

const getControllerLogger = (req: Request, routeName: string): Logger => {
    const loggingService = container.resolve(LoggingService);
    return loggingService.getLogger('app').child({
        controller: 'DashboardController',
        route: routeName,
        requestId: req.get('x-request-id'),
    });
};

const topQuerySchema = z.object({
    n: z.coerce.number().int().min(0).optional(),
    column: z.enum(COUNT_COLUMNS).optional(),
});

const mapPointsQuerySchema = z.object({
    limit: z.coerce.number().int().min(0).optional(),
});

const observationsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(100),
    offset: z.coerce.number().int().min(0).default(0),
});

const sendInvalidInput = (res: Response, logger: Logger, error: z.ZodError, query: unknown): void => {
    logger.warn({ errors: error.format(), query }, 'Invalid query string.');
    res.status(400).json({ message: 'Invalid input', errors: error.format() });
};

export const getSummary = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(req, 'getSummary');
    try {
        const dashboardData = container.resolve(DashboardDataService);
        const configService = container.resolve(ConfigService);

        const summary = await dashboardData.getSummary();
        const top = await dashboardData.getTopN();
        res.status(200).json(presentSummary(summary, top, configService.dataset.summaryCountryLimit));
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        logger.error({ errorMessage: message, stack }, 'Failed to build dashboard summary.');
        next(error);
    }
};

export const getTopCountries = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(req, 'getTopCountries');
    const validation = topQuerySchema.safeParse(req.query);
    if (!validation.success) {
        sendInvalidInput(res, logger, validation.error, req.query);
        return;
    }

    try {
        const { n, column } = validation.data;
        const dashboardData = container.resolve(DashboardDataService);
        res.status(200).json(await dashboardData.getTopN(n, column));
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        logger.error({ errorMessage: message, stack }, 'Failed to rank countries.');
        next(error);
    }
};

export const getCountryDetail = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(req, 'getCountryDetail');
    const { name } = req.params;

    try {
        const dashboardData = container.resolve(DashboardDataService);
        const rows = await dashboardData.getCountryDetail(name);
        if (rows.length === 0) {
            logger.info({ country: name }, 'No observations for country.');
            res.status(404).json({ status: 'error', statusCode: 404, message: `No observations found for country "${name}".` });
            return;
        }
        res.status(200).json(presentCountryDetail(name, rows));
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        logger.error({ country: name, errorMessage: message, stack }, 'Failed to build country detail.');
        next(error);
    }
};

export const getMapPoints = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(req, 'getMapPoints');
    const validation = mapPointsQuerySchema.safeParse(req.query);
    if (!validation.success) {
        sendInvalidInput(res, logger, validation.error, req.query);
        return;
    }

    try {
        const dashboardData = container.resolve(DashboardDataService);
        const points = await dashboardData.getMapPoints(validation.data.limit);
        res.status(200).json(presentMapPoints(points));
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        logger.error({ errorMessage: message, stack }, 'Failed to collect map points.');
        next(error);
    }
};

export const getObservations = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const logger = getControllerLogger(req, 'getObservations');
    const validation = observationsQuerySchema.safeParse(req.query);
    if (!validation.success) {
        sendInvalidInput(res, logger, validation.error, req.query);
        return;
    }

    try {
        const { limit, offset } = validation.data;
        const dashboardData = container.resolve(DashboardDataService);
        const table = await dashboardData.getRaw();
        res.status(200).json(presentObservationPage(table, limit, offset));
    } catch (error: unknown) {
        const { message, stack } = getErrorMessageAndStack(error);
        logger.error({ errorMessage: message, stack }, 'Failed to page observations.');
        next(error);
    }
};
